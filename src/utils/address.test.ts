/**
 * Address Detection Tests
 */

import { describe, it, expect } from 'vitest';
import { extractToken, isSolanaAddress } from './address.js';

const SOL_MINT = '7xKXtg2CW87d97TXJSDpbD5jBkheTqA83TZRuJosgAsU';
const PUMP_MINT = 'GkZ3rQ8mN5pW2xY7vB4cD9eF6hJ1kL3mN8pQ2rSpump';
const EVM_TOKEN = '0x1111111111111111111111111111111111111111';

describe('extractToken', () => {
  it('should prefer a pump.fun mint over other addresses', () => {
    expect(extractToken(`${SOL_MINT} and ${PUMP_MINT}`)).toBe(PUMP_MINT);
  });

  it('should find a Solana address inside free text', () => {
    expect(extractToken(`new launch: ${SOL_MINT} lfg`)).toBe(SOL_MINT);
  });

  it('should fall back to an EVM address', () => {
    expect(extractToken(`base play ${EVM_TOKEN}`)).toBe(EVM_TOKEN);
  });

  it('should return null when nothing looks like an address', () => {
    expect(extractToken('gm frens, no ca yet')).toBeNull();
    expect(extractToken('')).toBeNull();
    expect(extractToken(undefined)).toBeNull();
  });
});

describe('isSolanaAddress', () => {
  it('should accept base58 mints and reject EVM addresses', () => {
    expect(isSolanaAddress(SOL_MINT)).toBe(true);
    expect(isSolanaAddress(EVM_TOKEN)).toBe(false);
    expect(isSolanaAddress('short')).toBe(false);
  });
});
