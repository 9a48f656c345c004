// ===========================================
// CONTRACT ADDRESS DETECTION
// ===========================================

const BASE58 = '1-9A-HJ-NP-Za-km-z';

// Pump.fun mints end in "pump"; checked first so the suffix is kept
const PUMPFUN_ADDRESS = new RegExp(`\\b[${BASE58}]{32,44}pump\\b`);
const SOLANA_ADDRESS = new RegExp(`\\b[${BASE58}]{32,44}\\b`);
const EVM_ADDRESS = /\b0x[a-fA-F0-9]{40}\b/;

const SOLANA_ADDRESS_EXACT = new RegExp(`^[${BASE58}]{32,44}$`);

/**
 * Find the first token address in free text.
 * Priority: pump.fun mint, then any Solana address, then an EVM address.
 */
export function extractToken(text: string | null | undefined): string | null {
  if (!text) return null;

  for (const pattern of [PUMPFUN_ADDRESS, SOLANA_ADDRESS, EVM_ADDRESS]) {
    const match = pattern.exec(text);
    if (match) return normalizeToken(match[0]);
  }

  return null;
}

/**
 * Base58 addresses are case sensitive, so normalization only trims.
 */
export function normalizeToken(address: string): string {
  return address.trim();
}

export function isSolanaAddress(address: string): boolean {
  if (!address || address.startsWith('0x')) return false;
  return SOLANA_ADDRESS_EXACT.test(address);
}
