/**
 * Twitter Auth Tests
 */

import { describe, it, expect } from 'vitest';
import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { getTwitterBearerToken } from './twitter-auth.js';

function tokenEndpoint(data: unknown, seen: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return { data, status: 200, statusText: 'OK', headers: {}, config };
  };
}

describe('getTwitterBearerToken', () => {
  it('should use a configured bearer token without a request', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = axios.create({ adapter: tokenEndpoint({}, seen) });

    expect(await getTwitterBearerToken({ bearerToken: 'test-bearer' }, client)).toBe('test-bearer');
    expect(seen).toHaveLength(0);
  });

  it('should mint a token from consumer keys', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = axios.create({ adapter: tokenEndpoint({ token_type: 'bearer', access_token: 'minted' }, seen) });

    const token = await getTwitterBearerToken({ consumerKey: 'test-key', consumerSecret: 'test-secret' }, client);

    expect(token).toBe('minted');
    expect(seen[0]?.headers?.Authorization).toBe(`Basic ${Buffer.from('test-key:test-secret').toString('base64')}`);
  });

  it('should give up on an unexpected token type', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = axios.create({ adapter: tokenEndpoint({ token_type: 'mac', access_token: 'x' }, seen) });

    expect(await getTwitterBearerToken({ consumerKey: 'test-key', consumerSecret: 'test-secret' }, client)).toBeNull();
  });

  it('should return null without any credential', async () => {
    expect(await getTwitterBearerToken({})).toBeNull();
  });
});
