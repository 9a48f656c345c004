// ===========================================
// MODULE: TOKEN METADATA RESOLVER
// Address -> (name, ticker, chain)
// DexScreener search first, Jupiter fallback for Solana mints
// ===========================================

import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleeper } from '../../utils/sleep.js';
import { isSolanaAddress } from '../../utils/address.js';
import { shortAddress } from '../../utils/format.js';
import type { ProviderResult, TokenMetadata } from '../../types/index.js';

// ============ CONSTANTS ============

const DEXSCREENER_BASE_URL = 'https://api.dexscreener.com';
const JUPITER_BASE_URL = 'https://lite-api.jup.ag';

const PRIMARY_MAX_ATTEMPTS = 3;
const RATE_LIMIT_BACKOFF_MS = 30 * 1000;   // multiplied by attempt number
const RETRY_DELAY_MS = 5 * 1000;
const OTHER_STATUS_MAX_FAILURES = 2;
const REQUEST_TIMEOUT_MS = 10 * 1000;

export const EMPTY_METADATA: TokenMetadata = Object.freeze({ name: null, ticker: null, chain: null });

// ============ RESPONSE SCHEMAS ============

const dexScreenerSearchSchema = z.object({
  pairs: z.array(z.object({
    chainId: z.string().optional(),
    baseToken: z.object({
      name: z.string().nullish(),
      symbol: z.string().nullish(),
    }).optional(),
  })).nullish(),
});

const jupiterTokenSchema = z.object({
  name: z.string().nullish(),
  symbol: z.string().nullish(),
}).nullable();

// ============ HELPERS ============

function toTicker(symbol: string | null | undefined): string | null {
  return symbol ? `$${symbol}` : null;
}

function hasIdentity(metadata: TokenMetadata): boolean {
  return Boolean(metadata.name || metadata.ticker);
}

function isTimeout(error: unknown): boolean {
  return error instanceof AxiosError && (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============ RESOLVER CLASS ============

export interface MetadataResolverOptions {
  dexScreenerBaseUrl?: string;
  jupiterBaseUrl?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  sleep?: Sleeper;
}

export class MetadataResolver {
  private dexScreener: AxiosInstance;
  private jupiter: AxiosInstance;
  private sleep: Sleeper;

  // Process-lifetime cache; only successful resolutions are stored
  private cache: Map<string, TokenMetadata> = new Map();

  constructor(options: MetadataResolverOptions = {}) {
    const shared = {
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
      validateStatus: () => true,
      adapter: options.adapter,
    };

    this.dexScreener = axios.create({ baseURL: options.dexScreenerBaseUrl ?? DEXSCREENER_BASE_URL, ...shared });
    this.jupiter = axios.create({ baseURL: options.jupiterBaseUrl ?? JUPITER_BASE_URL, ...shared });
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Never throws: a token no provider knows resolves to all-null fields.
   */
  async resolve(token: string): Promise<TokenMetadata> {
    const cached = this.cache.get(token);
    if (cached) {
      logger.debug({ token: shortAddress(token) }, 'Metadata cache hit');
      return cached;
    }

    const primary = await this.fetchFromDexScreener(token);
    if (primary.status === 'found' && hasIdentity(primary.value)) {
      this.cache.set(token, primary.value);
      return primary.value;
    }

    if (isSolanaAddress(token)) {
      logger.info({ token: shortAddress(token) }, 'Trying Jupiter fallback');
      const fallback = await this.fetchFromJupiter(token);
      if (fallback.status === 'found' && hasIdentity(fallback.value)) {
        this.cache.set(token, fallback.value);
        return fallback.value;
      }
    }

    return EMPTY_METADATA;
  }

  isCached(token: string): boolean {
    return this.cache.has(token);
  }

  /**
   * DexScreener free-text search with retry + backoff.
   * An empty pair list is final; it is not retried.
   */
  async fetchFromDexScreener(token: string): Promise<ProviderResult<TokenMetadata>> {
    let otherFailures = 0;
    let lastReason = 'no attempts made';

    for (let attempt = 1; attempt <= PRIMARY_MAX_ATTEMPTS; attempt++) {
      const isLastAttempt = attempt === PRIMARY_MAX_ATTEMPTS;
      let response: AxiosResponse<unknown>;

      try {
        logger.debug({ token: shortAddress(token), attempt }, 'DexScreener lookup');
        response = await this.dexScreener.get('/latest/dex/search', { params: { q: token } });
      } catch (error) {
        lastReason = isTimeout(error) ? 'timeout' : describeError(error);
        logger.warn({ token: shortAddress(token), attempt, reason: lastReason }, 'DexScreener request failed');
        if (!isLastAttempt) await this.sleep(RETRY_DELAY_MS);
        continue;
      }

      const { status } = response;

      if (status >= 200 && status < 300) {
        const parsed = dexScreenerSearchSchema.safeParse(response.data);
        if (!parsed.success) {
          logger.warn({ token: shortAddress(token), issues: parsed.error.issues.length }, 'Unexpected DexScreener payload');
          return { status: 'failed', reason: 'malformed response' };
        }

        const pair = parsed.data.pairs?.[0];
        if (!pair) {
          logger.info({ token: shortAddress(token) }, 'Token not found on DexScreener');
          return { status: 'not-found' };
        }

        const metadata: TokenMetadata = {
          name: pair.baseToken?.name || null,
          ticker: toTicker(pair.baseToken?.symbol),
          chain: pair.chainId || null,
        };
        logger.info({ token: shortAddress(token), ...metadata }, 'DexScreener resolved token');
        return { status: 'found', value: metadata };
      }

      lastReason = `HTTP ${status}`;

      if (status === 429) {
        const wait = RATE_LIMIT_BACKOFF_MS * attempt;
        logger.warn({ token: shortAddress(token), attempt, waitMs: wait }, 'DexScreener rate limited');
        if (!isLastAttempt) await this.sleep(wait);
        continue;
      }

      if (status >= 500) {
        logger.warn({ token: shortAddress(token), attempt, status }, 'DexScreener server error');
        if (!isLastAttempt) await this.sleep(RETRY_DELAY_MS);
        continue;
      }

      otherFailures++;
      logger.warn({ token: shortAddress(token), attempt, status }, 'DexScreener unexpected status');
      if (otherFailures >= OTHER_STATUS_MAX_FAILURES) break;
      if (!isLastAttempt) await this.sleep(RETRY_DELAY_MS);
    }

    return { status: 'failed', reason: lastReason };
  }

  /**
   * Jupiter token list lookup. Single attempt.
   */
  async fetchFromJupiter(token: string): Promise<ProviderResult<TokenMetadata>> {
    try {
      const response = await this.jupiter.get(`/tokens/v1/token/${token}`);

      if (response.status !== 200) {
        logger.warn({ token: shortAddress(token), status: response.status }, 'Jupiter lookup failed');
        return response.status === 404 ? { status: 'not-found' } : { status: 'failed', reason: `HTTP ${response.status}` };
      }

      const parsed = jupiterTokenSchema.safeParse(response.data);
      if (!parsed.success) {
        return { status: 'failed', reason: 'malformed response' };
      }
      if (!parsed.data) {
        return { status: 'not-found' };
      }

      const metadata: TokenMetadata = {
        name: parsed.data.name || null,
        ticker: toTicker(parsed.data.symbol),
        chain: 'solana',
      };
      logger.info({ token: shortAddress(token), ...metadata }, 'Jupiter resolved token');
      return { status: 'found', value: metadata };
    } catch (error) {
      logger.error({ token: shortAddress(token), error: describeError(error) }, 'Jupiter error');
      return { status: 'failed', reason: isTimeout(error) ? 'timeout' : describeError(error) };
    }
  }
}
