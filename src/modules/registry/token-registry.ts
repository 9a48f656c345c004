// ===========================================
// MODULE: TOKEN REGISTRY
// Authoritative in-memory stats for every token seen
// since startup, plus the time-decayed ranking
// ===========================================

import { logger } from '../../utils/logger.js';
import { displayName, shortAddress } from '../../utils/format.js';
import type { TokenStats } from '../../types/index.js';

// ============ RANKING ============

const HOUR_MS = 60 * 60 * 1000;

/**
 * First hour counts as 1, then grows with monitoring time.
 * 0 min: 1.0, 15 min: 1.25, 1 hour: 2.0, 3 hours: 4.0
 */
export function timeFactor(elapsedMs: number): number {
  return 1 + Math.max(0, elapsedMs) / HOUR_MS;
}

export function averageMentionRate(stats: Pick<TokenStats, 'runningTotal' | 'startTime'>, now: number): number {
  return stats.runningTotal / timeFactor(now - stats.startTime);
}

export function newMentionCount(stats: Pick<TokenStats, 'runningTotal' | 'initialTotal'>): number {
  return stats.runningTotal - stats.initialTotal;
}

export interface RankedToken {
  stats: TokenStats;
  averageRate: number;
  elapsedMs: number;
}

// ============ REGISTRY CLASS ============

/**
 * Every mutator is synchronous, so each call runs to completion on the
 * event loop before any other writer or reader gets a turn. Reads hand
 * out copies; callers never hold a live reference to a stats record.
 */
export class TokenRegistry {
  private tokens: Map<string, TokenStats> = new Map();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Create stats for an unknown token, or subscribe another channel to a
   * known one. Metadata of a known token is never replaced.
   */
  registerOrAttach(
    token: string,
    name: string | null,
    ticker: string | null,
    channel: string,
    chain: string | null = null
  ): TokenStats {
    const existing = this.tokens.get(token);
    if (existing) {
      if (!existing.subscriberChannels.has(channel)) {
        existing.subscriberChannels.add(channel);
        logger.debug({ token: shortAddress(token), channel }, 'Channel attached to tracked token');
      }
      return snapshot(existing);
    }

    const stats: TokenStats = {
      address: token,
      displayName: name,
      ticker,
      chain,
      subscriberChannels: new Set([channel]),
      startTime: this.now(),
      initialTotal: 0,
      initialVerified: 0,
      initialNonVerified: 0,
      runningTotal: 0,
      runningVerified: 0,
      runningNonVerified: 0,
      lastCycleTotal: 0,
      lastCycleVerified: 0,
      lastCycleNonVerified: 0,
      cycles: 0,
      active: true,
    };

    this.tokens.set(token, stats);
    logger.info({ token: shortAddress(token), name: displayName(ticker, name), channel }, 'Tracking token');
    return snapshot(stats);
  }

  has(token: string): boolean {
    return this.tokens.has(token);
  }

  get(token: string): TokenStats | undefined {
    const stats = this.tokens.get(token);
    return stats ? snapshot(stats) : undefined;
  }

  recordInitial(token: string, total: number, verified: number, nonVerified: number): void {
    const stats = this.lookup(token, 'recordInitial');
    if (!stats) return;

    stats.initialTotal = total;
    stats.initialVerified = verified;
    stats.initialNonVerified = nonVerified;
    stats.runningTotal = total;
    stats.runningVerified = verified;
    stats.runningNonVerified = nonVerified;
  }

  recordCycle(token: string, newTotal: number, newVerified: number, newNonVerified: number): void {
    const stats = this.lookup(token, 'recordCycle');
    if (!stats) return;

    stats.lastCycleTotal = newTotal;
    stats.lastCycleVerified = newVerified;
    stats.lastCycleNonVerified = newNonVerified;
    stats.runningTotal += newTotal;
    stats.runningVerified += newVerified;
    stats.runningNonVerified += newNonVerified;
    stats.cycles++;
  }

  markComplete(token: string): void {
    const stats = this.lookup(token, 'markComplete');
    if (!stats || !stats.active) return;

    stats.active = false;
    logger.info({ token: shortAddress(token), total: stats.runningTotal }, 'Token monitoring complete');
  }

  /**
   * Active tokens, optionally only those the channel subscribes to.
   */
  activeTokens(channel?: string): TokenStats[] {
    const result: TokenStats[] = [];
    for (const stats of this.tokens.values()) {
      if (!stats.active) continue;
      if (channel !== undefined && !stats.subscriberChannels.has(channel)) continue;
      result.push(snapshot(stats));
    }
    return result;
  }

  /**
   * Channels subscribed to at least one active token.
   */
  subscribedChannels(): string[] {
    const channels = new Set<string>();
    for (const stats of this.tokens.values()) {
      if (!stats.active) continue;
      for (const channel of stats.subscriberChannels) channels.add(channel);
    }
    return Array.from(channels);
  }

  /**
   * Active tokens ordered by average mention rate, highest first.
   * Equal rates put the older token first.
   */
  rankedActive(channel?: string, limit?: number): RankedToken[] {
    const now = this.now();

    const ranked = this.activeTokens(channel)
      .map(stats => ({
        stats,
        averageRate: averageMentionRate(stats, now),
        elapsedMs: now - stats.startTime,
      }))
      .sort((a, b) => b.averageRate - a.averageRate || a.stats.startTime - b.stats.startTime);

    return limit === undefined ? ranked : ranked.slice(0, limit);
  }

  size(): number {
    return this.tokens.size;
  }

  private lookup(token: string, operation: string): TokenStats | undefined {
    const stats = this.tokens.get(token);
    if (!stats) {
      logger.debug({ token: shortAddress(token), operation }, 'Ignoring update for unknown token');
    }
    return stats;
  }
}

function snapshot(stats: TokenStats): TokenStats {
  return { ...stats, subscriberChannels: new Set(stats.subscriberChannels) };
}
