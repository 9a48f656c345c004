// ===========================================
// MODULE: NOTIFICATION DISPATCHER
// Per-event messages (legacy mode) and per-channel
// leaderboards, delivered through a NotificationSink
// ===========================================

import { logger } from '../../utils/logger.js';
import { ControlState } from '../control/control-state.js';
import { TokenRegistry } from '../registry/token-registry.js';
import {
  formatCycleUpdate,
  formatLeaderboard,
  formatNewToken,
  formatSessionComplete,
  formatStatus,
} from './formatter.js';
import type {
  BroadcastResult,
  DeliveryResult,
  MentionCounts,
  MentionRecord,
  NotificationSink,
} from '../../types/index.js';

export interface DispatcherSettings {
  durationHours: number;
  pollIntervalMinutes: number;
  leaderboardIntervalMinutes: number;
  leaderboardSize: number;
}

export class NotificationDispatcher {
  constructor(
    private readonly sink: NotificationSink,
    private readonly registry: TokenRegistry,
    private readonly control: ControlState,
    private readonly settings: DispatcherSettings,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * "New token" card. Sent in both modes; `counts` is the initial snapshot
   * for a fresh session or the running totals when replaying a known token.
   */
  async notifyNewToken(channel: string, token: string, counts: MentionCounts): Promise<DeliveryResult> {
    const stats = this.registry.get(token);
    if (!stats) {
      return { ok: false, reason: 'unknown token' };
    }

    return this.deliver(channel, formatNewToken(stats, counts, this.settings));
  }

  /**
   * One message per poll cycle with new mentions, to every subscriber.
   * Only in legacy mode.
   */
  async notifyCycle(token: string, batch: MentionRecord[]): Promise<BroadcastResult> {
    if (!this.control.isLegacy()) {
      return { status: 'skipped', reason: 'leaderboard mode' };
    }
    if (batch.length === 0) {
      return { status: 'skipped', reason: 'empty batch' };
    }

    const stats = this.registry.get(token);
    if (!stats) {
      return { status: 'skipped', reason: 'unknown token' };
    }

    const message = formatCycleUpdate(stats, batch, this.now());
    return this.deliverAll(Array.from(stats.subscriberChannels), message);
  }

  /**
   * Closing summary when a session's window elapses. Only in legacy mode.
   */
  async notifySessionComplete(token: string): Promise<BroadcastResult> {
    if (!this.control.isLegacy()) {
      return { status: 'skipped', reason: 'leaderboard mode' };
    }

    const stats = this.registry.get(token);
    if (!stats) {
      return { status: 'skipped', reason: 'unknown token' };
    }

    const message = formatSessionComplete(stats, this.settings.durationHours);
    return this.deliverAll(Array.from(stats.subscriberChannels), message);
  }

  /**
   * Ranked view of the tokens this channel subscribes to.
   */
  async sendLeaderboard(channel: string, limit: number = this.settings.leaderboardSize): Promise<BroadcastResult> {
    const ranked = this.registry.rankedActive(channel, limit);
    if (ranked.length === 0) {
      logger.info({ channel }, 'No active tokens for chat');
      return { status: 'skipped', reason: 'no active tokens' };
    }

    const messages = formatLeaderboard(ranked, this.settings);
    for (const message of messages) {
      const result = await this.deliver(channel, message);
      if (!result.ok) {
        return { status: 'failed', reason: result.reason };
      }
    }

    logger.info({ channel, tokens: ranked.length, messages: messages.length }, 'Leaderboard sent');
    return { status: 'sent' };
  }

  statusSummary(channel: string): string {
    return formatStatus(
      this.registry.activeTokens(channel),
      this.registry.activeTokens().length,
      this.control.mode,
      this.control.pausedUntil(),
      this.now()
    );
  }

  private async deliverAll(channels: string[], message: string): Promise<BroadcastResult> {
    const results = await Promise.all(channels.map(channel => this.deliver(channel, message)));
    const failures = results.filter(result => !result.ok).length;

    if (failures === results.length) {
      return { status: 'failed', reason: `${failures} deliveries failed` };
    }
    return { status: 'sent' };
  }

  /**
   * Fire-and-forget: failures are logged and dropped, never retried.
   */
  private async deliver(channel: string, message: string): Promise<DeliveryResult> {
    let result: DeliveryResult;
    try {
      result = await this.sink.send(channel, message);
    } catch (error) {
      result = { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    if (!result.ok) {
      logger.error({ channel, reason: result.reason, preview: message.slice(0, 60) }, 'Failed to deliver notification');
    }
    return result;
  }
}
