// ===========================================
// MODULE: LEADERBOARD BROADCASTER
// Periodic per-channel top-N while in leaderboard mode
// ===========================================

import { logger } from '../../utils/logger.js';
import { ControlState } from '../control/control-state.js';
import { TokenRegistry } from '../registry/token-registry.js';
import { NotificationDispatcher } from './dispatcher.js';

export interface TickSummary {
  sent: number;
  skipped: number;
  failed: number;
  reason?: string;
}

export class LeaderboardBroadcaster {
  private isRunning = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickSummary> | null = null;

  constructor(
    private readonly dispatcher: NotificationDispatcher,
    private readonly registry: TokenRegistry,
    private readonly control: ControlState,
    private readonly intervalMinutes: number
  ) {}

  start(): void {
    if (this.isRunning) {
      logger.warn('Leaderboard broadcaster already running');
      return;
    }

    this.isRunning = true;
    this.timer = setInterval(() => {
      void this.runTick();
    }, this.intervalMinutes * 60 * 1000);

    logger.info({ intervalMinutes: this.intervalMinutes }, 'Leaderboard broadcaster started');
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    logger.info('Leaderboard broadcaster stopped');
  }

  /**
   * One broadcast pass. Never throws.
   */
  async tick(): Promise<TickSummary> {
    if (this.control.isLegacy()) {
      return { sent: 0, skipped: 0, failed: 0, reason: 'legacy mode' };
    }
    if (this.control.isPaused()) {
      logger.debug('Leaderboard skipped while paused');
      return { sent: 0, skipped: 0, failed: 0, reason: 'paused' };
    }

    const channels = this.registry.subscribedChannels();
    if (channels.length === 0) {
      logger.debug('No active tokens, leaderboard skipped');
      return { sent: 0, skipped: 0, failed: 0, reason: 'no active tokens' };
    }

    const summary: TickSummary = { sent: 0, skipped: 0, failed: 0 };
    for (const channel of channels) {
      try {
        const result = await this.dispatcher.sendLeaderboard(channel);
        if (result.status === 'sent') summary.sent++;
        else if (result.status === 'skipped') summary.skipped++;
        else summary.failed++;
      } catch (error) {
        summary.failed++;
        logger.error({ channel, error: error instanceof Error ? error.message : String(error) }, 'Leaderboard send failed');
      }
    }

    logger.info({ ...summary, channels: channels.length }, 'Leaderboard broadcast complete');
    return summary;
  }

  private async runTick(): Promise<void> {
    if (this.inFlight) {
      logger.warn('Previous leaderboard broadcast still running, skipping tick');
      return;
    }

    this.inFlight = this.tick();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }
}
