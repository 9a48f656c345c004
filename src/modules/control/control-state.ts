// ===========================================
// MODULE: CONTROL STATE
// Notification mode and the global pause switch.
// Written by the command layer, read everywhere else.
// ===========================================

import { logger } from '../../utils/logger.js';
import { NotificationMode } from '../../types/index.js';

const MODE_ALIASES: Record<string, NotificationMode> = {
  legacy: NotificationMode.LEGACY,
  leaderboard: NotificationMode.LEADERBOARD,
  leaderboards: NotificationMode.LEADERBOARD,
};

export function parseMode(input: string): NotificationMode | null {
  return MODE_ALIASES[input.trim().toLowerCase()] ?? null;
}

export class ControlState {
  private currentMode: NotificationMode;
  private sleepUntil: number | null = null;

  constructor(
    initialMode: NotificationMode = NotificationMode.LEADERBOARD,
    private readonly now: () => number = Date.now
  ) {
    this.currentMode = initialMode;
  }

  get mode(): NotificationMode {
    return this.currentMode;
  }

  setMode(mode: NotificationMode): void {
    this.currentMode = mode;
    logger.info({ mode }, 'Notification mode set');
  }

  isLegacy(): boolean {
    return this.currentMode === NotificationMode.LEGACY;
  }

  /**
   * Pause new-token detection and the leaderboard broadcast.
   * Running monitor sessions are not affected.
   */
  pauseFor(minutes: number): Date {
    this.sleepUntil = this.now() + minutes * 60_000;
    const until = new Date(this.sleepUntil);
    logger.info({ minutes, until: until.toISOString() }, 'Paused');
    return until;
  }

  resume(): boolean {
    const wasPaused = this.isPaused();
    this.sleepUntil = null;
    if (wasPaused) logger.info('Resumed');
    return wasPaused;
  }

  isPaused(): boolean {
    return this.sleepUntil !== null && this.now() < this.sleepUntil;
  }

  pausedUntil(): Date | null {
    return this.isPaused() && this.sleepUntil !== null ? new Date(this.sleepUntil) : null;
  }
}
