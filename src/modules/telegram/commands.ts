// ===========================================
// CHAT COMMANDS
// Reply text for the control surface; the bot module
// only wires these to Telegram handlers
// ===========================================

import { ControlState, parseMode } from '../control/control-state.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import { formatUtcTime } from '../notifications/formatter.js';
import { NotificationMode } from '../../types/index.js';

const DEFAULT_SLEEP_MINUTES = 60;

export interface ParsedCommand {
  name: string;
  arg?: string;
}

/**
 * "/mode@SomeBot legacy" -> { name: 'mode', arg: 'legacy' }
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = /^\/([a-zA-Z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;

  const name = match[1]?.toLowerCase();
  if (!name) return null;

  const arg = match[2]?.trim().split(/\s+/)[0];
  return arg ? { name, arg } : { name };
}

export interface CommandSettings {
  durationHours: number;
  leaderboardSize: number;
  leaderboardIntervalMinutes: number;
}

export class ChatCommands {
  constructor(
    private readonly control: ControlState,
    private readonly dispatcher: NotificationDispatcher,
    private readonly settings: CommandSettings
  ) {}

  mode(arg?: string): string {
    if (!arg) {
      return (
        `📊 Current: *${this.control.mode}*\n\n` +
        'Commands:\n' +
        '`/mode legacy` - Individual notifications\n' +
        `\`/mode leaderboard\` - Top ${this.settings.leaderboardSize} summary`
      );
    }

    const mode = parseMode(arg);
    if (!mode) {
      return `❌ Invalid: \`${arg.trim()}\`\n\nUse \`legacy\` or \`leaderboard\``;
    }

    this.control.setMode(mode);

    if (mode === NotificationMode.LEGACY) {
      return (
        '✅ *Legacy Mode*\n\n' +
        '• Individual notifications per token\n' +
        '• Tweet content + engagement\n' +
        '• ⚠️ Can be spammy!'
      );
    }
    return (
      '✅ *Leaderboard Mode*\n\n' +
      `• Top ${this.settings.leaderboardSize} tokens every ${this.settings.leaderboardIntervalMinutes} min\n` +
      '• Ranked by avg tweet count'
    );
  }

  sleep(arg?: string): string {
    let minutes = DEFAULT_SLEEP_MINUTES;
    if (arg) {
      const parsed = Number(arg.trim());
      if (!Number.isInteger(parsed) || parsed <= 0) {
        return '⌛ Invalid number of minutes.';
      }
      minutes = parsed;
    }

    const until = this.control.pauseFor(minutes);
    return `😴 Sleeping for ${minutes} minutes (until ${formatUtcTime(until)}). Use /wake to resume early.`;
  }

  wake(): string {
    return this.control.resume() ? '☀️ Resuming monitoring now.' : '👍 Already awake.';
  }

  status(channel: string): string {
    return this.dispatcher.statusSummary(channel);
  }

  help(): string {
    return (
      '🤖 *Mention Monitor*\n\n' +
      '📌 *Commands*\n' +
      '`/mode` - Switch notification mode\n' +
      '`/status` - Active monitors (this chat)\n' +
      '`/top` - Show leaderboard now\n' +
      '`/sleep [min]` - Pause for N minutes\n' +
      '`/wake` - Resume monitoring\n' +
      '`/restart` - Restart bot process\n\n' +
      '📌 *Modes*\n' +
      `• Leaderboard - Top ${this.settings.leaderboardSize} every ${this.settings.leaderboardIntervalMinutes} min (default)\n` +
      '• Legacy - Individual tweet notifications\n\n' +
      '📌 *Usage*\n' +
      `Post token CA → Bot scans X → ${this.settings.durationHours}h monitoring`
    );
  }
}
