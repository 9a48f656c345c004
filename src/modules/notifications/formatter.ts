// ===========================================
// TELEGRAM MESSAGE FORMATTING
// Legacy Markdown: *bold*, _italic_, `code`
// ===========================================

import { escapeMarkdown, formatElapsed, displayName, truncate } from '../../utils/format.js';
import { averageMentionRate, newMentionCount, type RankedToken } from '../registry/token-registry.js';
import { NotificationMode, type MentionCounts, type MentionRecord, type TokenStats } from '../../types/index.js';

const TOP_MENTIONS_SHOWN = 5;
const MENTION_TEXT_MAX = 100;
const STATUS_TOKENS_SHOWN = 10;
const TELEGRAM_MESSAGE_LIMIT = 4096;

const RANK_MEDALS = ['🥇', '🥈', '🥉'];

function tokenName(stats: Pick<TokenStats, 'ticker' | 'displayName'>): string {
  return escapeMarkdown(displayName(stats.ticker, stats.displayName));
}

/**
 * Bold name plus the shortened address, or just the address when unnamed.
 */
function tokenLabel(stats: Pick<TokenStats, 'address' | 'ticker' | 'displayName'>): string {
  const short = stats.address.length > 16 ? `${stats.address.slice(0, 16)}...` : stats.address;
  const name = stats.ticker || stats.displayName;
  return name ? `*${escapeMarkdown(name)}* (\`${short}\`)` : `\`${short}\``;
}

export function engagementScore(record: Pick<MentionRecord, 'likeCount' | 'repostCount'>): number {
  return record.likeCount + record.repostCount;
}

/**
 * Highest engagement first; ties keep arrival order.
 */
export function sortByEngagement(batch: MentionRecord[]): MentionRecord[] {
  return [...batch].sort((a, b) => engagementScore(b) - engagementScore(a));
}

export function activityLabel(newMentions: number): string {
  if (newMentions > 50) return '🚀 Explosive';
  if (newMentions > 20) return '🔥 High';
  if (newMentions > 5) return '📈 Moderate';
  return '📊 Low';
}

export function formatRate(rate: number): string {
  return (Math.round(rate * 10) / 10).toFixed(1);
}

// ============ MESSAGES ============

export function formatNewToken(
  stats: TokenStats,
  counts: MentionCounts,
  settings: { durationHours: number; pollIntervalMinutes: number }
): string {
  return (
    '🆕 *NEW TOKEN DETECTED*\n\n' +
    `🪙 *${tokenName(stats)}*\n` +
    `📍 \`${stats.address}\`\n\n` +
    `📊 Existing: *${counts.total}*\n` +
    `✅ Verified: *${counts.verified}* | 👤 Regular: *${counts.nonVerified}*\n\n` +
    `⏳ Monitoring: ${settings.durationHours}h | 🔔 Updates: ${settings.pollIntervalMinutes}m`
  );
}

export function formatCycleUpdate(stats: TokenStats, batch: MentionRecord[], now: number): string {
  const sorted = sortByEngagement(batch);

  let message =
    `🆕 *${batch.length} New Mentions*\n` +
    `🪙 ${tokenLabel(stats)}\n\n` +
    `📊 Total: *${stats.runningTotal}* | ✅ ${stats.runningVerified} | 👤 ${stats.runningNonVerified}\n` +
    `⏱️ ${formatElapsed(now - stats.startTime)} | 🔸 Batch: +${batch.length}\n\n` +
    '🔥 *Top Tweets:*\n';

  for (const mention of sorted.slice(0, TOP_MENTIONS_SHOWN)) {
    const badge = mention.authorVerified ? '✅' : '';
    const text = truncate(mention.text.replace(/\n/g, ' '), MENTION_TEXT_MAX);

    message += `\n${badge}@${escapeMarkdown(mention.author)} | ❤️${mention.likeCount} 🔄${mention.repostCount}\n`;
    message += `_${escapeMarkdown(text)}_\n`;
    message += `[View](${mention.permalink})\n`;
  }

  if (sorted.length > TOP_MENTIONS_SHOWN) {
    message += `\n_+${sorted.length - TOP_MENTIONS_SHOWN} more_`;
  }

  return message;
}

export function formatSessionComplete(stats: TokenStats, durationHours: number): string {
  const newTotal = newMentionCount(stats);
  const newVerified = stats.runningVerified - stats.initialVerified;
  const newNonVerified = stats.runningNonVerified - stats.initialNonVerified;

  return (
    '🏁 *MONITORING COMPLETE*\n\n' +
    `🪙 ${tokenLabel(stats)}\n\n` +
    `📋 Initial: *${stats.initialTotal}* (✅${stats.initialVerified} 👤${stats.initialNonVerified})\n` +
    `🆕 New: *${newTotal}* (✅${newVerified} 👤${newNonVerified})\n\n` +
    `📈 *Total: ${stats.runningTotal}*\n` +
    `✅ Verified: ${stats.runningVerified} | 👤 Regular: ${stats.runningNonVerified}\n\n` +
    `📊 Activity: ${activityLabel(newTotal)}\n` +
    `⏱️ Duration: ${durationHours}h`
  );
}

/**
 * One or more messages, split between entries so that none exceeds
 * Telegram's message length limit.
 */
export function formatLeaderboard(
  ranked: RankedToken[],
  settings: { pollIntervalMinutes: number; leaderboardIntervalMinutes: number }
): string[] {
  const header = `📊 *TOP ${ranked.length} TOKENS*\n\n`;
  const footer = `🔄 _Updates every ${settings.leaderboardIntervalMinutes} min_`;

  const entries = ranked.map((entry, index) => {
    const { stats } = entry;
    const rank = RANK_MEDALS[index] ?? `${index + 1}.`;

    return (
      `${rank} *${tokenName(stats)}*\n` +
      `\`${stats.address}\`\n` +
      `📈 Avg: *${formatRate(entry.averageRate)}* | Total: *${stats.runningTotal}* | +${stats.lastCycleTotal} (${settings.pollIntervalMinutes}m)\n` +
      `🆕 New: ${newMentionCount(stats)} | ✅ ${stats.runningVerified} | 👤 ${stats.runningNonVerified} | ⏱️ ${formatElapsed(entry.elapsedMs)}\n\n`
    );
  });

  const messages: string[] = [];
  let current = header;
  for (const entry of entries) {
    if (current.length + entry.length > TELEGRAM_MESSAGE_LIMIT && current !== header) {
      messages.push(current.trimEnd());
      current = '';
    }
    current += entry;
  }

  if (current.length + footer.length > TELEGRAM_MESSAGE_LIMIT) {
    messages.push(current.trimEnd());
    current = '';
  }
  messages.push(current + footer);
  return messages;
}

export function formatStatus(
  channelTokens: TokenStats[],
  globalActiveCount: number,
  mode: NotificationMode,
  pausedUntil: Date | null,
  now: number
): string {
  if (channelTokens.length === 0) {
    return '📊 No active monitors in this chat';
  }

  let message = `📊 *${channelTokens.length} Active* (this chat)\n`;
  if (globalActiveCount !== channelTokens.length) {
    message += `🌐 ${globalActiveCount} total across all chats\n`;
  }
  message += '\n';

  for (const stats of channelTokens.slice(0, STATUS_TOKENS_SHOWN)) {
    message += `• ${tokenName(stats)}\n`;
    message += `  ${stats.runningTotal} tweets | avg ${formatRate(averageMentionRate(stats, now))} | ${formatElapsed(now - stats.startTime)}\n`;
  }

  if (channelTokens.length > STATUS_TOKENS_SHOWN) {
    message += `\n_+${channelTokens.length - STATUS_TOKENS_SHOWN} more_`;
  }

  const sleepNote = pausedUntil ? `Sleeping until ${formatUtcTime(pausedUntil)}` : 'Awake';
  message += `\n\nMode: \`${mode}\` | ${sleepNote}`;
  return message;
}

export function formatUtcTime(date: Date): string {
  return `${date.toISOString().slice(11, 16)} UTC`;
}
