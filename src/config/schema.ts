// ===========================================
// ENVIRONMENT SCHEMA
// ===========================================

import { z } from 'zod';
import { NotificationMode, type AppConfig } from '../types/index.js';

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

// Environment validation schema
export const envSchema = z.object({
  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_CHANNEL_IDS: z.string().optional().default(''),

  // Twitter/X API - Bearer Token, or Consumer Key/Secret to mint one
  TWITTER_BEARER_TOKEN: z.string().optional().default(''),
  TWITTER_CONSUMER_KEY: z.string().optional().default(''),
  TWITTER_CONSUMER_SECRET: z.string().optional().default(''),

  // Monitoring
  MONITOR_DURATION_HOURS: positiveNumber(3),
  POLL_INTERVAL_MIN_SECONDS: positiveNumber(900),   // 15 minutes
  POLL_INTERVAL_MAX_SECONDS: positiveNumber(900),
  INITIAL_SEARCH_LIMIT: z.coerce.number().int().positive().default(500),
  POLL_SEARCH_LIMIT: z.coerce.number().int().positive().default(50),

  // Leaderboard
  LEADERBOARD_INTERVAL_MINUTES: positiveNumber(15),
  LEADERBOARD_SIZE: z.coerce.number().int().positive().default(30),
  DEFAULT_NOTIFICATION_MODE: z.nativeEnum(NotificationMode).default(NotificationMode.LEADERBOARD),

  // System
  RECORDS_DIR: z.string().min(1).default('./data'),
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})
  .refine(env => env.POLL_INTERVAL_MIN_SECONDS <= env.POLL_INTERVAL_MAX_SECONDS, {
    message: 'POLL_INTERVAL_MIN_SECONDS must not exceed POLL_INTERVAL_MAX_SECONDS',
    path: ['POLL_INTERVAL_MIN_SECONDS'],
  })
  .refine(
    env => env.TWITTER_BEARER_TOKEN !== '' || (env.TWITTER_CONSUMER_KEY !== '' && env.TWITTER_CONSUMER_SECRET !== ''),
    {
      message: 'Set TWITTER_BEARER_TOKEN, or both TWITTER_CONSUMER_KEY and TWITTER_CONSUMER_SECRET',
      path: ['TWITTER_BEARER_TOKEN'],
    }
  );

export type ConfigParseResult =
  | { success: true; config: AppConfig; skippedChannelIds: string[] }
  | { success: false; error: z.ZodError };

/**
 * Split the comma-separated chat id list. Telegram chat ids are integers
 * (channels and supergroups are negative); anything else is skipped.
 */
export function parseChannelIds(raw: string): { ids: string[]; skipped: string[] } {
  const ids: string[] = [];
  const skipped: string[] = [];

  for (const part of raw.split(',')) {
    const id = part.trim();
    if (!id) continue;
    if (/^-?\d+$/.test(id)) {
      if (!ids.includes(id)) ids.push(id);
    } else {
      skipped.push(id);
    }
  }

  return { ids, skipped };
}

export function parseConfig(source: NodeJS.ProcessEnv): ConfigParseResult {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }

  const env = parsed.data;
  const channels = parseChannelIds(env.TELEGRAM_CHANNEL_IDS);

  return {
    success: true,
    skippedChannelIds: channels.skipped,
    config: {
      telegramBotToken: env.TELEGRAM_BOT_TOKEN,
      telegramChannelIds: channels.ids,
      twitterBearerToken: env.TWITTER_BEARER_TOKEN,
      twitterConsumerKey: env.TWITTER_CONSUMER_KEY,
      twitterConsumerSecret: env.TWITTER_CONSUMER_SECRET,
      defaultMode: env.DEFAULT_NOTIFICATION_MODE,
      recordsDir: env.RECORDS_DIR,
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,

      monitor: {
        durationHours: env.MONITOR_DURATION_HOURS,
        pollIntervalMinSeconds: env.POLL_INTERVAL_MIN_SECONDS,
        pollIntervalMaxSeconds: env.POLL_INTERVAL_MAX_SECONDS,
        initialSearchLimit: env.INITIAL_SEARCH_LIMIT,
        pollSearchLimit: env.POLL_SEARCH_LIMIT,
      },

      leaderboard: {
        intervalMinutes: env.LEADERBOARD_INTERVAL_MINUTES,
        size: env.LEADERBOARD_SIZE,
      },
    },
  };
}

/**
 * Shortest poll interval as a whole-minute label, never below one.
 */
export function pollIntervalMinutes(monitor: Pick<AppConfig['monitor'], 'pollIntervalMinSeconds'>): number {
  return Math.max(1, Math.round(monitor.pollIntervalMinSeconds / 60));
}
