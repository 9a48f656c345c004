// ===========================================
// CONFIGURATION LOADER
// ===========================================

import { config } from 'dotenv';
import type { AppConfig } from '../types/index.js';
import { parseConfig } from './schema.js';

// Load .env file
config();

function loadConfig(): AppConfig {
  const parsed = parseConfig(process.env);

  if (!parsed.success) {
    console.error('❌ Invalid environment configuration:');
    console.error(parsed.error.format());
    process.exit(1);
  }

  for (const id of parsed.skippedChannelIds) {
    console.warn(`⚠️ Skipping invalid chat id in TELEGRAM_CHANNEL_IDS: '${id}'`);
  }

  return parsed.config;
}

export const appConfig = loadConfig();
export default appConfig;
