// ===========================================
// MENTION MONITOR - MAIN ENTRY POINT
// ===========================================

import { spawn } from 'child_process';
import { appConfig } from './config/index.js';
import { pollIntervalMinutes } from './config/schema.js';
import { logger } from './utils/logger.js';
import { ControlState } from './modules/control/control-state.js';
import { TokenRegistry } from './modules/registry/token-registry.js';
import { MetadataResolver } from './modules/metadata/metadata-resolver.js';
import { TwitterMentionSource } from './modules/social/twitter-mention-source.js';
import { CsvRecordSink } from './modules/storage/csv-record-sink.js';
import { NotificationDispatcher } from './modules/notifications/dispatcher.js';
import { LeaderboardBroadcaster } from './modules/notifications/leaderboard-broadcaster.js';
import { TokenEngine } from './modules/engine/token-engine.js';
import { TelegramChatBot } from './modules/telegram.js';
import { ChatCommands } from './modules/telegram/commands.js';

// ============ STARTUP DIAGNOSTICS ============

function printStartupDiagnostics(): void {
  const { monitor, leaderboard } = appConfig;

  logger.info('='.repeat(50));
  logger.info('CONFIGURATION');
  logger.info('='.repeat(50));
  logger.info({
    channels: appConfig.telegramChannelIds.length > 0 ? appConfig.telegramChannelIds : 'all chats',
    mode: appConfig.defaultMode,
    recordsDir: appConfig.recordsDir,
  }, 'Ingestion');
  logger.info({
    durationHours: monitor.durationHours,
    pollIntervalSeconds: `${monitor.pollIntervalMinSeconds}-${monitor.pollIntervalMaxSeconds}`,
    initialSearchLimit: monitor.initialSearchLimit,
    pollSearchLimit: monitor.pollSearchLimit,
  }, 'Monitoring');
  logger.info({
    intervalMinutes: leaderboard.intervalMinutes,
    size: leaderboard.size,
  }, 'Leaderboard');
}

// ============ RESTART ============

/**
 * Replace this process with a fresh copy of itself.
 */
function respawn(): void {
  const child = spawn(process.execPath, [...process.execArgv, ...process.argv.slice(1)], {
    detached: true,
    stdio: 'inherit',
    env: process.env,
  });
  child.unref();
}

async function main(): Promise<void> {
  logger.info('='.repeat(50));
  logger.info('MENTION MONITOR');
  logger.info('='.repeat(50));
  logger.info({ env: appConfig.nodeEnv }, 'Starting up...');

  const startedAt = Date.now();

  // Mention source must be usable before anything listens for tokens
  const source = new TwitterMentionSource({
    bearerToken: appConfig.twitterBearerToken,
    consumerKey: appConfig.twitterConsumerKey,
    consumerSecret: appConfig.twitterConsumerSecret,
  });
  if (!(await source.initialize())) {
    throw new Error('No usable X API credential');
  }

  const registry = new TokenRegistry();
  const control = new ControlState(appConfig.defaultMode);
  const resolver = new MetadataResolver();
  const records = new CsvRecordSink(appConfig.recordsDir);
  const bot = new TelegramChatBot(appConfig.telegramBotToken, appConfig.port);

  const dispatcher = new NotificationDispatcher(bot, registry, control, {
    durationHours: appConfig.monitor.durationHours,
    pollIntervalMinutes: pollIntervalMinutes(appConfig.monitor),
    leaderboardIntervalMinutes: appConfig.leaderboard.intervalMinutes,
    leaderboardSize: appConfig.leaderboard.size,
  });

  const engine = new TokenEngine({
    registry,
    control,
    resolver,
    dispatcher,
    source,
    records,
    monitor: appConfig.monitor,
    allowedChannels: appConfig.telegramChannelIds,
    startedAt,
  });

  const broadcaster = new LeaderboardBroadcaster(dispatcher, registry, control, appConfig.leaderboard.intervalMinutes);

  const commands = new ChatCommands(control, dispatcher, {
    durationHours: appConfig.monitor.durationHours,
    leaderboardSize: appConfig.leaderboard.size,
    leaderboardIntervalMinutes: appConfig.leaderboard.intervalMinutes,
  });

  // Handle graceful shutdown
  let shuttingDown = false;
  const shutdown = async (reason: string, restart = false): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ reason }, 'Shutdown requested');

    await broadcaster.stop();
    await engine.shutdown();
    await bot.stop();

    if (restart) {
      respawn();
      logger.info('Restarted process spawned');
    }

    logger.info('Shutdown complete');
    process.exit(0);
  };

  const runShutdown = (reason: string, restart = false): void => {
    shutdown(reason, restart).catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  await bot.initialize({
    engine,
    commands,
    dispatcher,
    control,
    registry,
    onRestart: () => runShutdown('restart command', true),
  });

  printStartupDiagnostics();
  broadcaster.start();

  logger.info('Bot is running! Press Ctrl+C to stop.');

  process.on('SIGINT', () => runShutdown('SIGINT'));
  process.on('SIGTERM', () => runShutdown('SIGTERM'));
}

// ============ RUN ============

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Fatal error during startup');
  process.exit(1);
});
