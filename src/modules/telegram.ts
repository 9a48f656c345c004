// ===========================================
// MODULE: TELEGRAM CHAT BOT
// Ingests chat messages and channel posts, serves the
// control commands, and delivers every notification
// ===========================================

import TelegramBot from 'node-telegram-bot-api';
import express, { Request, Response } from 'express';
import { Server } from 'http';
import { logger } from '../utils/logger.js';
import { ControlState } from './control/control-state.js';
import { TokenRegistry } from './registry/token-registry.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { TokenEngine } from './engine/token-engine.js';
import { ChatCommands, parseCommand, type ParsedCommand } from './telegram/commands.js';
import type { DeliveryResult, NotificationSink } from '../types/index.js';

const BOT_COMMANDS: TelegramBot.BotCommand[] = [
  { command: 'mode', description: 'Switch notification mode (legacy | leaderboard)' },
  { command: 'status', description: 'Active monitors in this chat' },
  { command: 'top', description: 'Show the leaderboard now' },
  { command: 'sleep', description: 'Pause detection: /sleep [minutes]' },
  { command: 'wake', description: 'Resume detection' },
  { command: 'restart', description: 'Restart the bot process' },
  { command: 'help', description: 'Show all commands' },
];

export interface ChatHandlers {
  engine: Pick<TokenEngine, 'handleMessage'>;
  commands: ChatCommands;
  dispatcher: NotificationDispatcher;
  control: ControlState;
  registry: TokenRegistry;
  onRestart: () => void;
}

export class TelegramChatBot implements NotificationSink {
  private bot: TelegramBot | null = null;
  private server: Server | null = null;
  private startTime: Date | null = null;
  private handlers: ChatHandlers | null = null;

  constructor(
    private readonly botToken: string,
    private readonly port: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Route updates to `handlers` from now on. Anything sent before this
   * moment is dropped, commands included.
   */
  attach(handlers: ChatHandlers): void {
    this.handlers = handlers;
    this.startTime = new Date(this.now());
  }

  /**
   * Start long polling and the health-check server. Sending works from
   * here on; incoming updates are routed to `handlers`.
   */
  async initialize(handlers: ChatHandlers): Promise<void> {
    this.attach(handlers);
    this.bot = new TelegramBot(this.botToken, {
      polling: {
        interval: 1000,
        autoStart: true,
        params: {
          timeout: 30,
        },
      },
    });

    this.bot.on('message', (msg: TelegramBot.Message) => {
      void this.handleUpdate(msg);
    });
    this.bot.on('channel_post', (msg: TelegramBot.Message) => {
      void this.handleUpdate(msg);
    });

    this.bot.on('polling_error', (error: Error & { code?: string }) => {
      if (error.code === 'ETELEGRAM' && error.message.includes('409 Conflict')) {
        logger.error('409 Conflict detected - another bot instance is polling. Ensure only ONE instance is running.');
        this.bot?.stopPolling().catch((stopError: unknown) => {
          logger.error({ error: stopError }, 'Failed to stop polling');
        });
      } else {
        logger.error({ error: error.message }, 'Telegram polling error');
      }
    });

    this.bot.setMyCommands(BOT_COMMANDS).then(() => {
      logger.info('Bot command menu set up successfully');
    }).catch((error: unknown) => {
      logger.error({ error }, 'Failed to set bot commands');
    });

    await this.startHealthServer(handlers);
    logger.info('Telegram bot started in polling mode');
  }

  // ============ NOTIFICATION SINK ============

  async send(channel: string, message: string): Promise<DeliveryResult> {
    if (!this.bot) {
      return { ok: false, reason: 'bot not initialized' };
    }

    try {
      await this.bot.sendMessage(channel, message, {
        parse_mode: 'Markdown',
        disable_web_page_preview: true,
      });
      return { ok: true };
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  // ============ INGESTION ============

  /**
   * Route one update: commands to the control surface, everything else
   * with text to the engine. Never throws.
   */
  async handleUpdate(msg: TelegramBot.Message): Promise<void> {
    const handlers = this.handlers;
    const text = msg.text ?? msg.caption;
    if (!handlers || !text || !this.startTime) return;

    const channel = String(msg.chat.id);
    // Telegram dates have second resolution
    if (msg.date < Math.floor(this.startTime.getTime() / 1000)) {
      logger.debug({ channel, date: msg.date }, 'Update from before startup ignored');
      return;
    }

    try {
      const command = parseCommand(text);
      if (command) {
        await this.handleCommand(handlers, command, channel);
        return;
      }

      const outcome = await handlers.engine.handleMessage(text, channel, new Date(msg.date * 1000));
      logger.debug({ channel, outcome }, 'Message handled');
    } catch (error) {
      logger.error({ channel, error: error instanceof Error ? error.message : String(error) }, 'Failed to handle message');
    }
  }

  private async handleCommand(handlers: ChatHandlers, command: ParsedCommand, channel: string): Promise<void> {
    const { commands } = handlers;
    logger.info({ channel, command: command.name }, 'Command received');

    switch (command.name) {
      case 'mode':
        await this.send(channel, commands.mode(command.arg));
        return;
      case 'sleep':
        await this.send(channel, commands.sleep(command.arg));
        return;
      case 'wake':
        await this.send(channel, commands.wake());
        return;
      case 'status':
        await this.send(channel, commands.status(channel));
        return;
      case 'top': {
        const result = await handlers.dispatcher.sendLeaderboard(channel);
        if (result.status === 'skipped') {
          await this.send(channel, '📊 No active monitors in this chat');
        }
        return;
      }
      case 'restart':
        await this.send(channel, '🔄 Restarting bot...');
        handlers.onRestart();
        return;
      case 'help':
      case 'start':
        await this.send(channel, commands.help());
        return;
      default:
        logger.debug({ command: command.name }, 'Unknown command ignored');
    }
  }

  // ============ HEALTH SERVER ============

  private startHealthServer(handlers: ChatHandlers): Promise<void> {
    const { control, registry } = handlers;
    const port = this.port;

    const app = express();

    app.get('/health', (_req: Request, res: Response) => {
      res.status(200).json({
        status: 'ok',
        mode: control.mode,
        paused: control.isPaused(),
        activeTokens: registry.activeTokens().length,
        uptime: this.startTime ? Date.now() - this.startTime.getTime() : 0,
      });
    });

    app.get('/', (_req: Request, res: Response) => {
      res.status(200).json({
        name: 'mention-monitor',
        status: 'running',
        trackedTokens: registry.size(),
      });
    });

    return new Promise(resolve => {
      const server = app.listen(port, '0.0.0.0', () => {
        logger.info({ port, host: '0.0.0.0' }, 'HTTP server started for health checks');
        resolve();
      });
      server.on('error', (error) => {
        logger.error({ error, port }, 'Express server error');
        resolve();
      });
      this.server = server;
    });
  }

  /**
   * Stop the bot gracefully
   */
  async stop(): Promise<void> {
    logger.info('Stopping Telegram bot...');

    if (this.bot) {
      try {
        await this.bot.stopPolling();
      } catch (error) {
        logger.error({ error }, 'Failed to stop polling');
      }
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => {
          logger.info('Express server stopped');
          resolve();
        });
      });
      this.server = null;
    }

    logger.info('Telegram bot stopped');
  }
}
