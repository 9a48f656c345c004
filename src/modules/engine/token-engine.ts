// ===========================================
// MODULE: TOKEN ENGINE
// Message ingestion -> token detection -> monitor sessions
// ===========================================

import { logger } from '../../utils/logger.js';
import { extractToken } from '../../utils/address.js';
import { shortAddress } from '../../utils/format.js';
import type { Sleeper } from '../../utils/sleep.js';
import { ControlState } from '../control/control-state.js';
import { TokenRegistry } from '../registry/token-registry.js';
import { MetadataResolver } from '../metadata/metadata-resolver.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import { MonitorSession } from '../monitor/monitor-session.js';
import type { MentionSource, MonitorConfig, RecordSink } from '../../types/index.js';

export type MessageOutcome =
  | 'stale'        // sent before the engine started
  | 'not-allowed'  // channel outside the allow-list
  | 'paused'
  | 'no-token'
  | 'duplicate'    // this channel was already notified for the token
  | 'attached'     // known token, replayed to a new channel
  | 'started';     // new token, session launched

export interface TokenEngineDeps {
  registry: TokenRegistry;
  control: ControlState;
  resolver: Pick<MetadataResolver, 'resolve'>;
  dispatcher: NotificationDispatcher;
  source: MentionSource;
  records: RecordSink;
  monitor: MonitorConfig;
  allowedChannels?: string[];
  startedAt?: number;
  sleep?: Sleeper;
  random?: () => number;
  now?: () => number;
}

interface SessionHandle {
  session: MonitorSession;
  task: Promise<void>;
}

export class TokenEngine {
  // token -> channels already sent the "new token" card; never expires
  private notified: Map<string, Set<string>> = new Map();
  // token -> registration in progress
  private registering: Map<string, Promise<void>> = new Map();
  private sessions: Map<string, SessionHandle> = new Map();

  private readonly allowed: Set<string>;
  private readonly startedAt: number;
  private shuttingDown = false;

  constructor(private readonly deps: TokenEngineDeps) {
    this.allowed = new Set(deps.allowedChannels ?? []);
    this.startedAt = deps.startedAt ?? (deps.now ?? Date.now)();
  }

  /**
   * Entry point for every chat message or channel post.
   */
  async handleMessage(text: string, channel: string, messageDate?: Date): Promise<MessageOutcome> {
    if (messageDate && messageDate.getTime() < this.startedAt) {
      return 'stale';
    }
    if (this.allowed.size > 0 && !this.allowed.has(channel)) {
      return 'not-allowed';
    }
    if (this.deps.control.isPaused()) {
      logger.info({ channel }, 'Paused, skipping token detection');
      return 'paused';
    }

    const token = extractToken(text);
    if (!token) {
      return 'no-token';
    }

    const channels = this.notified.get(token) ?? new Set<string>();
    if (channels.has(channel)) {
      logger.debug({ token: shortAddress(token), channel }, 'Duplicate token in same chat ignored');
      return 'duplicate';
    }
    channels.add(channel);
    this.notified.set(token, channels);

    try {
      return await this.registerOrAttach(token, channel);
    } catch (error) {
      // Not notified after all; a repost may retry
      channels.delete(channel);
      throw error;
    }
  }

  private async registerOrAttach(token: string, channel: string): Promise<'attached' | 'started'> {
    const pending = this.registering.get(token);
    if (pending) {
      await pending;
    }

    if (this.deps.registry.has(token)) {
      await this.attach(token, channel);
      return 'attached';
    }

    const registration = this.startSession(token, channel);
    this.registering.set(token, registration);
    try {
      await registration;
    } finally {
      this.registering.delete(token);
    }
    return 'started';
  }

  activeSessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Stop every session and wait for their loops to exit.
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const handles = Array.from(this.sessions.values());
    for (const handle of handles) {
      handle.session.stop();
    }
    await Promise.all(handles.map(handle => handle.task));
    logger.info({ sessions: handles.length }, 'All monitor sessions stopped');
  }

  // ============ INTERNALS ============

  private async attach(token: string, channel: string): Promise<void> {
    const stats = this.deps.registry.registerOrAttach(token, null, null, channel);
    logger.info({ token: shortAddress(token), channel }, 'Sending existing results to new chat');

    await this.deps.dispatcher.notifyNewToken(channel, token, {
      total: stats.runningTotal,
      verified: stats.runningVerified,
      nonVerified: stats.runningNonVerified,
    });
  }

  private async startSession(token: string, channel: string): Promise<void> {
    const { registry, resolver, dispatcher } = this.deps;
    logger.info({ token: shortAddress(token), channel }, 'New token detected');

    const metadata = await resolver.resolve(token);
    if (metadata.chain) {
      logger.info({ token: shortAddress(token), chain: metadata.chain }, 'Token chain resolved');
    }

    registry.registerOrAttach(token, metadata.name, metadata.ticker, channel, metadata.chain);

    const session = new MonitorSession(token, {
      source: this.deps.source,
      registry,
      dispatcher,
      records: this.deps.records,
      config: this.deps.monitor,
      sleep: this.deps.sleep,
      random: this.deps.random,
      now: this.deps.now,
    });

    const counts = await session.initialCount();
    await dispatcher.notifyNewToken(channel, token, counts);

    if (this.shuttingDown) return;
    this.launch(session);
  }

  private launch(session: MonitorSession): void {
    const task = session.run()
      .catch((error: unknown) => {
        logger.error(
          { sessionId: session.sessionId, token: shortAddress(session.token), error: error instanceof Error ? error.message : String(error) },
          'Monitor session crashed'
        );
      })
      .finally(() => {
        this.sessions.delete(session.token);
      });

    this.sessions.set(session.token, { session, task });
    logger.info({ sessionId: session.sessionId, token: shortAddress(session.token) }, 'Monitor session started');
  }
}
