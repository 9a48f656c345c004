// ===========================================
// MODULE: MONITOR SESSION
// One lifecycle per token: initial bulk count, then
// jittered incremental polls until the window closes
// ===========================================

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../utils/logger.js';
import { randomInt, sleep as defaultSleep, type Sleeper } from '../../utils/sleep.js';
import { shortAddress } from '../../utils/format.js';
import { TokenRegistry } from '../registry/token-registry.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import {
  SessionState,
  type MentionCounts,
  type MentionRecord,
  type MentionSource,
  type MonitorConfig,
  type RecordSink,
} from '../../types/index.js';

const HOUR_MS = 60 * 60 * 1000;
const PROGRESS_LOG_EVERY = 50;

export interface MonitorSessionDeps {
  source: MentionSource;
  registry: TokenRegistry;
  dispatcher: NotificationDispatcher;
  records: RecordSink;
  config: MonitorConfig;
  sleep?: Sleeper;
  random?: () => number;
  now?: () => number;
}

function countMentions(records: MentionRecord[]): MentionCounts {
  const verified = records.filter(record => record.authorVerified).length;
  return { total: records.length, verified, nonVerified: records.length - verified };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class MonitorSession {
  readonly sessionId = uuidv4();

  private currentState = SessionState.INITIALIZING;
  private seen: Set<string> = new Set();
  private abort = new AbortController();
  private stopped = false;

  private readonly sleep: Sleeper;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    readonly token: string,
    private readonly deps: MonitorSessionDeps
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? Date.now;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get startTime(): number {
    return this.deps.registry.get(this.token)?.startTime ?? this.now();
  }

  get endTime(): number {
    return this.startTime + this.deps.config.durationHours * HOUR_MS;
  }

  // ============ INITIAL COUNT ============

  /**
   * Bulk search of existing mentions. A failure mid-stream keeps whatever
   * was gathered before it.
   */
  async initialCount(): Promise<MentionCounts> {
    const { source, registry, config } = this.deps;
    const gathered: MentionRecord[] = [];

    logger.info({ sessionId: this.sessionId, token: shortAddress(this.token), limit: config.initialSearchLimit }, 'Initial mention search');

    try {
      for await (const record of source.search({ term: this.token }, config.initialSearchLimit)) {
        if (this.seen.has(record.id)) continue;
        this.seen.add(record.id);
        gathered.push(record);

        if (gathered.length % PROGRESS_LOG_EVERY === 0) {
          logger.debug({ sessionId: this.sessionId, gathered: gathered.length }, 'Initial search progress');
        }
      }
    } catch (error) {
      logger.warn(
        { sessionId: this.sessionId, token: shortAddress(this.token), gathered: gathered.length, error: describeError(error) },
        'Initial search interrupted, keeping partial count'
      );
    }

    const counts = countMentions(gathered);
    registry.recordInitial(this.token, counts.total, counts.verified, counts.nonVerified);
    this.currentState = SessionState.POLLING;

    logger.info({ sessionId: this.sessionId, token: shortAddress(this.token), ...counts }, 'Initial count recorded');
    return counts;
  }

  // ============ POLLING LOOP ============

  /**
   * Poll until the monitoring window closes, then mark the token complete.
   * A stop() ends the loop without completing the token.
   */
  async run(): Promise<void> {
    const { config, registry, dispatcher } = this.deps;

    while (!this.stopped && this.now() < this.endTime) {
      const delaySeconds = randomInt(config.pollIntervalMinSeconds, config.pollIntervalMaxSeconds, this.random);
      await this.sleep(delaySeconds * 1000, this.abort.signal);
      if (this.stopped) break;

      await this.pollCycle();
    }

    if (this.stopped) {
      logger.info({ sessionId: this.sessionId, token: shortAddress(this.token) }, 'Monitor session stopped');
      return;
    }

    this.currentState = SessionState.COMPLETED;
    registry.markComplete(this.token);
    await dispatcher.notifySessionComplete(this.token);
  }

  /**
   * One incremental search. Returns the new mentions counted this cycle;
   * a failed search counts as a cycle with none.
   */
  async pollCycle(): Promise<MentionRecord[]> {
    const { source, registry, dispatcher, records, config } = this.deps;

    let batch: MentionRecord[] = [];
    try {
      const batchIds = new Set<string>();
      for await (const record of source.search({ term: this.token, excludeReposts: true }, config.pollSearchLimit)) {
        if (this.seen.has(record.id) || batchIds.has(record.id)) continue;
        batchIds.add(record.id);
        batch.push(record);
      }
      for (const id of batchIds) this.seen.add(id);
    } catch (error) {
      logger.error({ sessionId: this.sessionId, token: shortAddress(this.token), error: describeError(error) }, 'Poll cycle failed');
      batch = [];
    }

    if (batch.length > 0) {
      try {
        await records.append(this.token, this.startTime, batch);
      } catch (error) {
        logger.error({ sessionId: this.sessionId, token: shortAddress(this.token), error: describeError(error) }, 'Failed to archive mentions');
      }
    }

    const counts = countMentions(batch);
    registry.recordCycle(this.token, counts.total, counts.verified, counts.nonVerified);
    logger.info({ sessionId: this.sessionId, token: shortAddress(this.token), ...counts }, 'Poll cycle complete');

    if (batch.length > 0) {
      await dispatcher.notifyCycle(this.token, batch);
    }
    return batch;
  }

  stop(): void {
    this.stopped = true;
    this.abort.abort();
  }
}
