/**
 * Monitor Session Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MonitorSession } from './monitor-session.js';
import { TokenRegistry } from '../registry/token-registry.js';
import { ControlState } from '../control/control-state.js';
import { NotificationDispatcher } from '../notifications/dispatcher.js';
import { MentionSourceTimeoutError } from '../social/twitter-mention-source.js';
import { MemoryRecordSink, RecordingNotificationSink, ScriptedMentionSource, mention } from '../../testing/fakes.js';
import { NotificationMode, SessionState, type MonitorConfig } from '../../types/index.js';
import type { Sleeper } from '../../utils/sleep.js';

const TOKEN = 'GkZ3rQ8mN5pW2xY7vB4cD9eF6hJ1kL3mN8pQ2rS5tUv';
const T0 = 1_700_000_000_000;
const CHANNEL = '-100';

describe('MonitorSession', () => {
  let clock: number;
  let sleeps: number[];
  let registry: TokenRegistry;
  let control: ControlState;
  let sink: RecordingNotificationSink;
  let records: MemoryRecordSink;
  let source: ScriptedMentionSource;

  const advancingSleep: Sleeper = async (ms) => {
    sleeps.push(ms);
    clock += ms;
  };

  function createSession(overrides: Partial<MonitorConfig> = {}, random: () => number = Math.random): MonitorSession {
    const config: MonitorConfig = {
      durationHours: 3,
      pollIntervalMinSeconds: 900,
      pollIntervalMaxSeconds: 900,
      initialSearchLimit: 500,
      pollSearchLimit: 50,
      ...overrides,
    };
    const dispatcher = new NotificationDispatcher(sink, registry, control, {
      durationHours: config.durationHours,
      pollIntervalMinutes: 15,
      leaderboardIntervalMinutes: 15,
      leaderboardSize: 30,
    }, () => clock);

    return new MonitorSession(TOKEN, {
      source,
      registry,
      dispatcher,
      records,
      config,
      sleep: advancingSleep,
      random,
      now: () => clock,
    });
  }

  beforeEach(() => {
    clock = T0;
    sleeps = [];
    registry = new TokenRegistry(() => clock);
    control = new ControlState(NotificationMode.LEADERBOARD, () => clock);
    sink = new RecordingNotificationSink();
    records = new MemoryRecordSink();
    source = new ScriptedMentionSource();
    registry.registerOrAttach(TOKEN, 'Test Dog', '$TDOG', CHANNEL);
  });

  describe('initialCount', () => {
    it('should classify authors and seed the registry', async () => {
      source.queue({ records: [mention('1'), mention('2', { authorVerified: true }), mention('3')] });
      const session = createSession();

      const counts = await session.initialCount();

      expect(counts).toEqual({ total: 3, verified: 1, nonVerified: 2 });
      expect(source.calls[0]).toEqual({ query: { term: TOKEN }, limit: 500 });
      expect(registry.get(TOKEN)?.initialTotal).toBe(3);
      expect(registry.get(TOKEN)?.runningVerified).toBe(1);
      expect(session.state).toBe(SessionState.POLLING);
    });

    it('should keep the partial count when the search times out', async () => {
      source.queue({ records: [mention('1'), mention('2'), mention('3')], error: new MentionSourceTimeoutError() });
      const session = createSession();

      const counts = await session.initialCount();

      expect(counts).toEqual({ total: 3, verified: 0, nonVerified: 3 });
      expect(registry.get(TOKEN)?.runningTotal).toBe(3);
    });
  });

  describe('pollCycle', () => {
    it('should never count a mention twice across overlapping results', async () => {
      source.queue(
        { records: [mention('1'), mention('2', { authorVerified: true })] },
        { records: [mention('2'), mention('3'), mention('3')] },
        { records: [mention('3'), mention('4', { authorVerified: true })] }
      );
      const session = createSession();

      await session.initialCount();
      const first = await session.pollCycle();
      const second = await session.pollCycle();

      expect(first.map(m => m.id)).toEqual(['3']);
      expect(second.map(m => m.id)).toEqual(['4']);

      const stats = registry.get(TOKEN);
      expect(stats?.runningTotal).toBe(4);
      expect(stats?.runningVerified).toBe(2);
      expect(stats?.lastCycleTotal).toBe(1);
      expect(stats?.cycles).toBe(2);

      expect(source.calls[1]).toEqual({ query: { term: TOKEN, excludeReposts: true }, limit: 50 });
      expect(records.batches).toEqual([
        { token: TOKEN, sessionStart: T0, ids: ['3'] },
        { token: TOKEN, sessionStart: T0, ids: ['4'] },
      ]);
    });

    it('should record a failed search as an empty cycle and retry those ids later', async () => {
      source.queue(
        { records: [] },
        { records: [mention('1')], error: new Error('upstream exploded') },
        { records: [mention('1')] }
      );
      const session = createSession();
      await session.initialCount();

      const failed = await session.pollCycle();
      expect(failed).toEqual([]);
      expect(registry.get(TOKEN)?.cycles).toBe(1);
      expect(registry.get(TOKEN)?.runningTotal).toBe(0);
      expect(records.batches).toEqual([]);

      const retried = await session.pollCycle();
      expect(retried.map(m => m.id)).toEqual(['1']);
      expect(registry.get(TOKEN)?.runningTotal).toBe(1);
    });

    it('should update counts without a message in leaderboard mode', async () => {
      source.queue(
        { records: [] },
        { records: ['1', '2', '3', '4', '5'].map(id => mention(id)) }
      );
      const session = createSession();
      await session.initialCount();

      await session.pollCycle();

      expect(sink.sent).toEqual([]);
      expect(registry.get(TOKEN)?.runningTotal).toBe(5);
      expect(registry.get(TOKEN)?.lastCycleTotal).toBe(5);
    });

    it('should send the top five by engagement in legacy mode', async () => {
      control.setMode(NotificationMode.LEGACY);
      source.queue(
        { records: [] },
        { records: ['1', '2', '3', '4', '5', '6', '7'].map(id => mention(id, { likeCount: Number(id) * 10, repostCount: 1 })) }
      );
      const session = createSession();
      await session.initialCount();

      await session.pollCycle();

      const messages = sink.messagesFor(CHANNEL);
      expect(messages).toHaveLength(1);
      const message = messages[0] ?? '';
      expect(message.startsWith('🆕 *7 New Mentions*')).toBe(true);
      expect(message.indexOf('@user7 |')).toBeLessThan(message.indexOf('@user3 |'));
      expect(message).not.toContain('@user2 |');
      expect(message.endsWith('_+2 more_')).toBe(true);
    });
  });

  describe('run', () => {
    it('should poll on the interval until the window closes, then complete', async () => {
      control.setMode(NotificationMode.LEGACY);
      const session = createSession({ durationHours: 1 });
      await session.initialCount();

      await session.run();

      expect(sleeps).toEqual([900_000, 900_000, 900_000, 900_000]);
      expect(registry.get(TOKEN)?.cycles).toBe(4);
      expect(registry.get(TOKEN)?.active).toBe(false);
      expect(session.state).toBe(SessionState.COMPLETED);

      const messages = sink.messagesFor(CHANNEL);
      expect(messages).toHaveLength(1);
      expect(messages[0]?.startsWith('🏁 *MONITORING COMPLETE*')).toBe(true);
    });

    it('should draw each delay from the configured range', async () => {
      const session = createSession(
        { durationHours: 0.25, pollIntervalMinSeconds: 600, pollIntervalMaxSeconds: 1200 },
        () => 0.999
      );
      await session.initialCount();

      await session.run();

      expect(sleeps).toEqual([1_200_000]);
      expect(sink.sent).toEqual([]);
    });

    it('should end without completing the token when stopped', async () => {
      const session = new MonitorSession(TOKEN, {
        source,
        registry,
        dispatcher: new NotificationDispatcher(sink, registry, control, {
          durationHours: 3,
          pollIntervalMinutes: 15,
          leaderboardIntervalMinutes: 15,
          leaderboardSize: 30,
        }),
        records,
        config: {
          durationHours: 3,
          pollIntervalMinSeconds: 900,
          pollIntervalMaxSeconds: 900,
          initialSearchLimit: 500,
          pollSearchLimit: 50,
        },
        sleep: (_ms, signal) => new Promise(resolve => signal?.addEventListener('abort', () => resolve(), { once: true })),
        now: () => clock,
      });
      await session.initialCount();

      const running = session.run();
      session.stop();
      await running;

      expect(registry.get(TOKEN)?.active).toBe(true);
      expect(registry.get(TOKEN)?.cycles).toBe(0);
      expect(session.state).toBe(SessionState.POLLING);
    });
  });
});
