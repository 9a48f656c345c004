/**
 * Notification Dispatcher & Leaderboard Broadcaster Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NotificationDispatcher } from './dispatcher.js';
import { LeaderboardBroadcaster } from './leaderboard-broadcaster.js';
import { TokenRegistry } from '../registry/token-registry.js';
import { ControlState } from '../control/control-state.js';
import { RecordingNotificationSink, mention } from '../../testing/fakes.js';
import { NotificationMode, type DeliveryResult, type NotificationSink } from '../../types/index.js';

const HOUR = 60 * 60 * 1000;
const TOKEN_A = 'So11111111111111111111111111111111111111112';
const TOKEN_B = '7GCihgDB8fe6KNjn2MYtkzZcRjQy3t9GHdC8uHYmW2hr';

const SETTINGS = {
  durationHours: 3,
  pollIntervalMinutes: 15,
  leaderboardIntervalMinutes: 15,
  leaderboardSize: 30,
};

describe('NotificationDispatcher', () => {
  let clock: number;
  let registry: TokenRegistry;
  let control: ControlState;
  let sink: RecordingNotificationSink;
  let dispatcher: NotificationDispatcher;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    registry = new TokenRegistry(() => clock);
    control = new ControlState(NotificationMode.LEADERBOARD, () => clock);
    sink = new RecordingNotificationSink();
    dispatcher = new NotificationDispatcher(sink, registry, control, SETTINGS, () => clock);
  });

  it('should gate cycle and completion messages on legacy mode', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    registry.registerOrAttach(TOKEN_A, null, null, '-200');

    expect(await dispatcher.notifyCycle(TOKEN_A, [mention('1')])).toEqual({ status: 'skipped', reason: 'leaderboard mode' });
    expect(await dispatcher.notifySessionComplete(TOKEN_A)).toEqual({ status: 'skipped', reason: 'leaderboard mode' });
    expect(sink.sent).toEqual([]);

    control.setMode(NotificationMode.LEGACY);

    expect(await dispatcher.notifyCycle(TOKEN_A, [mention('1')])).toEqual({ status: 'sent' });
    expect(sink.messagesFor('-100')).toHaveLength(1);
    expect(sink.messagesFor('-200')).toHaveLength(1);
  });

  it('should log and drop failed deliveries instead of throwing', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    sink.failing.add('-100');

    const result = await dispatcher.notifyNewToken('-100', TOKEN_A, { total: 1, verified: 0, nonVerified: 1 });

    expect(result).toEqual({ ok: false, reason: 'chat not found' });
  });

  it('should turn a throwing sink into a failed delivery', async () => {
    const throwing: NotificationSink = {
      send: async (): Promise<DeliveryResult> => {
        throw new Error('socket hang up');
      },
    };
    const local = new NotificationDispatcher(throwing, registry, control, SETTINGS, () => clock);
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');

    expect(await local.sendLeaderboard('-100')).toEqual({ status: 'failed', reason: 'socket hang up' });
  });

  it('should render each channel its own ranking', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    registry.recordInitial(TOKEN_A, 10, 2, 8);
    registry.registerOrAttach(TOKEN_B, 'Beta', '$BETA', '-100');
    registry.registerOrAttach(TOKEN_B, null, null, '-200');
    registry.recordInitial(TOKEN_B, 40, 4, 36);

    expect(await dispatcher.sendLeaderboard('-100')).toEqual({ status: 'sent' });
    expect(await dispatcher.sendLeaderboard('-200')).toEqual({ status: 'sent' });
    expect(await dispatcher.sendLeaderboard('-300')).toEqual({ status: 'skipped', reason: 'no active tokens' });

    const [board100] = sink.messagesFor('-100');
    expect(board100?.startsWith('📊 *TOP 2 TOKENS*')).toBe(true);
    expect(board100?.indexOf('🥇 *$BETA*')).toBeLessThan(board100?.indexOf('🥈 *$ALPHA*') ?? -1);

    const [board200] = sink.messagesFor('-200');
    expect(board200?.startsWith('📊 *TOP 1 TOKENS*')).toBe(true);
    expect(board200).not.toContain('$ALPHA');
  });

  it('should honour an explicit leaderboard size', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    registry.registerOrAttach(TOKEN_B, 'Beta', '$BETA', '-100');

    await dispatcher.sendLeaderboard('-100', 1);

    expect(sink.messagesFor('-100')[0]?.startsWith('📊 *TOP 1 TOKENS*')).toBe(true);
  });
});

describe('LeaderboardBroadcaster', () => {
  let clock: number;
  let registry: TokenRegistry;
  let control: ControlState;
  let sink: RecordingNotificationSink;
  let broadcaster: LeaderboardBroadcaster;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    registry = new TokenRegistry(() => clock);
    control = new ControlState(NotificationMode.LEADERBOARD, () => clock);
    sink = new RecordingNotificationSink();
    const dispatcher = new NotificationDispatcher(sink, registry, control, SETTINGS, () => clock);
    broadcaster = new LeaderboardBroadcaster(dispatcher, registry, control, SETTINGS.leaderboardIntervalMinutes);
  });

  it('should skip the tick in legacy mode', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    control.setMode(NotificationMode.LEGACY);

    expect(await broadcaster.tick()).toEqual({ sent: 0, skipped: 0, failed: 0, reason: 'legacy mode' });
    expect(sink.sent).toEqual([]);
  });

  it('should skip the tick while paused', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    control.pauseFor(30);

    expect(await broadcaster.tick()).toEqual({ sent: 0, skipped: 0, failed: 0, reason: 'paused' });
    expect(sink.sent).toEqual([]);
  });

  it('should skip the tick when nothing is active', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    registry.markComplete(TOKEN_A);

    expect(await broadcaster.tick()).toEqual({ sent: 0, skipped: 0, failed: 0, reason: 'no active tokens' });
  });

  it('should send every subscribed channel and count failures', async () => {
    registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
    registry.registerOrAttach(TOKEN_B, 'Beta', '$BETA', '-200');
    registry.registerOrAttach(TOKEN_B, null, null, '-300');
    sink.failing.add('-300');
    clock += HOUR;

    expect(await broadcaster.tick()).toEqual({ sent: 2, skipped: 0, failed: 1 });
    expect(sink.messagesFor('-100')).toHaveLength(1);
    expect(sink.messagesFor('-200')).toHaveLength(1);
  });

  describe('timer', () => {
    const INTERVAL = SETTINGS.leaderboardIntervalMinutes * 60 * 1000;

    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should broadcast on every interval until stopped', async () => {
      registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
      broadcaster.start();

      await vi.advanceTimersByTimeAsync(INTERVAL - 1);
      expect(sink.sent).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(sink.messagesFor('-100')).toHaveLength(1);

      await broadcaster.stop();
      await vi.advanceTimersByTimeAsync(INTERVAL * 2);
      expect(sink.messagesFor('-100')).toHaveLength(1);
    });

    it('should skip a tick while the previous broadcast is still sending', async () => {
      let release: () => void = () => undefined;
      const calls: string[] = [];
      const slowSink: NotificationSink = {
        send: (channel: string): Promise<DeliveryResult> => {
          calls.push(channel);
          return new Promise(resolve => {
            release = () => resolve({ ok: true });
          });
        },
      };
      const dispatcher = new NotificationDispatcher(slowSink, registry, control, SETTINGS, () => clock);
      const slow = new LeaderboardBroadcaster(dispatcher, registry, control, SETTINGS.leaderboardIntervalMinutes);
      registry.registerOrAttach(TOKEN_A, 'Alpha', '$ALPHA', '-100');
      slow.start();

      await vi.advanceTimersByTimeAsync(INTERVAL);
      await vi.advanceTimersByTimeAsync(INTERVAL);
      expect(calls).toEqual(['-100']);

      const stopped = slow.stop();
      release();
      await stopped;

      await vi.advanceTimersByTimeAsync(INTERVAL);
      expect(calls).toEqual(['-100']);
    });
  });
});
