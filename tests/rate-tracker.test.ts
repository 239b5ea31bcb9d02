import { describe, expect, it } from 'vitest';
import { RateTracker } from '../src/moderation/rate-tracker';

const T0 = 1_700_000_000_000;

describe('rate tracker flood check', () => {
  it('passes the first message and flags one sent too soon', () => {
    const tracker = new RateTracker();

    expect(tracker.checkFlood(1, 2, T0, 2).violation).toBe(false);
    const second = tracker.checkFlood(1, 2, T0 + 1_000, 2);

    expect(second).toEqual({ violation: true, reason: 'Флуд: слишком частые сообщения' });
  });

  it('passes a message exactly at the minimum interval', () => {
    const tracker = new RateTracker();

    tracker.checkFlood(1, 2, T0, 2);
    expect(tracker.checkFlood(1, 2, T0 + 2_000, 2).violation).toBe(false);
  });

  it('always moves the last message time forward', () => {
    const tracker = new RateTracker();

    tracker.checkFlood(1, 2, T0, 2);
    tracker.checkFlood(1, 2, T0 + 1_500, 2);
    expect(tracker.checkFlood(1, 2, T0 + 3_000, 2).violation).toBe(true);
    expect(tracker.checkFlood(1, 2, T0 + 5_000, 2).violation).toBe(false);
  });

  it('keeps users and chats apart', () => {
    const tracker = new RateTracker();

    tracker.checkFlood(1, 2, T0, 2);
    expect(tracker.checkFlood(1, 3, T0 + 100, 2).violation).toBe(false);
    expect(tracker.checkFlood(9, 2, T0 + 100, 2).violation).toBe(false);
  });
});

describe('rate tracker spam check', () => {
  it('flags the sixth message inside the window', () => {
    const tracker = new RateTracker();
    const results: boolean[] = [];

    for (let index = 0; index < 6; index += 1) {
      results.push(tracker.checkSpam(1, 2, T0 + index * 5_000, 5, 60).violation);
    }

    expect(results).toEqual([false, false, false, false, false, true]);
    expect(tracker.checkSpam(1, 2, T0 + 30_000, 5, 60).reason).toBe('Спам: 7 сообщений за 60 сек');
  });

  it('starts a new window once the old one has elapsed', () => {
    const tracker = new RateTracker();

    for (let index = 0; index < 6; index += 1) {
      tracker.checkSpam(1, 2, T0 + index * 1_000, 5, 60);
    }

    expect(tracker.checkSpam(1, 2, T0 + 61_000, 5, 60).violation).toBe(false);
    expect(tracker.checkSpam(1, 2, T0 + 62_000, 5, 60).violation).toBe(false);
  });
});

describe('rate tracker purge', () => {
  it('drops only idle entries', () => {
    const tracker = new RateTracker();

    tracker.checkFlood(1, 2, T0, 2);
    tracker.checkSpam(1, 3, T0 + 50_000, 5, 60);
    expect(tracker.size).toBe(2);

    expect(tracker.purgeIdle(T0 + 70_000, 60_000)).toBe(1);
    expect(tracker.size).toBe(1);
  });
});
