export interface RateVerdict {
  violation: boolean;
  reason: string;
}

interface UserRateState {
  lastMessageTs: number | null;
  spamWindowStart: number;
  spamWindowCount: number;
}

const PASS: RateVerdict = { violation: false, reason: '' };

/**
 * In-memory flood and spam counters per (chat, user).
 *
 * Every call mutates state synchronously, so updates for one key never
 * interleave inside a single process. State is lost on restart.
 */
export class RateTracker {
  private readonly states = new Map<string, UserRateState>();

  checkFlood(chatId: number, userId: number, nowTs: number, minIntervalSec: number): RateVerdict {
    const state = this.getState(chatId, userId);
    const lastTs = state.lastMessageTs;
    state.lastMessageTs = nowTs;

    if (lastTs === null) {
      return PASS;
    }

    if (nowTs - lastTs < minIntervalSec * 1_000) {
      return { violation: true, reason: 'Флуд: слишком частые сообщения' };
    }

    return PASS;
  }

  checkSpam(chatId: number, userId: number, nowTs: number, threshold: number, windowSec: number): RateVerdict {
    const state = this.getState(chatId, userId);

    if (state.spamWindowCount === 0 || nowTs - state.spamWindowStart > windowSec * 1_000) {
      state.spamWindowStart = nowTs;
      state.spamWindowCount = 1;
      return PASS;
    }

    state.spamWindowCount += 1;
    if (state.spamWindowCount > threshold) {
      return {
        violation: true,
        reason: `Спам: ${state.spamWindowCount} сообщений за ${windowSec} сек`,
      };
    }

    return PASS;
  }

  purgeIdle(nowTs: number, maxIdleMs: number): number {
    let removed = 0;
    for (const [key, state] of this.states.entries()) {
      const lastSeenTs = Math.max(state.lastMessageTs ?? 0, state.spamWindowStart);
      if (nowTs - lastSeenTs > maxIdleMs) {
        this.states.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.states.size;
  }

  private getState(chatId: number, userId: number): UserRateState {
    const key = this.key(chatId, userId);
    let state = this.states.get(key);
    if (!state) {
      state = { lastMessageTs: null, spamWindowStart: 0, spamWindowCount: 0 };
      this.states.set(key, state);
    }
    return state;
  }

  private key(chatId: number, userId: number): string {
    return `${chatId}:${userId}`;
  }
}
