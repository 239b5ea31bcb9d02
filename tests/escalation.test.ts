import { describe, expect, it } from 'vitest';
import { buildDefaultSettings } from '../src/moderation/chat-settings';
import { resolveEscalationState, selectAction } from '../src/moderation/escalation';
import { formatDuration, parseActionType, tierActionType, UnknownActionTypeError } from '../src/moderation/tiers';
import { Sanction, Violation } from '../src/types';
import { testConfig } from './fakes';

const settings = buildDefaultSettings(testConfig);

const caps: Violation = { category: 'caps', reason: 'caps' };
const links: Violation = { category: 'links', reason: 'links' };
const flood: Violation = { category: 'flood', reason: 'flood' };
const spam: Violation = { category: 'spam', reason: 'spam' };

function sanction(kind: Sanction['kind']): Sanction {
  return {
    id: 1,
    chatId: 1,
    userId: 2,
    kind,
    reason: 'test',
    issuedBy: 0,
    issuedAtMs: 0,
    durationSec: 300,
    expiresAtMs: 300_000,
    active: true,
  };
}

describe('escalation policy', () => {
  it('returns no action when nothing fired', () => {
    expect(selectAction([], settings, 0)).toEqual({ violations: [], action: null });
  });

  it('lets the later check in precedence order win', () => {
    const verdict = selectAction([links, caps], settings, 0);

    expect(verdict.violations.map((violation) => violation.category)).toEqual(['caps', 'links']);
    expect(verdict.action).toEqual({ type: 'mute_1', durationSec: 300 });
  });

  it('maps spam to a fifteen minute mute', () => {
    expect(selectAction([flood, spam], settings, 0).action).toEqual({ type: 'mute_2', durationSec: 900 });
  });

  it('bans once a warning would reach the limit', () => {
    const verdict = selectAction([caps], settings, 2);

    expect(verdict.action).toEqual({ type: 'ban_1', durationSec: 86_400, recordsWarning: true });
    expect(verdict.violations[verdict.violations.length - 1]).toEqual({
      category: 'warning_limit',
      reason: 'Превышен лимит предупреждений: 3/3',
    });
  });

  it('does not mark a mute that reaches the limit as a warning', () => {
    expect(selectAction([links], settings, 3).action).toEqual({ type: 'ban_1', durationSec: 86_400 });
  });

  it('does not ban a warning below the limit', () => {
    expect(selectAction([caps], settings, 1).action).toEqual({ type: 'warning', durationSec: 0 });
  });

  it('never bans a clean message', () => {
    expect(selectAction([], settings, 10).action).toBeNull();
  });

  it('honors per-chat action overrides and blocked pattern actions', () => {
    const custom = { ...settings, ruleActions: { caps: 'mute_3' as const } };
    expect(selectAction([caps], custom, 0).action?.type).toBe('mute_3');

    const pattern: Violation = { category: 'blocked_pattern', reason: 'p', actionType: 'ban_2' };
    expect(selectAction([pattern], settings, 0).action).toEqual({ type: 'ban_2', durationSec: 604_800 });
  });

  it('follows a custom precedence', () => {
    const custom = {
      ...settings,
      precedence: settings.precedence.filter((category): boolean => category !== 'caps').concat('caps'),
    };

    expect(selectAction([links, caps], custom, 0).action?.type).toBe('warning');
  });

  it('derives the escalation state', () => {
    expect(resolveEscalationState(0, [])).toBe('clean');
    expect(resolveEscalationState(2, [])).toBe('warned');
    expect(resolveEscalationState(2, [sanction('mute')])).toBe('muted');
    expect(resolveEscalationState(0, [sanction('mute'), sanction('ban')])).toBe('banned');
  });
});

describe('sanction tiers', () => {
  it('maps kind and tier to an action type', () => {
    expect(tierActionType('mute', 2)).toBe('mute_2');
    expect(tierActionType('ban', 4)).toBeNull();
  });

  it('parses action types and rejects unknown ones', () => {
    expect(parseActionType(' MUTE_1 ')).toBe('mute_1');
    expect(() => parseActionType('kick')).toThrow(UnknownActionTypeError);
  });

  it('formats durations', () => {
    expect(formatDuration(45)).toBe('45 сек');
    expect(formatDuration(300)).toBe('5 мин');
    expect(formatDuration(3600)).toBe('1 ч');
    expect(formatDuration(604_800)).toBe('7 дн');
  });
});
