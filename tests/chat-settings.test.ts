import { describe, expect, it } from 'vitest';
import {
  buildDefaultSettings,
  ConfigValidationError,
  mergeStoredSettings,
  parseSettingAssignment,
  parseSettingsPatch,
} from '../src/moderation/chat-settings';
import { DEFAULT_PRECEDENCE } from '../src/moderation/escalation';
import { UnknownActionTypeError } from '../src/moderation/tiers';
import { testConfig } from './fakes';

describe('chat settings', () => {
  it('builds defaults from the app config', () => {
    const defaults = buildDefaultSettings(testConfig);

    expect(defaults.enabled).toBe(true);
    expect(defaults.floodMinIntervalSec).toBe(2);
    expect(defaults.spamThreshold).toBe(5);
    expect(defaults.maxWarnings).toBe(3);
    expect(defaults.precedence[0]).toBe('flood');
    expect(defaults.precedence[defaults.precedence.length - 1]).toBe('warning_limit');
  });

  it('parses typed admin assignments', () => {
    expect(parseSettingAssignment('spamThreshold', '10')).toEqual({ spamThreshold: 10 });
    expect(parseSettingAssignment('caps', 'off')).toEqual({ caps: false });
    expect(parseSettingAssignment('action.caps', 'mute_2')).toEqual({ ruleActions: { caps: 'mute_2' } });
  });

  it('rejects unknown keys and bad values', () => {
    expect(() => parseSettingAssignment('unknownKey', '1')).toThrow(ConfigValidationError);
    expect(() => parseSettingAssignment('spamThreshold', 'abc')).toThrow(ConfigValidationError);
    expect(() => parseSettingAssignment('spamThreshold', '0')).toThrow(ConfigValidationError);
    expect(() => parseSettingAssignment('action.nope', 'warning')).toThrow(ConfigValidationError);
    expect(() => parseSettingAssignment('action.caps', 'kick')).toThrow(UnknownActionTypeError);
  });

  it('requires precedence to list every check once', () => {
    expect(() => parseSettingAssignment('precedence', 'flood,spam')).toThrow(ConfigValidationError);
  });

  it('keeps the warning limit at the end of the precedence list', () => {
    const reordered = ['warning_limit', ...DEFAULT_PRECEDENCE.filter((category) => category !== 'warning_limit')];

    expect(() => parseSettingsPatch({ precedence: reordered }))
      .toThrow('Invalid moderation settings: precedence: warning_limit must be the last check');

    const linksFirst = ['links', ...DEFAULT_PRECEDENCE.filter((category) => category !== 'links')];
    expect(parseSettingAssignment('precedence', linksFirst.join(','))).toEqual({ precedence: linksFirst });
  });

  it('rejects patches with unknown keys', () => {
    expect(() => parseSettingsPatch({ bogus: true })).toThrow(ConfigValidationError);
    expect(() => parseSettingsPatch({ maxWarnings: 0 })).toThrow(/maxWarnings/);
  });

  it('keeps valid stored keys and falls back for the rest', () => {
    const defaults = buildDefaultSettings(testConfig);
    const merged = mergeStoredSettings({ spamThreshold: 9, caps: 'yes', bogus: 1 }, defaults);

    expect(merged.spamThreshold).toBe(9);
    expect(merged.caps).toBe(true);
    expect(merged).not.toHaveProperty('bogus');
  });
});
