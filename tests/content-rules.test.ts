import { describe, expect, it } from 'vitest';
import { buildDefaultSettings } from '../src/moderation/chat-settings';
import { evaluateContent } from '../src/moderation/content-rules';
import { ModerationConfig } from '../src/types';
import { testConfig } from './fakes';

function makeConfig(overrides: Partial<ModerationConfig> = {}): ModerationConfig {
  return {
    chatId: 1,
    settings: buildDefaultSettings(testConfig),
    badWords: [],
    blockedPatterns: [],
    allowedDomains: [],
    ...overrides,
  };
}

function categories(text: string, config: ModerationConfig = makeConfig()): string[] {
  return evaluateContent(text, config).map((violation) => violation.category);
}

describe('content rules', () => {
  it('returns nothing for empty or missing text', () => {
    expect(evaluateContent('', makeConfig())).toEqual([]);
    expect(evaluateContent(null, makeConfig())).toEqual([]);
    expect(evaluateContent(undefined, makeConfig())).toEqual([]);
  });

  it('passes an ordinary sentence', () => {
    expect(categories('Привет всем, как дела?')).toEqual([]);
  });

  it('flags caps above seventy percent of letters', () => {
    // 15 upper, 5 lower
    expect(categories('ABCDEFGHIJKLMNOpqrst')).toEqual(['caps']);
    // 13 upper, 7 lower
    expect(categories('ABCDEFGHIJKLMnopqrst')).toEqual([]);
  });

  it('ignores caps in short messages', () => {
    expect(categories('OK GO NOW')).toEqual([]);
  });

  it('reports the caps ratio as a percentage', () => {
    const [violation] = evaluateContent('ABCDEFGHIJKLMNOpqrst', makeConfig());
    expect(violation.reason).toBe('Слишком много заглавных букв: 75%');
  });

  it('flags links unless the domain is allowed', () => {
    expect(categories('see https://example.org/page')).toEqual(['links']);
    expect(categories('see https://docs.example.org/page', makeConfig({ allowedDomains: ['example.org'] }))).toEqual([]);
  });

  it('flags base and chat-specific bad words', () => {
    const [violation] = evaluateContent('тут реклама', makeConfig());
    expect(violation).toEqual({ category: 'bad_words', reason: 'Запрещенные слова: реклама' });

    expect(categories('купи слона', makeConfig({ badWords: ['слона'] }))).toEqual(['bad_words']);
  });

  it('flags more than five emoji', () => {
    expect(categories('ok 😀😀😀😀😀')).toEqual([]);
    expect(categories('ok 😀😀😀😀😀😀')).toEqual(['emoji_spam']);
  });

  it('flags more than five separate numbers', () => {
    expect(categories('1 2 3 4 5')).toEqual([]);
    expect(categories('1 2 3 4 5 6')).toEqual(['number_spam']);
  });

  it('flags a character repeated three times in a long message', () => {
    expect(categories('приветтт друзья')).toEqual(['repeated_chars']);
    expect(categories('ууу')).toEqual([]);
  });

  it('flags messages over the configured length', () => {
    const settings = { ...buildDefaultSettings(testConfig), maxMessageLength: 10 };
    expect(categories('коротко', makeConfig({ settings }))).toEqual([]);
    expect(categories('слишком длинно', makeConfig({ settings }))).toEqual(['max_length']);
  });

  it('applies blocked patterns with their own action', () => {
    const config = makeConfig({
      blockedPatterns: [{ filterId: 7, pattern: 'casino\\d+', actionType: 'mute_2' }],
    });

    expect(evaluateContent('visit CASINO42 today', config)).toEqual([
      { category: 'blocked_pattern', reason: 'Запрещенный шаблон #7', actionType: 'mute_2' },
    ]);
  });

  it('skips disabled rules', () => {
    const settings = { ...buildDefaultSettings(testConfig), links: false };
    expect(categories('see https://example.org/page', makeConfig({ settings }))).toEqual([]);
  });

  it('reports a failing rule and keeps evaluating the rest', () => {
    const config = makeConfig({
      blockedPatterns: [{ filterId: 3, pattern: '(', actionType: 'warning' }],
    });
    const failed: string[] = [];

    const violations = evaluateContent('ABCDEFGHIJKLMNOPQRST', config, (category) => {
      failed.push(category);
    });

    expect(failed).toEqual(['blocked_pattern']);
    expect(violations.map((violation) => violation.category)).toEqual(['caps']);
  });
});
