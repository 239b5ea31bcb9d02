import { ChatModerationSettings, ContentCategory, ModerationConfig, Violation } from '../types';
import { getForbiddenLinks, stripLinks } from './link-detector';

export const BASE_BAD_WORDS: readonly string[] = ['спам', 'реклама', 'scam', 'spam', 'advertisement'];

const CAPS_MIN_LETTERS = 10;
const CAPS_MAX_RATIO = 0.7;
const EMOJI_MAX_COUNT = 5;
const NUMBER_MAX_COUNT = 5;
const REPEATED_CHARS_MIN_LENGTH = 10;
const BAD_WORDS_IN_REASON = 3;

const EMOJI_REGEX = /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2600}-\u{27BF}]/gu;
const LETTER_REGEX = /\p{L}/u;
const UPPERCASE_REGEX = /\p{Lu}/u;
const DIGIT_RUN_REGEX = /\d+/g;
const REPEATED_CHAR_REGEX = /([\p{L}\p{N}])\1\1/u;

type ContentEvaluator = (text: string, config: ModerationConfig) => Violation | null;

interface ContentRule {
  category: ContentCategory;
  toggle: keyof Pick<
    ChatModerationSettings,
    'badWords' | 'links' | 'caps' | 'emojiSpam' | 'numberSpam' | 'repeatedChars' | 'maxLength' | 'blockedPatterns'
  >;
  evaluate: ContentEvaluator;
}

export type EvaluatorErrorHandler = (category: ContentCategory, error: unknown) => void;

function checkBadWords(text: string, config: ModerationConfig): Violation | null {
  const lowered = text.toLowerCase();
  const found: string[] = [];
  const seen = new Set<string>();

  for (const word of [...config.badWords, ...BASE_BAD_WORDS]) {
    const normalized = word.trim().toLowerCase();
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);

    if (lowered.includes(normalized)) {
      found.push(word.trim());
    }
  }

  if (found.length === 0) return null;

  return {
    category: 'bad_words',
    reason: `Запрещенные слова: ${found.slice(0, BAD_WORDS_IN_REASON).join(', ')}`,
  };
}

function checkLinks(text: string, config: ModerationConfig): Violation | null {
  const links = getForbiddenLinks(text, config.allowedDomains);
  if (links.length === 0) return null;

  return { category: 'links', reason: `Обнаружены ссылки: ${links.length} шт.` };
}

function checkCaps(text: string): Violation | null {
  let letters = 0;
  let uppercase = 0;

  for (const char of stripLinks(text)) {
    if (!LETTER_REGEX.test(char)) continue;
    letters += 1;
    if (UPPERCASE_REGEX.test(char)) uppercase += 1;
  }

  if (letters < CAPS_MIN_LETTERS) return null;

  const ratio = uppercase / letters;
  if (ratio <= CAPS_MAX_RATIO) return null;

  return { category: 'caps', reason: `Слишком много заглавных букв: ${Math.round(ratio * 100)}%` };
}

function checkEmojiSpam(text: string): Violation | null {
  const count = text.match(EMOJI_REGEX)?.length ?? 0;
  if (count <= EMOJI_MAX_COUNT) return null;

  return { category: 'emoji_spam', reason: `Слишком много эмодзи: ${count} шт.` };
}

function checkNumberSpam(text: string): Violation | null {
  const count = text.match(DIGIT_RUN_REGEX)?.length ?? 0;
  if (count <= NUMBER_MAX_COUNT) return null;

  return { category: 'number_spam', reason: `Слишком много чисел: ${count} шт.` };
}

function checkRepeatedChars(text: string): Violation | null {
  if (Array.from(text).length < REPEATED_CHARS_MIN_LENGTH) return null;
  if (!REPEATED_CHAR_REGEX.test(text)) return null;

  return { category: 'repeated_chars', reason: 'Повторяющиеся символы' };
}

function checkMaxLength(text: string, config: ModerationConfig): Violation | null {
  const length = Array.from(text).length;
  if (length <= config.settings.maxMessageLength) return null;

  return { category: 'max_length', reason: `Сообщение слишком длинное: ${length} символов` };
}

function checkBlockedPatterns(text: string, config: ModerationConfig): Violation | null {
  for (const blocked of config.blockedPatterns) {
    const regex = new RegExp(blocked.pattern, 'i');
    if (regex.test(text)) {
      return {
        category: 'blocked_pattern',
        reason: `Запрещенный шаблон #${blocked.filterId}`,
        actionType: blocked.actionType,
      };
    }
  }

  return null;
}

export const CONTENT_RULES: readonly ContentRule[] = [
  { category: 'bad_words', toggle: 'badWords', evaluate: checkBadWords },
  { category: 'links', toggle: 'links', evaluate: checkLinks },
  { category: 'caps', toggle: 'caps', evaluate: checkCaps },
  { category: 'emoji_spam', toggle: 'emojiSpam', evaluate: checkEmojiSpam },
  { category: 'number_spam', toggle: 'numberSpam', evaluate: checkNumberSpam },
  { category: 'repeated_chars', toggle: 'repeatedChars', evaluate: checkRepeatedChars },
  { category: 'max_length', toggle: 'maxLength', evaluate: checkMaxLength },
  { category: 'blocked_pattern', toggle: 'blockedPatterns', evaluate: checkBlockedPatterns },
];

/**
 * Runs every enabled content rule and collects all violations.
 * A rule that throws is reported through `onError` and counts as a pass.
 */
export function evaluateContent(
  text: string | null | undefined,
  config: ModerationConfig,
  onError?: EvaluatorErrorHandler,
): Violation[] {
  if (!text) return [];

  const violations: Violation[] = [];
  for (const rule of CONTENT_RULES) {
    if (!config.settings[rule.toggle]) continue;

    try {
      const violation = rule.evaluate(text, config);
      if (violation) {
        violations.push(violation);
      }
    } catch (error) {
      onError?.(rule.category, error);
    }
  }

  return violations;
}
