import { z } from 'zod';
import { AppConfig, ChatModerationSettings } from '../types';
import { DEFAULT_PRECEDENCE } from './escalation';
import { parseActionType } from './tiers';

const VIOLATION_CATEGORIES = [
  'flood',
  'spam',
  'bad_words',
  'links',
  'caps',
  'emoji_spam',
  'number_spam',
  'repeated_chars',
  'max_length',
  'blocked_pattern',
  'warning_limit',
] as const;

const categorySchema = z.enum(VIOLATION_CATEGORIES);
const actionTypeSchema = z.enum(['warning', 'mute_1', 'mute_2', 'mute_3', 'ban_1', 'ban_2', 'ban_3']);

/** `warning_limit` overrides whatever came before it, so it has to run last. */
const precedenceSchema = z.array(categorySchema)
  .refine(
    (list) => list.length === VIOLATION_CATEGORIES.length && new Set(list).size === list.length,
    { message: 'precedence must list every check exactly once' },
  )
  .refine(
    (list) => list[list.length - 1] === 'warning_limit',
    { message: 'warning_limit must be the last check' },
  );

export const chatSettingsSchema = z.object({
  enabled: z.boolean(),
  floodProtection: z.boolean(),
  floodMinIntervalSec: z.number().int().min(1).max(3600),
  spamProtection: z.boolean(),
  spamThreshold: z.number().int().min(1).max(1000),
  spamWindowSec: z.number().int().min(1).max(3600),
  badWords: z.boolean(),
  links: z.boolean(),
  caps: z.boolean(),
  emojiSpam: z.boolean(),
  numberSpam: z.boolean(),
  repeatedChars: z.boolean(),
  maxLength: z.boolean(),
  blockedPatterns: z.boolean(),
  maxMessageLength: z.number().int().min(1).max(100_000),
  maxWarnings: z.number().int().min(1).max(100),
  ruleActions: z.record(categorySchema, actionTypeSchema),
  precedence: precedenceSchema,
}).strict();

export const chatSettingsPatchSchema = chatSettingsSchema.partial().strict();

export type ChatSettingsPatch = z.infer<typeof chatSettingsPatchSchema>;

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid moderation settings: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${key}: ${issue.message}`;
  });
}

export function buildDefaultSettings(config: AppConfig): ChatModerationSettings {
  return {
    enabled: true,
    floodProtection: true,
    floodMinIntervalSec: config.floodMinIntervalSec,
    spamProtection: true,
    spamThreshold: config.spamThreshold,
    spamWindowSec: config.spamWindowSec,
    badWords: true,
    links: true,
    caps: true,
    emojiSpam: true,
    numberSpam: true,
    repeatedChars: true,
    maxLength: true,
    blockedPatterns: true,
    maxMessageLength: config.maxMessageLength,
    maxWarnings: config.maxWarnings,
    ruleActions: {},
    precedence: [...DEFAULT_PRECEDENCE],
  };
}

export function parseSettingsPatch(input: unknown): ChatSettingsPatch {
  const result = chatSettingsPatchSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Reads settings stored by an older build: unknown keys are dropped and
 * missing or invalid keys fall back to `defaults`.
 */
export function mergeStoredSettings(stored: unknown, defaults: ChatModerationSettings): ChatModerationSettings {
  if (!stored || typeof stored !== 'object' || Array.isArray(stored)) {
    return defaults;
  }

  const merged: ChatModerationSettings = { ...defaults };
  const shape = chatSettingsSchema.shape;
  const record = Object.fromEntries(Object.entries(stored));

  for (const key of Object.keys(shape)) {
    if (!(key in record)) continue;
    const single = chatSettingsPatchSchema.safeParse({ [key]: record[key] });
    if (single.success) {
      Object.assign(merged, single.data);
    }
  }

  return merged;
}

type SettingValueKind = 'boolean' | 'integer' | 'category_list';

const SETTING_KINDS: Record<Exclude<keyof ChatModerationSettings, 'ruleActions'>, SettingValueKind> = {
  enabled: 'boolean',
  floodProtection: 'boolean',
  floodMinIntervalSec: 'integer',
  spamProtection: 'boolean',
  spamThreshold: 'integer',
  spamWindowSec: 'integer',
  badWords: 'boolean',
  links: 'boolean',
  caps: 'boolean',
  emojiSpam: 'boolean',
  numberSpam: 'boolean',
  repeatedChars: 'boolean',
  maxLength: 'boolean',
  blockedPatterns: 'boolean',
  maxMessageLength: 'integer',
  maxWarnings: 'integer',
  precedence: 'category_list',
};

function isSettingKey(key: string): key is keyof typeof SETTING_KINDS {
  return Object.prototype.hasOwnProperty.call(SETTING_KINDS, key);
}

function parseBooleanToken(raw: string): boolean | string {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return raw;
}

function parseIntegerToken(raw: string): number | string {
  const trimmed = raw.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : raw;
}

/**
 * Turns a `key value` pair typed by an admin into a validated patch.
 * `action.<category>` keys set a rule action override.
 */
export function parseSettingAssignment(key: string, rawValue: string): ChatSettingsPatch {
  const actionMatch = key.match(/^action\.([a-z_]+)$/);
  if (actionMatch) {
    const category = actionMatch[1];
    if (!categorySchema.safeParse(category).success) {
      throw new ConfigValidationError([`${key}: unknown check`]);
    }
    return parseSettingsPatch({ ruleActions: { [category]: parseActionType(rawValue) } });
  }

  if (!isSettingKey(key)) {
    throw new ConfigValidationError([`${key}: unknown setting`]);
  }

  switch (SETTING_KINDS[key]) {
    case 'boolean':
      return parseSettingsPatch({ [key]: parseBooleanToken(rawValue) });
    case 'integer':
      return parseSettingsPatch({ [key]: parseIntegerToken(rawValue) });
    case 'category_list':
      return parseSettingsPatch({ [key]: rawValue.split(/[\s,]+/).filter(Boolean) });
    default:
      throw new ConfigValidationError([`${key}: unsupported setting`]);
  }
}

