import path from 'node:path';
import { AppConfig } from './types';

function parsePositiveInt(value: string | undefined, fallback: number, key: string): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return parsed;
}

function parseOptionalInt(value: string | undefined, key: string): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer`);
  }
  return parsed;
}

function parseIntList(value: string | undefined, key: string): number[] {
  if (!value || value.trim() === '') return [];

  return value.split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '')
    .map((item) => {
      const parsed = Number.parseInt(item, 10);
      if (!Number.isFinite(parsed) || String(parsed) !== item) {
        throw new Error(`Environment variable ${key} must be a comma-separated list of integers`);
      }
      return parsed;
    });
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const botToken = env.BOT_TOKEN?.trim();
  if (!botToken) {
    throw new Error('BOT_TOKEN is required');
  }

  return {
    botToken,
    databasePath: env.DATABASE_PATH?.trim() || path.resolve(process.cwd(), 'data/moderation.sqlite'),
    logChatId: parseOptionalInt(env.LOG_CHAT_ID, 'LOG_CHAT_ID'),
    adminUserIds: parseIntList(env.ADMIN_USER_IDS, 'ADMIN_USER_IDS'),
    noticeInChat: parseBoolean(env.NOTICE_IN_CHAT, true),
    notifyUserOnWarning: parseBoolean(env.NOTIFY_USER_ON_WARNING, true),
    notifyOnExpiry: parseBoolean(env.NOTIFY_ON_EXPIRY, false),
    floodMinIntervalSec: parsePositiveInt(env.FLOOD_MIN_INTERVAL_SEC, 2, 'FLOOD_MIN_INTERVAL_SEC'),
    spamThreshold: parsePositiveInt(env.SPAM_THRESHOLD, 5, 'SPAM_THRESHOLD'),
    spamWindowSec: parsePositiveInt(env.SPAM_WINDOW_SEC, 60, 'SPAM_WINDOW_SEC'),
    maxWarnings: parsePositiveInt(env.MAX_WARNINGS, 3, 'MAX_WARNINGS'),
    maxMessageLength: parsePositiveInt(env.MAX_MESSAGE_LENGTH, 1000, 'MAX_MESSAGE_LENGTH'),
    sweepIntervalSec: parsePositiveInt(env.SWEEP_INTERVAL_SEC, 300, 'SWEEP_INTERVAL_SEC'),
    retentionDays: parsePositiveInt(env.RETENTION_DAYS, 30, 'RETENTION_DAYS'),
  };
}
