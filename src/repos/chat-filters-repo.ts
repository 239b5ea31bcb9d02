import safeRegex from 'safe-regex2';
import { BetterSqliteDb } from '../db/sqlite';
import { ActionType, ChatFilter, FilterType } from '../types';

interface ChatFilterRow {
  id: number;
  chat_id: number;
  filter_type: FilterType;
  pattern: string;
  action_type: ActionType;
  is_active: number;
  created_by: number;
  created_at: number;
}

const MIN_PATTERN_LENGTH = 2;

function toFilter(row: ChatFilterRow): ChatFilter {
  return {
    id: row.id,
    chatId: row.chat_id,
    filterType: row.filter_type,
    pattern: row.pattern,
    actionType: row.action_type,
    active: row.is_active === 1,
    createdBy: row.created_by,
    createdAt: row.created_at,
  };
}

export type FilterRejection = 'too_short' | 'invalid_regex' | 'unsafe_regex';

export class InvalidFilterPatternError extends Error {
  constructor(readonly pattern: string, readonly rejection: FilterRejection, detail: string) {
    super(detail);
    this.name = 'InvalidFilterPatternError';
  }
}

/** Patterns run on every message, so ones prone to catastrophic backtracking are refused up front. */
export function validateFilterPattern(filterType: FilterType, pattern: string): string {
  const trimmed = pattern.trim();
  if (trimmed.length < MIN_PATTERN_LENGTH) {
    throw new InvalidFilterPatternError(trimmed, 'too_short', `Filter pattern must be at least ${MIN_PATTERN_LENGTH} characters`);
  }

  if (filterType !== 'pattern') {
    return trimmed;
  }

  let regex: RegExp;
  try {
    regex = new RegExp(trimmed, 'i');
  } catch (error) {
    throw new InvalidFilterPatternError(
      trimmed,
      'invalid_regex',
      `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!safeRegex(regex)) {
    throw new InvalidFilterPatternError(trimmed, 'unsafe_regex', 'Regular expression may backtrack catastrophically');
  }

  return trimmed;
}

export class ChatFiltersRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  add(chatId: number, filterType: FilterType, pattern: string, actionType: ActionType, createdBy: number): ChatFilter {
    const normalized = validateFilterPattern(filterType, pattern);
    const result = this.db.prepare(`
      INSERT INTO chat_filters (chat_id, filter_type, pattern, action_type, is_active, created_by, created_at)
      VALUES (?, ?, ?, ?, 1, ?, ?)
    `).run(chatId, filterType, normalized, actionType, createdBy, Date.now());

    const created = this.getById(Number(result.lastInsertRowid));
    if (!created) {
      throw new Error('Failed to read back created filter');
    }
    return created;
  }

  getById(id: number): ChatFilter | null {
    const row = this.db.prepare(`
      SELECT id, chat_id, filter_type, pattern, action_type, is_active, created_by, created_at
      FROM chat_filters
      WHERE id = ?
    `).get(id) as ChatFilterRow | undefined;

    return row ? toFilter(row) : null;
  }

  remove(chatId: number, id: number): boolean {
    const result = this.db.prepare('DELETE FROM chat_filters WHERE chat_id = ? AND id = ?').run(chatId, id);
    return result.changes > 0;
  }

  setActive(chatId: number, id: number, active: boolean): boolean {
    const result = this.db.prepare(`
      UPDATE chat_filters
      SET is_active = ?
      WHERE chat_id = ? AND id = ?
    `).run(active ? 1 : 0, chatId, id);

    return result.changes > 0;
  }

  list(chatId: number, filterType?: FilterType): ChatFilter[] {
    const rows = filterType === undefined
      ? this.db.prepare(`
          SELECT id, chat_id, filter_type, pattern, action_type, is_active, created_by, created_at
          FROM chat_filters
          WHERE chat_id = ?
          ORDER BY id ASC
        `).all(chatId) as ChatFilterRow[]
      : this.db.prepare(`
          SELECT id, chat_id, filter_type, pattern, action_type, is_active, created_by, created_at
          FROM chat_filters
          WHERE chat_id = ? AND filter_type = ?
          ORDER BY id ASC
        `).all(chatId, filterType) as ChatFilterRow[];

    return rows.map(toFilter);
  }

  listActive(chatId: number): ChatFilter[] {
    return this.list(chatId).filter((filter) => filter.active);
  }
}
