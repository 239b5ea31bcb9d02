import { BetterSqliteDb } from '../db/sqlite';
import { AuditActionType, ModerationActionRecord, StoredModerationAction } from '../types';

interface ModerationActionRow {
  id: number;
  chat_id: number;
  user_id: number;
  action_type: AuditActionType;
  reason: string;
  moderator_id: number;
  duration_sec: number;
  meta_json: string | null;
  created_at: number;
}

function parseMeta(raw: string | null): Record<string, unknown> | undefined {
  if (!raw) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return undefined;
  return Object.fromEntries(Object.entries(parsed));
}

function toStored(row: ModerationActionRow): StoredModerationAction {
  return {
    id: row.id,
    chatId: row.chat_id,
    userId: row.user_id,
    actionType: row.action_type,
    reason: row.reason,
    moderatorId: row.moderator_id,
    durationSec: row.duration_sec,
    meta: parseMeta(row.meta_json),
    createdAt: row.created_at,
  };
}

/** Append-only audit log; rows are never updated, only purged once past retention. */
export class ModerationActionsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  record(entry: ModerationActionRecord, nowTs: number = Date.now()): number {
    const result = this.db.prepare(`
      INSERT INTO moderation_actions (chat_id, user_id, action_type, reason, moderator_id, duration_sec, meta_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.chatId,
      entry.userId,
      entry.actionType,
      entry.reason,
      entry.moderatorId,
      entry.durationSec,
      entry.meta ? JSON.stringify(entry.meta) : null,
      nowTs,
    );

    return Number(result.lastInsertRowid);
  }

  listForUser(chatId: number, userId: number, limit: number = 20): StoredModerationAction[] {
    const rows = this.db.prepare(`
      SELECT id, chat_id, user_id, action_type, reason, moderator_id, duration_sec, meta_json, created_at
      FROM moderation_actions
      WHERE chat_id = ? AND user_id = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `).all(chatId, userId, limit) as ModerationActionRow[];

    return rows.map(toStored);
  }

  purgeOlderThan(cutoffTs: number): number {
    const result = this.db.prepare('DELETE FROM moderation_actions WHERE created_at < ?').run(cutoffTs);
    return result.changes;
  }

  countByActionSince(chatId: number, userId: number, actionType: AuditActionType, sinceTs: number): number {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS count
      FROM moderation_actions
      WHERE chat_id = ? AND user_id = ? AND action_type = ? AND created_at >= ?
    `).get(chatId, userId, actionType, sinceTs) as { count: number };

    return row.count;
  }
}
