import { BetterSqliteDb } from '../db/sqlite';

interface WarningRow {
  warning_count: number;
}

export class WarningsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  get(chatId: number, userId: number): number {
    const row = this.db.prepare(`
      SELECT warning_count
      FROM user_warnings
      WHERE chat_id = ? AND user_id = ?
    `).get(chatId, userId) as WarningRow | undefined;

    return row?.warning_count ?? 0;
  }

  increment(chatId: number, userId: number, nowTs: number = Date.now()): number {
    this.db.prepare(`
      INSERT INTO user_warnings (chat_id, user_id, warning_count, updated_at)
      VALUES (?, ?, 1, ?)
      ON CONFLICT(chat_id, user_id)
      DO UPDATE SET
        warning_count = warning_count + 1,
        updated_at = excluded.updated_at
    `).run(chatId, userId, nowTs);

    return this.get(chatId, userId);
  }

  reset(chatId: number, userId: number, nowTs: number = Date.now()): number {
    const previous = this.get(chatId, userId);

    this.db.prepare(`
      UPDATE user_warnings
      SET warning_count = 0, updated_at = ?
      WHERE chat_id = ? AND user_id = ?
    `).run(nowTs, chatId, userId);

    return previous;
  }
}
