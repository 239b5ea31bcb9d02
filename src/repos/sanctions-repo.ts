import { BetterSqliteDb } from '../db/sqlite';
import { NewSanction, Sanction, SanctionKind } from '../types';

interface SanctionRow {
  id: number;
  chat_id: number;
  user_id: number;
  kind: SanctionKind;
  reason: string;
  issued_by: number;
  issued_at: number;
  duration_sec: number;
  expires_at: number;
  active: number;
}

const SELECT_COLUMNS = `
  id, chat_id, user_id, kind, reason, issued_by, issued_at, duration_sec, expires_at, active
`;

function toSanction(row: SanctionRow): Sanction {
  return {
    id: row.id,
    chatId: row.chat_id,
    userId: row.user_id,
    kind: row.kind,
    reason: row.reason,
    issuedBy: row.issued_by,
    issuedAtMs: row.issued_at,
    durationSec: row.duration_sec,
    expiresAtMs: row.expires_at,
    active: row.active === 1,
  };
}

export class SanctionsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  /**
   * Inserts an active sanction. Any active sanction of the same kind for the
   * user in this chat is deactivated in the same transaction.
   */
  add(sanction: NewSanction): number {
    if (sanction.durationSec <= 0) {
      throw new Error('Sanction duration must be positive');
    }

    const expiresAtMs = sanction.issuedAtMs + sanction.durationSec * 1_000;

    const insert = this.db.transaction((): number => {
      this.db.prepare(`
        UPDATE sanctions
        SET active = 0, deactivated_at = ?, deactivation_reason = 'superseded'
        WHERE chat_id = ? AND user_id = ? AND kind = ? AND active = 1
      `).run(sanction.issuedAtMs, sanction.chatId, sanction.userId, sanction.kind);

      const result = this.db.prepare(`
        INSERT INTO sanctions (chat_id, user_id, kind, reason, issued_by, issued_at, duration_sec, expires_at, active)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, 1)
      `).run(
        sanction.chatId,
        sanction.userId,
        sanction.kind,
        sanction.reason,
        sanction.issuedBy,
        sanction.issuedAtMs,
        sanction.durationSec,
        expiresAtMs,
      );

      return Number(result.lastInsertRowid);
    });

    return insert();
  }

  getById(id: number): Sanction | null {
    const row = this.db.prepare(`SELECT ${SELECT_COLUMNS} FROM sanctions WHERE id = ?`).get(id) as SanctionRow | undefined;
    return row ? toSanction(row) : null;
  }

  /** Active and not yet past expiry; pass no chat to list every chat. */
  getActive(chatId: number | undefined, nowTs: number): Sanction[] {
    const rows = chatId === undefined
      ? this.db.prepare(`
          SELECT ${SELECT_COLUMNS}
          FROM sanctions
          WHERE active = 1 AND expires_at > ?
          ORDER BY expires_at ASC
        `).all(nowTs) as SanctionRow[]
      : this.db.prepare(`
          SELECT ${SELECT_COLUMNS}
          FROM sanctions
          WHERE chat_id = ? AND active = 1 AND expires_at > ?
          ORDER BY expires_at ASC
        `).all(chatId, nowTs) as SanctionRow[];

    return rows.map(toSanction);
  }

  getActiveFor(chatId: number, userId: number, nowTs: number): Sanction[] {
    const rows = this.db.prepare(`
      SELECT ${SELECT_COLUMNS}
      FROM sanctions
      WHERE chat_id = ? AND user_id = ? AND active = 1 AND expires_at > ?
      ORDER BY expires_at DESC
    `).all(chatId, userId, nowTs) as SanctionRow[];

    return rows.map(toSanction);
  }

  countActiveByKind(chatId: number, userId: number, kind: SanctionKind): number {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS count
      FROM sanctions
      WHERE chat_id = ? AND user_id = ? AND kind = ? AND active = 1
    `).get(chatId, userId, kind) as { count: number };

    return row.count;
  }

  /** Deactivates every due sanction in one transaction and returns them. */
  expireDue(nowTs: number): Sanction[] {
    const expire = this.db.transaction((): Sanction[] => {
      const rows = this.db.prepare(`
        SELECT ${SELECT_COLUMNS}
        FROM sanctions
        WHERE active = 1 AND expires_at <= ?
      `).all(nowTs) as SanctionRow[];

      if (rows.length === 0) {
        return [];
      }

      this.db.prepare(`
        UPDATE sanctions
        SET active = 0, deactivated_at = ?, deactivation_reason = 'expired'
        WHERE active = 1 AND expires_at <= ?
      `).run(nowTs, nowTs);

      return rows.map((row) => ({ ...toSanction(row), active: false }));
    });

    return expire();
  }

  /** Removes finished sanctions whose deactivation (or expiry, when never stamped) predates the cutoff. */
  purgeInactiveBefore(cutoffTs: number): number {
    const result = this.db.prepare(`
      DELETE FROM sanctions
      WHERE active = 0 AND COALESCE(deactivated_at, expires_at) < ?
    `).run(cutoffTs);

    return result.changes;
  }

  revoke(chatId: number, userId: number, kind: SanctionKind, nowTs: number): number {
    const result = this.db.prepare(`
      UPDATE sanctions
      SET active = 0, deactivated_at = ?, deactivation_reason = 'revoked'
      WHERE chat_id = ? AND user_id = ? AND kind = ? AND active = 1
    `).run(nowTs, chatId, userId, kind);

    return result.changes;
  }
}
