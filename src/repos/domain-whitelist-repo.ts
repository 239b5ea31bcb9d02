import { BetterSqliteDb } from '../db/sqlite';
import { normalizeDomain } from '../moderation/link-detector';

export interface WhitelistChange {
  domain: string;
  changed: boolean;
}

export class InvalidDomainError extends Error {
  constructor(readonly input: string) {
    super(`Invalid domain: ${input}`);
    this.name = 'InvalidDomainError';
  }
}

export class DomainWhitelistRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  add(chatId: number, input: string): WhitelistChange {
    const domain = this.normalize(input);
    const result = this.db.prepare(`
      INSERT INTO domain_whitelist (chat_id, domain, created_at)
      VALUES (?, ?, ?)
      ON CONFLICT(chat_id, domain) DO NOTHING
    `).run(chatId, domain, Date.now());

    return { domain, changed: result.changes > 0 };
  }

  remove(chatId: number, input: string): WhitelistChange {
    const domain = this.normalize(input);
    const result = this.db.prepare('DELETE FROM domain_whitelist WHERE chat_id = ? AND domain = ?').run(chatId, domain);
    return { domain, changed: result.changes > 0 };
  }

  list(chatId: number): string[] {
    return this.db.prepare('SELECT domain FROM domain_whitelist WHERE chat_id = ? ORDER BY domain')
      .pluck()
      .all(chatId)
      .filter((value): value is string => typeof value === 'string');
  }

  private normalize(input: string): string {
    const domain = normalizeDomain(input);
    if (!domain) {
      throw new InvalidDomainError(input);
    }
    return domain;
  }
}
