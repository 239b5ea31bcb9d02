import { BetterSqliteDb } from '../db/sqlite';
import { ChatSettingsPatch, mergeStoredSettings, parseSettingsPatch } from '../moderation/chat-settings';
import { ChatModerationSettings } from '../types';

interface ChatSettingRow {
  settings_json: string;
}

export class ChatSettingsRepo {
  constructor(
    private readonly db: BetterSqliteDb,
    private readonly defaults: ChatModerationSettings,
  ) {}

  get(chatId: number): ChatModerationSettings {
    const row = this.db.prepare(`
      SELECT settings_json
      FROM chat_settings
      WHERE chat_id = ?
    `).get(chatId) as ChatSettingRow | undefined;

    if (!row) {
      return this.cloneDefaults();
    }

    return mergeStoredSettings(JSON.parse(row.settings_json), this.cloneDefaults());
  }

  /** Validates `patch` against the settings schema; unknown keys are rejected. */
  update(chatId: number, patch: unknown): ChatModerationSettings {
    const parsed: ChatSettingsPatch = parseSettingsPatch(patch);
    const current = this.get(chatId);
    const next: ChatModerationSettings = {
      ...current,
      ...parsed,
      ruleActions: { ...current.ruleActions, ...(parsed.ruleActions ?? {}) },
    };

    this.db.prepare(`
      INSERT INTO chat_settings (chat_id, settings_json, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(chat_id)
      DO UPDATE SET settings_json = excluded.settings_json, updated_at = excluded.updated_at
    `).run(chatId, JSON.stringify(next), Date.now());

    return next;
  }

  setEnabled(chatId: number, enabled: boolean): ChatModerationSettings {
    return this.update(chatId, { enabled });
  }

  private cloneDefaults(): ChatModerationSettings {
    return {
      ...this.defaults,
      ruleActions: { ...this.defaults.ruleActions },
      precedence: [...this.defaults.precedence],
    };
  }
}
