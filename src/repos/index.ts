import { AppConfig } from '../types';
import { SqliteDatabase } from '../db/sqlite';
import { buildDefaultSettings } from '../moderation/chat-settings';
import { ChatFiltersRepo } from './chat-filters-repo';
import { ChatSettingsRepo } from './chat-settings-repo';
import { DomainWhitelistRepo } from './domain-whitelist-repo';
import { ModerationActionsRepo } from './moderation-actions-repo';
import { SanctionsRepo } from './sanctions-repo';
import { WarningsRepo } from './warnings-repo';

export interface Repositories {
  chatFilters: ChatFiltersRepo;
  chatSettings: ChatSettingsRepo;
  domainWhitelist: DomainWhitelistRepo;
  moderationActions: ModerationActionsRepo;
  sanctions: SanctionsRepo;
  warnings: WarningsRepo;
  transaction<T>(work: () => T): T;
}

export function createRepositories(database: SqliteDatabase, config: AppConfig): Repositories {
  const { db } = database;

  return {
    chatFilters: new ChatFiltersRepo(db),
    chatSettings: new ChatSettingsRepo(db, buildDefaultSettings(config)),
    domainWhitelist: new DomainWhitelistRepo(db),
    moderationActions: new ModerationActionsRepo(db),
    sanctions: new SanctionsRepo(db),
    warnings: new WarningsRepo(db),
    transaction: (work) => database.transaction(work),
  };
}
