import { Repositories } from '../repos';
import { ChatModerationSettings, ModerationConfig } from '../types';
import { ModerationLogger } from '../services/logger';

/**
 * Assembles the read-only snapshot the engine evaluates a message against.
 * A store failure yields the default settings with empty lists.
 */
export class ModerationConfigProvider {
  constructor(
    private readonly repos: Repositories,
    private readonly defaults: ChatModerationSettings,
    private readonly logger: ModerationLogger,
  ) {}

  get(chatId: number): ModerationConfig {
    try {
      const settings = this.repos.chatSettings.get(chatId);
      const filters = this.repos.chatFilters.listActive(chatId);

      return {
        chatId,
        settings,
        badWords: filters
          .filter((filter) => filter.filterType === 'bad_word')
          .map((filter) => filter.pattern),
        blockedPatterns: filters
          .filter((filter) => filter.filterType === 'pattern')
          .map((filter) => ({ filterId: filter.id, pattern: filter.pattern, actionType: filter.actionType })),
        allowedDomains: this.repos.domainWhitelist.list(chatId),
      };
    } catch (error) {
      void this.logger.error('Failed to load chat moderation config, using defaults', {
        chatId,
        error: error instanceof Error ? error.message : String(error),
      });

      return {
        chatId,
        settings: {
          ...this.defaults,
          ruleActions: { ...this.defaults.ruleActions },
          precedence: [...this.defaults.precedence],
        },
        badWords: [],
        blockedPatterns: [],
        allowedDomains: [],
      };
    }
  }
}
