import { Repositories } from '../repos';
import { FilterRejection, InvalidFilterPatternError } from '../repos/chat-filters-repo';
import { InvalidDomainError } from '../repos/domain-whitelist-repo';
import { ModerationLogger } from '../services/logger';
import { ActionType, SanctionKind, UserModerationStatus } from '../types';
import { ConfigValidationError, parseSettingAssignment } from '../moderation/chat-settings';
import { ModerationEngine } from '../moderation/moderation-engine';
import {
  formatDuration,
  isActionType,
  TIER_DURATIONS_SEC,
  tierActionType,
  UnknownActionTypeError,
} from '../moderation/tiers';

const ADMIN_COMMANDS = new Set([
  'mod_status',
  'mod_on',
  'mod_off',
  'mod_set',
  'warn',
  'mute',
  'ban',
  'unmute',
  'unban',
  'reset_warnings',
  'user_status',
  'badword_add',
  'filter_add',
  'filter_del',
  'filter_toggle',
  'filters',
  'allowdomain_add',
  'allowdomain_del',
  'allowdomain_list',
]);

const DEFAULT_ADMIN_REASON = 'Решение администратора';

const FILTER_REJECTIONS: Record<FilterRejection, string> = {
  too_short: 'шаблон слишком короткий',
  invalid_regex: 'некорректное регулярное выражение',
  unsafe_regex: 'выражение может зависнуть на длинном тексте',
};

export interface ParsedCommand {
  command: string;
  rawArgs: string;
}

export interface CommandInput {
  chatId: number;
  userId: number;
  text: string;
}

export type ReplyFn = (text: string) => Promise<void>;

export interface AdminCheck {
  isAdmin(chatId: number, userId: number): Promise<boolean>;
}

export function parseAdminCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^\/([a-z0-9_]+)(?:@[a-z0-9_]+)?(?:\s+([\s\S]+))?$/i);
  if (!match) return null;

  const command = match[1].toLowerCase();
  const rawArgs = (match[2] ?? '').trim();

  if (!ADMIN_COMMANDS.has(command)) {
    return null;
  }

  return { command, rawArgs };
}

function parsePositiveId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

function splitFirst(rawArgs: string): [string, string] {
  const match = rawArgs.match(/^(\S+)(?:\s+([\s\S]*))?$/);
  if (!match) return ['', ''];
  return [match[1], (match[2] ?? '').trim()];
}

function describeStatus(status: UserModerationStatus): string {
  const lines = [
    `Пользователь ${status.userId}:`,
    `- состояние: ${status.state}`,
    `- предупреждений: ${status.warningCount}`,
  ];

  for (const sanction of status.activeSanctions) {
    const kind = sanction.kind === 'mute' ? 'мут' : 'бан';
    lines.push(`- ${kind} до ${new Date(sanction.expiresAtMs).toISOString()} (${sanction.reason})`);
  }

  return lines.join('\n');
}

export class AdminCommands {
  constructor(
    private readonly repos: Repositories,
    private readonly engine: ModerationEngine,
    private readonly adminResolver: AdminCheck,
    private readonly logger: ModerationLogger,
  ) {}

  /** Returns true when the text was an admin command, whether or not it succeeded. */
  async tryHandle(input: CommandInput, reply: ReplyFn): Promise<boolean> {
    const parsed = parseAdminCommand(input.text);
    if (!parsed) return false;

    const { chatId, userId } = input;
    const safeReply = (text: string): Promise<void> => this.replySafe(reply, text, chatId);

    const isAdmin = await this.adminResolver.isAdmin(chatId, userId);
    if (!isAdmin) {
      await safeReply('Команда доступна только администраторам чата.');
      await this.logger.warn('Admin command denied', { chatId, userId, command: parsed.command });
      return true;
    }

    try {
      await safeReply(await this.execute(parsed, chatId, userId));
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        await safeReply(`Некорректное значение: ${error.issues.join('; ')}`);
        return true;
      }
      if (error instanceof UnknownActionTypeError) {
        await safeReply(`Неизвестное действие: ${error.actionType}`);
        return true;
      }
      if (error instanceof InvalidFilterPatternError) {
        await safeReply(`Фильтр не добавлен: ${FILTER_REJECTIONS[error.rejection]}.`);
        return true;
      }
      if (error instanceof InvalidDomainError) {
        await safeReply(`Некорректный домен: ${error.input}`);
        return true;
      }

      await safeReply('Не удалось выполнить команду. Проверьте аргументы.');
      await this.logger.error('Admin command failed', {
        chatId,
        userId,
        command: parsed.command,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return true;
  }

  private async execute(parsed: ParsedCommand, chatId: number, userId: number): Promise<string> {
    const { command, rawArgs } = parsed;

    switch (command) {
      case 'mod_status':
        return this.handleModStatus(chatId);
      case 'mod_on':
        this.repos.chatSettings.setEnabled(chatId, true);
        this.engine.recordConfigUpdate(chatId, userId, command, {});
        return 'Модерация включена.';
      case 'mod_off':
        this.repos.chatSettings.setEnabled(chatId, false);
        this.engine.recordConfigUpdate(chatId, userId, command, {});
        return 'Модерация отключена.';
      case 'mod_set':
        return this.handleModSet(chatId, userId, rawArgs);
      case 'warn':
        return this.handleWarn(chatId, userId, rawArgs);
      case 'mute':
        return this.handleSanction('mute', chatId, userId, rawArgs);
      case 'ban':
        return this.handleSanction('ban', chatId, userId, rawArgs);
      case 'unmute':
        return this.handleRevoke('mute', chatId, userId, rawArgs);
      case 'unban':
        return this.handleRevoke('ban', chatId, userId, rawArgs);
      case 'reset_warnings':
        return this.handleResetWarnings(chatId, userId, rawArgs);
      case 'user_status':
        return this.handleUserStatus(chatId, rawArgs);
      case 'badword_add':
        return this.handleBadWordAdd(chatId, userId, rawArgs);
      case 'filter_add':
        return this.handleFilterAdd(chatId, userId, rawArgs);
      case 'filter_del':
        return this.handleFilterDelete(chatId, userId, rawArgs);
      case 'filter_toggle':
        return this.handleFilterToggle(chatId, userId, rawArgs);
      case 'filters':
        return this.handleFilterList(chatId);
      case 'allowdomain_add':
        return this.handleAllowDomainAdd(chatId, userId, rawArgs);
      case 'allowdomain_del':
        return this.handleAllowDomainDelete(chatId, userId, rawArgs);
      case 'allowdomain_list':
        return this.handleAllowDomainList(chatId);
      default:
        return 'Неизвестная команда.';
    }
  }

  private handleModStatus(chatId: number): string {
    const settings = this.repos.chatSettings.get(chatId);
    const whitelist = this.repos.domainWhitelist.list(chatId);
    const filters = this.repos.chatFilters.listActive(chatId);

    const toggles = ([
      ['flood', settings.floodProtection],
      ['spam', settings.spamProtection],
      ['bad_words', settings.badWords],
      ['links', settings.links],
      ['caps', settings.caps],
      ['emoji_spam', settings.emojiSpam],
      ['number_spam', settings.numberSpam],
      ['repeated_chars', settings.repeatedChars],
      ['max_length', settings.maxLength],
      ['blocked_pattern', settings.blockedPatterns],
    ] as const).map(([name, enabled]) => `${name}=${enabled ? 'on' : 'off'}`);

    return [
      'Текущие настройки модерации:',
      `- status: ${settings.enabled ? 'on' : 'off'}`,
      `- проверки: ${toggles.join(', ')}`,
      `- flood: не чаще 1 сообщения в ${settings.floodMinIntervalSec} сек`,
      `- spam: ${settings.spamThreshold} сообщений / ${settings.spamWindowSec} сек`,
      `- max_length: ${settings.maxMessageLength}`,
      `- max_warnings: ${settings.maxWarnings}`,
      `- precedence: ${settings.precedence.join(', ')}`,
      `- фильтров: ${filters.length}`,
      `- whitelist: ${whitelist.length > 0 ? whitelist.join(', ') : '(пусто)'}`,
    ].join('\n');
  }

  private handleModSet(chatId: number, userId: number, rawArgs: string): string {
    const [key, value] = splitFirst(rawArgs);
    if (!key || !value) {
      return 'Использование: /mod_set <key> <value>';
    }

    const patch = parseSettingAssignment(key, value);
    this.repos.chatSettings.update(chatId, patch);
    this.engine.recordConfigUpdate(chatId, userId, 'mod_set', { key, value });
    return `Настройка обновлена: ${key} = ${value}`;
  }

  private async handleWarn(chatId: number, moderatorId: number, rawArgs: string): Promise<string> {
    const [rawUserId, reason] = splitFirst(rawArgs);
    const targetId = parsePositiveId(rawUserId);
    if (targetId === null) {
      return 'Использование: /warn <userId> [причина]';
    }

    const applied = await this.engine.apply({
      chatId,
      userId: targetId,
      actionType: 'warning',
      reason: reason || DEFAULT_ADMIN_REASON,
      moderatorId,
      durationSec: TIER_DURATIONS_SEC.warning,
    });

    if (!applied) {
      return 'Не удалось выдать предупреждение.';
    }

    const count = this.repos.warnings.get(chatId, targetId);
    return `Пользователь ${targetId} получил предупреждение (всего: ${count}).`;
  }

  private async handleSanction(kind: SanctionKind, chatId: number, moderatorId: number, rawArgs: string): Promise<string> {
    const usage = `Использование: /${kind} <userId> <1-3> [причина]`;
    const [rawUserId, rest] = splitFirst(rawArgs);
    const [rawTier, reason] = splitFirst(rest);
    const targetId = parsePositiveId(rawUserId);
    const actionType: ActionType | null = /^\d$/.test(rawTier)
      ? tierActionType(kind, Number.parseInt(rawTier, 10))
      : null;

    if (targetId === null || actionType === null) {
      return usage;
    }

    const durationSec = TIER_DURATIONS_SEC[actionType];
    const applied = await this.engine.apply({
      chatId,
      userId: targetId,
      actionType,
      reason: reason || DEFAULT_ADMIN_REASON,
      moderatorId,
      durationSec,
    });

    if (!applied) {
      return 'Не удалось применить санкцию.';
    }

    const what = kind === 'mute' ? 'мут' : 'бан';
    return `Пользователь ${targetId} получил ${what} на ${formatDuration(durationSec)}.`;
  }

  private handleRevoke(kind: SanctionKind, chatId: number, moderatorId: number, rawArgs: string): string {
    const targetId = parsePositiveId(rawArgs.split(/\s+/)[0]);
    if (targetId === null) {
      return `Использование: /un${kind} <userId>`;
    }

    const revoked = this.engine.revoke(chatId, targetId, kind, moderatorId);
    const what = kind === 'mute' ? 'мут' : 'бан';
    return revoked
      ? `С пользователя ${targetId} снят ${what}.`
      : `У пользователя ${targetId} нет активного: ${what}.`;
  }

  private handleResetWarnings(chatId: number, moderatorId: number, rawArgs: string): string {
    const targetId = parsePositiveId(rawArgs.split(/\s+/)[0]);
    if (targetId === null) {
      return 'Использование: /reset_warnings <userId>';
    }

    const previous = this.engine.resetWarnings(chatId, targetId, moderatorId);
    return `Предупреждения пользователя ${targetId} сброшены (было: ${previous}).`;
  }

  private handleUserStatus(chatId: number, rawArgs: string): string {
    const targetId = parsePositiveId(rawArgs.split(/\s+/)[0]);
    if (targetId === null) {
      return 'Использование: /user_status <userId>';
    }

    return describeStatus(this.engine.describeUserStatus(chatId, targetId));
  }

  private handleBadWordAdd(chatId: number, userId: number, rawArgs: string): string {
    if (!rawArgs) {
      return 'Использование: /badword_add <слово>';
    }

    const filter = this.repos.chatFilters.add(chatId, 'bad_word', rawArgs, 'warning', userId);
    this.engine.recordConfigUpdate(chatId, userId, 'badword_add', { filterId: filter.id, word: filter.pattern });
    return `Слово добавлено в фильтр (#${filter.id}): ${filter.pattern}`;
  }

  private handleFilterAdd(chatId: number, userId: number, rawArgs: string): string {
    if (!rawArgs) {
      return 'Использование: /filter_add <regex> [действие]';
    }

    const lastSpace = rawArgs.lastIndexOf(' ');
    const tail = lastSpace > 0 ? rawArgs.slice(lastSpace + 1).toLowerCase() : '';
    const hasAction = isActionType(tail);
    const pattern = hasAction ? rawArgs.slice(0, lastSpace) : rawArgs;
    const actionType: ActionType = hasAction ? tail : 'warning';

    const filter = this.repos.chatFilters.add(chatId, 'pattern', pattern, actionType, userId);
    this.engine.recordConfigUpdate(chatId, userId, 'filter_add', {
      filterId: filter.id,
      pattern: filter.pattern,
      actionType,
    });
    return `Фильтр #${filter.id} добавлен: ${filter.pattern} -> ${actionType}`;
  }

  private handleFilterDelete(chatId: number, userId: number, rawArgs: string): string {
    const id = parsePositiveId(rawArgs);
    if (id === null) {
      return 'Использование: /filter_del <id>';
    }

    if (!this.repos.chatFilters.remove(chatId, id)) {
      return `Фильтр #${id} не найден.`;
    }

    this.engine.recordConfigUpdate(chatId, userId, 'filter_del', { filterId: id });
    return `Фильтр #${id} удален.`;
  }

  private handleFilterToggle(chatId: number, userId: number, rawArgs: string): string {
    const id = parsePositiveId(rawArgs);
    if (id === null) {
      return 'Использование: /filter_toggle <id>';
    }

    const filter = this.repos.chatFilters.getById(id);
    if (!filter || filter.chatId !== chatId) {
      return `Фильтр #${id} не найден.`;
    }

    const active = !filter.active;
    this.repos.chatFilters.setActive(chatId, id, active);
    this.engine.recordConfigUpdate(chatId, userId, 'filter_toggle', { filterId: id, active });
    return `Фильтр #${id} ${active ? 'включен' : 'выключен'}.`;
  }

  private handleFilterList(chatId: number): string {
    const filters = this.repos.chatFilters.list(chatId);
    if (filters.length === 0) {
      return 'Фильтров нет.';
    }

    return [
      'Фильтры чата:',
      ...filters.map((filter) => {
        const state = filter.active ? '' : ' (выкл)';
        return `#${filter.id} [${filter.filterType}] ${filter.pattern} -> ${filter.actionType}${state}`;
      }),
    ].join('\n');
  }

  private handleAllowDomainAdd(chatId: number, userId: number, rawArgs: string): string {
    if (!rawArgs) {
      return 'Использование: /allowdomain_add <domain>';
    }

    const { domain, changed } = this.repos.domainWhitelist.add(chatId, rawArgs);
    if (!changed) {
      return `Домен уже в whitelist: ${domain}`;
    }

    this.engine.recordConfigUpdate(chatId, userId, 'allowdomain_add', { domain });
    return `Домен добавлен в whitelist: ${domain}`;
  }

  private handleAllowDomainDelete(chatId: number, userId: number, rawArgs: string): string {
    if (!rawArgs) {
      return 'Использование: /allowdomain_del <domain>';
    }

    const { domain, changed } = this.repos.domainWhitelist.remove(chatId, rawArgs);
    if (!changed) {
      return `Домена нет в whitelist: ${domain}`;
    }

    this.engine.recordConfigUpdate(chatId, userId, 'allowdomain_del', { domain });
    return `Домен удален из whitelist: ${domain}`;
  }

  private handleAllowDomainList(chatId: number): string {
    const list = this.repos.domainWhitelist.list(chatId);
    return list.length > 0
      ? `Разрешенные домены:\n${list.map((domain) => `- ${domain}`).join('\n')}`
      : 'Whitelist пуст.';
  }

  private async replySafe(reply: ReplyFn, text: string, chatId: number): Promise<void> {
    try {
      await reply(text);
    } catch (error) {
      await this.logger.warn('Failed to reply to admin command', {
        chatId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
