import { formatDuration } from '../moderation/tiers';
import { ModerationActionRecord } from '../types';

export interface LogEvent {
  level: 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export interface ModerationLogger {
  info(message: string, meta?: Record<string, unknown>): Promise<void>;
  warn(message: string, meta?: Record<string, unknown>): Promise<void>;
  error(message: string, meta?: Record<string, unknown>): Promise<void>;
  moderation(record: ModerationActionRecord): Promise<void>;
}

/** The part of the MAX `Api` the logger needs. */
export interface LogChatApi {
  sendMessageToChat(chatId: number, text: string): Promise<unknown>;
}

function isSanctionAction(actionType: string): boolean {
  return actionType.startsWith('mute_') || actionType.startsWith('ban_');
}

export class BotLogger implements ModerationLogger {
  constructor(
    private readonly api: LogChatApi,
    private readonly getLogChatId: () => number | undefined,
  ) {}

  async info(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'info', message, meta }, false);
  }

  async warn(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'warn', message, meta }, false);
  }

  async error(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'error', message, meta }, false);
  }

  async moderation(record: ModerationActionRecord): Promise<void> {
    const userLabel = this.resolveUserLabel(record);
    const detail = this.resolveModerationDetail(record);
    const message = [
      `[moderation] chat=${record.chatId} user=${userLabel} action=${record.actionType} reason=${record.reason}`,
      `moderator=${record.moderatorId}`,
      detail ? `detail=${detail}` : null,
    ].filter(Boolean).join(' ');

    await this.emit(
      {
        level: 'info',
        message,
        meta: record.meta,
      },
      isSanctionAction(record.actionType),
    );
  }

  private async emit(event: LogEvent, sendToLogChat: boolean): Promise<void> {
    const payload = {
      ts: new Date().toISOString(),
      level: event.level,
      message: event.message,
      ...(event.meta ? { meta: event.meta } : {}),
    };

    if (event.level === 'error') {
      console.error(JSON.stringify(payload));
    } else if (event.level === 'warn') {
      console.warn(JSON.stringify(payload));
    } else {
      console.log(JSON.stringify(payload));
    }

    if (!sendToLogChat) {
      return;
    }

    const logChatId = this.getLogChatId();
    if (!logChatId) return;

    const text = [
      `[#${event.level.toUpperCase()}] ${event.message}`,
      event.meta ? `meta: ${JSON.stringify(event.meta)}` : null,
    ].filter(Boolean).join('\n');

    try {
      await this.api.sendMessageToChat(logChatId, text);
    } catch (error) {
      console.warn(JSON.stringify({
        ts: new Date().toISOString(),
        level: 'warn',
        message: 'Failed to forward log event to log chat',
        meta: { logChatId, error: error instanceof Error ? error.message : String(error) },
      }));
    }
  }

  private resolveUserLabel(record: ModerationActionRecord): string {
    const fromMeta = record.meta?.userName;
    if (typeof fromMeta === 'string' && fromMeta.trim() !== '') {
      return fromMeta.trim();
    }

    return String(record.userId);
  }

  private resolveModerationDetail(record: ModerationActionRecord): string | undefined {
    if (record.actionType.startsWith('mute_')) {
      return `мут на ${formatDuration(record.durationSec)}`;
    }
    if (record.actionType.startsWith('ban_')) {
      return `бан на ${formatDuration(record.durationSec)}`;
    }
    if (record.actionType === 'warning') {
      const warningCount = record.meta?.warningCount;
      return typeof warningCount === 'number' ? `предупреждение №${warningCount}` : 'предупреждение';
    }
    return undefined;
  }
}
