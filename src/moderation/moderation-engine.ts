import {
  AppConfig,
  ApplyActionRequest,
  IncomingMessage,
  ModerationActionRecord,
  ModerationConfig,
  Sanction,
  SanctionKind,
  UserModerationStatus,
  Verdict,
  Violation,
} from '../types';
import { Repositories } from '../repos';
import { DeliveryQueue } from '../services/delivery';
import { ModerationLogger } from '../services/logger';
import { Messenger } from '../services/messenger';
import { ModerationConfigProvider } from './config-provider';
import { evaluateContent } from './content-rules';
import { resolveEscalationState, selectAction } from './escalation';
import { RateTracker } from './rate-tracker';
import { formatDuration, isActionType, sanctionKindOf } from './tiers';

const RATE_STATE_IDLE_MS = 2 * 60 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;
export const SYSTEM_MODERATOR_ID = 0;

const EMPTY_VERDICT: Verdict = { violations: [], action: null };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function displayName(userName: string | undefined, userId: number): string {
  const normalized = userName?.trim();
  return normalized ? normalized : `Пользователь ${userId}`;
}

export class ModerationEngine {
  constructor(
    private readonly config: AppConfig,
    private readonly repos: Repositories,
    private readonly configProvider: ModerationConfigProvider,
    private readonly rateTracker: RateTracker,
    private readonly messenger: Messenger,
    private readonly delivery: DeliveryQueue,
    private readonly logger: ModerationLogger,
  ) {}

  /** Evaluates one message. Never throws: any internal failure yields an empty verdict. */
  check(message: IncomingMessage, config?: ModerationConfig): Verdict {
    try {
      return this.evaluate(message, config ?? this.configProvider.get(message.chatId));
    } catch (error) {
      void this.logger.error('Moderation check failed, message passed', {
        chatId: message.chatId,
        userId: message.userId,
        error: errorMessage(error),
      });
      return EMPTY_VERDICT;
    }
  }

  /**
   * Persists a moderation action. The audit entry and the warning counter or
   * sanction are written in one transaction; deliveries run only after it
   * committed.
   */
  async apply(request: ApplyActionRequest): Promise<boolean> {
    const { chatId, userId, reason, moderatorId, durationSec } = request;

    if (!isActionType(request.actionType)) {
      await this.logger.warn('Rejected moderation action with unknown type', {
        chatId,
        userId,
        actionType: request.actionType,
      });
      return false;
    }

    const actionType = request.actionType;
    const kind = sanctionKindOf(actionType);
    const durationValid = Number.isInteger(durationSec)
      && (kind === null ? durationSec >= 0 : durationSec > 0);

    if (!durationValid) {
      await this.logger.warn('Rejected moderation action with invalid duration', {
        chatId,
        userId,
        actionType,
        durationSec,
      });
      return false;
    }

    const nowTs = Date.now();
    let record: ModerationActionRecord;

    try {
      record = this.repos.transaction(() => {
        const meta: Record<string, unknown> = {};
        if (request.userName) {
          meta.userName = request.userName;
        }

        if (kind === null || request.recordsWarning) {
          meta.warningCount = this.repos.warnings.increment(chatId, userId, nowTs);
        }
        if (kind !== null) {
          meta.sanctionId = this.repos.sanctions.add({
            chatId,
            userId,
            kind,
            reason,
            issuedBy: moderatorId,
            issuedAtMs: nowTs,
            durationSec,
          });
        }

        const entry: ModerationActionRecord = {
          chatId,
          userId,
          actionType,
          reason,
          moderatorId,
          durationSec,
          meta,
        };
        this.repos.moderationActions.record(entry, nowTs);
        return entry;
      });
    } catch (error) {
      await this.logger.error('Failed to persist moderation action', {
        chatId,
        userId,
        actionType,
        error: errorMessage(error),
      });
      return false;
    }

    this.delivery.dispatch('moderation log', () => this.logger.moderation(record), { chatId, userId });

    const name = displayName(request.userName, userId);

    if (kind === null) {
      if (this.config.notifyUserOnWarning) {
        const count = record.meta?.warningCount;
        this.delivery.dispatch(
          'warning notice',
          () => this.messenger.notifyUser(userId, `Вы получили предупреждение №${String(count)} в чате. Причина: ${reason}`),
          { chatId, userId },
        );
      }
      return true;
    }

    const messageRef = request.messageRef;
    if (messageRef) {
      this.delivery.dispatch(
        'delete message',
        () => this.messenger.deleteMessage(chatId, messageRef),
        { chatId, userId, messageRef },
      );
    }

    if (kind === 'ban') {
      this.delivery.dispatch(
        'remove member',
        () => this.messenger.removeMember(chatId, userId),
        { chatId, userId },
      );
    }

    if (this.config.noticeInChat) {
      const what = kind === 'mute' ? 'мут' : 'блокировку';
      this.delivery.dispatch(
        'chat notice',
        () => this.messenger.notifyChat(
          chatId,
          `«${name}», вы получили ${what} на ${formatDuration(durationSec)}. Причина: ${reason}`,
        ),
        { chatId, userId },
      );
    }

    return true;
  }

  /** Connector entry for an ordinary chat message. */
  async handleMessage(message: IncomingMessage): Promise<void> {
    const { chatId, userId } = message;
    const config = this.configProvider.get(chatId);
    if (!config.settings.enabled) {
      return;
    }

    const active = this.findActiveSanctions(chatId, userId);
    if (active.length > 0) {
      const messageRef = message.messageRef;
      this.delivery.dispatch(
        'delete message',
        () => this.messenger.deleteMessage(chatId, messageRef),
        { chatId, userId, messageRef, sanction: active[0].kind },
      );
      return;
    }

    const verdict = this.check(message, config);
    if (!verdict.action) {
      return;
    }

    await this.apply({
      chatId,
      userId,
      actionType: verdict.action.type,
      reason: verdict.violations.map((violation) => violation.reason).join('; '),
      moderatorId: SYSTEM_MODERATOR_ID,
      durationSec: verdict.action.durationSec,
      messageRef: message.messageRef,
      userName: message.userName,
      recordsWarning: verdict.action.recordsWarning,
    });
  }

  /** Deactivates due sanctions and returns how many expired. */
  runExpirySweep(nowTs: number = Date.now()): number {
    let expired: Sanction[];
    try {
      expired = this.repos.sanctions.expireDue(nowTs);
    } catch (error) {
      void this.logger.error('Sanction expiry sweep failed', { error: errorMessage(error) });
      return 0;
    }

    for (const sanction of expired) {
      void this.logger.info('Sanction expired', {
        sanctionId: sanction.id,
        chatId: sanction.chatId,
        userId: sanction.userId,
        kind: sanction.kind,
      });

      if (this.config.notifyOnExpiry) {
        const text = sanction.kind === 'mute'
          ? `«${displayName(undefined, sanction.userId)}», срок мута истек.`
          : `«${displayName(undefined, sanction.userId)}», срок блокировки истек.`;
        this.delivery.dispatch(
          'expiry notice',
          () => this.messenger.notifyChat(sanction.chatId, text),
          { chatId: sanction.chatId, userId: sanction.userId },
        );
      }
    }

    this.rateTracker.purgeIdle(nowTs, RATE_STATE_IDLE_MS);
    this.purgeRetained(nowTs);
    return expired.length;
  }

  private purgeRetained(nowTs: number): void {
    const cutoffTs = nowTs - this.config.retentionDays * DAY_MS;
    try {
      const purged = this.repos.transaction(() => ({
        auditEntries: this.repos.moderationActions.purgeOlderThan(cutoffTs),
        sanctions: this.repos.sanctions.purgeInactiveBefore(cutoffTs),
      }));

      if (purged.auditEntries > 0 || purged.sanctions > 0) {
        void this.logger.info('Old moderation data removed', { ...purged, retentionDays: this.config.retentionDays });
      }
    } catch (error) {
      void this.logger.error('Retention cleanup failed', { error: errorMessage(error) });
    }
  }

  /** Lifts the user's active sanction of `kind`; false when there was none. */
  revoke(chatId: number, userId: number, kind: SanctionKind, moderatorId: number): boolean {
    const nowTs = Date.now();
    const entry: ModerationActionRecord = {
      chatId,
      userId,
      actionType: kind === 'mute' ? 'unmute' : 'unban',
      reason: 'Снято администратором',
      moderatorId,
      durationSec: 0,
    };

    const revoked = this.repos.transaction(() => {
      const count = this.repos.sanctions.revoke(chatId, userId, kind, nowTs);
      if (count > 0) {
        this.repos.moderationActions.record(entry, nowTs);
      }
      return count;
    });

    if (revoked > 0) {
      this.delivery.dispatch('moderation log', () => this.logger.moderation(entry), { chatId, userId });
    }
    return revoked > 0;
  }

  /** Returns the warning count before the reset. */
  resetWarnings(chatId: number, userId: number, moderatorId: number): number {
    const nowTs = Date.now();

    return this.repos.transaction(() => {
      const previous = this.repos.warnings.reset(chatId, userId, nowTs);
      this.repos.moderationActions.record({
        chatId,
        userId,
        actionType: 'warnings_reset',
        reason: 'Предупреждения сброшены администратором',
        moderatorId,
        durationSec: 0,
        meta: { previous },
      }, nowTs);
      return previous;
    });
  }

  recordConfigUpdate(chatId: number, moderatorId: number, reason: string, meta: Record<string, unknown>): void {
    this.repos.moderationActions.record({
      chatId,
      userId: moderatorId,
      actionType: 'config_update',
      reason,
      moderatorId,
      durationSec: 0,
      meta,
    });
  }

  describeUserStatus(chatId: number, userId: number, nowTs: number = Date.now()): UserModerationStatus {
    const warningCount = this.repos.warnings.get(chatId, userId);
    const activeSanctions = this.repos.sanctions.getActiveFor(chatId, userId, nowTs);

    return {
      chatId,
      userId,
      state: resolveEscalationState(warningCount, activeSanctions),
      warningCount,
      activeSanctions,
    };
  }

  private evaluate(message: IncomingMessage, config: ModerationConfig): Verdict {
    const { chatId, userId, timestampMs } = message;
    const { settings } = config;
    const detected: Violation[] = [];

    if (settings.floodProtection) {
      const flood = this.rateTracker.checkFlood(chatId, userId, timestampMs, settings.floodMinIntervalSec);
      if (flood.violation) {
        detected.push({ category: 'flood', reason: flood.reason });
      }
    }

    if (settings.spamProtection) {
      const spam = this.rateTracker.checkSpam(chatId, userId, timestampMs, settings.spamThreshold, settings.spamWindowSec);
      if (spam.violation) {
        detected.push({ category: 'spam', reason: spam.reason });
      }
    }

    detected.push(...evaluateContent(message.text, config, (category, error) => {
      void this.logger.warn('Content rule failed, treated as pass', {
        chatId,
        userId,
        category,
        error: errorMessage(error),
      });
    }));

    let warningCount = 0;
    try {
      warningCount = this.repos.warnings.get(chatId, userId);
    } catch (error) {
      void this.logger.warn('Failed to read warning count, assuming zero', {
        chatId,
        userId,
        error: errorMessage(error),
      });
    }

    return selectAction(detected, settings, warningCount);
  }

  private findActiveSanctions(chatId: number, userId: number): Sanction[] {
    try {
      return this.repos.sanctions.getActiveFor(chatId, userId, Date.now());
    } catch (error) {
      void this.logger.warn('Failed to read active sanctions', {
        chatId,
        userId,
        error: errorMessage(error),
      });
      return [];
    }
  }
}
