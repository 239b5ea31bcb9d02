import { ModerationLogger } from './logger';

/** Outbound side effects of a moderation decision. */
export interface Messenger {
  /** Resolves true once the message is gone, including when it was already deleted. */
  deleteMessage(chatId: number, messageRef: string): Promise<boolean>;
  /** Removes the user from the chat; resolves false when the platform refused. */
  removeMember(chatId: number, userId: number): Promise<boolean>;
  notifyChat(chatId: number, text: string): Promise<void>;
  notifyUser(userId: number, text: string): Promise<void>;
}

export interface RemoveChatMemberPayload {
  chat_id: number;
  user_id: number;
  block?: boolean;
}

export interface MessengerApi {
  deleteMessage(messageId: string): Promise<unknown>;
  sendMessageToChat(chatId: number, text: string): Promise<unknown>;
  sendMessageToUser(userId: number, text: string): Promise<unknown>;
  raw: {
    chats: {
      removeChatMember(payload: RemoveChatMemberPayload): Promise<unknown>;
    };
  };
}

export const DELETE_MESSAGE_RETRY_DELAYS_MS: readonly number[] = [350, 1_200];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function extractErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) {
    return undefined;
  }

  const { status } = error;
  if (typeof status !== 'number') {
    return undefined;
  }

  return Number.isFinite(status) ? status : undefined;
}

export function isMessageAlreadyDeleted(error: unknown): boolean {
  if (extractErrorStatus(error) === 404) {
    return true;
  }

  const normalized = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return normalized.includes('not found')
    || normalized.includes('already deleted');
}

export class MaxMessenger implements Messenger {
  constructor(
    private readonly api: MessengerApi,
    private readonly logger: ModerationLogger,
    private readonly retryDelaysMs: readonly number[] = DELETE_MESSAGE_RETRY_DELAYS_MS,
  ) {}

  async deleteMessage(chatId: number, messageRef: string): Promise<boolean> {
    let attempts = 0;
    let lastError: string | undefined;

    for (let index = 0; index <= this.retryDelaysMs.length; index += 1) {
      attempts += 1;

      try {
        await this.api.deleteMessage(messageRef);
        return true;
      } catch (error) {
        if (isMessageAlreadyDeleted(error)) {
          return true;
        }

        lastError = error instanceof Error ? error.message : String(error);

        const retryDelay = this.retryDelaysMs[index];
        if (retryDelay !== undefined) {
          await sleep(retryDelay);
        }
      }
    }

    await this.logger.warn('Failed to delete message', {
      chatId,
      messageRef,
      attempts,
      error: lastError ?? 'unknown',
    });

    return false;
  }

  async removeMember(chatId: number, userId: number): Promise<boolean> {
    try {
      // Bans are timed, so the user is removed without a platform block and may rejoin later.
      await this.api.raw.chats.removeChatMember({ chat_id: chatId, user_id: userId, block: false });
      return true;
    } catch (error) {
      await this.logger.warn('Failed to remove chat member, falling back to message deletion', {
        chatId,
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async notifyChat(chatId: number, text: string): Promise<void> {
    await this.api.sendMessageToChat(chatId, text);
  }

  async notifyUser(userId: number, text: string): Promise<void> {
    await this.api.sendMessageToUser(userId, text);
  }
}
