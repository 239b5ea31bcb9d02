import { IncomingMessage, MaxIncomingMessage } from '../types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Narrows a raw update payload to the message fields the bot reads. */
export function asMaxMessage(raw: unknown): MaxIncomingMessage | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const { recipient, body, sender } = raw;
  if (!isRecord(recipient) || !isRecord(body)) {
    return undefined;
  }

  const chatType = recipient.chat_type;
  if (chatType !== 'dialog' && chatType !== 'chat' && chatType !== 'channel') {
    return undefined;
  }
  if (typeof body.mid !== 'string') {
    return undefined;
  }

  return {
    recipient: {
      chat_id: typeof recipient.chat_id === 'number' ? recipient.chat_id : null,
      chat_type: chatType,
    },
    body: {
      mid: body.mid,
      text: typeof body.text === 'string' ? body.text : null,
    },
    sender: isRecord(sender) && typeof sender.user_id === 'number'
      ? {
          user_id: sender.user_id,
          is_bot: sender.is_bot === true,
          name: typeof sender.name === 'string' ? sender.name : undefined,
        }
      : null,
    timestamp: typeof raw.timestamp === 'number' ? raw.timestamp : undefined,
  };
}

/**
 * Maps a MAX group-chat message to the engine's input. Dialogs, bot
 * messages and the bot's own messages yield undefined.
 */
export function toIncomingMessage(
  message: MaxIncomingMessage,
  myId?: number,
  nowTs: number = Date.now(),
): IncomingMessage | undefined {
  const chatType = message.recipient.chat_type;
  if (chatType !== 'chat' && chatType !== 'channel') return undefined;

  const chatId = message.recipient.chat_id;
  const userId = message.sender?.user_id;
  const messageRef = message.body.mid;

  if (!chatId || !userId || !messageRef) {
    return undefined;
  }

  if (message.sender?.is_bot || userId === myId) {
    return undefined;
  }

  return {
    chatId,
    userId,
    userName: message.sender?.name,
    text: message.body.text,
    timestampMs: message.timestamp ?? nowTs,
    messageRef,
  };
}
