import { describe, expect, it, vi } from 'vitest';
import { isMessageAlreadyDeleted, MaxMessenger, MessengerApi } from '../src/services/messenger';
import { MemoryLogger } from './fakes';

function makeApi(
  deleteMessage: MessengerApi['deleteMessage'],
  removeChatMember: MessengerApi['raw']['chats']['removeChatMember'] = vi.fn(async () => ({})),
): MessengerApi {
  return {
    deleteMessage,
    sendMessageToChat: vi.fn(async () => ({})),
    sendMessageToUser: vi.fn(async () => ({})),
    raw: { chats: { removeChatMember } },
  };
}

describe('max messenger', () => {
  it('retries deletion and succeeds on a later attempt', async () => {
    let calls = 0;
    const api = makeApi(async () => {
      calls += 1;
      if (calls < 2) throw new Error('temporary failure');
      return {};
    });
    const logger = new MemoryLogger();
    const messenger = new MaxMessenger(api, logger, [0, 0]);

    expect(await messenger.deleteMessage(1, 'mid-1')).toBe(true);
    expect(calls).toBe(2);
    expect(logger.events).toEqual([]);
  });

  it('treats an already deleted message as success', async () => {
    const api = makeApi(async () => {
      throw new Error('Message not found');
    });
    const messenger = new MaxMessenger(api, new MemoryLogger(), [0, 0]);

    expect(await messenger.deleteMessage(1, 'mid-2')).toBe(true);
  });

  it('gives up after the last retry and logs a warning', async () => {
    const deleteMessage = vi.fn(async () => {
      throw new Error('forbidden');
    });
    const logger = new MemoryLogger();
    const messenger = new MaxMessenger(makeApi(deleteMessage), logger, [0, 0]);

    expect(await messenger.deleteMessage(1, 'mid-3')).toBe(false);
    expect(deleteMessage).toHaveBeenCalledTimes(3);
    expect(logger.events).toEqual([{
      level: 'warn',
      message: 'Failed to delete message',
      meta: { chatId: 1, messageRef: 'mid-3', attempts: 3, error: 'forbidden' },
    }]);
  });

  it('sends chat and direct notices through the api', async () => {
    const api = makeApi(async () => ({}));
    const messenger = new MaxMessenger(api, new MemoryLogger());

    await messenger.notifyChat(5, 'hello chat');
    await messenger.notifyUser(6, 'hello user');

    expect(api.sendMessageToChat).toHaveBeenCalledWith(5, 'hello chat');
    expect(api.sendMessageToUser).toHaveBeenCalledWith(6, 'hello user');
  });

  it('removes a banned member without a permanent block', async () => {
    const removeChatMember = vi.fn(async () => ({}));
    const messenger = new MaxMessenger(makeApi(async () => ({}), removeChatMember), new MemoryLogger());

    expect(await messenger.removeMember(5, 42)).toBe(true);
    expect(removeChatMember).toHaveBeenCalledWith({ chat_id: 5, user_id: 42, block: false });
  });

  it('reports a refused removal so message deletion stays in force', async () => {
    const logger = new MemoryLogger();
    const messenger = new MaxMessenger(makeApi(async () => ({}), async () => {
      throw new Error('not enough rights');
    }), logger);

    expect(await messenger.removeMember(5, 42)).toBe(false);
    expect(logger.events).toEqual([{
      level: 'warn',
      message: 'Failed to remove chat member, falling back to message deletion',
      meta: { chatId: 5, userId: 42, error: 'not enough rights' },
    }]);
  });

  it('recognizes not-found errors by status', () => {
    expect(isMessageAlreadyDeleted(Object.assign(new Error('gone'), { status: 404 }))).toBe(true);
    expect(isMessageAlreadyDeleted(new Error('rate limited'))).toBe(false);
  });
});
