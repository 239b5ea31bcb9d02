import { describe, expect, it, vi } from 'vitest';
import { BotLogger } from '../src/services/logger';

const LOG_CHAT_ID = -70000000000001;

describe('bot logger chat notifications', () => {
  it('does not send generic info/warn/error messages to log chat', async () => {
    const sendMessageToChat = vi.fn(async () => ({ body: { mid: 'log-1' } }));
    const logger = new BotLogger({ sendMessageToChat }, () => LOG_CHAT_ID);

    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await logger.info('plain info', { a: 1 });
    await logger.warn('plain warn', { b: 2 });
    await logger.error('plain error', { c: 3 });

    expect(sendMessageToChat).toHaveBeenCalledTimes(0);
    expect(JSON.parse(String(warnSpy.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      message: 'plain warn',
      meta: { b: 2 },
    });

    logSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it('sends only mute and ban moderation events to log chat', async () => {
    const sendMessageToChat = vi.fn(async () => ({ body: { mid: 'log-2' } }));
    const logger = new BotLogger({ sendMessageToChat }, () => LOG_CHAT_ID);

    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await logger.moderation({ chatId: 1, userId: 2, actionType: 'warning', reason: 'caps', moderatorId: 0, durationSec: 0 });
    await logger.moderation({ chatId: 1, userId: 2, actionType: 'mute_1', reason: 'links', moderatorId: 0, durationSec: 300 });
    await logger.moderation({ chatId: 1, userId: 2, actionType: 'ban_2', reason: 'spam', moderatorId: 7, durationSec: 604_800 });
    await logger.moderation({ chatId: 1, userId: 2, actionType: 'unban', reason: 'manual', moderatorId: 7, durationSec: 0 });

    expect(sendMessageToChat).toHaveBeenCalledTimes(2);
    expect(sendMessageToChat).toHaveBeenNthCalledWith(
      1,
      LOG_CHAT_ID,
      '[#INFO] [moderation] chat=1 user=2 action=mute_1 reason=links moderator=0 detail=мут на 5 мин',
    );
    expect(sendMessageToChat).toHaveBeenNthCalledWith(
      2,
      LOG_CHAT_ID,
      '[#INFO] [moderation] chat=1 user=2 action=ban_2 reason=spam moderator=7 detail=бан на 7 дн',
    );

    logSpy.mockRestore();
  });

  it('uses user name in log message when provided in moderation meta', async () => {
    const sendMessageToChat = vi.fn(async () => ({ body: { mid: 'log-3' } }));
    const logger = new BotLogger({ sendMessageToChat }, () => LOG_CHAT_ID);

    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await logger.moderation({
      chatId: 1,
      userId: 2,
      actionType: 'mute_2',
      reason: 'spam',
      moderatorId: 0,
      durationSec: 900,
      meta: { userName: 'Иван' },
    });

    expect(sendMessageToChat).toHaveBeenCalledTimes(1);
    expect(sendMessageToChat).toHaveBeenCalledWith(
      LOG_CHAT_ID,
      expect.stringContaining('user=Иван action=mute_2 reason=spam'),
    );

    logSpy.mockRestore();
  });

  it('skips the log chat when none is configured and survives send failures', async () => {
    const sendMessageToChat = vi.fn(async () => {
      throw new Error('chat not found');
    });
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const silent = new BotLogger({ sendMessageToChat }, () => undefined);
    await silent.moderation({ chatId: 1, userId: 2, actionType: 'mute_1', reason: 'x', moderatorId: 0, durationSec: 300 });
    expect(sendMessageToChat).not.toHaveBeenCalled();

    const failing = new BotLogger({ sendMessageToChat }, () => LOG_CHAT_ID);
    await failing.moderation({ chatId: 1, userId: 2, actionType: 'mute_1', reason: 'x', moderatorId: 0, durationSec: 300 });
    expect(sendMessageToChat).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warnSpy.mock.calls[0][0])).message).toBe('Failed to forward log event to log chat');

    logSpy.mockRestore();
    warnSpy.mockRestore();
  });
});
