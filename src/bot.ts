import { Bot, Context } from '@maxhub/max-bot-api';
import { AppConfig } from './types';
import { SqliteDatabase } from './db/sqlite';
import { createRepositories, Repositories } from './repos';
import { BotLogger } from './services/logger';
import { AdminResolver } from './services/admin-resolver';
import { ChatTaskQueue } from './services/chat-queue';
import { DeliveryQueue } from './services/delivery';
import { ExpirySweeper } from './services/expiry-sweeper';
import { asMaxMessage, toIncomingMessage } from './services/incoming';
import { MaxMessenger } from './services/messenger';
import { AdminCommands } from './commands/admin';
import { buildDefaultSettings } from './moderation/chat-settings';
import { ModerationConfigProvider } from './moderation/config-provider';
import { ModerationEngine } from './moderation/moderation-engine';
import { RateTracker } from './moderation/rate-tracker';

export interface Runtime {
  bot: Bot;
  db: SqliteDatabase;
  repos: Repositories;
  logger: BotLogger;
  engine: ModerationEngine;
  delivery: DeliveryQueue;
  sweeper: ExpirySweeper;
}

const COMMANDS = [
  { name: 'mod_status', description: 'Показать настройки модерации' },
  { name: 'mod_on', description: 'Включить модерацию в этом чате' },
  { name: 'mod_off', description: 'Отключить модерацию в этом чате' },
  { name: 'mod_set', description: 'Изменить настройку модерации' },
  { name: 'warn', description: 'Выдать предупреждение' },
  { name: 'mute', description: 'Выдать мут (уровень 1-3)' },
  { name: 'ban', description: 'Выдать бан (уровень 1-3)' },
  { name: 'unmute', description: 'Снять мут' },
  { name: 'unban', description: 'Снять бан' },
  { name: 'reset_warnings', description: 'Сбросить предупреждения' },
  { name: 'user_status', description: 'Статус пользователя' },
  { name: 'badword_add', description: 'Добавить запрещенное слово' },
  { name: 'filter_add', description: 'Добавить фильтр-шаблон' },
  { name: 'filter_del', description: 'Удалить фильтр' },
  { name: 'filter_toggle', description: 'Включить или выключить фильтр' },
  { name: 'filters', description: 'Список фильтров' },
  { name: 'allowdomain_add', description: 'Добавить домен в whitelist' },
  { name: 'allowdomain_del', description: 'Удалить домен из whitelist' },
  { name: 'allowdomain_list', description: 'Список whitelist доменов' },
];

export async function createRuntime(config: AppConfig): Promise<Runtime> {
  const db = new SqliteDatabase(config.databasePath);
  const repos = createRepositories(db, config);

  const bot = new Bot(config.botToken);

  const logger = new BotLogger(bot.api, () => config.logChatId);
  const adminResolver = new AdminResolver(bot.api, config.adminUserIds, 60_000, (message, meta) => {
    void logger.warn(message, meta);
  });
  const delivery = new DeliveryQueue(logger);
  const engine = new ModerationEngine(
    config,
    repos,
    new ModerationConfigProvider(repos, buildDefaultSettings(config), logger),
    new RateTracker(),
    new MaxMessenger(bot.api, logger),
    delivery,
    logger,
  );
  const adminCommands = new AdminCommands(repos, engine, adminResolver, logger);
  const chatQueue = new ChatTaskQueue();
  const sweeper = new ExpirySweeper(engine, config.sweepIntervalSec * 1_000, logger);

  bot.catch(async (error, ctx) => {
    await logger.error('Unhandled bot middleware error', {
      updateType: ctx.updateType,
      error: error instanceof Error ? error.message : String(error),
    });

    throw error;
  });

  bot.on('message_created', async (ctx: Context) => {
    const raw = asMaxMessage(ctx.message);
    if (!raw) return;

    const message = toIncomingMessage(raw, ctx.myId);
    if (!message) return;

    await chatQueue.run(message.chatId, async () => {
      if (message.text) {
        const handled = await adminCommands.tryHandle(
          { chatId: message.chatId, userId: message.userId, text: message.text },
          async (text) => {
            await ctx.reply(text);
          },
        );
        if (handled) return;
      }

      if (await adminResolver.isAdmin(message.chatId, message.userId)) {
        return;
      }

      await engine.handleMessage(message);
    });
  });

  try {
    await bot.api.setMyCommands(COMMANDS);
  } catch (error) {
    await logger.warn('Failed to set bot commands', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return {
    bot,
    db,
    repos,
    logger,
    engine,
    delivery,
    sweeper,
  };
}
