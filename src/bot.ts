import { Bot, Context } from '@maxhub/max-bot-api';
import type { BotConfig, IncomingMessage, RecallAuditSink, RecallOutcome } from './types';
import { createSettingsReader } from './config';
import { SqliteDatabase } from './db/sqlite';
import { createRepositories, type Repositories } from './repos';
import { BotLogger, errorMessage } from './services/logger';
import { createMaxHost } from './services/max-host';
import {
  RecallUpdateHandler,
  type JudgementSource,
  type SmartRecallOptions,
} from './services/recall-updates';
import { CleanupService } from './services/cleanup';
import { RecallCoordinator } from './recall/recall-coordinator';
import { RecallCommand } from './commands/recall';

export type { JudgementSource, SmartRecallOptions } from './services/recall-updates';

export interface RuntimeOptions {
  judge?: JudgementSource;
}

export interface Runtime {
  bot: Bot;
  db: SqliteDatabase;
  repos: Repositories;
  logger: BotLogger;
  coordinator: RecallCoordinator;
  cleanupService: CleanupService;
  smartRecall(message: IncomingMessage, verdict: string | undefined, options?: SmartRecallOptions): Promise<RecallOutcome>;
}

const COMMANDS = [
  { name: 'recall', description: 'Удалить сообщение (ответом на него или /recall <message_id>)' },
];

function getMessage(ctx: Context): IncomingMessage | undefined {
  return ctx.message as IncomingMessage | undefined;
}

export async function createRuntime(config: BotConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const settings = createSettingsReader(config.settings);
  const db = new SqliteDatabase(config.databasePath);
  const repos = createRepositories(db.db);

  const bot = new Bot(config.botToken);

  const logger = new BotLogger(bot.api, () => config.logChatId, {
    level: settings.get('logging.level'),
    prefix: settings.get('logging.prefix'),
  });

  const audit: RecallAuditSink = {
    record(entry) {
      repos.recallActions.record(entry);
      void logger.recall(entry);
    },
  };

  const coordinator = new RecallCoordinator({ settings, logger, audit });
  const recallCommand = new RecallCommand(coordinator);
  const cleanupService = new CleanupService(repos, config, logger);

  const hostFor = (chatId: number | undefined) => createMaxHost(bot.api, repos.messageHistory, {
    platform: config.platform,
    chatId,
  });

  const updates = new RecallUpdateHandler({
    platform: config.platform,
    settings,
    history: repos.messageHistory,
    coordinator,
    recallCommand,
    hostFor,
    logger,
    judge: options.judge,
  });

  bot.catch(async (error, ctx) => {
    await logger.error('Unhandled bot middleware error', {
      updateType: ctx.updateType,
      error: errorMessage(error),
    });

    throw error;
  });

  bot.on('message_created', async (ctx) => {
    await updates.handleMessage({
      message: getMessage(ctx),
      chatId: ctx.chatId ?? undefined,
      myId: ctx.myId ?? undefined,
    });
  });

  bot.on('message_removed', async (ctx) => {
    updates.handleRemoved(ctx.update);
  });

  try {
    await bot.api.setMyCommands(COMMANDS);
  } catch (error) {
    await logger.warn('Failed to set bot commands', { error: errorMessage(error) });
  }

  return {
    bot,
    db,
    repos,
    logger,
    coordinator,
    cleanupService,
    smartRecall: (message, verdict, smartOptions) => updates.smartRecall(message, verdict, smartOptions),
  };
}
