import { describe, expect, it, vi } from 'vitest';
import type { IncomingMessage, RecallSettings } from '../src/types';
import { SqliteDatabase } from '../src/db/sqlite';
import { createRepositories } from '../src/repos';
import { createSettingsReader } from '../src/config';
import { RecallCommand } from '../src/commands/recall';
import { RecallCoordinator } from '../src/recall/recall-coordinator';
import { createMaxHost } from '../src/services/max-host';
import { RecallUpdateHandler, type JudgementSource } from '../src/services/recall-updates';

function makeLogger() {
  return {
    debug: vi.fn(async () => {}),
    info: vi.fn(async () => {}),
    warn: vi.fn(async () => {}),
    error: vi.fn(async () => {}),
  };
}

function makeApi() {
  return {
    sendMessageToChat: vi.fn(async (_chatId: number, _text: string): Promise<unknown> => ({})),
    deleteMessage: vi.fn(async (_messageId: string): Promise<unknown> => ({ success: true })),
  };
}

function makeJudge(verdict: string | undefined = 'yes') {
  return { judge: vi.fn(async (_message: IncomingMessage): Promise<string | undefined> => verdict) };
}

function makeMessage(overrides: Partial<IncomingMessage> = {}): IncomingMessage {
  return {
    sender: { user_id: 10, name: 'Ivan' },
    recipient: { chat_id: 100, chat_type: 'chat' },
    body: { mid: 'mid.1', text: 'buy now' },
    ...overrides,
  };
}

function setup(settings: Partial<RecallSettings> = {}, judge?: JudgementSource) {
  const db = new SqliteDatabase(':memory:');
  const repos = createRepositories(db.db);
  const logger = makeLogger();
  const api = makeApi();
  const reader = createSettingsReader({ 'verify.enabled': false, ...settings });
  const coordinator = new RecallCoordinator({ settings: reader, logger });
  const handler = new RecallUpdateHandler({
    platform: 'max',
    settings: reader,
    history: repos.messageHistory,
    coordinator,
    recallCommand: new RecallCommand(coordinator),
    hostFor: (chatId) => createMaxHost(api, repos.messageHistory, { platform: 'max', chatId }),
    logger,
    judge,
  });

  const historyIds = (): unknown[] => repos.messageHistory.listRecent({
    platform: 'max', chatId: '100', sinceTs: 0, limit: 10, order: 'earliest', excludeBots: false,
  }).map((row) => row.message_id);

  return { db, repos, logger, api, coordinator, handler, historyIds };
}

describe('recall update handler', () => {
  it('records history and recalls the replied-to message on /recall', async () => {
    const judge = makeJudge();
    const { db, api, handler, historyIds } = setup({}, judge);
    const command = makeMessage({
      body: { mid: 'mid.1', text: '/recall' },
      link: { type: 'reply', sender: { user_id: 11 }, message: { mid: 'mid.0', text: 'spam' } },
    });

    await expect(handler.handleMessage({ message: command, chatId: 100, myId: 7 })).resolves.toEqual({
      success: true,
      status: 'recalled',
      message: 'Запрошено удаление сообщения mid.0',
      messageId: 'mid.0',
      intercepted: true,
    });
    expect(api.deleteMessage).toHaveBeenCalledWith('mid.0');
    expect(judge.judge).not.toHaveBeenCalled();
    expect(historyIds()).toEqual(['mid.1']);

    db.close();
  });

  it('only records history while the plugin is disabled', async () => {
    const judge = makeJudge();
    const { db, api, handler, historyIds } = setup({ 'plugin.enabled': false }, judge);

    await expect(handler.handleMessage({ message: makeMessage({ body: { mid: 'mid.1', text: '/recall mid.0' } }) }))
      .resolves.toBeNull();
    expect(api.deleteMessage).not.toHaveBeenCalled();
    expect(judge.judge).not.toHaveBeenCalled();
    expect(historyIds()).toEqual(['mid.1']);

    db.close();
  });

  it('recalls the message itself on an affirmative verdict', async () => {
    const judge = makeJudge('yes');
    const { db, api, handler } = setup({}, judge);
    const message = makeMessage();

    await expect(handler.handleMessage({ message, chatId: 100, myId: 7 })).resolves.toEqual({
      success: true,
      status: 'recalled',
      message: 'Запрошено удаление сообщения mid.1',
      messageId: 'mid.1',
    });
    expect(judge.judge).toHaveBeenCalledWith(message);
    expect(api.deleteMessage).toHaveBeenCalledWith('mid.1');

    db.close();
  });

  it('never judges the bot\'s own messages', async () => {
    const judge = makeJudge();
    const { db, handler } = setup({}, judge);

    await expect(handler.handleMessage({ message: makeMessage({ sender: { user_id: 7 } }), myId: 7 })).resolves.toBeNull();
    await expect(handler.handleMessage({ message: makeMessage({ sender: { user_id: 8, is_bot: true } }), myId: 7 }))
      .resolves.toBeNull();
    expect(judge.judge).not.toHaveBeenCalled();

    db.close();
  });

  it('judges messages without a sender when the bot id is unknown', async () => {
    const judge = makeJudge('no');
    const { db, handler } = setup({}, judge);

    await expect(handler.handleMessage({ message: makeMessage({ sender: null }) })).resolves.toEqual({
      success: true,
      status: 'no_action',
      message: 'Удаление не требуется',
      messageId: 'mid.1',
    });
    expect(judge.judge).toHaveBeenCalledTimes(1);

    db.close();
  });

  it('treats a failing classifier as an absent verdict', async () => {
    const judge = makeJudge();
    judge.judge.mockRejectedValueOnce(new Error('classifier down'));
    const { db, api, logger, handler } = setup({}, judge);

    await expect(handler.handleMessage({ message: makeMessage(), chatId: 100 })).resolves.toEqual({
      success: true,
      status: 'no_action',
      message: 'Удаление не требуется',
      messageId: 'mid.1',
    });
    expect(logger.warn).toHaveBeenCalledWith('Judgement failed, treating verdict as absent', {
      chatId: 100,
      messageId: 'mid.1',
      error: 'classifier down',
    });
    expect(api.deleteMessage).not.toHaveBeenCalled();

    db.close();
  });

  it('drops history rows on removal updates', () => {
    const { db, repos, handler, historyIds } = setup();
    repos.messageHistory.record({ platform: 'max', chatId: '100', messageId: 'mid.0', isBot: false, createdAtTs: Date.now() });

    expect(handler.handleRemoved({ message_id: 'mid.0' })).toBe(false);
    expect(handler.handleRemoved(null)).toBe(false);
    expect(historyIds()).toEqual(['mid.0']);

    expect(handler.handleRemoved({ update_type: 'message_removed', message_id: 'mid.0', chat_id: 100, user_id: 10 }))
      .toBe(true);
    expect(historyIds()).toEqual([]);

    db.close();
  });

  it('confirms a recall once the platform reports the removal', async () => {
    const { db, repos, api, coordinator, handler } = setup({ 'verify.enabled': true, 'verify.delay_ms': 0, 'verify.attempts': 1 });
    repos.messageHistory.record({ platform: 'max', chatId: '100', messageId: 'mid.0', isBot: false, createdAtTs: Date.now() });
    api.deleteMessage.mockImplementation(async (messageId: string) => {
      handler.handleRemoved({ message_id: messageId, chat_id: 100 });
      return { success: true };
    });

    const command = makeMessage({
      body: { mid: 'mid.1', text: '/recall' },
      link: { type: 'reply', sender: { user_id: 11 }, message: { mid: 'mid.0', text: 'spam' } },
    });
    const outcome = await handler.handleMessage({ message: command });

    expect(outcome?.status).toBe('recalled');
    expect(coordinator.cache.has('mid.0', Date.now())).toBe(true);

    db.close();
  });
});
