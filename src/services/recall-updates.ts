import type { IncomingMessage, RecallHost, RecallOutcome } from '../types';
import type { SettingsReader } from '../config';
import type { RecallCommand } from '../commands/recall';
import type { RecallCoordinator } from '../recall/recall-coordinator';
import type { MessageHistoryRepo } from '../repos/message-history-repo';
import { errorMessage, type RecallLogger } from './logger';
import { buildInvocation } from './max-host';

/**
 * External content classifier. Returns the verdict token for a message;
 * only the affirmative token leads to a recall.
 */
export interface JudgementSource {
  judge(message: IncomingMessage): Promise<string | undefined>;
}

export interface MessageUpdate {
  message?: IncomingMessage;
  chatId?: number;
  myId?: number;
}

export interface SmartRecallOptions {
  fallbackChatId?: number;
}

export interface RecallUpdateDeps {
  platform: string;
  settings: SettingsReader;
  history: Pick<MessageHistoryRepo, 'record' | 'remove'>;
  coordinator: RecallCoordinator;
  recallCommand: RecallCommand;
  hostFor: (chatId: number | undefined) => RecallHost;
  logger: RecallLogger;
  judge?: JudgementSource;
}

function readRemovedMessage(update: unknown): { messageId: string; chatId: number } | null {
  if (!update || typeof update !== 'object') {
    return null;
  }

  const { message_id: messageId, chat_id: chatId } = update as { message_id?: unknown; chat_id?: unknown };
  if (typeof messageId !== 'string' || messageId === '' || typeof chatId !== 'number') {
    return null;
  }
  return { messageId, chatId };
}

export class RecallUpdateHandler {
  constructor(private readonly deps: RecallUpdateDeps) {}

  /**
   * Routes a `message_created` update: history first, then the recall
   * command, then the judgement path. Returns the recall outcome, if any.
   */
  async handleMessage(update: MessageUpdate): Promise<RecallOutcome | null> {
    const { message } = update;
    if (!message?.body?.mid) return null;

    const chatId = message.recipient?.chat_id ?? update.chatId;
    if (chatId) {
      this.recordHistory(message, chatId, update.myId);
    }

    const { settings } = this.deps;
    if (!settings.get('plugin.enabled')) return null;

    const text = message.body.text;
    if (text && settings.get('components.enable_recall_command')) {
      const invocation = buildInvocation(message, {
        platform: this.deps.platform,
        target: 'reply',
        fallbackChatId: chatId,
      });
      const outcome = await this.deps.recallCommand.tryHandle(text, invocation, this.deps.hostFor(chatId));
      if (outcome?.intercepted) {
        return outcome;
      }
    }

    const senderId = message.sender?.user_id;
    const isOwnMessage = message.sender?.is_bot === true
      || (update.myId !== undefined && senderId === update.myId);
    if (!this.deps.judge || isOwnMessage || !settings.get('components.enable_smart_recall')) {
      return null;
    }

    let verdict: string | undefined;
    try {
      verdict = await this.deps.judge.judge(message);
    } catch (error) {
      await this.deps.logger.warn('Judgement failed, treating verdict as absent', {
        chatId,
        messageId: message.body.mid,
        error: errorMessage(error),
      });
    }

    return this.smartRecall(message, verdict, { fallbackChatId: chatId });
  }

  /** Entry point for classifiers that run outside the update loop. */
  async smartRecall(
    message: IncomingMessage,
    verdict: string | undefined,
    options: SmartRecallOptions = {},
  ): Promise<RecallOutcome> {
    const invocation = buildInvocation(message, {
      platform: this.deps.platform,
      target: 'self',
      fallbackChatId: options.fallbackChatId,
    });
    const host = this.deps.hostFor(message.recipient?.chat_id ?? options.fallbackChatId);
    return this.deps.coordinator.runSmartRecall(invocation, host, verdict);
  }

  /** Drops the history row once the platform reports the message removed. */
  handleRemoved(update: unknown): boolean {
    const removed = readRemovedMessage(update);
    if (!removed) return false;

    try {
      return this.deps.history.remove(this.deps.platform, String(removed.chatId), removed.messageId);
    } catch (error) {
      void this.deps.logger.warn('Failed to drop removed message from history', {
        chatId: removed.chatId,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private recordHistory(message: IncomingMessage, chatId: number, myId: number | undefined): void {
    try {
      this.deps.history.record({
        platform: this.deps.platform,
        chatId: String(chatId),
        messageId: message.body.mid,
        userId: message.sender?.user_id ? String(message.sender.user_id) : undefined,
        isBot: message.sender?.is_bot === true || (myId !== undefined && message.sender?.user_id === myId),
        text: message.body.text,
        createdAtTs: message.timestamp ?? Date.now(),
      });
    } catch (error) {
      void this.deps.logger.warn('Failed to record message history', { chatId, error: errorMessage(error) });
    }
  }
}
