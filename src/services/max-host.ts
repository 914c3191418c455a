import type {
  DeletePayload,
  HistoryRecord,
  IncomingMessage,
  RecallHost,
  RecallInvocation,
  RecentMessagesQuery,
} from '../types';
import type { MessageHistoryRepo } from '../repos/message-history-repo';
import { DELETE_COMMAND_CANDIDATES } from '../recall/deletion-gateway';
import { hoursToMs } from '../utils/time';
import { errorMessage } from './logger';

const DELETE_COMMANDS = new Set<string>(DELETE_COMMAND_CANDIDATES);

export interface MaxApiLike {
  sendMessageToChat(chatId: number, text: string): Promise<unknown>;
  deleteMessage(messageId: string): Promise<unknown>;
}

export type HistoryStore = Pick<MessageHistoryRepo, 'record' | 'listRecent'>;

export interface MaxHostOptions {
  platform: string;
  chatId?: number;
  now?: () => number;
}

export type InvocationTarget = 'self' | 'reply';

export function isMessageAlreadyDeleted(error: unknown): boolean {
  const status = extractErrorStatus(error);
  if (status === 404) {
    return true;
  }

  const normalized = errorMessage(error).toLowerCase();
  return normalized.includes('not found')
    || normalized.includes('message not found')
    || normalized.includes('already deleted');
}

function extractErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  const status = (error as { status?: unknown }).status;
  if (typeof status !== 'number') {
    return undefined;
  }

  return Number.isFinite(status) ? status : undefined;
}

/** `deleteMessage` answers `{ success: false, message }` when the platform refuses. */
function isRejectedResult(result: unknown): result is { success: false; message?: string } {
  if (!result || typeof result !== 'object') {
    return false;
  }

  const { success, message } = result as { success?: unknown; message?: unknown };
  return success === false && (message === undefined || typeof message === 'string');
}

function resolveChatId(message: IncomingMessage, fallbackChatId?: number): number | undefined {
  return message.recipient?.chat_id ?? fallbackChatId;
}

/**
 * Maps a MAX update into a recall invocation. With `target: 'reply'` the
 * replied-to message becomes the primary message; otherwise the message
 * itself is the one under judgement.
 */
export function buildInvocation(
  message: IncomingMessage,
  options: { platform: string; target: InvocationTarget; fallbackChatId?: number },
): RecallInvocation {
  const chatId = resolveChatId(message, options.fallbackChatId);
  const chatType = message.recipient?.chat_type;
  const isGroup = chatType === 'chat' || chatType === 'channel';

  let actionMessage: Record<string, unknown> | undefined;
  if (options.target === 'self') {
    actionMessage = {
      message_id: message.body.mid,
      seq: message.body.seq,
      text: message.body.text,
      sender: message.sender ?? null,
    };
  } else if (message.link?.type === 'reply' && message.link.message?.mid) {
    actionMessage = {
      message_id: message.link.message.mid,
      seq: message.link.message.seq,
      text: message.link.message.text ?? null,
      sender: message.link.sender ?? null,
    };
  }

  return {
    platform: options.platform,
    isGroup,
    groupId: isGroup && chatId ? String(chatId) : undefined,
    chatId: chatId ? String(chatId) : undefined,
    userId: message.sender?.user_id ? String(message.sender.user_id) : undefined,
    actionMessage,
    message: {
      chat_id: chatId ?? null,
      chat_stream: {
        platform: options.platform,
        chat_id: chatId ?? null,
        chat_type: chatType ?? null,
      },
    },
  };
}

/**
 * RecallHost backed by the MAX Bot API and the local message history.
 * Every delete command name maps to `deleteMessage`.
 */
export function createMaxHost(api: MaxApiLike, history: HistoryStore, options: MaxHostOptions): RecallHost {
  const now = options.now ?? Date.now;
  const chatKey = options.chatId ? String(options.chatId) : undefined;

  return {
    async sendText(text: string): Promise<void> {
      if (!options.chatId) {
        throw new Error('Chat id unavailable for notice');
      }
      await api.sendMessageToChat(options.chatId, text);
    },

    async sendBackendCommand(
      name: string,
      payload: DeletePayload,
      displayText: string,
      persist: boolean,
    ): Promise<unknown> {
      if (!DELETE_COMMANDS.has(name)) {
        return { status: 'failed', message: `unsupported command: ${name}` };
      }

      let alreadyDeleted = false;
      try {
        const result = await api.deleteMessage(payload.message_id);
        if (isRejectedResult(result)) {
          return { status: 'failed', message: result.message ?? 'delete rejected' };
        }
      } catch (error) {
        if (!isMessageAlreadyDeleted(error)) {
          return { status: 'failed', message: errorMessage(error) };
        }
        alreadyDeleted = true;
      }

      // History rows go away on the platform's removal update, not here.
      if (persist && chatKey) {
        history.record({
          platform: options.platform,
          chatId: chatKey,
          messageId: `action:${name}:${payload.message_id}`,
          isBot: true,
          text: displayText,
          createdAtTs: now(),
        });
      }

      return { status: 'ok', ...(alreadyDeleted ? { message: 'already deleted' } : {}) };
    },

    async getRecentMessages(query: RecentMessagesQuery): Promise<HistoryRecord[]> {
      return history.listRecent({
        platform: options.platform,
        chatId: query.chatId,
        sinceTs: now() - hoursToMs(query.windowHours),
        limit: query.limit,
        order: query.order,
        excludeBots: query.excludeSelf,
      });
    },
  };
}
