import type { RecallHost, RecallInvocation } from '../types';
import { errorMessage, type RecallLogger } from '../services/logger';
import { describeContext, findFirst, type ScanHit, toContextNode } from './context-tree';
import {
  isValidMessageId,
  MESSAGE_ID_KEYS,
  readHistoryMessageId,
  REFERENCE_PLATFORM,
} from './identifier';

const LIVE_LOOKUP_WINDOW_HOURS = 1 / 60;
const CHAT_ID_KEYS = ['chat_id', 'group_id', 'conversation_id', 'peer_id', 'channel_id'] as const;

function readField(value: unknown, key: string): unknown {
  const node = toContextNode(value);
  if (node.kind !== 'mapping' && node.kind !== 'record') return undefined;
  return node.fields.get(key);
}

function lookupKeys(value: unknown, isValid: (candidate: unknown) => boolean): string | null {
  const node = toContextNode(value);
  if (node.kind !== 'mapping' && node.kind !== 'record') return null;

  for (const key of MESSAGE_ID_KEYS) {
    const candidate = node.fields.get(key);
    if (isValid(candidate)) {
      return String(candidate);
    }
  }
  return null;
}

function readChatStream(wrapper: unknown): unknown {
  return readField(wrapper, 'chat_stream') ?? readField(wrapper, 'chatStream');
}

export function pickChatId(invocation: RecallInvocation): string | null {
  if (invocation.chatId) return invocation.chatId;
  if (invocation.groupId) return invocation.groupId;

  for (const key of CHAT_ID_KEYS) {
    const value = readField(invocation.message, key);
    if (value !== null && value !== undefined && value !== '') {
      return String(value);
    }
  }
  return null;
}

export class IdentifierResolver {
  constructor(private readonly logger: RecallLogger) {}

  /**
   * Lookups that need neither a scan nor a platform query: the well-known
   * `message_id` of the primary message, then the priority keys over the
   * action data, then over the primary message itself.
   */
  resolveDirect(invocation: RecallInvocation): string | null {
    const isValid = (candidate: unknown): boolean => isValidMessageId(candidate, invocation.platform);

    const wellKnown = readField(invocation.actionMessage, 'message_id');
    if (isValid(wellKnown)) {
      return String(wellKnown);
    }

    return lookupKeys(invocation.actionData, isValid)
      ?? lookupKeys(invocation.actionMessage, isValid);
  }

  async resolve(invocation: RecallInvocation, host: RecallHost): Promise<string | null> {
    const direct = this.resolveDirect(invocation);
    if (direct) {
      await this.logger.debug('Target message id resolved from direct fields', { messageId: direct });
      return direct;
    }

    const hit = this.scanContext(invocation);
    if (hit) {
      await this.logger.debug('Target message id resolved by context scan', { path: hit.path });
      return String(hit.value);
    }

    await this.logger.debug('No message id in invocation context', {
      actionMessage: describeContext(invocation.actionMessage),
      actionData: describeContext(invocation.actionData),
      chatStream: describeContext(readChatStream(invocation.message)),
    });

    if (invocation.platform !== REFERENCE_PLATFORM) {
      return null;
    }

    const chatId = pickChatId(invocation);
    if (!chatId) {
      return null;
    }

    return this.lookupLatestMessage(host, chatId, invocation.platform);
  }

  private scanContext(invocation: RecallInvocation): ScanHit | null {
    const accept = (candidate: unknown): boolean => isValidMessageId(candidate, invocation.platform);

    return findFirst(invocation.actionMessage, MESSAGE_ID_KEYS, { accept }, 'action_message')
      ?? findFirst(readChatStream(invocation.message), MESSAGE_ID_KEYS, { accept }, 'message.chat_stream')
      ?? findFirst(invocation.message, MESSAGE_ID_KEYS, { accept }, 'message');
  }

  private async lookupLatestMessage(host: RecallHost, chatId: string, platform: string): Promise<string | null> {
    try {
      const records = await host.getRecentMessages({
        chatId,
        windowHours: LIVE_LOOKUP_WINDOW_HOURS,
        limit: 1,
        order: 'latest',
        excludeSelf: true,
      });

      const latest = records[0];
      if (!latest) {
        await this.logger.warn('Live lookup found no recent message', { chatId, platform });
        return null;
      }

      const messageId = readHistoryMessageId(latest, platform);
      if (!messageId) {
        await this.logger.warn('Live lookup returned a message without a valid id', { chatId });
        return null;
      }

      await this.logger.debug('Target message id resolved by live lookup', { chatId, messageId });
      return messageId;
    } catch (error) {
      await this.logger.error('Live lookup failed', { chatId, error: errorMessage(error) });
      return null;
    }
  }
}
