export const REFERENCE_PLATFORM = 'qq';

/**
 * Ordered aliases a reply/quote/original-message reference may be stored
 * under. Order only breaks ties between keys present on the same node.
 */
export const MESSAGE_ID_KEYS = [
  'target_message_id', 'message_id', 'platform_message_id', 'id', 'napcat_message_id',
  'reply', 'reply_id', 'reply_to', 'reply_message_id', 'replied_message_id',
  'quote', 'quote_id', 'quoted', 'quoted_id', 'quoted_message_id',
  'source', 'source_id', 'source_message_id',
  'message_ref_id', 'reference_message_id', 'refer_message_id',
  'seq', 'msgSeq', 'msg_id', 'msgId', 'origin_message_id',
] as const;

/** Fields a history record may carry its message id under. */
export const HISTORY_ID_KEYS = [
  'message_id', 'platform_message_id', 'id', 'napcat_message_id', 'msg_id', 'msgId',
] as const;

const DIGITS_ONLY = /^[0-9]+$/;
const NO_WHITESPACE = /^\S+$/;

function toText(candidate: unknown): string | null {
  if (candidate === null || candidate === undefined) return null;
  if (typeof candidate === 'symbol' || typeof candidate === 'function') return null;
  // String([123]) === '123'; a sequence is never an identifier.
  if (Array.isArray(candidate)) return null;
  try {
    return String(candidate);
  } catch {
    return null;
  }
}

export function isNumericLike(candidate: unknown): boolean {
  const text = toText(candidate);
  return text !== null && DIGITS_ONLY.test(text);
}

export function isValidMessageId(candidate: unknown, platform: string): boolean {
  if (platform === REFERENCE_PLATFORM) {
    return isNumericLike(candidate);
  }

  if (typeof candidate !== 'string' && typeof candidate !== 'number') {
    return false;
  }
  return NO_WHITESPACE.test(String(candidate));
}

export function readHistoryMessageId(record: Record<string, unknown>, platform: string): string | null {
  for (const key of HISTORY_ID_KEYS) {
    const value = record[key];
    if (value && isValidMessageId(value, platform)) {
      return String(value);
    }
  }
  return null;
}
