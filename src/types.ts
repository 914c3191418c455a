export type ChatKind = 'dialog' | 'chat' | 'channel';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecallSettings {
  'plugin.enabled': boolean;
  'components.enable_smart_recall': boolean;
  'components.enable_recall_command': boolean;
  'permissions.allowed_groups': string[];
  'messages.recall_display': string;
  'messages.error_messages': string[];
  'verify.enabled': boolean;
  'verify.delay_ms': number;
  'verify.attempts': number;
  'behavior.recall_delay_ms': number;
  'logging.level': LogLevel;
  'logging.prefix': string;
}

export type SettingKey = keyof RecallSettings;

export interface BotConfig {
  botToken: string;
  platform: string;
  databasePath: string;
  logChatId?: number;
  cleanupIntervalSec: number;
  historyRetentionHours: number;
  settings: Partial<RecallSettings>;
}

export interface IncomingSender {
  user_id: number;
  is_bot?: boolean;
  name?: string;
}

export interface IncomingRecipient {
  chat_id: number | null;
  chat_type: ChatKind;
}

export interface IncomingBody {
  mid: string;
  seq?: number;
  text: string | null;
  attachments?: unknown[] | null;
}

export interface IncomingLinkedBody {
  mid?: string;
  seq?: number;
  text?: string | null;
  attachments?: unknown[] | null;
}

export interface IncomingLink {
  type?: 'forward' | 'reply' | string;
  sender?: IncomingSender | null;
  chat_id?: number;
  message?: IncomingLinkedBody | null;
}

export interface IncomingMessage {
  sender?: IncomingSender | null;
  recipient: IncomingRecipient;
  body: IncomingBody;
  link?: IncomingLink | null;
  timestamp?: number;
}

/**
 * One invocation of the recall workflow as handed over by the host.
 * `actionMessage`, `actionData` and `message` are inspected read-only and may
 * have any shape.
 */
export interface RecallInvocation {
  platform: string;
  isGroup: boolean;
  groupId?: string;
  chatId?: string;
  userId?: string;
  actionMessage?: unknown;
  actionData?: unknown;
  message?: unknown;
}

export type HistoryOrder = 'latest' | 'earliest';

export interface RecentMessagesQuery {
  chatId: string;
  windowHours: number;
  limit: number;
  order: HistoryOrder;
  excludeSelf: boolean;
}

export type HistoryRecord = Record<string, unknown>;

export interface DeletePayload {
  message_id: string;
}

/**
 * Primitives the chat host supplies for a single invocation.
 */
export interface RecallHost {
  sendText(text: string): Promise<void>;
  sendBackendCommand(
    name: string,
    payload: DeletePayload,
    displayText: string,
    persist: boolean,
  ): Promise<unknown>;
  getRecentMessages(query: RecentMessagesQuery): Promise<HistoryRecord[]>;
}

export interface DeletionAttemptResult {
  success: boolean;
  backendCommandUsed: string;
  rawResponse: unknown;
  diagnosticNote: string;
}

export type VerificationReason =
  | 'skipped'
  | 'not_found_after_delete'
  | 'still_exists'
  | 'verify_error'
  | 'skip_no_chat_id';

export interface VerificationResult {
  confirmed: boolean;
  reason: VerificationReason;
}

export type RecallStatus =
  | 'recalled'
  | 'already_recalled'
  | 'scheduled'
  | 'no_action'
  | 'permission_denied'
  | 'unresolved'
  | 'invalid_target'
  | 'delete_failed'
  | 'error';

export interface RecallOutcome {
  success: boolean;
  status: RecallStatus;
  message: string;
  messageId?: string;
}

export interface CommandOutcome extends RecallOutcome {
  intercepted: boolean;
}

export type RecallTrigger = 'smart' | 'command';

export interface RecallActionRecord {
  platform: string;
  chatId?: string;
  messageId?: string;
  trigger: RecallTrigger;
  status: RecallStatus;
  note?: string;
}

export interface RecallAuditSink {
  record(entry: RecallActionRecord): void;
}
