import type { LogLevel, RecallActionRecord, RecallStatus } from '../types';

export interface LogEvent {
  level: LogLevel;
  message: string;
  meta?: Record<string, unknown>;
}

export interface LogChatSink {
  sendMessageToChat(chatId: number, text: string): Promise<unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

export interface RecallLogger {
  debug(message: string, meta?: Record<string, unknown>): Promise<void>;
  info(message: string, meta?: Record<string, unknown>): Promise<void>;
  warn(message: string, meta?: Record<string, unknown>): Promise<void>;
  error(message: string, meta?: Record<string, unknown>): Promise<void>;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const CHAT_NOTIFICATION_STATUSES = new Set<RecallStatus>(['recalled', 'scheduled', 'delete_failed']);

export class BotLogger implements RecallLogger {
  private readonly minLevel: LogLevel;
  private readonly prefix: string;

  constructor(
    private readonly api: LogChatSink,
    private readonly getLogChatId: () => number | undefined,
    options: LoggerOptions = {},
  ) {
    this.minLevel = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
  }

  async debug(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'debug', message, meta }, false);
  }

  async info(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'info', message, meta }, false);
  }

  async warn(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'warn', message, meta }, false);
  }

  async error(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'error', message, meta }, false);
  }

  async recall(record: RecallActionRecord): Promise<void> {
    const shouldSendToChat = CHAT_NOTIFICATION_STATUSES.has(record.status);
    const message = [
      `[recall] platform=${record.platform} chat=${record.chatId ?? '-'} mid=${record.messageId ?? '-'}`,
      `trigger=${record.trigger} status=${record.status}`,
      record.note ? `note=${record.note}` : null,
    ].filter(Boolean).join(' ');

    await this.emit(
      {
        level: record.status === 'delete_failed' || record.status === 'error' ? 'warn' : 'info',
        message,
      },
      shouldSendToChat,
    );
  }

  private async emit(event: LogEvent, sendToLogChat: boolean): Promise<void> {
    if (LEVEL_WEIGHT[event.level] < LEVEL_WEIGHT[this.minLevel]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level: event.level,
      message: this.prefix ? `${this.prefix} ${event.message}` : event.message,
      ...(event.meta ? { meta: event.meta } : {}),
    };

    if (event.level === 'error') {
      console.error(JSON.stringify(payload));
    } else if (event.level === 'warn') {
      console.warn(JSON.stringify(payload));
    } else {
      console.log(JSON.stringify(payload));
    }

    if (!sendToLogChat) {
      return;
    }

    const logChatId = this.getLogChatId();
    if (!logChatId) return;

    const text = [
      `[#${event.level.toUpperCase()}] ${event.message}`,
      event.meta ? `meta: ${JSON.stringify(event.meta)}` : null,
    ].filter(Boolean).join('\n');

    try {
      await this.api.sendMessageToChat(logChatId, text);
    } catch {
      // Avoid recursive logging on send failures.
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
