import path from 'node:path';
import type { BotConfig, LogLevel, RecallSettings, SettingKey } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_SETTINGS: RecallSettings = {
  'plugin.enabled': true,
  'components.enable_smart_recall': true,
  'components.enable_recall_command': true,
  'permissions.allowed_groups': [],
  'messages.recall_display': '🗑️ Удаляю сообщение (серьезное нарушение)…',
  'messages.error_messages': [
    'Не найдено сообщение для удаления. Ответьте на него или укажите message_id.',
    'Некорректный message_id, проверьте формат.',
    'Удалить не получилось, попробуйте позже.',
  ],
  'verify.enabled': true,
  'verify.delay_ms': 500,
  'verify.attempts': 2,
  'behavior.recall_delay_ms': 0,
  'logging.level': 'info',
  'logging.prefix': '[recall]',
};

function parsePositiveInt(value: string | undefined, fallback: number, key: string): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return parsed;
}

function parseNonNegativeInt(value: string | undefined, key: string): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer`);
  }
  return parsed;
}

function parseOptionalInt(value: string | undefined, key: string): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseList(value: string | undefined, separator: string): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(separator).map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((item) => item === normalized);
  if (!level) {
    throw new Error(`Environment variable LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

function setIfDefined<K extends SettingKey>(
  target: Partial<RecallSettings>,
  key: K,
  value: RecallSettings[K] | undefined,
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = env.BOT_TOKEN?.trim();
  if (!botToken) {
    throw new Error('BOT_TOKEN is required');
  }

  const settings: Partial<RecallSettings> = {};
  setIfDefined(settings, 'plugin.enabled', parseBoolean(env.RECALL_ENABLED));
  setIfDefined(settings, 'components.enable_smart_recall', parseBoolean(env.RECALL_SMART_ENABLED));
  setIfDefined(settings, 'components.enable_recall_command', parseBoolean(env.RECALL_COMMAND_ENABLED));
  setIfDefined(settings, 'permissions.allowed_groups', parseList(env.RECALL_ALLOWED_GROUPS, ','));
  setIfDefined(settings, 'messages.recall_display', env.RECALL_DISPLAY?.trim() || undefined);
  setIfDefined(settings, 'messages.error_messages', parseList(env.RECALL_ERROR_MESSAGES, '|'));
  setIfDefined(settings, 'verify.enabled', parseBoolean(env.RECALL_VERIFY_ENABLED));
  setIfDefined(settings, 'verify.delay_ms', parseNonNegativeInt(env.RECALL_VERIFY_DELAY_MS, 'RECALL_VERIFY_DELAY_MS'));
  setIfDefined(settings, 'verify.attempts', parseNonNegativeInt(env.RECALL_VERIFY_ATTEMPTS, 'RECALL_VERIFY_ATTEMPTS'));
  setIfDefined(settings, 'behavior.recall_delay_ms', parseNonNegativeInt(env.RECALL_DELAY_MS, 'RECALL_DELAY_MS'));
  setIfDefined(settings, 'logging.level', parseLogLevel(env.LOG_LEVEL));
  setIfDefined(settings, 'logging.prefix', env.LOG_PREFIX?.trim() || undefined);

  return {
    botToken,
    platform: 'max',
    databasePath: env.DATABASE_PATH?.trim() || path.resolve(process.cwd(), 'data/recall.sqlite'),
    logChatId: parseOptionalInt(env.LOG_CHAT_ID, 'LOG_CHAT_ID'),
    cleanupIntervalSec: parsePositiveInt(env.CLEANUP_INTERVAL_SEC, 300, 'CLEANUP_INTERVAL_SEC'),
    historyRetentionHours: parsePositiveInt(env.HISTORY_RETENTION_HOURS, 24, 'HISTORY_RETENTION_HOURS'),
    settings,
  };
}

export interface SettingsReader {
  get<K extends SettingKey>(key: K, fallback?: RecallSettings[K]): RecallSettings[K];
}

/**
 * Dotted-key lookup over the recall settings. Unset keys resolve to the
 * caller's fallback, then to the built-in default.
 */
export function createSettingsReader(settings: Partial<RecallSettings> = {}): SettingsReader {
  return {
    get<K extends SettingKey>(key: K, fallback?: RecallSettings[K]): RecallSettings[K] {
      const value: RecallSettings[K] | undefined = settings[key];
      if (value !== undefined) return value;
      return fallback ?? DEFAULT_SETTINGS[key];
    },
  };
}
