import type { RecallHost, VerificationResult } from '../types';
import { errorMessage, type RecallLogger } from '../services/logger';
import { isAbortedError, sleep } from '../utils/time';
import { HISTORY_ID_KEYS } from './identifier';
import { RecentRecallCache } from './recent-recall-cache';

const VERIFY_WINDOW_HOURS = 1;
const VERIFY_HISTORY_LIMIT = 200;
const VERIFY_RETRY_INTERVAL_MS = 200;

export interface VerifyOptions {
  enabled: boolean;
  delayMs: number;
  attempts: number;
  signal?: AbortSignal;
}

function recordHasMessageId(record: Record<string, unknown>, messageId: string): boolean {
  return HISTORY_ID_KEYS.some((key) => String(record[key] ?? '') === messageId);
}

/**
 * Post-delete check against recent history. Advisory: it never turns a
 * reported deletion into a failure.
 */
export class VerificationProbe {
  constructor(
    private readonly cache: RecentRecallCache,
    private readonly logger: RecallLogger,
    private readonly now: () => number = Date.now,
  ) {}

  async verify(
    host: RecallHost,
    messageId: string,
    chatId: string | null,
    options: VerifyOptions,
  ): Promise<VerificationResult> {
    if (!options.enabled) {
      return { confirmed: true, reason: 'skipped' };
    }

    if (!chatId) {
      await this.logger.info('No chat id available, verification skipped', { messageId });
      return { confirmed: true, reason: 'skip_no_chat_id' };
    }

    try {
      await sleep(options.delayMs, options.signal);

      for (let attempt = 0; attempt < options.attempts; attempt += 1) {
        const records = await host.getRecentMessages({
          chatId,
          windowHours: VERIFY_WINDOW_HOURS,
          limit: VERIFY_HISTORY_LIMIT,
          order: 'latest',
          excludeSelf: true,
        });

        const exists = records.some((record) => recordHasMessageId(record, messageId));
        if (!exists) {
          await this.logger.debug('Verification passed: message is gone', { messageId, attempt: attempt + 1 });
          this.cache.mark(messageId, this.now());
          return { confirmed: true, reason: 'not_found_after_delete' };
        }

        await sleep(VERIFY_RETRY_INTERVAL_MS, options.signal);
      }

      await this.logger.warn('Verification failed: message still exists', {
        messageId,
        attempts: options.attempts,
      });
      return { confirmed: false, reason: 'still_exists' };
    } catch (error) {
      if (isAbortedError(error)) {
        throw error;
      }

      await this.logger.warn('Verification error', { messageId, error: errorMessage(error) });
      return { confirmed: true, reason: 'verify_error' };
    }
  }
}
