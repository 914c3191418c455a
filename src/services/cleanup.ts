import type { BotConfig } from '../types';
import type { Repositories } from '../repos';
import { hoursToMs } from '../utils/time';
import { errorMessage, type RecallLogger } from './logger';

const RECALL_ACTIONS_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

export class CleanupService {
  private runInProgress = false;

  constructor(
    private readonly repos: Repositories,
    private readonly config: Pick<BotConfig, 'historyRetentionHours'>,
    private readonly logger: RecallLogger,
  ) {}

  async run(nowTs: number = Date.now()): Promise<void> {
    if (this.runInProgress) {
      return;
    }

    this.runInProgress = true;
    try {
      this.repos.messageHistory.purgeOlderThan(nowTs - hoursToMs(this.config.historyRetentionHours));
      this.repos.recallActions.purgeOlderThan(nowTs - RECALL_ACTIONS_RETENTION_MS);
    } catch (error) {
      await this.logger.error('Cleanup failed', { error: errorMessage(error) });
    } finally {
      this.runInProgress = false;
    }
  }
}
