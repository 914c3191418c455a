import type { BetterSqliteDb } from '../db/sqlite';
import { MessageHistoryRepo } from './message-history-repo';
import { RecallActionsRepo } from './recall-actions-repo';

export interface Repositories {
  messageHistory: MessageHistoryRepo;
  recallActions: RecallActionsRepo;
}

export function createRepositories(db: BetterSqliteDb): Repositories {
  return {
    messageHistory: new MessageHistoryRepo(db),
    recallActions: new RecallActionsRepo(db),
  };
}
