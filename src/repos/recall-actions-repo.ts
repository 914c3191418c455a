import type { BetterSqliteDb } from '../db/sqlite';
import type { RecallActionRecord, RecallAuditSink } from '../types';

export class RecallActionsRepo implements RecallAuditSink {
  constructor(private readonly db: BetterSqliteDb) {}

  record(entry: RecallActionRecord): void {
    this.db.prepare(`
      INSERT INTO recall_actions (platform, chat_id, message_id, trigger_kind, status, note, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.platform,
      entry.chatId ?? null,
      entry.messageId ?? null,
      entry.trigger,
      entry.status,
      entry.note ?? null,
      Date.now(),
    );
  }

  purgeOlderThan(cutoffTsMs: number): void {
    this.db.prepare('DELETE FROM recall_actions WHERE created_at < ?').run(cutoffTsMs);
  }
}
