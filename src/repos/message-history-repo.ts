import type { BetterSqliteDb } from '../db/sqlite';
import type { HistoryOrder, HistoryRecord } from '../types';

export interface StoredMessage {
  platform: string;
  chatId: string;
  messageId: string;
  userId?: string;
  isBot: boolean;
  text?: string | null;
  createdAtTs: number;
}

export interface HistoryQuery {
  platform: string;
  chatId: string;
  sinceTs: number;
  limit: number;
  order: HistoryOrder;
  excludeBots: boolean;
}

interface MessageHistoryRow {
  chat_id: string;
  message_id: string;
  user_id: string | null;
  is_bot: number;
  text: string | null;
  created_at: number;
}

export class MessageHistoryRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  record(entry: StoredMessage): void {
    this.db.prepare(`
      INSERT INTO message_history (platform, chat_id, message_id, user_id, is_bot, text, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(platform, chat_id, message_id) DO NOTHING
    `).run(
      entry.platform,
      entry.chatId,
      entry.messageId,
      entry.userId ?? null,
      entry.isBot ? 1 : 0,
      entry.text ?? null,
      entry.createdAtTs,
    );
  }

  listRecent(query: HistoryQuery): HistoryRecord[] {
    const direction = query.order === 'latest' ? 'DESC' : 'ASC';
    const rows = this.db.prepare(`
      SELECT chat_id, message_id, user_id, is_bot, text, created_at
      FROM message_history
      WHERE platform = ? AND chat_id = ? AND created_at >= ? AND (? = 0 OR is_bot = 0)
      ORDER BY created_at ${direction}, rowid ${direction}
      LIMIT ?
    `).all(
      query.platform,
      query.chatId,
      query.sinceTs,
      query.excludeBots ? 1 : 0,
      query.limit,
    ) as MessageHistoryRow[];

    return rows.map((row) => ({
      message_id: row.message_id,
      chat_id: row.chat_id,
      user_id: row.user_id,
      is_bot: row.is_bot === 1,
      text: row.text,
      time: row.created_at,
    }));
  }

  remove(platform: string, chatId: string, messageId: string): boolean {
    const result = this.db.prepare(`
      DELETE FROM message_history
      WHERE platform = ? AND chat_id = ? AND message_id = ?
    `).run(platform, chatId, messageId);

    return result.changes > 0;
  }

  purgeOlderThan(cutoffTsMs: number): void {
    this.db.prepare('DELETE FROM message_history WHERE created_at < ?').run(cutoffTsMs);
  }
}
