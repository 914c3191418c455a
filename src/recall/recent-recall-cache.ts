export const RECENT_RECALL_TTL_MS = 5 * 60 * 1000;

export class RecentRecallCache {
  private readonly recalledAt = new Map<string, number>();

  constructor(private readonly ttlMs: number = RECENT_RECALL_TTL_MS) {}

  has(messageId: string, nowTs: number): boolean {
    const markedAt = this.recalledAt.get(messageId);
    if (markedAt === undefined) return false;
    return nowTs - markedAt < this.ttlMs;
  }

  mark(messageId: string, nowTs: number): void {
    this.recalledAt.set(messageId, nowTs);
  }
}
