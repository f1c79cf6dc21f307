import type { SeenQuest } from '../types/entities';
import { SeenQuestStore, sortBySeenAtDesc } from './seenQuest';

/**
 * In-process seen-set with the same semantics as DynamoSeenQuestStore.
 * Used by tests and local dry runs.
 */
export class InMemorySeenQuestStore implements SeenQuestStore {
  private readonly entries = new Map<string, string>();
  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  async upsert(questId: string, seenAt: Date): Promise<void> {
    this.entries.set(questId, seenAt.toISOString());
  }

  async listIds(): Promise<Set<string>> {
    return new Set(this.entries.keys());
  }

  async listWithTimestamps(): Promise<SeenQuest[]> {
    return sortBySeenAtDesc(
      [...this.entries].map(([questId, firstSeenAt]) => ({ questId, firstSeenAt }))
    );
  }

  async deleteMany(questIds: Iterable<string>): Promise<void> {
    for (const questId of questIds) {
      this.entries.delete(questId);
    }
  }

  async deleteAll(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  async deleteOlderThan(horizonMs: number): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - horizonMs).toISOString();
    let removed = 0;
    for (const [questId, firstSeenAt] of this.entries) {
      if (firstSeenAt < cutoff) {
        this.entries.delete(questId);
        removed++;
      }
    }
    return removed;
  }
}
