/**
 * Snapshot Reconciler
 *
 * Diffs the current upstream snapshot against the seen-set and brings the
 * seen-set in line with it:
 * - toAdd = snapshot - stored: reported as new and written before any send
 * - toRemove = stored - snapshot: deleted, never notified
 * - unchanged = snapshot ∩ stored: left alone (firstSeenAt is preserved)
 *
 * An empty snapshot is treated as suspect: the store is left untouched and
 * nothing is reported as new.
 */

import type { SeenQuestStore } from '../../models/seenQuest';
import { Logger, logger as defaultLogger } from '../../lib/logger';
import type { Quest, Snapshot, SnapshotItem } from '../../types/entities';

export interface ReconcileResult<T extends SnapshotItem = Quest> {
  /** Newly appeared items, in snapshot order */
  newItems: T[];
  removedIds: string[];
  unchangedIds: string[];
  /** snapshot ids ∪ stored ids that were kept */
  allSeenIds: Set<string>;
  /** True when the snapshot was empty and reconciliation did not run */
  skipped: boolean;
}

export interface SnapshotReconcilerOptions {
  store: SeenQuestStore;
  clock?: () => Date;
  logger?: Logger;
}

export class SnapshotReconciler {
  private readonly store: SeenQuestStore;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: SnapshotReconcilerOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? defaultLogger).child({ component: 'SnapshotReconciler' });
  }

  async reconcile<T extends SnapshotItem>(snapshot: Snapshot<T>): Promise<ReconcileResult<T>> {
    if (snapshot.length === 0) {
      this.logger.warn('Empty snapshot received; seen-set left untouched');
      return {
        newItems: [],
        removedIds: [],
        unchangedIds: [],
        allSeenIds: await this.store.listIds(),
        skipped: true,
      };
    }

    // Must be read before any mutation: toAdd is computed against this set
    const stored = await this.store.listIds();

    const current = new Set<string>();
    const newItems: T[] = [];
    const unchangedIds: string[] = [];

    for (const item of snapshot) {
      if (current.has(item.id)) {
        continue;
      }
      current.add(item.id);

      if (stored.has(item.id)) {
        unchangedIds.push(item.id);
      } else {
        newItems.push(item);
      }
    }

    const removedIds = [...stored].filter((id) => !current.has(id));

    const seenAt = this.clock();
    for (const item of newItems) {
      await this.store.upsert(item.id, seenAt);
    }

    if (removedIds.length > 0) {
      await this.store.deleteMany(removedIds);
    }

    // Every kept stored id is also in the snapshot, so the union is the snapshot itself
    const allSeenIds = new Set(current);

    this.logger.info('Snapshot reconciled', {
      snapshotSize: snapshot.length,
      added: newItems.length,
      removed: removedIds.length,
      unchanged: unchangedIds.length,
    });

    return { newItems, removedIds, unchangedIds, allSeenIds, skipped: false };
  }
}
