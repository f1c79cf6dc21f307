import type { SeenQuestStore } from '../../models/seenQuest';
import { Logger, logger as defaultLogger } from '../../lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RetentionSweeperOptions {
  store: SeenQuestStore;
  retentionDays: number;
  logger?: Logger;
}

/**
 * Prunes seen-set entries older than the retention horizon, whether or not
 * the quest is still active upstream. A pruned quest that is still live is
 * reported as new on the next check.
 */
export class RetentionSweeper {
  private readonly store: SeenQuestStore;
  private readonly horizonMs: number;
  private readonly logger: Logger;

  constructor(options: RetentionSweeperOptions) {
    this.store = options.store;
    this.horizonMs = options.retentionDays * DAY_MS;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'RetentionSweeper' });
  }

  async sweep(): Promise<number> {
    const removed = await this.store.deleteOlderThan(this.horizonMs);
    if (removed > 0) {
      this.logger.info('Retention sweep pruned seen quests', {
        removed,
        horizonDays: this.horizonMs / DAY_MS,
      });
    }
    return removed;
  }
}
