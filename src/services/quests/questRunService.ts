/**
 * Quest Run Service
 *
 * Entry point for every operational control. Each operation returns a
 * RunSummary and never throws: FetchError, AuthError and StoreError abort the
 * run, anything unexpected marks it FAILED, and operators are alerted where a
 * human has to act.
 */

import { AuthError, FetchError, StoreError, toError } from '../../lib/errors';
import { Logger, logger as defaultLogger } from '../../lib/logger';
import { RunMetricsPublisher, logRunEvent, noopRunMetrics } from '../../lib/monitoring/runMetrics';
import { generateUUID } from '../../lib/uuid';
import type { SeenQuestStore } from '../../models/seenQuest';
import type { Quest, RunOperation, RunSummary, SeenQuest, Snapshot } from '../../types/entities';
import type { AlertNotifier } from '../notifications/alerts';
import type { NotificationDispatcher } from '../notifications/dispatcher';
import type { CredentialsProvider, QuestApiCredentials } from './credentials';
import type { QuestSource } from './questApiClient';
import type { SnapshotReconciler } from './reconciler';
import type { RetentionSweeper } from './retention';

export interface QuestRunServiceDeps {
  store: SeenQuestStore;
  source: QuestSource;
  credentials: CredentialsProvider;
  reconciler: SnapshotReconciler;
  sweeper: RetentionSweeper;
  dispatcher: NotificationDispatcher<Quest>;
  alerts: AlertNotifier;
  destinations: readonly string[];
  metrics?: RunMetricsPublisher;
  clock?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

interface RunCounts {
  newQuestCount: number;
  removedCount: number;
  prunedCount: number;
  sent: number;
  failed: number;
}

type OperationOutcome =
  | { status: 'COMPLETED'; counts?: Partial<RunCounts> }
  | { status: 'ABORTED'; error: Error; counts?: Partial<RunCounts> };

export class NoDestinationsError extends Error {
  public readonly code = 'NO_DESTINATIONS';

  constructor() {
    super('No webhook URL provided. Set WEBHOOK_URL or pass webhookUrls.');
    this.name = 'NoDestinationsError';
    Object.setPrototypeOf(this, NoDestinationsError.prototype);
  }
}

export class QuestNotFoundError extends Error {
  public readonly code = 'QUEST_NOT_FOUND';

  constructor(public readonly questId: string) {
    super(`Quest with ID "${questId}" not found`);
    this.name = 'QuestNotFoundError';
    Object.setPrototypeOf(this, QuestNotFoundError.prototype);
  }
}

export class NoQuestsAvailableError extends Error {
  public readonly code = 'NO_QUESTS_AVAILABLE';

  constructor() {
    super('No quests available to send');
    this.name = 'NoQuestsAvailableError';
    Object.setPrototypeOf(this, NoQuestsAvailableError.prototype);
  }
}

export class QuestRunService {
  private readonly deps: QuestRunServiceDeps;
  private readonly metrics: RunMetricsPublisher;
  private readonly clock: () => Date;
  private readonly generateId: () => string;
  private readonly logger: Logger;

  constructor(deps: QuestRunServiceDeps) {
    this.deps = deps;
    this.metrics = deps.metrics ?? noopRunMetrics;
    this.clock = deps.clock ?? (() => new Date());
    this.generateId = deps.generateId ?? generateUUID;
    this.logger = (deps.logger ?? defaultLogger).child({ component: 'QuestRunService' });
  }

  /**
   * Fetch, sweep, reconcile and notify for every new quest
   */
  async runCheck(): Promise<RunSummary> {
    return this.execute('CHECK', async (log) => {
      await this.preflight(log);

      if (this.deps.destinations.length === 0) {
        return { status: 'ABORTED', error: new NoDestinationsError() };
      }

      const fetched = await this.deps.source.fetchSnapshot();
      if (!fetched.ok) {
        return this.abortOnFetch(fetched.error);
      }

      const prunedCount = await this.deps.sweeper.sweep();
      const reconciled = await this.deps.reconciler.reconcile(fetched.value);

      if (reconciled.skipped) {
        log.warn('No quests data available or empty quests list');
        return { status: 'COMPLETED', counts: { prunedCount } };
      }

      if (reconciled.newItems.length === 0) {
        log.info('No new quests to send');
      }

      const dispatched = await this.deps.dispatcher.dispatch(reconciled.newItems, this.deps.destinations);

      return {
        status: 'COMPLETED',
        counts: {
          newQuestCount: reconciled.newItems.length,
          removedCount: reconciled.removedIds.length,
          prunedCount,
          sent: dispatched.sent,
          failed: dispatched.failed,
        },
      };
    });
  }

  /**
   * Bring the seen-set in line with the current snapshot without notifying
   */
  async syncSeen(): Promise<RunSummary> {
    return this.execute('SYNC', async (log) => {
      const fetched = await this.deps.source.fetchSnapshot();
      if (!fetched.ok) {
        return this.abortOnFetch(fetched.error);
      }

      const reconciled = await this.deps.reconciler.reconcile(fetched.value);
      const remaining = reconciled.allSeenIds.size;
      log.info('Sync completed', { remaining });

      return {
        status: 'COMPLETED',
        counts: {
          newQuestCount: reconciled.newItems.length,
          removedCount: reconciled.removedIds.length,
        },
      };
    });
  }

  /**
   * Forget every seen quest: the next check reports all active quests as new
   */
  async resetSeen(): Promise<RunSummary> {
    return this.execute('RESET', async (log) => {
      const removedCount = await this.deps.store.deleteAll();
      log.info('Seen quests reset', { removedCount });
      return { status: 'COMPLETED', counts: { removedCount } };
    });
  }

  async sweepRetention(): Promise<RunSummary> {
    return this.execute('SWEEP', async () => {
      const prunedCount = await this.deps.sweeper.sweep();
      return { status: 'COMPLETED', counts: { prunedCount } };
    });
  }

  /**
   * Seen quests with the time each was first seen, most recent first
   */
  async listSeen(): Promise<{ summary: RunSummary; entries: SeenQuest[] }> {
    let entries: SeenQuest[] = [];
    const summary = await this.execute('LIST', async (log) => {
      entries = await this.deps.store.listWithTimestamps();
      log.info(entries.length > 0 ? 'Previously seen quests' : 'No quests have been seen yet', {
        count: entries.length,
        entries,
      });
      return { status: 'COMPLETED' };
    });
    return { summary, entries };
  }

  /**
   * Send one named quest out-of-band; the seen-set is not touched
   */
  async sendQuest(questId: string, destinations?: readonly string[]): Promise<RunSummary> {
    return this.execute('SEND_QUEST', async () => {
      return this.sendSelected(
        destinations,
        (snapshot) => snapshot.find((quest) => quest.id === questId),
        () => new QuestNotFoundError(questId)
      );
    });
  }

  /**
   * Send the most recently activated quest to every destination
   */
  async sendLatest(destinations?: readonly string[]): Promise<RunSummary> {
    return this.execute('SEND_LATEST', async () => {
      return this.sendSelected(destinations, (snapshot) => snapshot[0], () => new NoQuestsAvailableError());
    });
  }

  private async sendSelected(
    override: readonly string[] | undefined,
    select: (snapshot: Snapshot<Quest>) => Quest | undefined,
    notFound: () => Error
  ): Promise<OperationOutcome> {
    const destinations = override && override.length > 0 ? override : this.deps.destinations;
    if (destinations.length === 0) {
      return { status: 'ABORTED', error: new NoDestinationsError() };
    }

    const fetched = await this.deps.source.fetchSnapshot();
    if (!fetched.ok) {
      return this.abortOnFetch(fetched.error);
    }

    const quest = select(fetched.value);
    if (!quest) {
      return { status: 'ABORTED', error: notFound() };
    }

    const dispatched = await this.deps.dispatcher.dispatch([quest], destinations);
    return { status: 'COMPLETED', counts: { sent: dispatched.sent, failed: dispatched.failed } };
  }

  /**
   * Alert when the upstream credentials are not configured at all
   */
  private async preflight(log: Logger): Promise<void> {
    let credentials: QuestApiCredentials;
    try {
      credentials = await this.deps.credentials.get();
    } catch {
      // Surfaced again, with its cause, by the fetch that follows
      return;
    }

    const issues: string[] = [];
    if (!credentials.authorization) {
      issues.push('DISCORD_AUTHORIZATION is empty');
    }
    if (!credentials.superProperties) {
      issues.push('TOKEN_JWT is empty');
    }

    if (issues.length > 0) {
      const message = `⚠️ Token misconfiguration detected: ${issues.join('; ')}. Please update your configuration.`;
      log.error(message);
      await this.deps.alerts.alert(message);
    }
  }

  private async abortOnFetch(error: FetchError | AuthError): Promise<OperationOutcome> {
    if (error instanceof AuthError) {
      await this.deps.alerts.alert(
        `❌ ${error.message}\nPlease refresh DISCORD_AUTHORIZATION and TOKEN_JWT.`
      );
    }
    return { status: 'ABORTED', error };
  }

  private async execute(
    operation: RunOperation,
    body: (log: Logger) => Promise<OperationOutcome>
  ): Promise<RunSummary> {
    const runId = this.generateId();
    const startedAt = this.clock();
    const log = this.logger.child({ runId, operation });
    logRunEvent(log, 'start', operation);

    let outcome: OperationOutcome;
    let failed = false;
    try {
      outcome = await body(log);
    } catch (error) {
      const cause = toError(error);
      if (cause instanceof StoreError) {
        await this.deps.alerts.alert(`Seen quest store unavailable, ${operation} run aborted: ${cause.message}`);
        outcome = { status: 'ABORTED', error: cause };
      } else {
        failed = true;
        log.error('Quest run failed unexpectedly', cause);
        await this.deps.alerts.alert(`Quest ${operation} run failed: ${cause.message}`);
        outcome = { status: 'ABORTED', error: cause };
      }
    }

    const summary: RunSummary = {
      runId,
      operation,
      status: failed ? 'FAILED' : outcome.status,
      newQuestCount: outcome.counts?.newQuestCount ?? 0,
      removedCount: outcome.counts?.removedCount ?? 0,
      prunedCount: outcome.counts?.prunedCount ?? 0,
      sent: outcome.counts?.sent ?? 0,
      failed: outcome.counts?.failed ?? 0,
      startedAt: startedAt.toISOString(),
      completedAt: this.clock().toISOString(),
    };

    if (outcome.status === 'ABORTED') {
      summary.error = { code: errorCode(outcome.error), message: outcome.error.message };
      logRunEvent(log, failed ? 'error' : 'abort', operation, {
        message: outcome.error.message,
        code: summary.error.code,
      });
    } else {
      logRunEvent(log, 'complete', operation, {
        newQuestCount: summary.newQuestCount,
        removedCount: summary.removedCount,
        prunedCount: summary.prunedCount,
        sent: summary.sent,
        failed: summary.failed,
      });
    }

    await this.metrics.publish(summary);
    return summary;
  }
}

function errorCode(error: Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : 'UNEXPECTED_ERROR';
}
