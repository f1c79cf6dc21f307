/**
 * Quest Run Metrics & Logging Helpers
 *
 * CloudWatch metrics and structured job events for quest notifier runs.
 */

import { CloudWatchClient, MetricDatum, PutMetricDataCommand, StandardUnit } from '@aws-sdk/client-cloudwatch';
import { Logger, logger as defaultLogger } from '../logger';
import { toError } from '../errors';
import type { RunSummary } from '../../types/entities';

export interface RunMetricsPublisher {
  publish(summary: RunSummary): Promise<void>;
}

export interface CloudWatchRunMetricsOptions {
  client: CloudWatchClient;
  namespace: string;
  logger?: Logger;
}

/**
 * Build the metric data for one run
 */
export function buildRunMetricData(summary: RunSummary, timestamp: Date = new Date()): MetricDatum[] {
  const dimensions = [{ Name: 'Operation', Value: summary.operation }];
  const count = (name: string, value: number): MetricDatum => ({
    MetricName: name,
    Dimensions: dimensions,
    Value: value,
    Unit: StandardUnit.Count,
    Timestamp: timestamp,
  });

  return [
    count('NewQuests', summary.newQuestCount),
    count('SeenQuestsRemoved', summary.removedCount),
    count('SeenQuestsPruned', summary.prunedCount),
    count('NotificationsSent', summary.sent),
    count('NotificationsFailed', summary.failed),
    count('RunsAborted', summary.status === 'COMPLETED' ? 0 : 1),
    {
      MetricName: 'RunDuration',
      Dimensions: dimensions,
      Value: Date.parse(summary.completedAt) - Date.parse(summary.startedAt),
      Unit: StandardUnit.Milliseconds,
      Timestamp: timestamp,
    },
  ];
}

/**
 * Publishes run metrics to CloudWatch; failures are logged, never thrown
 */
export class CloudWatchRunMetrics implements RunMetricsPublisher {
  private readonly client: CloudWatchClient;
  private readonly namespace: string;
  private readonly logger: Logger;

  constructor(options: CloudWatchRunMetricsOptions) {
    this.client = options.client;
    this.namespace = options.namespace;
    this.logger = options.logger ?? defaultLogger;
  }

  async publish(summary: RunSummary): Promise<void> {
    try {
      await this.client.send(
        new PutMetricDataCommand({
          Namespace: this.namespace,
          MetricData: buildRunMetricData(summary),
        })
      );
    } catch (err) {
      // Log but don't fail the run if metrics publishing fails
      this.logger.error('Failed to publish CloudWatch metrics', toError(err), { runId: summary.runId });
    }
  }
}

/**
 * Used when METRICS_ENABLED=false
 */
export const noopRunMetrics: RunMetricsPublisher = {
  publish: async () => undefined,
};

/**
 * Log structured run event
 */
export function logRunEvent(
  logger: Logger,
  event: 'start' | 'complete' | 'abort' | 'error',
  operation: RunSummary['operation'],
  details: Record<string, unknown> = {}
): void {
  const baseContext = { operation, event, ...details };

  switch (event) {
    case 'start':
      logger.info('Quest run started', baseContext);
      break;
    case 'complete':
      logger.info('Quest run completed', baseContext);
      break;
    case 'abort':
      logger.warn('Quest run aborted', baseContext);
      break;
    case 'error':
      logger.error('Quest run error', new Error(String(details['message'] || 'Unknown error')), baseContext);
      break;
  }
}
