/**
 * Application wiring - Quest Notifier
 *
 * Builds every component from one AppConfig. The context is cached for the
 * lifetime of the Lambda container so clients and the credentials cache are
 * reused across invocations.
 */

import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { AppConfig, loadConfig } from '../config/app';
import { DynamoSeenQuestStore } from '../models/seenQuest';
import { AlertNotifier } from '../services/notifications/alerts';
import { NotificationDispatcher } from '../services/notifications/dispatcher';
import { WebhookSender } from '../services/notifications/send';
import { QuestApiCredentialsProvider } from '../services/quests/credentials';
import { QuestApiClient } from '../services/quests/questApiClient';
import { QuestRunService } from '../services/quests/questRunService';
import { SnapshotReconciler } from '../services/quests/reconciler';
import { RetentionSweeper } from '../services/quests/retention';
import type { Quest } from '../types/entities';
import { createDocumentClient } from './dynamodb';
import { buildQuestMessage } from './embeds/questEmbed';
import { logger, setLogLevel } from './logger';
import { CloudWatchRunMetrics, noopRunMetrics } from './monitoring/runMetrics';

export interface AppContext {
  config: AppConfig;
  service: QuestRunService;
}

let cached: AppContext | null = null;

/**
 * Wire the application from config
 */
export const buildAppContext = (config: AppConfig = loadConfig()): AppContext => {
  setLogLevel(config.logLevel);

  const store = new DynamoSeenQuestStore({
    client: createDocumentClient(config.aws),
    tableName: config.aws.tableName,
  });

  const credentials = new QuestApiCredentialsProvider({
    inline: {
      authorization: config.questApi.authorization,
      superProperties: config.questApi.superProperties,
    },
    secretName: config.questApi.secretName,
    client: config.questApi.secretName
      ? new SecretsManagerClient({ region: config.aws.region })
      : undefined,
  });

  const sender = new WebhookSender();

  const dispatcher = new NotificationDispatcher<Quest>({
    sender,
    delayMs: config.webhooks.delayMs,
    render: (quest) => buildQuestMessage(quest, { ...config.rendering, now: new Date() }),
  });

  const metrics = config.metrics.enabled
    ? new CloudWatchRunMetrics({
        client: new CloudWatchClient({ region: config.aws.region }),
        namespace: config.metrics.namespace,
      })
    : noopRunMetrics;

  const service = new QuestRunService({
    store,
    source: new QuestApiClient({ endpoint: config.questApi.endpoint, credentials }),
    credentials,
    reconciler: new SnapshotReconciler({ store }),
    sweeper: new RetentionSweeper({ store, retentionDays: config.retention.days }),
    dispatcher,
    alerts: new AlertNotifier({
      sender,
      alertDestinations: config.webhooks.alertDestinations,
      fallbackDestinations: config.webhooks.destinations,
    }),
    destinations: config.webhooks.destinations,
    metrics,
  });

  logger.debug('Application context built', {
    tableName: config.aws.tableName,
    destinations: config.webhooks.destinations.length,
    alertDestinations: config.webhooks.alertDestinations.length,
    retentionDays: config.retention.days,
    metricsEnabled: config.metrics.enabled,
  });

  return { config, service };
};

/**
 * Container-scoped context, built on first use
 */
export const getAppContext = (): AppContext => {
  if (!cached) {
    cached = buildAppContext();
  }
  return cached;
};
