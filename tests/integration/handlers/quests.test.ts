/**
 * Tests: Quest handlers
 *
 * Handlers run against a QuestRunService wired over the in-memory store; the
 * application context is mocked so no AWS client is built.
 */

import type { ScheduledEvent } from 'aws-lambda';
import { handler as checkQuests } from '../../../src/handlers/quests/checkQuests';
import { handler as listSeenQuests } from '../../../src/handlers/quests/listSeenQuests';
import { handler as postLatestQuest } from '../../../src/handlers/quests/postLatestQuest';
import { handler as resetSeenQuests } from '../../../src/handlers/quests/resetSeenQuests';
import { handler as sendQuest } from '../../../src/handlers/quests/sendQuest';
import { handler as sweepSeenQuests } from '../../../src/handlers/quests/sweepSeenQuests';
import { handler as syncSeenQuests } from '../../../src/handlers/quests/syncSeenQuests';
import { loadConfig } from '../../../src/config/app';
import { getAppContext } from '../../../src/lib/appContext';
import { ConfigError, InvalidEventError } from '../../../src/lib/errors';
import { ok } from '../../../src/lib/result';
import { InMemorySeenQuestStore } from '../../../src/models/memorySeenQuestStore';
import { AlertNotifier } from '../../../src/services/notifications/alerts';
import { NotificationDispatcher } from '../../../src/services/notifications/dispatcher';
import { QuestRunService } from '../../../src/services/quests/questRunService';
import { SnapshotReconciler } from '../../../src/services/quests/reconciler';
import { RetentionSweeper } from '../../../src/services/quests/retention';
import type { Quest } from '../../../src/types/entities';
import { RecordingSender, createMockContext, fixedClock, makeQuest } from '../../helpers/fixtures';

jest.mock('../../../src/lib/appContext');

const NOW = '2025-07-01T00:00:00.000Z';
const MAIN = 'https://hooks.example/main';

const scheduledEvent = (rule = 'quest-notifier-check'): ScheduledEvent => ({
  version: '0',
  id: 'test-event-id',
  'detail-type': 'Scheduled Event',
  source: 'aws.events',
  account: '123456789012',
  time: NOW,
  region: 'us-east-1',
  resources: [`arn:aws:events:us-east-1:123456789012:rule/${rule}`],
  detail: {},
});

describe('quest handlers', () => {
  const context = createMockContext();
  let store: InMemorySeenQuestStore;
  let sender: RecordingSender;

  beforeEach(() => {
    const clock = fixedClock(NOW);
    store = new InMemorySeenQuestStore(clock);
    sender = new RecordingSender();
    const config = loadConfig({ TABLE_NAME: 'test-quest-table', WEBHOOK_URL: MAIN, WEBHOOK_DELAY_MS: '0' });

    const service = new QuestRunService({
      store,
      source: { fetchSnapshot: async () => ok([makeQuest('newest'), makeQuest('older')]) },
      credentials: {
        get: async () => ({ authorization: 'test-authorization', superProperties: 'test-super-properties' }),
      },
      reconciler: new SnapshotReconciler({ store, clock }),
      sweeper: new RetentionSweeper({ store, retentionDays: config.retention.days }),
      dispatcher: new NotificationDispatcher<Quest>({
        sender,
        render: (quest) => ({ content: quest.id }),
        delayMs: config.webhooks.delayMs,
      }),
      alerts: new AlertNotifier({ sender, alertDestinations: [], fallbackDestinations: [] }),
      destinations: config.webhooks.destinations,
      clock,
    });

    jest.mocked(getAppContext).mockReturnValue({ config, service });
  });

  describe('checkQuests', () => {
    it('notifies new quests and returns the run summary', async () => {
      const result = await checkQuests(scheduledEvent(), context);

      expect(result).toMatchObject({ operation: 'CHECK', status: 'COMPLETED', newQuestCount: 2, sent: 2 });
      expect(sender.sent.map((sent) => sent.message)).toEqual([{ content: 'newest' }, { content: 'older' }]);
    });

    it('answers warmup pings without running a check', async () => {
      const result = await checkQuests(scheduledEvent('quest-notifier-warmup'), context);

      expect(result).toMatchObject({ warmup: true });
      expect(getAppContext).not.toHaveBeenCalled();
    });

    it('fails the invocation on invalid configuration', async () => {
      jest.mocked(getAppContext).mockImplementation(() => {
        throw new ConfigError(['TABLE_NAME: TABLE_NAME environment variable is not set']);
      });

      await expect(checkQuests(scheduledEvent(), context)).rejects.toThrow(ConfigError);
    });
  });

  describe('sweepSeenQuests', () => {
    it('returns the number of pruned entries', async () => {
      await store.upsert('ancient', new Date('2024-01-01T00:00:00.000Z'));

      const result = await sweepSeenQuests(scheduledEvent('quest-notifier-sweep'), context);

      expect(result).toMatchObject({ operation: 'SWEEP', prunedCount: 1 });
    });
  });

  describe('resetSeenQuests', () => {
    it('clears the seen quests', async () => {
      await store.upsert('q1', new Date(NOW));

      const result = await resetSeenQuests({}, context);

      expect(result).toMatchObject({ operation: 'RESET', status: 'COMPLETED', removedCount: 1 });
      expect(await store.listIds()).toEqual(new Set());
    });
  });

  describe('syncSeenQuests', () => {
    it('records current quests without notifying', async () => {
      const result = await syncSeenQuests({}, context);

      expect(result).toMatchObject({ operation: 'SYNC', newQuestCount: 2 });
      expect(await store.listIds()).toEqual(new Set(['newest', 'older']));
      expect(sender.sent).toEqual([]);
    });
  });

  describe('listSeenQuests', () => {
    it('returns the seen entries', async () => {
      await store.upsert('q1', new Date(NOW));

      const result = await listSeenQuests({}, context);

      expect(result).toMatchObject({
        count: 1,
        entries: [{ questId: 'q1', firstSeenAt: NOW }],
      });
    });
  });

  describe('sendQuest', () => {
    it('sends the requested quest to the requested webhooks', async () => {
      const result = await sendQuest(
        { questId: 'older', webhookUrls: ['https://hooks.example/other'] },
        context
      );

      expect(result).toMatchObject({ operation: 'SEND_QUEST', status: 'COMPLETED', sent: 1 });
      expect(sender.sent).toEqual([{ endpoint: 'https://hooks.example/other', message: { content: 'older' } }]);
    });

    it('rejects an event without a quest id', async () => {
      await expect(sendQuest({}, context)).rejects.toThrow(InvalidEventError);
      await expect(sendQuest({}, context)).rejects.toThrow('Invalid event: questId: Required');
    });

    it('rejects webhook URLs that are not URLs', async () => {
      await expect(sendQuest({ questId: 'older', webhookUrls: ['nope'] }, context)).rejects.toThrow(
        'Invalid event: webhookUrls.0: Webhook URL must be a valid URL'
      );
    });
  });

  describe('postLatestQuest', () => {
    it('sends the newest quest to the configured webhooks when invoked without a payload', async () => {
      const result = await postLatestQuest(null, context);

      expect(result).toMatchObject({ operation: 'SEND_LATEST', status: 'COMPLETED', sent: 1 });
      expect(sender.sent).toEqual([{ endpoint: MAIN, message: { content: 'newest' } }]);
    });
  });
});
