/**
 * Shared test fixtures
 */

import type { Context } from 'aws-lambda';
import type { DestinationSender, SendOutcome } from '../../src/services/notifications/send';
import type { Quest } from '../../src/types/entities';

export const makeQuest = (id: string, overrides: Partial<Quest> = {}): Quest => ({
  id,
  activatedAt: '2025-01-01T00:00:00.000Z',
  expiresAt: '2025-01-15T00:00:00.000Z',
  name: `Quest ${id}`,
  gameTitle: `Game ${id}`,
  gamePublisher: 'Test Publisher',
  tasks: [],
  rewards: [],
  ...overrides,
});

/**
 * Upstream record shaped like the quest API payload
 */
export const makeApiQuest = (id: string, startsAt: string) => ({
  config: {
    id,
    starts_at: startsAt,
    expires_at: '2025-02-01T00:00:00+00:00',
    messages: {
      quest_name: `Quest ${id}`,
      game_title: `Game ${id}`,
      game_publisher: 'Test Publisher',
    },
    task_config: {
      tasks: {
        WATCH_VIDEO: { event_name: 'WATCH_VIDEO', target: 900 },
      },
    },
    rewards_config: {
      rewards: [{ messages: { name: 'Test Orb' }, asset: 'reward.png' }],
    },
    assets: { hero: 'hero.png' },
  },
});

export const fixedClock = (iso: string) => () => new Date(iso);

export interface SentMessage {
  endpoint: string;
  message: unknown;
}

/**
 * Records every send; endpoints listed in failing are rejected
 */
export class RecordingSender implements DestinationSender {
  readonly sent: SentMessage[] = [];

  constructor(private readonly failing: readonly string[] = []) {}

  async send(endpoint: string, message: unknown): Promise<SendOutcome> {
    this.sent.push({ endpoint, message });
    if (this.failing.includes(endpoint)) {
      return { success: false, statusCode: 500, detail: 'Webhook responded with HTTP 500' };
    }
    return { success: true, statusCode: 204, detail: 'HTTP 204' };
  }
}

/**
 * Helper to create mock Lambda context
 */
export function createMockContext(): Context {
  return {
    callbackWaitsForEmptyEventLoop: false,
    functionName: 'test-function',
    functionVersion: '1',
    invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:test-function',
    memoryLimitInMB: '128',
    awsRequestId: 'test-request-id',
    logGroupName: '/aws/lambda/test-function',
    logStreamName: '2025/01/15/[$LATEST]test-stream',
    getRemainingTimeInMillis: () => 3000,
    done: () => undefined,
    fail: () => undefined,
    succeed: () => undefined,
  };
}
