/**
 * Seen Quest Store
 *
 * Durable record of quest ids the notifier has already processed, keyed by
 * quest id with the time it was first seen. One partition holds the whole
 * seen-set; every item is { PK: SEEN_QUESTS, SK: QUEST#<questId> }.
 */

import {
  BatchWriteCommand,
  DynamoDBDocumentClient,
  PutCommand,
  QueryCommand,
  QueryCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import { DynamoDBErrorCodes, isDynamoDBError } from '../lib/dynamodb';
import { StoreError, toError } from '../lib/errors';
import { Logger, logger as defaultLogger } from '../lib/logger';
import { KeyBuilder, SEEN_QUESTS_PARTITION, SeenQuest, SeenQuestItem } from '../types/entities';

/**
 * Seen-set contract shared by the DynamoDB and in-memory stores
 */
export interface SeenQuestStore {
  /** Insert or replace the entry for questId. Never fails on a duplicate id. */
  upsert(questId: string, seenAt: Date): Promise<void>;
  /** Every stored quest id. */
  listIds(): Promise<Set<string>>;
  /** Every entry, most recently seen first. */
  listWithTimestamps(): Promise<SeenQuest[]>;
  /** Remove every listed id that exists; absent ids are ignored. */
  deleteMany(questIds: Iterable<string>): Promise<void>;
  /** Remove everything. Returns the number of entries removed. */
  deleteAll(): Promise<number>;
  /** Remove entries first seen before now - horizonMs. Returns the number removed. */
  deleteOlderThan(horizonMs: number): Promise<number>;
}

/**
 * Order entries by firstSeenAt descending (ISO strings sort lexically)
 */
export const sortBySeenAtDesc = (entries: SeenQuest[]): SeenQuest[] =>
  [...entries].sort((a, b) => {
    if (a.firstSeenAt === b.firstSeenAt) {
      return a.questId.localeCompare(b.questId);
    }
    return a.firstSeenAt < b.firstSeenAt ? 1 : -1;
  });

const BATCH_WRITE_LIMIT = 25;
const MAX_UNPROCESSED_RETRIES = 5;

export interface DynamoSeenQuestStoreOptions {
  client: DynamoDBDocumentClient;
  tableName: string;
  clock?: () => Date;
  logger?: Logger;
  /** Pause between retries of unprocessed batch deletes */
  retryDelayMs?: number;
}

type StoreKey = { PK: string; SK: string };

/**
 * DynamoDB-backed seen-set
 */
export class DynamoSeenQuestStore implements SeenQuestStore {
  private readonly client: DynamoDBDocumentClient;
  private readonly tableName: string;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly retryDelayMs: number;

  constructor(options: DynamoSeenQuestStoreOptions) {
    this.client = options.client;
    this.tableName = options.tableName;
    this.clock = options.clock ?? (() => new Date());
    this.logger = (options.logger ?? defaultLogger).child({ component: 'DynamoSeenQuestStore' });
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  async upsert(questId: string, seenAt: Date): Promise<void> {
    const item: SeenQuestItem = {
      ...KeyBuilder.seenQuest(questId),
      questId,
      firstSeenAt: seenAt.toISOString(),
      entityType: 'SeenQuest',
    };

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: item,
        })
      );
      this.logger.debug('Seen quest stored', { questId });
    } catch (error) {
      throw this.fail('upsert', error, { questId });
    }
  }

  async listIds(): Promise<Set<string>> {
    try {
      const items = await this.queryAll();
      return new Set(items.map((item) => item.questId));
    } catch (error) {
      throw this.fail('listIds', error);
    }
  }

  async listWithTimestamps(): Promise<SeenQuest[]> {
    try {
      const items = await this.queryAll();
      return sortBySeenAtDesc(
        items.map((item) => ({ questId: item.questId, firstSeenAt: item.firstSeenAt }))
      );
    } catch (error) {
      throw this.fail('listWithTimestamps', error);
    }
  }

  async deleteMany(questIds: Iterable<string>): Promise<void> {
    const keys = [...new Set(questIds)].map((questId) => KeyBuilder.seenQuest(questId));
    if (keys.length === 0) {
      return;
    }

    try {
      await this.batchDelete(keys);
      this.logger.info('Seen quests deleted', { count: keys.length });
    } catch (error) {
      throw this.fail('deleteMany', error, { count: keys.length });
    }
  }

  async deleteAll(): Promise<number> {
    try {
      const keys: StoreKey[] = [];
      for (const raw of await this.queryRaw()) {
        const key = toStoreKey(raw);
        if (key) {
          keys.push(key);
        }
      }
      await this.batchDelete(keys);
      this.logger.info('Seen quest store cleared', { removed: keys.length });
      return keys.length;
    } catch (error) {
      throw this.fail('deleteAll', error);
    }
  }

  async deleteOlderThan(horizonMs: number): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - horizonMs).toISOString();

    try {
      const stale = await this.queryAll(cutoff);
      await this.batchDelete(stale.map((item) => ({ PK: item.PK, SK: item.SK })));
      this.logger.info('Seen quests pruned by age', { cutoff, removed: stale.length });
      return stale.length;
    } catch (error) {
      throw this.fail('deleteOlderThan', error, { cutoff });
    }
  }

  /**
   * Read the whole partition, following LastEvaluatedKey.
   * With seenBefore set, only entries first seen before that instant are returned.
   */
  private async queryAll(seenBefore?: string): Promise<SeenQuestItem[]> {
    const items: SeenQuestItem[] = [];
    for (const raw of await this.queryRaw(seenBefore)) {
      const item = toSeenQuestItem(raw);
      if (item) {
        items.push(item);
      } else {
        this.logger.warn('Skipping malformed seen quest item', { sk: raw['SK'] });
      }
    }
    return items;
  }

  /**
   * Raw rows of the partition, malformed ones included
   */
  private async queryRaw(seenBefore?: string): Promise<Record<string, unknown>[]> {
    const rows: Record<string, unknown>[] = [];
    let exclusiveStartKey: QueryCommandOutput['LastEvaluatedKey'];

    do {
      const response = await this.client.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'PK = :pk AND begins_with(SK, :skPrefix)',
          ...(seenBefore
            ? {
                FilterExpression: '#firstSeenAt < :cutoff',
                ExpressionAttributeNames: { '#firstSeenAt': 'firstSeenAt' },
              }
            : {}),
          ExpressionAttributeValues: {
            ':pk': SEEN_QUESTS_PARTITION,
            ':skPrefix': 'QUEST#',
            ...(seenBefore ? { ':cutoff': seenBefore } : {}),
          },
          ExclusiveStartKey: exclusiveStartKey,
        })
      );

      rows.push(...(response.Items ?? []));
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return rows;
  }

  /**
   * Delete keys in chunks of 25, retrying UnprocessedItems a bounded number of times
   */
  private async batchDelete(keys: StoreKey[]): Promise<void> {
    for (let offset = 0; offset < keys.length; offset += BATCH_WRITE_LIMIT) {
      let pending: StoreKey[] = keys.slice(offset, offset + BATCH_WRITE_LIMIT);
      let attempt = 0;

      while (pending.length > 0) {
        const response = await this.client.send(
          new BatchWriteCommand({
            RequestItems: {
              [this.tableName]: pending.map((Key) => ({ DeleteRequest: { Key } })),
            },
          })
        );

        pending = unprocessedKeys(response.UnprocessedItems?.[this.tableName]);
        if (pending.length === 0) {
          break;
        }

        attempt++;
        if (attempt > MAX_UNPROCESSED_RETRIES) {
          throw new Error(`${pending.length} deletes still unprocessed after ${MAX_UNPROCESSED_RETRIES} retries`);
        }
        this.logger.warn('Retrying unprocessed seen quest deletes', { attempt, remaining: pending.length });
        await delay(this.retryDelayMs * attempt);
      }
    }
  }

  private fail(operation: string, error: unknown, context: Record<string, unknown> = {}): StoreError {
    const cause = toError(error);
    const hint = isDynamoDBError(error, DynamoDBErrorCodes.RESOURCE_NOT_FOUND)
      ? { hint: `table "${this.tableName}" does not exist` }
      : {};
    this.logger.error(`Seen quest store ${operation} failed`, cause, { ...context, ...hint });
    return new StoreError(operation, cause);
  }
}

function toStoreKey(raw: Record<string, unknown>): StoreKey | null {
  const { PK, SK } = raw;
  return typeof PK === 'string' && typeof SK === 'string' ? { PK, SK } : null;
}

function toSeenQuestItem(raw: Record<string, unknown>): SeenQuestItem | null {
  const { PK, SK, questId, firstSeenAt } = raw;
  if (
    typeof PK !== 'string' ||
    typeof SK !== 'string' ||
    typeof questId !== 'string' ||
    typeof firstSeenAt !== 'string'
  ) {
    return null;
  }
  return { PK, SK, questId, firstSeenAt, entityType: 'SeenQuest' };
}

function unprocessedKeys(
  requests: Array<{ DeleteRequest?: { Key: Record<string, unknown> | undefined } }> | undefined
): StoreKey[] {
  const keys: StoreKey[] = [];
  for (const request of requests ?? []) {
    const key = request.DeleteRequest?.Key;
    if (key && typeof key['PK'] === 'string' && typeof key['SK'] === 'string') {
      keys.push({ PK: key['PK'], SK: key['SK'] });
    }
  }
  return keys;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
