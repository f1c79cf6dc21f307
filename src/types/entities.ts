/**
 * Entity Type Definitions - Quest Notifier
 *
 * Persisted entities follow the DynamoDB single-table design pattern.
 * Transient types (snapshots, dispatch results, run summaries) live here too
 * so handlers, services and tests share one vocabulary.
 */

/**
 * Base entity with common attributes
 */
export interface BaseEntity {
  PK: string;
  SK: string;
  entityType: EntityType;
}

/**
 * Entity type discriminator
 */
export type EntityType = 'SeenQuest';

/**
 * SeenQuest Entity - one quest id the notifier has already processed
 */
export interface SeenQuestItem extends BaseEntity {
  questId: string;
  firstSeenAt: string; // ISO 8601
  entityType: 'SeenQuest';
}

/**
 * Seen-set entry as returned by the store
 */
export interface SeenQuest {
  questId: string;
  firstSeenAt: string; // ISO 8601
}

/**
 * Minimum shape of an upstream snapshot record
 */
export interface SnapshotItem {
  id: string;
  activatedAt: string; // ISO 8601, ordering key
}

export interface QuestTask {
  eventName: string;
  targetSeconds: number;
}

export interface QuestReward {
  name: string;
  asset?: string;
}

/**
 * Normalized quest record
 */
export interface Quest extends SnapshotItem {
  expiresAt: string; // ISO 8601
  name: string;
  gameTitle: string;
  gamePublisher: string;
  tasks: QuestTask[];
  rewards: QuestReward[];
  heroAsset?: string;
}

/**
 * Full listing of currently active upstream items, most recently activated first
 */
export type Snapshot<T extends SnapshotItem = Quest> = readonly T[];

export type DispatchStatus = 'SUCCESS' | 'FAILURE';

export interface DispatchResult {
  itemId: string;
  destination: string;
  status: DispatchStatus;
  detail: string;
}

export type RunOperation =
  | 'CHECK'
  | 'SYNC'
  | 'RESET'
  | 'SWEEP'
  | 'LIST'
  | 'SEND_QUEST'
  | 'SEND_LATEST';

export type RunStatus = 'COMPLETED' | 'ABORTED' | 'FAILED';

/**
 * Outcome of one operational control, returned to the handler
 */
export interface RunSummary {
  runId: string;
  operation: RunOperation;
  status: RunStatus;
  newQuestCount: number;
  removedCount: number;
  prunedCount: number;
  sent: number;
  failed: number;
  startedAt: string;
  completedAt: string;
  error?: {
    code: string;
    message: string;
  };
}

/**
 * Key builder for single-table design
 */
export const SEEN_QUESTS_PARTITION = 'SEEN_QUESTS';

export const KeyBuilder = {
  seenQuest: (questId: string) => ({
    PK: SEEN_QUESTS_PARTITION,
    SK: `QUEST#${questId}`,
  }),
};
