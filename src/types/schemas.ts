/**
 * Zod Validation Schemas - Quest Notifier
 *
 * Runtime validation for the upstream quest payload and for the events
 * accepted by the operational Lambda handlers.
 */

import { z } from 'zod';
import type { Quest } from './entities';

const isoDateSchema = z.string().datetime({ offset: true, message: 'Invalid ISO 8601 datetime' });
const nonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * One task entry under config.task_config.tasks
 */
export const questTaskSchema = z.object({
  event_name: nonEmptyString,
  target: z.number().nonnegative(),
});

/**
 * One reward entry under config.rewards_config.rewards
 */
export const questRewardSchema = z.object({
  messages: z.object({
    name: nonEmptyString,
  }),
  asset: z.string().nullish(),
});

/**
 * Upstream quest record, normalized into a Quest
 */
export const questSchema = z
  .object({
    config: z.object({
      id: nonEmptyString,
      starts_at: isoDateSchema,
      expires_at: isoDateSchema,
      messages: z.object({
        quest_name: z.string(),
        game_title: z.string(),
        game_publisher: z.string(),
      }),
      task_config: z
        .object({
          tasks: z.record(questTaskSchema).default({}),
        })
        .default({ tasks: {} }),
      rewards_config: z
        .object({
          rewards: z.array(questRewardSchema).default([]),
        })
        .default({ rewards: [] }),
      assets: z
        .object({
          hero: z.string().nullish(),
        })
        .default({}),
    }),
  })
  .transform(({ config }): Quest => ({
    id: config.id,
    activatedAt: config.starts_at,
    expiresAt: config.expires_at,
    name: config.messages.quest_name,
    gameTitle: config.messages.game_title,
    gamePublisher: config.messages.game_publisher,
    tasks: Object.values(config.task_config.tasks).map((task) => ({
      eventName: task.event_name,
      targetSeconds: task.target,
    })),
    rewards: config.rewards_config.rewards.map((reward) => ({
      name: reward.messages.name,
      asset: reward.asset ?? undefined,
    })),
    heroAsset: config.assets.hero ?? undefined,
  }));

/**
 * Body of GET /quests/@me
 */
export const questListResponseSchema = z.object({
  quests: z.array(questSchema),
});

const webhookUrlSchema = z.string().url('Webhook URL must be a valid URL');

/**
 * Event for the out-of-band single quest send
 */
export const sendQuestEventSchema = z.object({
  questId: nonEmptyString,
  webhookUrls: z.array(webhookUrlSchema).optional(),
});

/**
 * Event for posting the latest quest
 */
export const postLatestQuestEventSchema = z
  .object({
    webhookUrls: z.array(webhookUrlSchema).optional(),
  })
  .default({});

/**
 * Flatten zod issues into "path: message" lines
 */
export const describeIssues = (error: z.ZodError, limit = 10): string[] =>
  error.issues.slice(0, limit).map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
