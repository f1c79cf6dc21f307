/**
 * Application Configuration - Quest Notifier
 *
 * The environment is read exactly once, validated with zod, and turned into
 * an AppConfig that is handed to every component constructor.
 */

import { z } from 'zod';
import { ConfigError } from '../lib/errors';
import { LogLevel, parseLogLevel } from '../lib/logger';

export const DEFAULT_QUESTS_ENDPOINT = 'https://discord.com/api/v9/quests/@me';
export const DEFAULT_QUEST_PAGE_BASE_URL = 'https://discord.com/quests';
export const DEFAULT_CDN_BASE_URL = 'https://cdn.discordapp.com';
export const DEFAULT_RETENTION_DAYS = 180;
export const DEFAULT_WEBHOOK_DELAY_MS = 1000;
export const DEFAULT_DISPLAY_TIMEZONE = 'Asia/Ho_Chi_Minh';

export interface AppConfig {
  logLevel: LogLevel;
  aws: {
    region: string;
    tableName: string;
    dynamodbEndpoint?: string;
    localDevelopment: boolean;
  };
  questApi: {
    endpoint: string;
    authorization: string;
    superProperties: string;
    secretName?: string;
  };
  rendering: {
    questPageBaseUrl: string;
    cdnBaseUrl: string;
    timeZone: string;
  };
  webhooks: {
    destinations: string[];
    alertDestinations: string[];
    delayMs: number;
  };
  retention: {
    days: number;
  };
  metrics: {
    enabled: boolean;
    namespace: string;
  };
}

/**
 * Parse a comma- or semicolon-separated list of webhook URLs.
 * Whitespace is trimmed and empty entries are removed.
 */
export function parseWebhookUrls(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .replace(/;/g, ',')
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const numberWithDefault = (fallback: number, label: string) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isFinite(parsed) || parsed < 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${label} must be a non-negative number`,
        });
        return z.NEVER;
      }
      return parsed;
    });

const webhookList = z
  .string()
  .optional()
  .transform(parseWebhookUrls)
  .pipe(z.array(z.string().url('Webhook destinations must be valid URLs')));

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === '') {
        return fallback;
      }
      return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
    });

const envSchema = z.object({
  LOG_LEVEL: z.string().optional(),
  AWS_REGION: optionalString,
  TABLE_NAME: z.string({ required_error: 'TABLE_NAME environment variable is not set' }).min(1, 'TABLE_NAME environment variable is not set'),
  DYNAMODB_ENDPOINT: optionalString,
  AWS_SAM_LOCAL: booleanFlag(false),
  QUESTS_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  QUEST_PAGE_BASE_URL: optionalString.pipe(z.string().url().optional()),
  QUEST_CDN_BASE_URL: optionalString.pipe(z.string().url().optional()),
  DISCORD_AUTHORIZATION: optionalString,
  TOKEN_JWT: optionalString,
  QUEST_API_SECRET_NAME: optionalString,
  WEBHOOK_URL: webhookList,
  WEBHOOK_URL_ALERT: webhookList,
  WEBHOOK_DELAY_MS: numberWithDefault(DEFAULT_WEBHOOK_DELAY_MS, 'WEBHOOK_DELAY_MS'),
  RETENTION_DAYS: numberWithDefault(DEFAULT_RETENTION_DAYS, 'RETENTION_DAYS'),
  DISPLAY_TIMEZONE: optionalString,
  METRICS_ENABLED: booleanFlag(true),
  METRICS_NAMESPACE: optionalString,
});

/**
 * Build the application config from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const timeZone = values.DISPLAY_TIMEZONE ?? DEFAULT_DISPLAY_TIMEZONE;
  if (!isValidTimeZone(timeZone)) {
    throw new ConfigError([`DISPLAY_TIMEZONE: unknown time zone "${timeZone}"`]);
  }

  return {
    logLevel: parseLogLevel(values.LOG_LEVEL),
    aws: {
      region: values.AWS_REGION ?? 'us-east-1',
      tableName: values.TABLE_NAME,
      dynamodbEndpoint:
        values.DYNAMODB_ENDPOINT ??
        (values.AWS_SAM_LOCAL ? 'http://host.docker.internal:8000' : undefined),
      localDevelopment: values.AWS_SAM_LOCAL || values.DYNAMODB_ENDPOINT !== undefined,
    },
    questApi: {
      endpoint: values.QUESTS_ENDPOINT ?? DEFAULT_QUESTS_ENDPOINT,
      authorization: values.DISCORD_AUTHORIZATION ?? '',
      superProperties: values.TOKEN_JWT ?? '',
      secretName: values.QUEST_API_SECRET_NAME,
    },
    rendering: {
      questPageBaseUrl: values.QUEST_PAGE_BASE_URL ?? DEFAULT_QUEST_PAGE_BASE_URL,
      cdnBaseUrl: values.QUEST_CDN_BASE_URL ?? DEFAULT_CDN_BASE_URL,
      timeZone,
    },
    webhooks: {
      destinations: values.WEBHOOK_URL,
      alertDestinations: values.WEBHOOK_URL_ALERT,
      delayMs: values.WEBHOOK_DELAY_MS,
    },
    retention: {
      days: values.RETENTION_DAYS,
    },
    metrics: {
      enabled: values.METRICS_ENABLED,
      namespace: values.METRICS_NAMESPACE ?? 'QuestNotifier',
    },
  };
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone });
    return true;
  } catch {
    return false;
  }
}
