/**
 * Quest API credentials
 *
 * Inline values (DISCORD_AUTHORIZATION / TOKEN_JWT) win; otherwise the
 * JSON secret named by QUEST_API_SECRET_NAME is read from Secrets Manager
 * once per container and cached.
 */

import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { z } from 'zod';
import { Logger, logger as defaultLogger } from '../../lib/logger';
import { toError } from '../../lib/errors';

export interface QuestApiCredentials {
  authorization: string;
  superProperties: string;
}

const secretSchema = z.object({
  authorization: z.string().default(''),
  superProperties: z.string().default(''),
});

export interface CredentialsProvider {
  get(): Promise<QuestApiCredentials>;
}

export interface QuestApiCredentialsProviderOptions {
  inline: QuestApiCredentials;
  secretName?: string;
  client?: SecretsManagerClient;
  region?: string;
  logger?: Logger;
}

export class QuestApiCredentialsProvider implements CredentialsProvider {
  private cached: QuestApiCredentials | null = null;
  private readonly options: QuestApiCredentialsProviderOptions;
  private readonly logger: Logger;

  constructor(options: QuestApiCredentialsProviderOptions) {
    this.options = options;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'QuestApiCredentials' });
  }

  async get(): Promise<QuestApiCredentials> {
    if (this.cached) {
      return this.cached;
    }

    const { inline, secretName } = this.options;
    if (inline.authorization || inline.superProperties || !secretName) {
      this.cached = inline;
      return this.cached;
    }

    const client = this.options.client ?? new SecretsManagerClient({ region: this.options.region });

    try {
      const response = await client.send(new GetSecretValueCommand({ SecretId: secretName }));
      if (!response.SecretString) {
        throw new Error('Secret value is empty');
      }

      const parsed = secretSchema.parse(JSON.parse(response.SecretString));
      this.cached = parsed;
      this.logger.info('Quest API credentials loaded from Secrets Manager', { secretName });
      return this.cached;
    } catch (error) {
      this.logger.error('Failed to load quest API credentials', toError(error), { secretName });
      throw new Error(`Failed to load quest API credentials from "${secretName}"`);
    }
  }
}
