/**
 * Quest API client
 *
 * Fetches the full list of active quests and returns it as a Snapshot,
 * most recently activated first. Failures come back as typed errors so the
 * caller can tell "no quests right now" apart from "could not ask".
 */

import { AuthError, FetchError, toError } from '../../lib/errors';
import { Logger, logger as defaultLogger } from '../../lib/logger';
import { Result, err, ok } from '../../lib/result';
import type { Quest, Snapshot } from '../../types/entities';
import { describeIssues, questListResponseSchema } from '../../types/schemas';
import type { CredentialsProvider, QuestApiCredentials } from './credentials';

export type SnapshotResult = Result<Snapshot<Quest>, FetchError | AuthError>;

/**
 * Anything that can produce the current quest snapshot
 */
export interface QuestSource {
  fetchSnapshot(): Promise<SnapshotResult>;
}

export interface QuestApiClientOptions {
  endpoint: string;
  credentials: CredentialsProvider;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  logger?: Logger;
}

const CLIENT_HEADERS: Record<string, string> = {
  referer: 'https://discord.com/discovery/quests',
  accept: 'application/json',
  'accept-language': 'en-US',
  'x-discord-locale': 'en-US',
  'user-agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) discord/1.0.9209 Chrome/134.0.6998.205 Electron/35.3.0 Safari/537.36',
};

export class QuestApiClient implements QuestSource {
  private readonly endpoint: string;
  private readonly credentials: CredentialsProvider;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: QuestApiClientOptions) {
    this.endpoint = options.endpoint;
    this.credentials = options.credentials;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.logger = (options.logger ?? defaultLogger).child({ component: 'QuestApiClient' });
  }

  async fetchSnapshot(): Promise<SnapshotResult> {
    let credentials: QuestApiCredentials;
    try {
      credentials = await this.credentials.get();
    } catch (error) {
      return err(new FetchError('Quest API credentials unavailable', undefined, error));
    }

    let response: Response;
    try {
      this.logger.info('Fetching quests', { endpoint: this.endpoint });
      response = await this.fetchImpl(this.endpoint, {
        method: 'GET',
        headers: buildHeaders(credentials),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Quest API request failed', cause);
      return err(new FetchError(`Quest API request failed: ${cause.message}`, undefined, cause));
    }

    if (response.status === 401 || response.status === 403) {
      const authError = new AuthError(
        response.status,
        Boolean(credentials.authorization || credentials.superProperties)
      );
      this.logger.error('Quest API rejected credentials', authError);
      return err(authError);
    }

    if (!response.ok) {
      this.logger.error('Quest API returned an error status', undefined, { statusCode: response.status });
      return err(new FetchError(`Quest API responded with HTTP ${response.status}`, response.status));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return err(new FetchError('Quest API returned invalid JSON', response.status, error));
    }

    const parsed = questListResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error, 5);
      this.logger.error('Quest API payload failed validation', undefined, { issues });
      return err(new FetchError(`Quest API payload failed validation: ${issues.join('; ')}`, response.status));
    }

    const snapshot = sortByActivationDesc(parsed.data.quests);
    this.logger.info('Fetched quests', { count: snapshot.length });
    return ok(snapshot);
  }
}

/**
 * Most recently activated first; ties keep upstream order
 */
export function sortByActivationDesc<T extends { activatedAt: string }>(items: readonly T[]): T[] {
  return items
    .map((item, index) => ({ item, index, at: Date.parse(item.activatedAt) }))
    .sort((a, b) => b.at - a.at || a.index - b.index)
    .map(({ item }) => item);
}

function buildHeaders(credentials: QuestApiCredentials): Record<string, string> {
  return {
    ...CLIENT_HEADERS,
    authorization: credentials.authorization,
    'x-super-properties': credentials.superProperties,
  };
}
