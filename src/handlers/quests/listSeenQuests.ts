/**
 * List Seen Quests Handler
 *
 * Direct invoke. Returns every seen-set entry with the time it was first
 * seen, most recent first.
 */

import type { Context } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { toError } from '../../lib/errors';
import { logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
import { WarmupResponse, handleWarmup, warmupResponse } from '../../lib/warmup';
import type { RunSummary, SeenQuest } from '../../types/entities';

export interface ListSeenQuestsResult {
  summary: RunSummary;
  count: number;
  entries: SeenQuest[];
}

export const handler = async (
  event: unknown,
  context: Context
): Promise<ListSeenQuestsResult | WarmupResponse> => {
  if (handleWarmup(event, context)) {
    return warmupResponse();
  }

  const startedAt = Date.now();
  logLambdaInvocation('listSeenQuests', event, context.awsRequestId);

  try {
    const { summary, entries } = await getAppContext().service.listSeen();
    logLambdaCompletion('listSeenQuests', Date.now() - startedAt, context.awsRequestId);
    return { summary, count: entries.length, entries };
  } catch (err) {
    logLambdaError('listSeenQuests', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
