/**
 * Sync Seen Quests Handler
 *
 * Direct invoke. Reconciles the seen-set against the current quest list
 * without sending any notification.
 */

import type { Context } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { toError } from '../../lib/errors';
import { logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
import { WarmupResponse, handleWarmup, warmupResponse } from '../../lib/warmup';
import type { RunSummary } from '../../types/entities';

export const handler = async (event: unknown, context: Context): Promise<RunSummary | WarmupResponse> => {
  if (handleWarmup(event, context)) {
    return warmupResponse();
  }

  const startedAt = Date.now();
  logLambdaInvocation('syncSeenQuests', event, context.awsRequestId);

  try {
    const summary = await getAppContext().service.syncSeen();
    logLambdaCompletion('syncSeenQuests', Date.now() - startedAt, context.awsRequestId);
    return summary;
  } catch (err) {
    logLambdaError('syncSeenQuests', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
