/**
 * Sweep Seen Quests Handler
 *
 * Daily retention sweep. Removes seen-set entries first seen longer ago than
 * RETENTION_DAYS, independently of any quest check.
 */

import type { Context, ScheduledEvent } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { toError } from '../../lib/errors';
import { logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
import { WarmupResponse, handleWarmup, warmupResponse } from '../../lib/warmup';
import type { RunSummary } from '../../types/entities';

export const handler = async (
  event: ScheduledEvent,
  context: Context
): Promise<RunSummary | WarmupResponse> => {
  if (handleWarmup(event, context)) {
    return warmupResponse();
  }

  const startedAt = Date.now();
  logLambdaInvocation('sweepSeenQuests', event, context.awsRequestId);

  try {
    const summary = await getAppContext().service.sweepRetention();
    logLambdaCompletion('sweepSeenQuests', Date.now() - startedAt, context.awsRequestId);
    return summary;
  } catch (err) {
    logLambdaError('sweepSeenQuests', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
