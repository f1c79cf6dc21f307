/**
 * Reset Seen Quests Handler
 *
 * Direct invoke. Clears the seen-set so the next check reports every active
 * quest as new.
 */

import type { Context } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { toError } from '../../lib/errors';
import { createLambdaLogger, logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
import { WarmupResponse, handleWarmup, warmupResponse } from '../../lib/warmup';
import type { RunSummary } from '../../types/entities';

export const handler = async (event: unknown, context: Context): Promise<RunSummary | WarmupResponse> => {
  if (handleWarmup(event, context)) {
    return warmupResponse();
  }

  const startedAt = Date.now();
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('resetSeenQuests', event, context.awsRequestId);

  try {
    const summary = await getAppContext().service.resetSeen();
    if (summary.status === 'COMPLETED') {
      logger.info('Seen quests cleared; next check will report all active quests', {
        removedCount: summary.removedCount,
      });
    }
    logLambdaCompletion('resetSeenQuests', Date.now() - startedAt, context.awsRequestId);
    return summary;
  } catch (err) {
    logLambdaError('resetSeenQuests', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
