/**
 * Check Quests Handler
 *
 * Runs on a schedule (every 30 minutes by default). Fetches the active quest
 * list, prunes expired seen-set entries, reconciles the seen-set against the
 * snapshot and posts one webhook notification per new quest.
 */

import type { Context, ScheduledEvent } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { toError } from '../../lib/errors';
import { createLambdaLogger, logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
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
  const logger = createLambdaLogger(context.awsRequestId);
  logLambdaInvocation('checkQuests', event, context.awsRequestId);

  try {
    const { service } = getAppContext();
    const summary = await service.runCheck();

    if (summary.newQuestCount > 0) {
      logger.info('New quests notified', {
        newQuestCount: summary.newQuestCount,
        sent: summary.sent,
        failed: summary.failed,
      });
    }

    logLambdaCompletion('checkQuests', Date.now() - startedAt, context.awsRequestId);
    return summary;
  } catch (err) {
    logLambdaError('checkQuests', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
