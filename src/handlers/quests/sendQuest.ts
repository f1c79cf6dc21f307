/**
 * Send Quest Handler
 *
 * Direct invoke with { questId, webhookUrls? }. Posts one named quest to the
 * given webhooks (or the configured ones) without touching the seen-set.
 */

import type { Context } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { InvalidEventError, toError } from '../../lib/errors';
import { logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
import { WarmupResponse, handleWarmup, warmupResponse } from '../../lib/warmup';
import type { RunSummary } from '../../types/entities';
import { describeIssues, sendQuestEventSchema } from '../../types/schemas';

export const handler = async (event: unknown, context: Context): Promise<RunSummary | WarmupResponse> => {
  if (handleWarmup(event, context)) {
    return warmupResponse();
  }

  const startedAt = Date.now();
  logLambdaInvocation('sendQuest', event, context.awsRequestId);

  try {
    const parsed = sendQuestEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new InvalidEventError(describeIssues(parsed.error));
    }

    const { questId, webhookUrls } = parsed.data;
    const summary = await getAppContext().service.sendQuest(questId, webhookUrls);
    logLambdaCompletion('sendQuest', Date.now() - startedAt, context.awsRequestId);
    return summary;
  } catch (err) {
    logLambdaError('sendQuest', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
