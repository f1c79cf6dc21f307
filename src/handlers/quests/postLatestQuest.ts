/**
 * Post Latest Quest Handler
 *
 * Direct invoke with an optional { webhookUrls }. Posts the most recently
 * activated quest; used to check that webhooks and rendering work end to end.
 */

import type { Context } from 'aws-lambda';
import { getAppContext } from '../../lib/appContext';
import { InvalidEventError, toError } from '../../lib/errors';
import { logLambdaCompletion, logLambdaError, logLambdaInvocation } from '../../lib/logger';
import { WarmupResponse, handleWarmup, warmupResponse } from '../../lib/warmup';
import type { RunSummary } from '../../types/entities';
import { describeIssues, postLatestQuestEventSchema } from '../../types/schemas';

export const handler = async (event: unknown, context: Context): Promise<RunSummary | WarmupResponse> => {
  if (handleWarmup(event, context)) {
    return warmupResponse();
  }

  const startedAt = Date.now();
  logLambdaInvocation('postLatestQuest', event, context.awsRequestId);

  try {
    const parsed = postLatestQuestEventSchema.safeParse(event ?? undefined);
    if (!parsed.success) {
      throw new InvalidEventError(describeIssues(parsed.error));
    }

    const summary = await getAppContext().service.sendLatest(parsed.data.webhookUrls);
    logLambdaCompletion('postLatestQuest', Date.now() - startedAt, context.awsRequestId);
    return summary;
  } catch (err) {
    logLambdaError('postLatestQuest', toError(err), context.awsRequestId);
    throw err;
  }
};

export default handler;
