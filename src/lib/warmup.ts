/**
 * Lambda Warmup Utility
 *
 * Detects warmup pings so scheduled and direct-invoke handlers can exit
 * before building any clients or touching the seen-quest table.
 */

import type { Context } from 'aws-lambda';
import { logger } from './logger';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Check if the current invocation is a warmup ping
 * Warmup events are identified by the source field in the event
 */
export const isWarmupEvent = (event: unknown): boolean => {
  if (!isRecord(event)) {
    return false;
  }

  if (event['source'] === 'warmup.orchestrator' || event['warmup'] === true) {
    return true;
  }

  // EventBridge rule dedicated to warmup
  const resources = event['resources'];
  return (
    event['source'] === 'aws.events' &&
    event['detail-type'] === 'Scheduled Event' &&
    Array.isArray(resources) &&
    typeof resources[0] === 'string' &&
    resources[0].includes('warmup')
  );
};

/**
 * Returns true if warmup (so handler can return early)
 */
export const handleWarmup = (event: unknown, context: Context): boolean => {
  if (isWarmupEvent(event)) {
    logger.info('Warmup event detected - exiting early', {
      requestId: context.awsRequestId,
      functionName: context.functionName,
      source: isRecord(event) ? event['source'] : undefined,
    });
    return true;
  }
  return false;
};

/**
 * Result returned by direct-invoke handlers for warmup pings
 */
export const warmupResponse = () => ({
  warmup: true as const,
  message: 'Lambda warmed up successfully',
  timestamp: new Date().toISOString(),
});

export type WarmupResponse = ReturnType<typeof warmupResponse>;
