import { isWarmupEvent } from '../../../src/lib/warmup';

describe('isWarmupEvent', () => {
  it('detects orchestrator and flagged pings', () => {
    expect(isWarmupEvent({ source: 'warmup.orchestrator' })).toBe(true);
    expect(isWarmupEvent({ warmup: true })).toBe(true);
  });

  it('detects the dedicated EventBridge warmup rule', () => {
    expect(
      isWarmupEvent({
        source: 'aws.events',
        'detail-type': 'Scheduled Event',
        resources: ['arn:aws:events:us-east-1:123456789012:rule/quest-notifier-warmup'],
      })
    ).toBe(true);
  });

  it('lets the regular schedule and direct invokes through', () => {
    expect(
      isWarmupEvent({
        source: 'aws.events',
        'detail-type': 'Scheduled Event',
        resources: ['arn:aws:events:us-east-1:123456789012:rule/quest-notifier-check'],
      })
    ).toBe(false);
    expect(isWarmupEvent({ questId: '123' })).toBe(false);
    expect(isWarmupEvent(null)).toBe(false);
    expect(isWarmupEvent(undefined)).toBe(false);
  });
});
