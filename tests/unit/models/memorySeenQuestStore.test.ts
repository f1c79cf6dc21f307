/**
 * In-memory seen quest store tests
 */

import { InMemorySeenQuestStore } from '../../../src/models/memorySeenQuestStore';
import { fixedClock } from '../../helpers/fixtures';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('InMemorySeenQuestStore', () => {
  const now = '2025-07-01T00:00:00.000Z';
  let store: InMemorySeenQuestStore;

  beforeEach(() => {
    store = new InMemorySeenQuestStore(fixedClock(now));
  });

  it('treats upsert of an existing id as a replace', async () => {
    await store.upsert('q1', new Date('2025-06-01T00:00:00.000Z'));
    await store.upsert('q1', new Date('2025-06-02T00:00:00.000Z'));

    expect(await store.listWithTimestamps()).toEqual([
      { questId: 'q1', firstSeenAt: '2025-06-02T00:00:00.000Z' },
    ]);
  });

  it('lists entries most recently seen first', async () => {
    await store.upsert('old', new Date('2025-01-01T00:00:00.000Z'));
    await store.upsert('new', new Date('2025-06-01T00:00:00.000Z'));
    await store.upsert('mid', new Date('2025-03-01T00:00:00.000Z'));

    const entries = await store.listWithTimestamps();

    expect(entries.map((entry) => entry.questId)).toEqual(['new', 'mid', 'old']);
    expect(await store.listIds()).toEqual(new Set(['old', 'new', 'mid']));
  });

  it('ignores absent ids on deleteMany', async () => {
    await store.upsert('q1', new Date(now));
    await store.upsert('q2', new Date(now));

    await store.deleteMany(['q2', 'missing']);

    expect(await store.listIds()).toEqual(new Set(['q1']));
  });

  it('reports how many entries deleteAll removed', async () => {
    await store.upsert('q1', new Date(now));
    await store.upsert('q2', new Date(now));

    expect(await store.deleteAll()).toBe(2);
    expect(await store.listIds()).toEqual(new Set());
  });

  it('removes only entries older than the horizon', async () => {
    await store.upsert('stale', new Date(Date.parse(now) - 200 * DAY_MS));
    await store.upsert('fresh', new Date(Date.parse(now) - 10 * DAY_MS));

    expect(await store.deleteOlderThan(180 * DAY_MS)).toBe(1);
    expect(await store.listIds()).toEqual(new Set(['fresh']));
  });
});
