import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  InMemoryEventStore,
  RedisEventStore,
  createEventStore,
} from '../../src/webhooks/event-store.js';
import type { WebhookRecord } from '../../src/types/index.js';

vi.mock('../../src/utils/redis.js', () => ({
  configureRedis: vi.fn(),
  redisSetJsonIfAbsent: vi.fn(),
  redisGetJson: vi.fn(),
}));

import { configureRedis, redisGetJson, redisSetJsonIfAbsent } from '../../src/utils/redis.js';

const record: WebhookRecord = { id: 'evt-1', payload: { id: 'evt-1' }, received_at: 1700000000 };

describe('InMemoryEventStore', () => {
  it('inserts a new record', async () => {
    const store = new InMemoryEventStore();

    await expect(store.insertIfAbsent(record)).resolves.toBe(true);
    await expect(store.get('evt-1')).resolves.toEqual(record);
    expect(store.size).toBe(1);
  });

  it('refuses a second record with the same ID and keeps the first', async () => {
    const store = new InMemoryEventStore();
    await store.insertIfAbsent(record);

    await expect(store.insertIfAbsent({ ...record, received_at: 1700000999 })).resolves.toBe(false);
    expect((await store.get('evt-1'))?.received_at).toBe(1700000000);
    expect(store.size).toBe(1);
  });

  it('returns null for an unknown ID', async () => {
    await expect(new InMemoryEventStore().get('missing')).resolves.toBeNull();
  });
});

describe('RedisEventStore', () => {
  beforeEach(() => {
    vi.mocked(redisSetJsonIfAbsent).mockReset();
    vi.mocked(redisGetJson).mockReset();
  });

  it('inserts with SET NX under the prefixed key', async () => {
    vi.mocked(redisSetJsonIfAbsent).mockResolvedValue(true);
    const store = new RedisEventStore();

    await expect(store.insertIfAbsent(record)).resolves.toBe(true);
    expect(redisSetJsonIfAbsent).toHaveBeenCalledWith('webhook:event:evt-1', record);
  });

  it('reports a duplicate when the key already exists', async () => {
    vi.mocked(redisSetJsonIfAbsent).mockResolvedValue(false);
    const store = new RedisEventStore('events:');

    await expect(store.insertIfAbsent(record)).resolves.toBe(false);
    expect(redisSetJsonIfAbsent).toHaveBeenCalledWith('events:evt-1', record);
  });

  it('propagates Redis failures', async () => {
    vi.mocked(redisSetJsonIfAbsent).mockRejectedValue(new Error('connection refused'));

    await expect(new RedisEventStore().insertIfAbsent(record)).rejects.toThrow('connection refused');
  });

  it('reads records back', async () => {
    vi.mocked(redisGetJson).mockResolvedValue(record);

    await expect(new RedisEventStore().get('evt-1')).resolves.toEqual(record);
    expect(redisGetJson).toHaveBeenCalledWith('webhook:event:evt-1');
  });
});

describe('createEventStore', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses Redis at the given URL when one is configured', () => {
    vi.mocked(configureRedis).mockClear();

    expect(createEventStore('redis://events.internal:6380')).toBeInstanceOf(RedisEventStore);
    expect(configureRedis).toHaveBeenCalledWith('redis://events.internal:6380');
  });

  it('keeps events in memory otherwise', () => {
    vi.mocked(configureRedis).mockClear();

    expect(createEventStore(null)).toBeInstanceOf(InMemoryEventStore);
    expect(createEventStore()).toBeInstanceOf(InMemoryEventStore);
    expect(configureRedis).not.toHaveBeenCalled();
  });
});
