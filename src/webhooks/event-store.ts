import { configureRedis, redisGetJson, redisSetJsonIfAbsent } from '../utils/redis.js';
import type { WebhookRecord } from '../types/index.js';

/**
 * Record of every webhook event accepted so far.
 * An ID's presence is what marks an event as already processed.
 */
export interface EventStore {
  /** Store the record unless its ID is already present. Returns false for a duplicate. */
  insertIfAbsent(record: WebhookRecord): Promise<boolean>;
  get(id: string): Promise<WebhookRecord | null>;
}

export class InMemoryEventStore implements EventStore {
  private records = new Map<string, WebhookRecord>();

  async insertIfAbsent(record: WebhookRecord): Promise<boolean> {
    if (this.records.has(record.id)) {
      return false;
    }
    this.records.set(record.id, record);
    return true;
  }

  async get(id: string): Promise<WebhookRecord | null> {
    return this.records.get(id) ?? null;
  }

  get size(): number {
    return this.records.size;
  }
}

const WEBHOOK_EVENT_KEY_PREFIX = 'webhook:event:';

/**
 * Event store shared across processes through Redis. Keys never expire.
 */
export class RedisEventStore implements EventStore {
  constructor(private keyPrefix: string = WEBHOOK_EVENT_KEY_PREFIX) {}

  insertIfAbsent(record: WebhookRecord): Promise<boolean> {
    return redisSetJsonIfAbsent(this.key(record.id), record);
  }

  get(id: string): Promise<WebhookRecord | null> {
    return redisGetJson<WebhookRecord>(this.key(id));
  }

  private key(id: string): string {
    return `${this.keyPrefix}${id}`;
  }
}

/**
 * Pick the Redis-backed store, connected to `redisUrl`, when one is given. Otherwise keep events in memory.
 */
export function createEventStore(redisUrl?: string | null): EventStore {
  if (redisUrl) {
    configureRedis(redisUrl);
    console.log('[Webhook] Using Redis event store');
    return new RedisEventStore();
  }
  return new InMemoryEventStore();
}
