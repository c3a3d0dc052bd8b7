import { getUnixTime } from 'date-fns';
import { WebhookError } from '../errors/index.js';
import { verifySignature } from './signature.js';
import type { EventStore } from './event-store.js';
import type { WebhookRecord, WebhookResult } from '../types/index.js';

/**
 * Derive an event's identity from its payload's `id` field.
 *
 * Payloads without a usable `id` get a millisecond timestamp identity. Two such
 * payloads delivered within the same millisecond collide and the second one is
 * reported as a duplicate.
 */
export function deriveEventId(payload: unknown, now: Date = new Date()): string {
  if (payload !== null && typeof payload === 'object' && 'id' in payload) {
    const { id } = payload;
    if (typeof id === 'string' && id.length > 0) {
      return id;
    }
    if (typeof id === 'number' && Number.isFinite(id)) {
      return String(id);
    }
  }
  return `ts-${now.getTime()}`;
}

/**
 * Verifies signed webhook deliveries and processes each event at most once.
 */
export class WebhookIngestor {
  private secret: string | null;

  constructor(
    private store: EventStore,
    secret?: string | null
  ) {
    this.secret = secret || null;
  }

  /**
   * Replace the shared secret. Takes effect for the next delivery.
   */
  setSecret(value: string): void {
    this.secret = value;
    console.log('[Webhook] Secret updated');
  }

  hasSecret(): boolean {
    return this.secret !== null;
  }

  /**
   * Verify a delivery and record it unless its event ID has been seen before.
   *
   * @throws WebhookError when no secret is configured or the signature doesn't match
   */
  async process(signature: string, payload: unknown): Promise<WebhookResult> {
    const secret = this.secret;
    if (secret === null) {
      throw WebhookError.secretNotConfigured();
    }

    if (!verifySignature(secret, payload, signature)) {
      console.error('[Webhook] Rejected delivery with mismatched signature');
      throw WebhookError.signatureMismatch();
    }

    const receivedAt = new Date();
    const record: WebhookRecord = {
      id: deriveEventId(payload, receivedAt),
      payload,
      received_at: getUnixTime(receivedAt),
    };

    const inserted = await this.store.insertIfAbsent(record);
    if (!inserted) {
      console.log(`[Webhook] Duplicate event ${record.id} ignored`);
      return { duplicate: true, id: record.id };
    }

    console.log(`[Webhook] Accepted event ${record.id}`);
    return { ok: true, id: record.id };
  }

  getEvent(id: string): Promise<WebhookRecord | null> {
    return this.store.get(id);
  }
}
