import { createHmac, timingSafeEqual } from 'crypto';

const SIGNATURE_PREFIX = 'sha256=';
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

function compareKeys([a]: [string, unknown], [b]: [string, unknown]): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Serialize a JSON value with object keys sorted by code unit and no whitespace.
 * Two payloads that differ only in key order produce the same bytes.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  if (value !== null && typeof value === 'object') {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(compareKeys)
      .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);
    return `{${members.join(',')}}`;
  }

  return JSON.stringify(value) ?? 'null';
}

/**
 * HMAC-SHA256 of the payload's canonical bytes, hex-encoded.
 */
export function signPayload(secret: string, payload: unknown): string {
  return createHmac('sha256', secret).update(canonicalJson(payload), 'utf8').digest('hex');
}

/**
 * Check a hex signature (optionally prefixed with "sha256=") against the payload.
 * Malformed hex is treated as a mismatch.
 */
export function verifySignature(secret: string, payload: unknown, signature: string): boolean {
  const hex = signature.trim().startsWith(SIGNATURE_PREFIX)
    ? signature.trim().slice(SIGNATURE_PREFIX.length)
    : signature.trim();

  if (!HEX_PATTERN.test(hex)) {
    return false;
  }

  const provided = Buffer.from(hex, 'hex');
  const expected = Buffer.from(signPayload(secret, payload), 'hex');

  // timingSafeEqual throws on length mismatch
  if (provided.length !== expected.length) {
    return false;
  }

  return timingSafeEqual(provided, expected);
}
