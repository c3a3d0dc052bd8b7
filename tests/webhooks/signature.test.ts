import { describe, it, expect } from 'vitest';
import { createHmac } from 'crypto';
import { canonicalJson, signPayload, verifySignature } from '../../src/webhooks/signature.js';

const SECRET = 'test-secret';

describe('canonicalJson', () => {
  it('sorts object keys at every depth', () => {
    const value = { b: 1, a: { d: [3, { z: 1, y: 2 }], c: null } };

    expect(canonicalJson(value)).toBe('{"a":{"c":null,"d":[3,{"y":2,"z":1}]},"b":1}');
  });

  it('keeps array order', () => {
    expect(canonicalJson(['b', 'a', 1])).toBe('["b","a",1]');
  });

  it('drops undefined members like JSON.stringify does', () => {
    expect(canonicalJson({ a: undefined, b: 'x' })).toBe('{"b":"x"}');
  });

  it('escapes strings and keys', () => {
    expect(canonicalJson({ 'quote"key': 'line\nbreak' })).toBe('{"quote\\"key":"line\\nbreak"}');
  });

  it('serializes scalars', () => {
    expect(canonicalJson(null)).toBe('null');
    expect(canonicalJson(true)).toBe('true');
    expect(canonicalJson(1.5)).toBe('1.5');
    expect(canonicalJson(undefined)).toBe('null');
  });
});

describe('signPayload', () => {
  it('is the hex HMAC-SHA256 of the canonical JSON', () => {
    const expected = createHmac('sha256', SECRET).update('{"a":1,"b":2}').digest('hex');

    expect(signPayload(SECRET, { b: 2, a: 1 })).toBe(expected);
  });

  it('does not depend on key order', () => {
    expect(signPayload(SECRET, { id: 'evt-1', type: 'ACTIVITY_UPLOADED' })).toBe(
      signPayload(SECRET, { type: 'ACTIVITY_UPLOADED', id: 'evt-1' })
    );
  });

  it('depends on the secret', () => {
    expect(signPayload(SECRET, { id: 'evt-1' })).not.toBe(signPayload('other-secret', { id: 'evt-1' }));
  });
});

describe('verifySignature', () => {
  const payload = { id: 'evt-1', type: 'ACTIVITY_UPLOADED' };
  const signature = signPayload(SECRET, payload);

  it('accepts a matching signature', () => {
    expect(verifySignature(SECRET, payload, signature)).toBe(true);
  });

  it('accepts the sha256= prefix and uppercase hex', () => {
    expect(verifySignature(SECRET, payload, `sha256=${signature}`)).toBe(true);
    expect(verifySignature(SECRET, payload, signature.toUpperCase())).toBe(true);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifySignature(SECRET, payload, signPayload('other-secret', payload))).toBe(false);
  });

  it('rejects a signature for a different payload', () => {
    expect(verifySignature(SECRET, { ...payload, id: 'evt-2' }, signature)).toBe(false);
  });

  it('rejects malformed signatures', () => {
    expect(verifySignature(SECRET, payload, '')).toBe(false);
    expect(verifySignature(SECRET, payload, 'not-hex')).toBe(false);
    expect(verifySignature(SECRET, payload, 'abc')).toBe(false);
    expect(verifySignature(SECRET, payload, signature.slice(0, 32))).toBe(false);
  });
});
