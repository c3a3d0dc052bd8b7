/**
 * Stream discovery for the best-efforts resolver.
 *
 * The streams endpoint has answered in three shapes over time:
 *   { "watts": [...], "time": [...] }                 object of arrays
 *   { "streams": { "watts": [...], "time": [...] } }  nested streams object
 *   { "streams": [{ "name": "watts" }, ...] }         nested streams array
 * A bare top-level array of `{ type, data }` entries is read as the nested array shape.
 */

import type { StreamsPayload } from '../types/index.js';

/**
 * Best-efforts preference, most useful first. Discovered streams outside this
 * list are tried afterwards in the order they were discovered.
 */
export const PREFERRED_STREAMS = ['power', 'speed', 'pace', 'distance', 'hr', 'watts'] as const;

/** Axis channels that can't be searched for a best effort */
const EXCLUDED_STREAMS = new Set(['time']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Tag a streams response with its shape. Returns null for anything unrecognised.
 */
export function classifyStreamsPayload(json: unknown): StreamsPayload | null {
  if (Array.isArray(json)) {
    return { shape: 'nested_streams_array', value: json };
  }
  if (!isRecord(json)) {
    return null;
  }

  if ('streams' in json) {
    const { streams } = json;
    if (Array.isArray(streams)) {
      return { shape: 'nested_streams_array', value: streams };
    }
    if (isRecord(streams)) {
      return { shape: 'nested_streams_object', value: streams };
    }
    return null;
  }

  return { shape: 'object_of_arrays', value: json };
}

function namesFromObjectOfArrays(value: Record<string, unknown>): string[] {
  return Object.entries(value)
    .filter(([, data]) => Array.isArray(data))
    .map(([name]) => name);
}

function namesFromNestedObject(value: Record<string, unknown>): string[] {
  return Object.keys(value);
}

function namesFromNestedArray(value: unknown[]): string[] {
  const names: string[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    if (typeof entry.name === 'string') {
      names.push(entry.name);
    } else if (typeof entry.type === 'string') {
      names.push(entry.type);
    }
  }
  return names;
}

/**
 * Stream names a payload exposes, in first-seen order, without axis streams or duplicates.
 */
export function normalizeStreams(payload: StreamsPayload): string[] {
  const names = streamNames(payload);
  return Array.from(new Set(names)).filter((name) => !EXCLUDED_STREAMS.has(name));
}

function streamNames(payload: StreamsPayload): string[] {
  switch (payload.shape) {
    case 'object_of_arrays':
      return namesFromObjectOfArrays(payload.value);
    case 'nested_streams_object':
      return namesFromNestedObject(payload.value);
    case 'nested_streams_array':
      return namesFromNestedArray(payload.value);
  }
}

export function extractAvailableStreams(json: unknown): string[] {
  const payload = classifyStreamsPayload(json);
  return payload ? normalizeStreams(payload) : [];
}

/**
 * Order discovered streams for searching: preferred streams first, in preference
 * order, then the rest as discovered.
 */
export function orderCandidateStreams(available: string[]): string[] {
  const preferred: string[] = PREFERRED_STREAMS.filter((name) => available.includes(name));
  const rest = available.filter((name) => !preferred.includes(name));
  return [...preferred, ...rest];
}
