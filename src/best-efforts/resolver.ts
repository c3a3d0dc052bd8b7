import { ApiError, InputValidationError, type ErrorCategory } from '../errors/index.js';
import { extractAvailableStreams, orderCandidateStreams } from './streams.js';
import type {
  BestEffortsParams,
  BestEffortsQuery,
  BestEffortsQueryPort,
  BestEffortsResult,
} from '../types/index.js';

const PRIMARY_DURATION_SECS = 60;
const PRIMARY_DISTANCE_METERS = 1000;
const SECONDARY_DURATION_SECS = 300;
const DEFAULT_COUNT = 8;

/** Tried in order when the caller gives only an activity */
export const DEFAULT_CANDIDATES: readonly BestEffortsQuery[] = [
  { stream: 'power', duration: PRIMARY_DURATION_SECS },
  { stream: 'power', distance: PRIMARY_DISTANCE_METERS },
  { stream: 'power', duration: SECONDARY_DURATION_SECS },
];

/**
 * Parameter sets tried for a discovered stream, in order.
 */
export function parameterSetsForStream(stream: string): BestEffortsQuery[] {
  return [
    { stream, duration: PRIMARY_DURATION_SECS },
    { stream, distance: PRIMARY_DISTANCE_METERS },
    { stream, duration: SECONDARY_DURATION_SECS },
    { stream, count: DEFAULT_COUNT },
    { stream },
  ];
}

// Failures that move the search on to the next candidate; anything else ends it
const DEFAULTS_CONTINUABLE: ReadonlySet<ErrorCategory> = new Set(['unprocessable']);
const DISCOVERED_CONTINUABLE: ReadonlySet<ErrorCategory> = new Set(['unprocessable', 'not_found']);

type Attempt =
  | { found: true; query: BestEffortsQuery; value: unknown }
  | { found: false; error: ApiError };

function describeQuery(query: BestEffortsQuery): string {
  return Object.entries(query)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(', ');
}

/**
 * Finds a parameter set the best-efforts endpoint accepts for an activity.
 *
 * With an explicit stream, exactly one query is made. Otherwise the defaults are
 * tried, then the activity's own streams are discovered and searched stream by
 * stream, returning the first success.
 */
export class BestEffortsResolver {
  constructor(private port: BestEffortsQueryPort) {}

  async resolve(params: BestEffortsParams): Promise<BestEffortsResult> {
    const { activity_id: activityId, stream, ...rest } = params;

    if (stream !== undefined) {
      return this.resolveExplicit(activityId, { stream, ...rest });
    }

    const stray = Object.entries(rest).filter(([, value]) => value !== undefined);
    if (stray.length > 0) {
      throw new InputValidationError(
        `A stream is required when ${stray.map(([key]) => key).join(', ')} ${stray.length === 1 ? 'is' : 'are'} given.`,
        { operation: 'fetch best efforts', resource: `activity ${activityId}`, parameters: { ...params } }
      );
    }

    return this.resolveAdaptive(activityId);
  }

  private async resolveExplicit(activityId: string, query: BestEffortsQuery): Promise<BestEffortsResult> {
    if (query.duration === undefined && query.distance === undefined) {
      throw new InputValidationError(
        `Best efforts for stream '${query.stream}' need a duration or a distance.`,
        { operation: 'fetch best efforts', resource: `activity ${activityId}`, parameters: { ...query } }
      );
    }

    const value = await this.port.queryBestEfforts(activityId, query);
    return { activity_id: activityId, stream: query.stream, parameters: query, best_efforts: value };
  }

  private async resolveAdaptive(activityId: string): Promise<BestEffortsResult> {
    let defaultsFailure: ApiError | null = null;

    for (const candidate of DEFAULT_CANDIDATES) {
      const attempt = await this.attempt(activityId, candidate, DEFAULTS_CONTINUABLE);
      if (attempt.found) {
        return this.toResult(activityId, attempt);
      }
      defaultsFailure = attempt.error;
    }

    console.log(`[BestEfforts] Default parameters rejected for activity ${activityId}, discovering streams`);

    let streamsPayload: unknown;
    try {
      streamsPayload = await this.port.getActivityStreams(activityId);
    } catch (error) {
      // An activity without streams has no valid parameters either
      if (error instanceof ApiError && error.category === 'not_found' && defaultsFailure) {
        throw defaultsFailure;
      }
      throw error;
    }

    const candidates = orderCandidateStreams(extractAvailableStreams(streamsPayload));
    console.log(`[BestEfforts] Candidate streams for activity ${activityId}: ${candidates.join(', ') || '(none)'}`);

    for (const stream of candidates) {
      for (const query of parameterSetsForStream(stream)) {
        const attempt = await this.attempt(activityId, query, DISCOVERED_CONTINUABLE);
        if (attempt.found) {
          return this.toResult(activityId, attempt);
        }
      }
    }

    throw new InputValidationError(
      `No suitable best-efforts parameters found for activity ${activityId}.`,
      { operation: 'fetch best efforts', resource: `activity ${activityId}` }
    );
  }

  /**
   * Run one query. Continuable failures come back as a result; any other error is thrown.
   */
  private async attempt(
    activityId: string,
    query: BestEffortsQuery,
    continuable: ReadonlySet<ErrorCategory>
  ): Promise<Attempt> {
    try {
      const value = await this.port.queryBestEfforts(activityId, query);
      return { found: true, query, value };
    } catch (error) {
      if (error instanceof ApiError && continuable.has(error.category)) {
        console.log(`[BestEfforts] ${describeQuery(query)} rejected (${error.category})`);
        return { found: false, error };
      }
      throw error;
    }
  }

  private toResult(
    activityId: string,
    attempt: { query: BestEffortsQuery; value: unknown }
  ): BestEffortsResult {
    return {
      activity_id: activityId,
      stream: attempt.query.stream,
      parameters: attempt.query,
      best_efforts: attempt.value,
    };
  }
}
