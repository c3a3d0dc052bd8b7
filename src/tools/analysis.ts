import { BestEffortsResolver } from '../best-efforts/resolver.js';
import { extractAvailableStreams } from '../best-efforts/streams.js';
import type { BestEffortsQueryPort, BestEffortsResult, ActivityStreamsResponse } from '../types/index.js';
import type { GetActivityStreamsInput, GetBestEffortsInput } from './types.js';

export class AnalysisTools {
  private resolver: BestEffortsResolver;

  constructor(private port: BestEffortsQueryPort) {
    this.resolver = new BestEffortsResolver(port);
  }

  /**
   * Best efforts for an activity. Without a stream, the server searches for
   * parameters the activity supports.
   */
  async getBestEfforts(params: GetBestEffortsInput): Promise<BestEffortsResult> {
    return this.resolver.resolve(params);
  }

  async getActivityStreams(params: GetActivityStreamsInput): Promise<ActivityStreamsResponse> {
    const streams = await this.port.getActivityStreams(params.activity_id);
    return {
      activity_id: params.activity_id,
      available_streams: extractAvailableStreams(streams),
      streams,
    };
  }
}
