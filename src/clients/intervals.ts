import { open } from 'fs/promises';
import type {
  IntervalsConfig,
  RetryPolicy,
  BestEffortsQuery,
  BestEffortsQueryPort,
  DownloadFormat,
  FileTransferPort,
  ProgressSink,
  TransferRequest,
} from '../types/index.js';
import {
  DownloadCancelledError,
  IntervalsApiError,
  type ErrorContext,
} from '../errors/index.js';
import { DEFAULT_RETRY_POLICY, withRetry } from '../utils/retry.js';

const DEFAULT_INTERVALS_BASE_URL = 'https://intervals.icu';

const DOWNLOAD_ENDPOINTS: Record<DownloadFormat, string> = {
  original: '/file',
  fit: '/fit-file',
  gpx: '/gpx-file',
};

function parseContentLength(value: string | null): number | null {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return Number(value.trim());
}

export class IntervalsClient implements BestEffortsQueryPort, FileTransferPort {
  private config: IntervalsConfig;
  private authHeader: string;
  private baseUrl: string;
  private retryPolicy: RetryPolicy;

  constructor(config: IntervalsConfig) {
    this.config = config;
    // Intervals.icu uses API key as password with "API_KEY" as username
    const credentials = Buffer.from(`API_KEY:${config.apiKey}`).toString('base64');
    this.authHeader = `Basic ${credentials}`;
    this.baseUrl = (config.baseUrl ?? DEFAULT_INTERVALS_BASE_URL).replace(/\/+$/, '');
    this.retryPolicy = config.retry ?? DEFAULT_RETRY_POLICY;
  }

  get athleteId(): string {
    return this.config.athleteId;
  }

  /**
   * Query best efforts for one stream with one parameter set.
   * A 422 surfaces as an IntervalsApiError with category 'unprocessable'.
   */
  async queryBestEfforts(activityId: string, query: BestEffortsQuery): Promise<unknown> {
    const params: Record<string, string> = { stream: query.stream };
    if (query.duration !== undefined) params.duration = String(query.duration);
    if (query.distance !== undefined) params.distance = String(query.distance);
    if (query.count !== undefined) params.count = String(query.count);
    if (query.min_value !== undefined) params.minValue = String(query.min_value);
    if (query.exclude_intervals !== undefined) params.excludeIntervals = String(query.exclude_intervals);
    if (query.start_index !== undefined) params.startIndex = String(query.start_index);
    if (query.end_index !== undefined) params.endIndex = String(query.end_index);

    return this.fetchActivity<unknown>(activityId, '/best-efforts', params, {
      operation: 'fetch best efforts',
      resource: `activity ${activityId}`,
      parameters: { ...query },
    });
  }

  /**
   * Get the raw streams payload for an activity
   */
  async getActivityStreams(activityId: string): Promise<unknown> {
    return this.fetchActivity<unknown>(activityId, '/streams', undefined, {
      operation: 'fetch activity streams',
      resource: `activity ${activityId}`,
    });
  }

  /**
   * Download an activity file, reporting progress as chunks arrive.
   * Writes to `request.outputPath` when given and returns it; otherwise returns the body as base64.
   * Aborting `signal` cancels the request and any read in flight, and the transfer rejects
   * with a DownloadCancelledError.
   */
  async transfer(
    request: TransferRequest,
    progress: ProgressSink,
    signal: AbortSignal
  ): Promise<string> {
    const { activityId, format, outputPath } = request;
    const errorContext: ErrorContext = {
      operation: 'download activity file',
      resource: `activity ${activityId}`,
      parameters: { format },
    };

    console.log(`[Intervals] Downloading ${format} file for activity ${activityId}`);
    let response: Response;
    try {
      response = await this.send(this.activityUrl(activityId, DOWNLOAD_ENDPOINTS[format]), errorContext, signal);
    } catch (error) {
      if (signal.aborted) {
        throw new DownloadCancelledError(activityId);
      }
      throw error;
    }
    const totalBytes = parseContentLength(response.headers.get('content-length'));

    if (!outputPath) {
      const chunks: Uint8Array[] = [];
      await this.readBody(response, signal, activityId, errorContext, (chunk) => {
        chunks.push(chunk);
      });
      const body = Buffer.concat(chunks);
      progress.trySend({ bytesDownloaded: body.length, totalBytes: body.length });
      return body.toString('base64');
    }

    const file = await open(outputPath, 'w');
    try {
      let downloaded = 0;
      await this.readBody(response, signal, activityId, errorContext, async (chunk) => {
        await file.write(chunk);
        downloaded += chunk.byteLength;
        progress.trySend({ bytesDownloaded: downloaded, totalBytes });
      });
      await file.sync();
    } finally {
      await file.close();
    }

    return outputPath;
  }

  /**
   * Feed the response body to `onChunk` one chunk at a time.
   * Aborting `signal` cancels the reader, which ends a read that is waiting on a stalled connection.
   */
  private async readBody(
    response: Response,
    signal: AbortSignal,
    activityId: string,
    errorContext: ErrorContext,
    onChunk: (chunk: Uint8Array) => Promise<void> | void
  ): Promise<void> {
    const reader = response.body?.getReader();
    if (!reader) {
      return;
    }

    const cancelRead = (): void => {
      reader.cancel().catch((error: unknown) => {
        console.error(`[Intervals] Failed to cancel the download of activity ${activityId}:`, error);
      });
    };
    signal.addEventListener('abort', cancelRead, { once: true });

    try {
      for (;;) {
        if (signal.aborted) {
          await reader.cancel();
          throw new DownloadCancelledError(activityId);
        }

        const chunk = await reader.read().catch((error: unknown) => {
          throw signal.aborted
            ? new DownloadCancelledError(activityId)
            : IntervalsApiError.networkError(errorContext, error instanceof Error ? error : undefined);
        });
        if (chunk.done) {
          // A cancelled reader reports done
          if (signal.aborted) {
            throw new DownloadCancelledError(activityId);
          }
          return;
        }

        await onChunk(chunk.value);
      }
    } finally {
      signal.removeEventListener('abort', cancelRead);
    }
  }

  private activityUrl(activityId: string, endpoint: string, params?: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}/api/v1/activity/${encodeURIComponent(activityId)}${endpoint}`);
    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        url.searchParams.set(key, value);
      });
    }
    return url;
  }

  /**
   * Issue a GET, retrying only when the request itself fails to complete.
   * HTTP error statuses are never retried here, and nothing is retried once `signal` is aborted.
   */
  private async send(url: URL, errorContext: ErrorContext, signal?: AbortSignal): Promise<Response> {
    const init: RequestInit = {
      headers: {
        Authorization: this.authHeader,
        Accept: '*/*',
      },
    };
    if (signal) {
      init.signal = signal;
    }

    let response: Response;
    try {
      response = await withRetry(() => fetch(url.toString(), init), this.retryPolicy, signal);
    } catch (error) {
      throw IntervalsApiError.networkError(errorContext, error instanceof Error ? error : undefined);
    }

    if (!response.ok) {
      throw IntervalsApiError.fromHttpStatus(response.status, errorContext);
    }

    return response;
  }

  /**
   * Fetch from activity-specific endpoints (uses /activity/{id})
   */
  private async fetchActivity<T>(
    activityId: string,
    endpoint: string,
    params: Record<string, string> | undefined,
    errorContext: ErrorContext
  ): Promise<T> {
    const response = await this.send(this.activityUrl(activityId, endpoint, params), errorContext);
    return response.json() as Promise<T>;
  }
}
