// ============================================
// Configuration
// ============================================

export interface RetryPolicy {
  /** Retries after the first attempt; an always-failing call runs maxRetries + 1 times */
  maxRetries: number;
  /** Base of the exponential backoff window, in milliseconds */
  baseDelayMs: number;
}

export interface IntervalsConfig {
  apiKey: string;
  athleteId: string;
  /** Defaults to https://intervals.icu */
  baseUrl?: string;
  retry?: RetryPolicy;
}

// ============================================
// Downloads
// ============================================

/** Which rendition of the activity file to fetch */
export type DownloadFormat = 'original' | 'fit' | 'gpx';

export type DownloadState =
  | 'pending'
  | 'in_progress'
  | 'completed'
  | 'failed'
  | 'cancelled';

export interface DownloadStatus {
  id: string;
  activity_id: string;
  format: DownloadFormat;
  state: DownloadState;
  bytes_downloaded: number;
  total_bytes: number | null;
  /** File path, or the base64 payload when no output path was given. Set once completed. */
  path: string | null;
  /** Failure message. Set once failed. */
  error: string | null;
}

export interface DownloadProgress {
  bytesDownloaded: number;
  totalBytes: number | null;
}

/** Non-blocking progress sink handed to a transfer. Returns false when the update was dropped. */
export interface ProgressSink {
  trySend(update: DownloadProgress): boolean;
}

export interface TransferRequest {
  activityId: string;
  format: DownloadFormat;
  outputPath?: string;
}

/**
 * Performs the byte transfer for one activity file.
 *
 * Implementations must push progress without blocking and check `signal.aborted`
 * between chunks, rejecting with a message containing "cancelled" once it is set.
 * Resolves to the written file path, or the base64-encoded body when no output path was given.
 */
export interface FileTransferPort {
  transfer(
    request: TransferRequest,
    progress: ProgressSink,
    signal: AbortSignal
  ): Promise<string>;
}

export interface StartDownloadOptions {
  outputPath?: string;
  format?: DownloadFormat;
}

// ============================================
// Best efforts
// ============================================

export interface BestEffortsQuery {
  stream: string;
  duration?: number;
  distance?: number;
  count?: number;
  min_value?: number;
  exclude_intervals?: boolean;
  start_index?: number;
  end_index?: number;
}

export interface BestEffortsParams extends Partial<BestEffortsQuery> {
  activity_id: string;
}

export interface BestEffortsResult {
  activity_id: string;
  stream: string;
  /** The parameter set the upstream API accepted */
  parameters: BestEffortsQuery;
  best_efforts: unknown;
}

/**
 * Remote queries consulted by the best-efforts resolver.
 * Failures must be thrown as ApiError so the resolver can classify them by category.
 */
export interface BestEffortsQueryPort {
  queryBestEfforts(activityId: string, query: BestEffortsQuery): Promise<unknown>;
  getActivityStreams(activityId: string): Promise<unknown>;
}

/** The three shapes the streams endpoint has been seen to answer with */
export type StreamsPayload =
  | { shape: 'object_of_arrays'; value: Record<string, unknown> }
  | { shape: 'nested_streams_object'; value: Record<string, unknown> }
  | { shape: 'nested_streams_array'; value: unknown[] };

export interface ActivityStreamsResponse {
  activity_id: string;
  available_streams: string[];
  streams: unknown;
}

// ============================================
// Webhooks
// ============================================

export interface WebhookRecord {
  id: string;
  payload: unknown;
  /** Unix timestamp, seconds */
  received_at: number;
}

export type WebhookResult =
  | { ok: true; id: string }
  | { duplicate: true; id: string };
