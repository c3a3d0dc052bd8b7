/**
 * Field descriptions for MCP tool responses.
 * These are included in responses so the LLM knows what each field means and its units.
 */

export const DOWNLOAD_FIELD_DESCRIPTIONS = {
  download_id: 'ID of the background download; pass it to get_download_status or cancel_download',
  id: 'ID of the background download',
  activity_id: 'Intervals.icu activity ID the file belongs to',
  format: 'Which file is being downloaded: original upload, FIT export, or GPX export',
  state: 'pending (queued), in_progress (transferring), completed, failed, or cancelled. completed, failed and cancelled are final.',
  bytes_downloaded: 'Bytes received so far',
  total_bytes: 'Total size in bytes, when the server reported it. Omitted when unknown.',
  path: 'Where the file was written. For downloads without an output path, this holds the base64-encoded file contents instead.',
  error: 'Why the download failed',
  cancelled: 'Whether the download is now marked cancelled. False if it had already finished; its final state is kept.',
  downloads: 'All downloads started since the server came up, with their current status',
};

export const BEST_EFFORTS_FIELD_DESCRIPTIONS = {
  activity_id: 'Intervals.icu activity ID',
  stream: 'Stream the best efforts were computed on (e.g., watts, heartrate)',
  parameters: 'The query parameters Intervals.icu accepted for this activity',
  duration: 'Effort duration, in seconds',
  distance: 'Effort distance, in meters',
  count: 'Maximum number of efforts requested',
  best_efforts: 'Best efforts as returned by Intervals.icu',
};

export const STREAMS_FIELD_DESCRIPTIONS = {
  activity_id: 'Intervals.icu activity ID',
  available_streams: 'Names of the data streams recorded for this activity, excluding the time axis',
  streams: 'Raw stream data as returned by Intervals.icu',
};

export const WEBHOOK_FIELD_DESCRIPTIONS = {
  ok: 'The event was verified and stored',
  duplicate: 'An event with this ID was already stored; nothing was changed',
  id: 'Event ID, taken from the payload or derived from the receive time',
  configured: 'Whether webhook signature verification is now enabled',
};

type FieldCategory = 'download' | 'best_efforts' | 'streams' | 'webhook';

/**
 * Get descriptions for a specific category
 */
export function getFieldDescriptions(category: FieldCategory): Record<string, string> {
  switch (category) {
    case 'download':
      return DOWNLOAD_FIELD_DESCRIPTIONS;
    case 'best_efforts':
      return BEST_EFFORTS_FIELD_DESCRIPTIONS;
    case 'streams':
      return STREAMS_FIELD_DESCRIPTIONS;
    case 'webhook':
      return WEBHOOK_FIELD_DESCRIPTIONS;
  }
}

/**
 * Combine field descriptions for a response that includes multiple types
 */
export function combineFieldDescriptions(
  ...categories: FieldCategory[]
): Record<string, string> {
  return categories.reduce(
    (acc, category) => ({ ...acc, ...getFieldDescriptions(category) }),
    {}
  );
}
