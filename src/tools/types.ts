import { z } from 'zod';

export const ActivityIdSchema = z
  .string()
  .min(1)
  .describe('Intervals.icu activity ID (e.g., "i113367711")');

export const DownloadIdSchema = z
  .string()
  .min(1)
  .describe('Download ID returned by start_download');

// Tool parameter schemas
export const StartDownloadParams = z.object({
  activity_id: ActivityIdSchema,
  output_path: z
    .string()
    .optional()
    .describe('File path to write to. If omitted, the file is returned base64-encoded in the status (or written to the server download directory, if one is configured).'),
  format: z
    .enum(['original', 'fit', 'gpx'])
    .optional()
    .describe('Which file to download: the original upload (default), a FIT export, or a GPX export'),
});

export const DownloadIdParams = z.object({
  download_id: DownloadIdSchema,
});

export const GetBestEffortsParams = z.object({
  activity_id: ActivityIdSchema,
  stream: z
    .string()
    .optional()
    .describe('Stream to search (e.g., "watts", "heartrate", "velocity_smooth"). If omitted, the server finds a stream the activity supports.'),
  duration: z.number().int().positive().optional().describe('Effort duration in seconds. Requires stream.'),
  distance: z.number().positive().optional().describe('Effort distance in meters. Requires stream.'),
  count: z.number().int().positive().optional().describe('Maximum number of efforts to return'),
  min_value: z.number().optional().describe('Ignore efforts below this value'),
  exclude_intervals: z.boolean().optional().describe('Exclude efforts that overlap existing intervals'),
  start_index: z.number().int().nonnegative().optional().describe('First data point to consider'),
  end_index: z.number().int().nonnegative().optional().describe('Last data point to consider'),
});

export const GetActivityStreamsParams = z.object({
  activity_id: ActivityIdSchema,
});

export const ReceiveWebhookParams = z.object({
  signature: z.string().min(1).describe('Hex-encoded HMAC-SHA256 of the payload, optionally prefixed with "sha256="'),
  payload: z.record(z.string(), z.unknown()).describe('The webhook event payload'),
});

export const SetWebhookSecretParams = z.object({
  secret: z.string().min(1).describe('Shared secret used to verify webhook signatures'),
});

// Type exports
export type StartDownloadInput = z.infer<typeof StartDownloadParams>;
export type DownloadIdInput = z.infer<typeof DownloadIdParams>;
export type GetBestEffortsInput = z.infer<typeof GetBestEffortsParams>;
export type GetActivityStreamsInput = z.infer<typeof GetActivityStreamsParams>;
export type ReceiveWebhookInput = z.infer<typeof ReceiveWebhookParams>;
export type SetWebhookSecretInput = z.infer<typeof SetWebhookSecretParams>;
