import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { IntervalsClient } from '../clients/intervals.js';
import { DownloadOrchestrator } from '../downloads/orchestrator.js';
import { WebhookIngestor } from '../webhooks/ingestor.js';
import { createEventStore } from '../webhooks/event-store.js';
import { DownloadTools } from './downloads.js';
import { AnalysisTools } from './analysis.js';
import { WebhookTools } from './webhooks.js';
import {
  StartDownloadParams,
  DownloadIdParams,
  GetBestEffortsParams,
  GetActivityStreamsParams,
  ReceiveWebhookParams,
  SetWebhookSecretParams,
  type StartDownloadInput,
  type DownloadIdInput,
  type GetBestEffortsInput,
  type GetActivityStreamsInput,
  type ReceiveWebhookInput,
  type SetWebhookSecretInput,
} from './types.js';
import {
  combineFieldDescriptions,
  getFieldDescriptions,
} from '../utils/field-descriptions.js';
import { buildToolResponse, type ToolResponse } from '../utils/response-builder.js';
import { ApiError } from '../errors/index.js';
import type { IntervalsConfig } from '../types/index.js';

interface ResponseOptions {
  fieldDescriptions: Record<string, string>;
  nextActions?: string[];
}

interface ErrorDetails {
  error: true;
  message: string;
  what_happened: string;
  how_to_fix: string;
  can_retry: boolean;
  category: string;
  [key: string]: unknown;
}

interface StructuredErrorContent {
  error: ErrorDetails;
  [key: string]: unknown;
}

interface ErrorResponse {
  content: Array<{ type: 'text'; text: string }>;
  structuredContent: StructuredErrorContent;
  isError: true;
  [key: string]: unknown;
}

/**
 * Build a structured error response for LLM consumption.
 * All errors are caught and formatted consistently.
 */
export function buildErrorResponse(error: unknown): ErrorResponse {
  let errorDetails: ErrorDetails;

  if (error instanceof ApiError) {
    errorDetails = {
      error: true,
      message: error.message,
      what_happened: error.getWhatHappened(),
      how_to_fix: error.getHowToFix(),
      can_retry: error.isRetryable,
      category: error.category,
      source: error.source,
    };
    if (error.statusCode !== undefined) {
      errorDetails.status_code = error.statusCode;
    }
  } else {
    const message = error instanceof Error ? error.message : 'An unknown error occurred';
    errorDetails = {
      error: true,
      message,
      what_happened: 'An unexpected error occurred while processing the request.',
      how_to_fix: 'Please try again. If the issue persists, there may be a problem with the service.',
      can_retry: true,
      category: 'internal',
    };
  }

  const structuredContent = { error: errorDetails };

  return {
    content: [{ type: 'text' as const, text: JSON.stringify(structuredContent, null, 2) }],
    structuredContent,
    isError: true,
  };
}

/**
 * Wraps a tool handler with response building and error handling.
 */
function withToolResponse<TArgs, TResult>(
  toolName: string,
  handler: (args: TArgs) => Promise<TResult>,
  options: ResponseOptions
): (args: TArgs) => Promise<ToolResponse | ErrorResponse> {
  return async (args: TArgs) => {
    console.log(`[Tool] Calling tool: ${toolName}`);
    try {
      const data = await handler(args);
      return buildToolResponse({
        data,
        fieldDescriptions: options.fieldDescriptions,
        nextActions: options.nextActions,
      });
    } catch (error) {
      return buildErrorResponse(error);
    }
  };
}

export interface ToolsConfig {
  intervals: IntervalsConfig;
  webhookSecret?: string | null;
  redisUrl?: string | null;
  downloadDir?: string | null;
}

export class ToolRegistry {
  readonly orchestrator: DownloadOrchestrator;
  readonly webhooks: WebhookIngestor;
  private downloadTools: DownloadTools;
  private analysisTools: AnalysisTools;
  private webhookTools: WebhookTools;

  constructor(config: ToolsConfig) {
    const intervalsClient = new IntervalsClient(config.intervals);

    this.orchestrator = new DownloadOrchestrator(intervalsClient, {
      downloadDir: config.downloadDir ?? undefined,
    });
    this.webhooks = new WebhookIngestor(createEventStore(config.redisUrl), config.webhookSecret);

    this.downloadTools = new DownloadTools(this.orchestrator);
    this.analysisTools = new AnalysisTools(intervalsClient);
    this.webhookTools = new WebhookTools(this.webhooks);
  }

  /**
   * Cancel in-flight downloads and wait for them to wind down
   */
  async shutdown(): Promise<void> {
    await this.orchestrator.shutdown();
  }

  /**
   * Register all tools with the MCP server
   */
  registerTools(server: McpServer): void {
    // ============================================
    // Downloads
    // ============================================

    server.tool(
      'start_download',
      `Starts downloading an activity file from Intervals.icu in the background and returns a download ID right away.

<use-cases>
- Saving the original recording of a workout (usually a FIT file) for backup or further analysis.
- Exporting an activity as FIT or GPX for use in another application.
</use-cases>

<instructions>
- Call get_download_status with the returned download_id to follow progress; large files can take a while.
- Pass output_path to write the file to disk. Without it, the completed status carries the file contents base64-encoded in its path field, unless the server has a download directory configured.
- Get the activity_id from the user or from a link to the activity on Intervals.icu.
</instructions>

<notes>
- Activities imported from Strava can't be downloaded due to Strava API Agreement restrictions.
</notes>`,
      StartDownloadParams.shape,
      withToolResponse(
        'start_download',
        async (args: StartDownloadInput) => this.downloadTools.startDownload(args),
        {
          fieldDescriptions: getFieldDescriptions('download'),
          nextActions: ['Call get_download_status with the download_id to check on progress.'],
        }
      )
    );

    server.tool(
      'get_download_status',
      `Returns the current status of a background download: its state, bytes received so far, total size when known, and where the file ended up.

<notes>
- completed, failed and cancelled are final states.
- A download cancelled while its last chunk was already in flight can still finish as completed or failed.
</notes>`,
      DownloadIdParams.shape,
      withToolResponse(
        'get_download_status',
        async (args: DownloadIdInput) => this.downloadTools.getDownloadStatus(args),
        {
          fieldDescriptions: getFieldDescriptions('download'),
        }
      )
    );

    server.tool(
      'cancel_download',
      `Requests cancellation of a background download.

<notes>
- Cancelling a download that is pending or in progress marks it cancelled immediately and stops the transfer.
- Cancelling a download that already completed or failed is not an error, but it keeps its completed or failed state: the response has cancelled: false and the unchanged status.
</notes>`,
      DownloadIdParams.shape,
      withToolResponse(
        'cancel_download',
        async (args: DownloadIdInput) => this.downloadTools.cancelDownload(args),
        {
          fieldDescriptions: getFieldDescriptions('download'),
        }
      )
    );

    server.tool(
      'list_downloads',
      `Lists every download started since the server came up, in the order they were started, with their current status.`,
      {},
      withToolResponse(
        'list_downloads',
        async () => this.downloadTools.listDownloads(),
        {
          fieldDescriptions: getFieldDescriptions('download'),
        }
      )
    );

    // ============================================
    // Analysis
    // ============================================

    server.tool(
      'get_best_efforts',
      `Fetches the best efforts for an activity, such as the highest 1-minute power or the fastest kilometer.

<use-cases>
- Finding the peak efforts in a race or a hard workout.
- Comparing the best efforts of two activities on the same stream.
</use-cases>

<instructions>
- To ask for a specific effort, pass stream together with duration (seconds) or distance (meters).
- Passing only activity_id makes the server search for parameters the activity supports: it tries 1-minute power, 1 km power and 5-minute power, then falls back to the activity's own streams.
- duration, distance, count and the other options require stream.
</instructions>

<notes>
- The response includes the stream and parameters that were used, so follow-up calls can ask for them directly.
</notes>`,
      GetBestEffortsParams.shape,
      withToolResponse(
        'get_best_efforts',
        async (args: GetBestEffortsInput) => this.analysisTools.getBestEfforts(args),
        {
          fieldDescriptions: getFieldDescriptions('best_efforts'),
        }
      )
    );

    server.tool(
      'get_activity_streams',
      `Fetches the recorded data streams for an activity (power, heart rate, cadence, speed, etc.) along with the list of stream names.

<use-cases>
- Finding out which streams an activity has before asking for best efforts on one of them.
- Looking at second-by-second data for a portion of a workout.
</use-cases>`,
      GetActivityStreamsParams.shape,
      withToolResponse(
        'get_activity_streams',
        async (args: GetActivityStreamsInput) => this.analysisTools.getActivityStreams(args),
        {
          fieldDescriptions: getFieldDescriptions('streams'),
        }
      )
    );

    // ============================================
    // Webhooks
    // ============================================

    server.tool(
      'receive_webhook',
      `Verifies a signed Intervals.icu webhook event and stores it. Each event is processed at most once.

<notes>
- The signature is the hex HMAC-SHA256 of the payload serialized as JSON with sorted keys, using the shared webhook secret.
- Re-delivering an event with the same id returns duplicate: true and changes nothing.
- Fails if no webhook secret has been configured; use set_webhook_secret first.
</notes>`,
      ReceiveWebhookParams.shape,
      withToolResponse(
        'receive_webhook',
        async (args: ReceiveWebhookInput) => this.webhookTools.receiveWebhook(args),
        {
          fieldDescriptions: getFieldDescriptions('webhook'),
        }
      )
    );

    server.tool(
      'set_webhook_secret',
      `Sets the shared secret used to verify webhook signatures. Takes effect for the next event received.`,
      SetWebhookSecretParams.shape,
      withToolResponse(
        'set_webhook_secret',
        async (args: SetWebhookSecretInput) => this.webhookTools.setWebhookSecret(args),
        {
          fieldDescriptions: combineFieldDescriptions('webhook'),
        }
      )
    );
  }
}
