/**
 * Unified error handling system for the Pacekeeper MCP server.
 * Provides human-readable error messages designed for LLM consumption.
 */

/**
 * Error categories for classifying different types of failures.
 */
export type ErrorCategory =
  | 'not_found'           // Resource (activity, download) doesn't exist
  | 'authentication'      // API credentials invalid or expired
  | 'authorization'       // Valid credentials but lacks permission
  | 'rate_limit'          // Too many requests
  | 'network'             // Connection or timeout issues
  | 'service_unavailable' // External API temporarily down
  | 'validation'          // Caller-supplied parameters are insufficient
  | 'unprocessable'       // Upstream rejected the parameters (HTTP 422)
  | 'signature'           // Webhook signature did not verify
  | 'configuration'       // Server is missing required setup
  | 'cancelled'           // Operation was cancelled by the caller
  | 'internal';           // Unexpected errors

/**
 * Context information about what operation was being performed when the error occurred.
 */
export interface ErrorContext {
  /** What operation was being attempted (e.g., "fetch best efforts") */
  operation: string;
  /** The specific resource involved (e.g., "activity i123456") */
  resource?: string;
  /** The input parameters that were provided */
  parameters?: Record<string, unknown>;
}

/**
 * Source of the error - which API or component caused it.
 */
export type ErrorSource = 'intervals' | 'downloads' | 'webhook' | 'tool';

/**
 * Base error class for all API and tool errors.
 * Designed to produce human-readable messages for LLM consumption.
 */
export class ApiError extends Error {
  public override readonly name: string = 'ApiError';

  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly isRetryable: boolean,
    public readonly context: ErrorContext,
    public readonly source: ErrorSource,
    public readonly statusCode?: number
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }

  /**
   * Get a human-friendly explanation of what happened.
   */
  getWhatHappened(): string {
    const resourceInfo = this.context.resource ? ` for ${this.context.resource}` : '';
    return `The ${this.context.operation} operation${resourceInfo} failed.`;
  }

  /**
   * Get guidance on how to fix the error.
   */
  getHowToFix(): string {
    switch (this.category) {
      case 'not_found':
        return 'Double-check that the ID is correct. Use list_downloads or the activity listing to find valid IDs.';
      case 'authentication':
        return 'The API credentials may be invalid or expired. Please check the configuration.';
      case 'authorization':
        return 'The configured API key may not have permission for this operation.';
      case 'rate_limit':
        return 'Wait a moment before trying again. The API is temporarily limiting requests.';
      case 'network':
        return 'This is usually a temporary connectivity issue. Please try again in a moment.';
      case 'service_unavailable':
        return 'The external service is temporarily unavailable. Please try again shortly.';
      case 'validation':
        return 'Please check that all input parameters are valid and in the expected format.';
      case 'unprocessable':
        return 'The activity does not support these parameters. Try a different stream, duration, or distance, or omit them to let the server search.';
      case 'signature':
        return 'Make sure the webhook was signed with the currently configured secret.';
      case 'configuration':
        return 'The server is missing required configuration. Set it up and try again.';
      case 'cancelled':
        return 'The operation was cancelled. Start it again if the result is still needed.';
      default:
        return 'An unexpected error occurred. Please try again or contact support if the issue persists.';
    }
  }
}

/**
 * Error thrown when Intervals.icu API calls fail.
 */
export class IntervalsApiError extends ApiError {
  public override readonly name = 'IntervalsApiError';

  constructor(
    message: string,
    category: ErrorCategory,
    isRetryable: boolean,
    context: ErrorContext,
    statusCode?: number
  ) {
    super(message, category, isRetryable, context, 'intervals', statusCode);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IntervalsApiError);
    }
  }

  /**
   * Create an error from an HTTP response status code.
   */
  static fromHttpStatus(
    statusCode: number,
    context: ErrorContext
  ): IntervalsApiError {
    const { category, isRetryable, message } = IntervalsApiError.categorizeStatus(statusCode, context);
    return new IntervalsApiError(message, category, isRetryable, context, statusCode);
  }

  /**
   * Categorize an HTTP status code into an error category with appropriate message.
   */
  private static categorizeStatus(
    statusCode: number,
    context: ErrorContext
  ): { category: ErrorCategory; isRetryable: boolean; message: string } {
    const resourceInfo = context.resource ? ` '${context.resource}'` : '';

    switch (statusCode) {
      case 400:
        return {
          category: 'validation',
          isRetryable: false,
          message: `The request to ${context.operation} was invalid. Please check the parameters.`,
        };
      case 401:
        return {
          category: 'authentication',
          isRetryable: false,
          message: `Authentication failed with Intervals.icu. The API key may be invalid or expired.`,
        };
      case 403:
        return {
          category: 'authorization',
          isRetryable: false,
          message: `Access denied for ${context.operation}. The API key may not have permission for this operation.`,
        };
      case 404:
        return {
          category: 'not_found',
          isRetryable: false,
          message: `I couldn't find${resourceInfo}. It may have been deleted or the ID might be incorrect.`,
        };
      case 422:
        return {
          category: 'unprocessable',
          isRetryable: false,
          message: `Intervals.icu couldn't process the parameters to ${context.operation}${resourceInfo}.`,
        };
      case 429:
        return {
          category: 'rate_limit',
          isRetryable: true,
          message: `Intervals.icu is temporarily limiting requests. Please try again in a few seconds.`,
        };
      case 500:
      case 502:
      case 503:
      case 504:
        return {
          category: 'service_unavailable',
          isRetryable: true,
          message: `Intervals.icu is temporarily unavailable. This is usually a brief issue. Please try again shortly.`,
        };
      default:
        if (statusCode >= 500) {
          return {
            category: 'service_unavailable',
            isRetryable: true,
            message: `Intervals.icu returned an error (${statusCode}). Please try again shortly.`,
          };
        }
        return {
          category: 'internal',
          isRetryable: false,
          message: `An unexpected error occurred with Intervals.icu (${statusCode}).`,
        };
    }
  }

  /**
   * Create an error for network/connection issues.
   */
  static networkError(context: ErrorContext, originalError?: Error): IntervalsApiError {
    const errorDetail = originalError?.message ? `: ${originalError.message}` : '';
    return new IntervalsApiError(
      `I'm having trouble connecting to Intervals.icu${errorDetail}. This is usually temporary. Please try again in a moment.`,
      'network',
      true,
      context
    );
  }
}

/**
 * Error thrown when tool parameters are insufficient, before any remote call is made.
 */
export class InputValidationError extends ApiError {
  public override readonly name = 'InputValidationError';

  constructor(message: string, context: ErrorContext) {
    super(message, 'validation', false, context, 'tool');

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InputValidationError);
    }
  }
}

export type WebhookErrorKind = 'secret_not_configured' | 'signature_mismatch';

/**
 * Error thrown when an inbound webhook can't be verified.
 */
export class WebhookError extends ApiError {
  public override readonly name = 'WebhookError';

  constructor(public readonly kind: WebhookErrorKind) {
    super(
      kind === 'secret_not_configured'
        ? 'Webhook secret is not configured.'
        : 'Webhook signature does not match the payload.',
      kind === 'secret_not_configured' ? 'configuration' : 'signature',
      false,
      { operation: 'verify webhook' },
      'webhook'
    );

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WebhookError);
    }
  }

  static secretNotConfigured(): WebhookError {
    return new WebhookError('secret_not_configured');
  }

  static signatureMismatch(): WebhookError {
    return new WebhookError('signature_mismatch');
  }

  override getHowToFix(): string {
    if (this.kind === 'secret_not_configured') {
      return 'Call set_webhook_secret (or set WEBHOOK_SECRET) before delivering webhooks.';
    }
    return 'Sign the payload with HMAC-SHA256 using the configured secret and send the hex digest.';
  }
}

/**
 * Error thrown when a download ID isn't known to the orchestrator.
 */
export class DownloadNotFoundError extends ApiError {
  public override readonly name = 'DownloadNotFoundError';

  constructor(public readonly downloadId: string, operation: string) {
    super(
      `I couldn't find a download with ID '${downloadId}'.`,
      'not_found',
      false,
      { operation, resource: `download ${downloadId}` },
      'downloads'
    );

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DownloadNotFoundError);
    }
  }

  override getHowToFix(): string {
    return 'Use list_downloads to see the downloads started since the server came up.';
  }
}

/**
 * Error a transfer rejects with once it observes its cancellation signal.
 * The message always contains "cancelled" so a failed status can be told apart from upstream failures.
 */
export class DownloadCancelledError extends ApiError {
  public override readonly name = 'DownloadCancelledError';

  constructor(activityId: string) {
    super(
      'download cancelled',
      'cancelled',
      false,
      { operation: 'download activity file', resource: `activity ${activityId}` },
      'downloads'
    );

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DownloadCancelledError);
    }
  }
}
