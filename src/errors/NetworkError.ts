import { CorpusError, ErrorCode, type ErrorContext } from "./CorpusError";

/**
 * Error for network-related failures (HTTP status, transport, timeouts).
 */
export class CorpusNetworkError extends CorpusError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    context: Partial<ErrorContext> & { statusCode?: number; endpoint?: string } = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true,
    });
    this.name = "CorpusNetworkError";
    this.statusCode = context.statusCode;
    this.endpoint = context.endpoint;
  }

  static timeout(endpoint: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new CorpusNetworkError(
      `Request to ${endpoint} timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      { ...context, endpoint },
      { isRetryable: true }
    );
  }

  static connectionFailed(endpoint: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new CorpusNetworkError(
      `Failed to connect to ${endpoint}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      { ...context, endpoint },
      { cause, isRetryable: true }
    );
  }

  static rateLimited(endpoint: string, retryAfterMs?: number, context: Partial<ErrorContext> = {}) {
    const message = retryAfterMs !== undefined
      ? `Rate limited by ${endpoint}. Retry after ${retryAfterMs}ms`
      : `Rate limited by ${endpoint}`;
    return new CorpusNetworkError(
      message,
      ErrorCode.NETWORK_RATE_LIMITED,
      { ...context, endpoint, statusCode: 429 },
      { isRetryable: true }
    );
  }

  static serverError(endpoint: string, statusCode: number, context: Partial<ErrorContext> = {}) {
    return new CorpusNetworkError(
      `HTTP ${statusCode} from ${endpoint}`,
      ErrorCode.NETWORK_SERVER_ERROR,
      { ...context, endpoint, statusCode },
      { isRetryable: true }
    );
  }

  static permanent(endpoint: string, statusCode: number, context: Partial<ErrorContext> = {}) {
    return new CorpusNetworkError(
      `HTTP ${statusCode} from ${endpoint} is not retryable`,
      ErrorCode.HTTP_PERMANENT,
      { ...context, endpoint, statusCode },
      { isRetryable: false }
    );
  }

  static aborted(endpoint: string, context: Partial<ErrorContext> = {}) {
    return new CorpusNetworkError(
      `Request to ${endpoint} was cancelled`,
      ErrorCode.NETWORK_ABORTED,
      { ...context, endpoint },
      { isRetryable: false }
    );
  }
}
