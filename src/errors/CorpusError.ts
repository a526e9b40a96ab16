/**
 * Base error class for all mushaf-store errors.
 * Provides error codes, operation context, and structured metadata.
 */

export enum ErrorCode {
  // Network errors (2xxx)
  NETWORK_TIMEOUT = 2001,
  NETWORK_CONNECTION_FAILED = 2002,
  NETWORK_RATE_LIMITED = 2003,
  NETWORK_SERVER_ERROR = 2004,
  NETWORK_ABORTED = 2005,
  HTTP_PERMANENT = 2020,

  // Database errors (3xxx)
  DB_CONNECTION_FAILED = 3001,
  DB_QUERY_FAILED = 3002,
  DB_SEED_MISSING = 3004,
  DB_CONSTRAINT_VIOLATION = 3005,

  // Validation errors (4xxx)
  VALIDATION_INVALID_PAYLOAD = 4001,
  VALIDATION_KEY_MISMATCH = 4002,
  VALIDATION_INVALID_CONFIG = 4003,
  VALIDATION_INVALID_FORMAT = 4004,

  // Enrichment errors (5xxx)
  ENRICHMENT_EMPTY_GROUP = 5001,
  ENRICHMENT_MISSING_LAYOUT = 5002,

  // General errors (9xxx)
  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  url?: string;
  ayatId?: number;
  verseKey?: string;
  table?: string;
  timestamp?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  code: ErrorCode;
  message: string;
  context: ErrorContext;
  cause?: string;
  stack?: string;
}

export class CorpusError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "CorpusError";
    this.code = code;
    this.cause = options?.cause;
    this.timestamp = new Date().toISOString();
    this.isRetryable = options?.isRetryable ?? false;
    this.context = {
      ...context,
      operation: context.operation || "unknown",
      timestamp: this.timestamp,
    };

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  /**
   * Single-line form used in run reports and log output.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.url) parts.push(`URL: ${this.context.url}`);
    if (this.context.verseKey) parts.push(`Verse: ${this.context.verseKey}`);
    if (this.cause instanceof Error) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Helper to wrap unknown errors in CorpusError.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): CorpusError {
  if (error instanceof CorpusError) {
    return new CorpusError(error.message, error.code, {
      ...error.context,
      ...context,
    }, { cause: error.cause, isRetryable: error.isRetryable });
  }

  if (error instanceof Error) {
    return new CorpusError(error.message, code, context, { cause: error });
  }

  return new CorpusError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isCorpusError(error: unknown): error is CorpusError {
  return error instanceof CorpusError;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (isCorpusError(error)) return error.code;
  return ErrorCode.UNKNOWN;
}
