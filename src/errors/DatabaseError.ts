import { CorpusError, ErrorCode, type ErrorContext } from "./CorpusError";

/**
 * Error for database-related failures.
 */
export class CorpusDatabaseError extends CorpusError {
  public readonly table?: string;
  public readonly sqlState?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.DB_QUERY_FAILED,
    context: Partial<ErrorContext> & { table?: string; sqlState?: string } = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, options);
    this.name = "CorpusDatabaseError";
    this.table = context.table;
    this.sqlState = context.sqlState;
  }

  static connectionFailed(cause?: Error, context: Partial<ErrorContext> = {}) {
    return new CorpusDatabaseError(
      "Failed to open corpus store",
      ErrorCode.DB_CONNECTION_FAILED,
      context,
      { cause, isRetryable: false }
    );
  }

  static queryFailed(operation: string, table: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new CorpusDatabaseError(
      `Database ${operation} failed on ${table}`,
      ErrorCode.DB_QUERY_FAILED,
      { ...context, table, operation },
      { cause, isRetryable: false }
    );
  }

  static seedMissing(tables: string[], context: Partial<ErrorContext> = {}) {
    return new CorpusDatabaseError(
      `Seed data missing for ${tables.join(", ")}. Seed the store before ingesting.`,
      ErrorCode.DB_SEED_MISSING,
      { ...context, table: tables[0] },
      { isRetryable: false }
    );
  }

  static constraintViolation(
    message: string,
    context: Partial<ErrorContext> & { table?: string; sqlState?: string } = {},
    cause?: Error
  ) {
    return new CorpusDatabaseError(
      message,
      ErrorCode.DB_CONSTRAINT_VIOLATION,
      context,
      { cause, isRetryable: false }
    );
  }
}
