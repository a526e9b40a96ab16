import { CorpusError, ErrorCode, type ErrorContext } from "./CorpusError";

/**
 * Error for malformed remote payloads and invalid configuration.
 */
export class CorpusValidationError extends CorpusError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_FORMAT,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "CorpusValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static invalidPayload(url: string, detail: string, context: Partial<ErrorContext> = {}, cause?: Error) {
    return new CorpusValidationError(
      `Malformed payload from ${url}: ${detail}`,
      ErrorCode.VALIDATION_INVALID_PAYLOAD,
      { ...context, url },
      { cause }
    );
  }

  static keyMismatch(field: string, expected: number, actual: number, context: Partial<ErrorContext> = {}) {
    return new CorpusValidationError(
      `Payload ${field} ${actual} does not match requested ${expected}`,
      ErrorCode.VALIDATION_KEY_MISMATCH,
      { ...context, field, value: actual }
    );
  }

  static invalidConfig(field: string, value: unknown, expected: string, context: Partial<ErrorContext> = {}) {
    return new CorpusValidationError(
      `Invalid configuration ${field}=${JSON.stringify(value)}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_CONFIG,
      { ...context, field, value }
    );
  }

  static invalidFormat(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new CorpusValidationError(
      `Invalid format for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_FORMAT,
      { ...context, field, value: actual }
    );
  }
}
