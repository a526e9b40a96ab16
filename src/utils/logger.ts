import { isCorpusError } from "../errors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: number;
    message: string;
    operation?: string;
    stack?: string;
  };
}

/** Receives every line the logger decides to emit. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerConfig {
  prefix: string;
  minLevel: LogLevel;
  includeTimestamp: boolean;
  structuredOutput: boolean;
  sink: LogSink;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "debug":
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

const DEFAULT_CONFIG: LoggerConfig = {
  prefix: "[mushaf]",
  minLevel: "info",
  includeTimestamp: false,
  structuredOutput: false,
  sink: consoleSink,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function describeError(error: unknown): LogEntry["error"] | undefined {
  if (isCorpusError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      operation: error.context.operation,
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return undefined;
}

/**
 * Leveled logger for the ingestion pipeline.
 * Plain mode writes `prefix [LEVEL] message | k=v`; structured mode writes one JSON object per line.
 */
class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  private formatPlain(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(this.config.prefix, `[${level.toUpperCase()}]`, message);

    if (context && Object.keys(context).length > 0) {
      const contextStr = Object.entries(context)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(" ");
      parts.push(`| ${contextStr}`);
    }

    if (isCorpusError(error)) {
      parts.push(`| ${error.toLogMessage()}`);
    } else if (error instanceof Error) {
      parts.push(`| ${error.name}: ${error.message}`);
    }

    return parts.join(" ");
  }

  private formatStructured(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): string {
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (context && Object.keys(context).length > 0) entry.context = context;
    const described = describeError(error);
    if (described) entry.error = described;
    return JSON.stringify(entry);
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.shouldLog(level)) return;

    const line = this.config.structuredOutput
      ? this.formatStructured(level, message, context, error)
      : this.formatPlain(level, message, context, error);
    this.config.sink(level, line);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("warn", message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: unknown): void {
    this.log("error", message, context, error);
  }

  child(context: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this, context);
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  reset(): void {
    this.config = { ...DEFAULT_CONFIG };
  }
}

/**
 * Logger with persistent context (per run, per unit).
 */
export class ContextualLogger {
  constructor(
    private parent: Logger,
    private context: Record<string, unknown>
  ) {}

  debug(message: string, extra?: Record<string, unknown>): void {
    this.parent.log("debug", message, { ...this.context, ...extra });
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.parent.log("info", message, { ...this.context, ...extra });
  }

  warn(message: string, extra?: Record<string, unknown>, error?: unknown): void {
    this.parent.log("warn", message, { ...this.context, ...extra }, error);
  }

  error(message: string, extra?: Record<string, unknown>, error?: unknown): void {
    this.parent.log("error", message, { ...this.context, ...extra }, error);
  }

  child(extra: Record<string, unknown>): ContextualLogger {
    return new ContextualLogger(this.parent, { ...this.context, ...extra });
  }
}

export type { Logger };

export const logger = new Logger();

export function createLogger(context: Record<string, unknown>): ContextualLogger {
  return logger.child(context);
}

if (typeof process !== "undefined" && process.env) {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(level)) {
    logger.configure({ minLevel: level });
  }
  if (process.env.MUSHAF_STRUCTURED_LOGS === "true") {
    logger.configure({ structuredOutput: true });
  }
}
