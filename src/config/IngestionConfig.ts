import { CorpusValidationError } from "../errors";
import type { RetryConfig } from "../utils/retry";
import {
  CORPUS_SHAPE,
  HTTP_DEFAULTS,
  INGESTION_DEFAULTS,
  RETRY_DEFAULTS,
  SOURCE_DEFAULTS,
} from "./constants";

export type IngestionMode = "fill-missing" | "force-refresh";

export interface CorpusShape {
  juzCount: number;
  hezbsPerJuz: number;
  pageCount: number;
}

export interface IngestionConfig {
  apiBaseUrl: string;
  audioBaseUrl: string;
  reciterId: number;
  /** PGlite data directory; in-memory store when absent */
  dbPath?: string;
  timeoutMs: number;
  userAgent: string;
  retry: RetryConfig;
  concurrency: number;
  mode: IngestionMode;
  progressEvery: number;
  shape: CorpusShape;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw CorpusValidationError.invalidConfig(name, raw, "a non-negative integer");
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw CorpusValidationError.invalidConfig(name, raw, `an integer in [${min}, ${max}]`);
  }
  return value;
}

function readUrl(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  try {
    const url = new URL(raw);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw CorpusValidationError.invalidConfig(name, raw, "an http(s) URL");
    }
    return raw;
  } catch (err) {
    if (err instanceof CorpusValidationError) throw err;
    throw CorpusValidationError.invalidConfig(name, raw, "an absolute URL");
  }
}

function readMode(env: Env): IngestionMode {
  const raw = env.MUSHAF_MODE?.trim();
  if (!raw) return INGESTION_DEFAULTS.MODE;
  if (raw === "fill-missing" || raw === "force-refresh") return raw;
  throw CorpusValidationError.invalidConfig("MUSHAF_MODE", raw, '"fill-missing" or "force-refresh"');
}

/**
 * Build the run configuration from environment variables, falling back to the defaults in constants.ts.
 */
export function loadIngestionConfig(env: Env = process.env): IngestionConfig {
  const initialDelayMs = readInt(env, "MUSHAF_RETRY_BASE_MS", RETRY_DEFAULTS.INITIAL_DELAY_MS, 0);
  const maxDelayMs = readInt(env, "MUSHAF_RETRY_MAX_MS", RETRY_DEFAULTS.MAX_DELAY_MS, 0);
  if (maxDelayMs < initialDelayMs) {
    throw CorpusValidationError.invalidConfig(
      "MUSHAF_RETRY_MAX_MS",
      maxDelayMs,
      `at least MUSHAF_RETRY_BASE_MS (${initialDelayMs})`
    );
  }

  const dbPath = env.MUSHAF_DB_PATH?.trim();

  return {
    apiBaseUrl: readUrl(env, "MUSHAF_API_BASE_URL", SOURCE_DEFAULTS.API_BASE_URL),
    audioBaseUrl: readUrl(env, "MUSHAF_AUDIO_BASE_URL", SOURCE_DEFAULTS.AUDIO_BASE_URL),
    reciterId: readInt(env, "MUSHAF_RECITER_ID", SOURCE_DEFAULTS.RECITER_ID, 1),
    dbPath: dbPath ? dbPath : undefined,
    timeoutMs: readInt(env, "MUSHAF_TIMEOUT_MS", HTTP_DEFAULTS.TIMEOUT_MS, 1),
    userAgent: env.MUSHAF_USER_AGENT?.trim() || HTTP_DEFAULTS.USER_AGENT,
    retry: {
      maxAttempts: readInt(env, "MUSHAF_MAX_ATTEMPTS", RETRY_DEFAULTS.MAX_ATTEMPTS, 1),
      initialDelayMs,
      maxDelayMs,
      backoffMultiplier: RETRY_DEFAULTS.BACKOFF_MULTIPLIER,
      jitterRatio: RETRY_DEFAULTS.JITTER_RATIO,
    },
    concurrency: readInt(
      env,
      "MUSHAF_CONCURRENCY",
      INGESTION_DEFAULTS.CONCURRENCY,
      1,
      INGESTION_DEFAULTS.MAX_CONCURRENCY
    ),
    mode: readMode(env),
    progressEvery: readInt(env, "MUSHAF_PROGRESS_EVERY", INGESTION_DEFAULTS.PROGRESS_EVERY, 1),
    shape: {
      juzCount: CORPUS_SHAPE.JUZ_COUNT,
      hezbsPerJuz: readInt(env, "MUSHAF_HEZBS_PER_JUZ", CORPUS_SHAPE.HEZBS_PER_JUZ, 1),
      pageCount: CORPUS_SHAPE.PAGE_COUNT,
    },
  };
}
