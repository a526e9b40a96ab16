/**
 * Centralized constants for mushaf-store.
 * Avoids magic numbers scattered throughout codebase
 */

export const HTTP_DEFAULTS = {
  TIMEOUT_MS: 30_000,
  USER_AGENT: "mushaf-store/0.1 (+https://api.quran.com)",
} as const;

export const RETRY_DEFAULTS = {
  MAX_ATTEMPTS: 6,
  INITIAL_DELAY_MS: 500,
  MAX_DELAY_MS: 30_000,
  BACKOFF_MULTIPLIER: 2,
  /** Upper bound of the random extra delay, as a fraction of the computed delay */
  JITTER_RATIO: 0.25,
} as const;

export const SOURCE_DEFAULTS = {
  API_BASE_URL: "https://api.quran.com/api/v4",
  AUDIO_BASE_URL: "https://verses.quran.foundation/",
  /** Mishari Rashid al-Afasy */
  RECITER_ID: 7,
  VERSE_FIELDS: "text_uthmani,chapter_id,page_number,juz_number,hizb_number,sajdah_number",
  WORD_FIELDS: "text_uthmani,page_number,line_number,char_type,audio",
  CHAPTER_LANGUAGE: "ar",
} as const;

export const INGESTION_DEFAULTS = {
  CONCURRENCY: 1,
  MAX_CONCURRENCY: 32,
  PROGRESS_EVERY: 250,
  MODE: "fill-missing",
} as const;

export const CORPUS_SHAPE = {
  JUZ_COUNT: 30,
  HEZBS_PER_JUZ: 2,
  PAGE_COUNT: 604,
} as const;
