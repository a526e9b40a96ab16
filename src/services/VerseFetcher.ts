/**
 * VerseFetcher: pulls one verse (with words and audio) per request and parses it into a VerseRecord.
 *
 * Sits between the orchestrator and the RetryClient. Parse failures are permanent: retrying a
 * malformed payload will not fix it. PURE with respect to the store.
 */

import { SOURCE_DEFAULTS } from "../config/constants";
import { CorpusValidationError } from "../errors";
import type { UnitKey } from "../orchestrator/keySpace";
import { verseKey } from "../orchestrator/keySpace";
import { createLogger } from "../utils/logger";
import {
  describeIssues,
  verseResponseSchema,
  type VersePayload,
  type WordPayload,
} from "./payloadSchemas";
import type { FetchFailure, RetryClient } from "./RetryClient";
import type { VerseRecord, WordRecord } from "./VerseFetcher.types";

export interface VerseFetcherOptions {
  apiBaseUrl?: string;
  audioBaseUrl?: string;
  reciterId?: number;
  timeoutMs?: number;
}

export type FetchUnitResult =
  | { ok: true; record: VerseRecord; attempts: number }
  | { ok: false; failure: FetchFailure };

const log = createLogger({ component: "VerseFetcher" });
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Join a relative audio path onto the CDN base. Absolute URLs pass through; blank paths become null.
 */
export function combineUrl(base: string, path: string | null | undefined): string | null {
  if (!path || !path.trim()) return null;
  const trimmed = path.trim();
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  if (trimmed.startsWith("//")) return `https:${trimmed}`;
  return `${base.replace(/\/+$/, "")}/${trimmed.replace(/^\/+/, "")}`;
}

function emptyToNull(value: string | null | undefined): string | null {
  return value && value.trim() ? value : null;
}

export class VerseFetcher {
  private readonly apiBaseUrl: string;
  private readonly audioBaseUrl: string;
  private readonly reciterId: number;
  private readonly timeoutMs?: number;

  constructor(private client: RetryClient, options: VerseFetcherOptions = {}) {
    this.apiBaseUrl = (options.apiBaseUrl ?? SOURCE_DEFAULTS.API_BASE_URL).replace(/\/+$/, "");
    this.audioBaseUrl = options.audioBaseUrl ?? SOURCE_DEFAULTS.AUDIO_BASE_URL;
    this.reciterId = options.reciterId ?? SOURCE_DEFAULTS.RECITER_ID;
    this.timeoutMs = options.timeoutMs;
  }

  buildUrl(key: UnitKey): string {
    const params = new URLSearchParams({
      words: "true",
      audio: String(this.reciterId),
      word_fields: SOURCE_DEFAULTS.WORD_FIELDS,
      fields: SOURCE_DEFAULTS.VERSE_FIELDS,
    });
    return `${this.apiBaseUrl}/verses/by_key/${verseKey(key)}?${params.toString()}`;
  }

  async fetchUnit(key: UnitKey, signal?: AbortSignal): Promise<FetchUnitResult> {
    const url = this.buildUrl(key);
    const outcome = await this.client.fetch({ url, timeoutMs: this.timeoutMs, signal });
    if (!outcome.ok) return outcome;

    const parsed = this.parse(key, url, outcome.body);
    if (parsed instanceof CorpusValidationError) {
      log.warn("Discarding malformed verse payload", { verseKey: verseKey(key) }, parsed);
      return {
        ok: false,
        failure: {
          kind: "Permanent",
          attempts: outcome.attempts,
          lastError: parsed,
          status: outcome.status,
          url,
        },
      };
    }
    return { ok: true, record: parsed, attempts: outcome.attempts };
  }

  /**
   * Decode, validate and normalize a response body. Returns the error instead of throwing.
   */
  parse(key: UnitKey, url: string, body: Uint8Array): VerseRecord | CorpusValidationError {
    const context = { operation: "VerseFetcher.parse", verseKey: verseKey(key), ayatId: key.ayatId };

    let json: unknown;
    try {
      json = JSON.parse(decoder.decode(body));
    } catch (err) {
      return CorpusValidationError.invalidPayload(
        url,
        "body is not valid UTF-8 JSON",
        context,
        err instanceof Error ? err : undefined
      );
    }

    const result = verseResponseSchema.safeParse(json);
    if (!result.success) {
      return CorpusValidationError.invalidPayload(url, describeIssues(result.error), context);
    }
    const verse = result.data.verse;

    if (verse.chapter_id !== undefined && verse.chapter_id !== key.suraId) {
      return CorpusValidationError.keyMismatch("chapter_id", key.suraId, verse.chapter_id, context);
    }
    if (verse.verse_number !== key.ayatNumber) {
      return CorpusValidationError.keyMismatch("verse_number", key.ayatNumber, verse.verse_number, context);
    }
    if (verse.id !== undefined && verse.id !== key.ayatId) {
      return CorpusValidationError.keyMismatch("id", key.ayatId, verse.id, context);
    }

    return this.toRecord(key, verse);
  }

  private toRecord(key: UnitKey, verse: VersePayload): VerseRecord {
    const segments = verse.audio?.segments;
    return {
      ayatId: key.ayatId,
      suraId: key.suraId,
      ayatNumber: key.ayatNumber,
      textUthmani: verse.text_uthmani,
      juzNumber: verse.juz_number,
      hezbNumber: verse.hizb_number,
      pageNumber: verse.page_number,
      sajdahNumber: verse.sajdah_number ?? null,
      audioUrl: combineUrl(this.audioBaseUrl, verse.audio?.url),
      audioSegments: segments && segments.length > 0 ? segments : null,
      words: [...verse.words]
        .sort((a, b) => a.position - b.position)
        .map((w) => this.toWord(key.ayatId, w)),
    };
  }

  private toWord(ayatId: number, word: WordPayload): WordRecord {
    return {
      wordId: word.id,
      ayatId,
      wordNumber: word.position,
      textUthmani: word.text_uthmani,
      type: emptyToNull(word.char_type_name) ?? "word",
      pageNumber: word.page_number ?? null,
      lineNumber: word.line_number ?? null,
      audioUrl: combineUrl(this.audioBaseUrl, word.audio_url),
    };
  }
}
