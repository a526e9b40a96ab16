/**
 * IngestionOrchestrator: walks the verse key space once, fetching and writing each unit.
 *
 * Fetches may run in parallel (one worker per concurrency slot pulling from a shared cursor);
 * writes always go through a single serialized chain. A failed unit is recorded and the run
 * moves on. Only cancellation or an infrastructure error ends a run early.
 */

import { INGESTION_DEFAULTS } from "../config/constants";
import type { IngestionMode } from "../config/IngestionConfig";
import type { WriteResult } from "../db/ayatsRepository";
import { CorpusValidationError, ErrorCode, isCorpusError, wrapError } from "../errors";
import type { FetchFailureKind } from "../services/RetryClient";
import type { FetchUnitResult } from "../services/VerseFetcher";
import type { VerseRecord } from "../services/VerseFetcher.types";
import { createLogger } from "../utils/logger";
import { verseKey, type UnitKey } from "./keySpace";

export interface UnitFetcher {
  fetchUnit(key: UnitKey, signal?: AbortSignal): Promise<FetchUnitResult>;
}

export interface VerseWriter {
  upsertVerse(record: VerseRecord): Promise<WriteResult>;
  listCompleteAyatIds(): Promise<number[]>;
}

export interface SeedCheck {
  assertSeeded(): Promise<void>;
}

export interface IngestionOrchestratorDeps {
  fetcher: UnitFetcher;
  writer: VerseWriter;
  seeds?: SeedCheck;
}

export interface IngestionOptions {
  mode?: IngestionMode;
  concurrency?: number;
  signal?: AbortSignal;
  /** Log a progress line every N finished units; 0 disables */
  progressEvery?: number;
}

export type UnitFailureKind = FetchFailureKind | "WriteConstraintViolation";

export interface UnitFailure {
  ayatId: number;
  verseKey: string;
  kind: UnitFailureKind;
  attempts: number;
  reason: string;
}

export interface IngestionReport {
  total: number;
  succeeded: number;
  skipped: number;
  failed: UnitFailure[];
  cancelled: boolean;
  durationMs: number;
}

const log = createLogger({ component: "IngestionOrchestrator" });

export class IngestionOrchestrator {
  private readonly fetcher: UnitFetcher;
  private readonly writer: VerseWriter;
  private readonly seeds?: SeedCheck;

  constructor(deps: IngestionOrchestratorDeps, private defaults: IngestionOptions = {}) {
    this.fetcher = deps.fetcher;
    this.writer = deps.writer;
    this.seeds = deps.seeds;
  }

  async run(keys: readonly UnitKey[], options: IngestionOptions = {}): Promise<IngestionReport> {
    const mode = options.mode ?? this.defaults.mode ?? INGESTION_DEFAULTS.MODE;
    const concurrency = options.concurrency ?? this.defaults.concurrency ?? INGESTION_DEFAULTS.CONCURRENCY;
    const progressEvery = options.progressEvery ?? this.defaults.progressEvery ?? INGESTION_DEFAULTS.PROGRESS_EVERY;
    const signal = options.signal ?? this.defaults.signal;

    if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > INGESTION_DEFAULTS.MAX_CONCURRENCY) {
      throw CorpusValidationError.invalidConfig(
        "concurrency",
        concurrency,
        `an integer between 1 and ${INGESTION_DEFAULTS.MAX_CONCURRENCY}`
      );
    }

    // Fatal precondition, checked before any network traffic
    await this.seeds?.assertSeeded();

    const startedAt = Date.now();
    // Each verse is attempted at most once per run
    const ordered = [...new Map(keys.map((key) => [key.ayatId, key])).values()].sort((a, b) => a.ayatId - b.ayatId);
    const complete = mode === "fill-missing" ? new Set(await this.writer.listCompleteAyatIds()) : new Set<number>();

    const report: IngestionReport = {
      total: ordered.length,
      succeeded: 0,
      skipped: 0,
      failed: [],
      cancelled: false,
      durationMs: 0,
    };

    log.info("Ingestion started", { total: report.total, mode, concurrency, complete: complete.size });

    let cursor = 0;
    let finished = 0;
    let fatal: unknown = undefined;
    let writeChain: Promise<void> = Promise.resolve();

    const noteFinished = () => {
      finished++;
      if (progressEvery > 0 && finished % progressEvery === 0) {
        log.info("Ingestion progress", {
          finished,
          total: report.total,
          succeeded: report.succeeded,
          skipped: report.skipped,
          failed: report.failed.length,
        });
      }
    };

    const recordFailure = (key: UnitKey, kind: UnitFailureKind, attempts: number, reason: string) => {
      report.failed.push({ ayatId: key.ayatId, verseKey: verseKey(key), kind, attempts, reason });
    };

    // Writes are chained so at most one is in flight, in the order fetches complete
    const enqueueWrite = (key: UnitKey, record: VerseRecord, attempts: number): Promise<void> => {
      const next = writeChain.then(async () => {
        if (fatal !== undefined) return;
        try {
          const result = await this.writer.upsertVerse(record);
          if (result.ok) {
            report.succeeded++;
          } else {
            recordFailure(key, result.failure.kind, attempts, result.failure.reason);
          }
        } catch (err) {
          fatal ??= err;
        }
        noteFinished();
      });
      writeChain = next;
      return next;
    };

    const worker = async () => {
      for (;;) {
        if (fatal !== undefined) return;
        // A run whose units were all attempted is finished, whenever the abort fired
        if (cursor >= ordered.length) return;
        if (signal?.aborted) {
          report.cancelled = true;
          return;
        }
        const key = ordered[cursor++];
        if (key === undefined) return;

        if (complete.has(key.ayatId)) {
          report.skipped++;
          noteFinished();
          continue;
        }

        let fetched: FetchUnitResult;
        try {
          fetched = await this.fetcher.fetchUnit(key, signal);
        } catch (err) {
          fatal ??= err;
          return;
        }

        if (!fetched.ok) {
          // An abort mid-fetch is cancellation, not a unit failure
          if (signal?.aborted) {
            report.cancelled = true;
            return;
          }
          recordFailure(key, fetched.failure.kind, fetched.failure.attempts, fetched.failure.lastError.message);
          noteFinished();
          continue;
        }

        await enqueueWrite(key, fetched.record, fetched.attempts);
      }
    };

    const workerCount = Math.min(concurrency, Math.max(1, ordered.length));
    await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    await writeChain;

    if (fatal !== undefined) {
      const error = isCorpusError(fatal) ? fatal : wrapError(fatal, ErrorCode.INTERNAL, { operation: "IngestionOrchestrator.run" });
      log.error("Ingestion aborted", { finished, total: report.total }, error);
      throw error;
    }

    report.failed.sort((a, b) => a.ayatId - b.ayatId);
    report.durationMs = Date.now() - startedAt;

    log.info(report.cancelled ? "Ingestion cancelled" : "Ingestion finished", {
      total: report.total,
      succeeded: report.succeeded,
      skipped: report.skipped,
      failed: report.failed.length,
      durationMs: report.durationMs,
    });
    return report;
  }
}
