import { loadIngestionConfig, type IngestionConfig } from "./config/IngestionConfig";
import { AyatsRepository } from "./db/ayatsRepository";
import type { SeedSource } from "./db/seedData";
import { openCorpusStore, type CorpusStore } from "./db/store";
import { StructureRepository, type SeedCounts } from "./db/structureRepository";
import { buildKeySpace, selectKeys } from "./orchestrator/keySpace";
import {
  IngestionOrchestrator,
  type IngestionOptions,
  type IngestionReport,
} from "./orchestrator/IngestionOrchestrator";
import { ChapterCatalog, createRemoteSeedSource } from "./services/ChapterCatalog";
import { EnrichmentEngine, type PassReport } from "./services/EnrichmentEngine";
import { RetryClient, type RetryClientOptions } from "./services/RetryClient";
import {
  StoreVerifier,
  type HezbCountMismatch,
  type JuzCoverageReport,
  type PageOrderViolation,
} from "./services/StoreVerifier";
import { VerseFetcher } from "./services/VerseFetcher";
import { logger } from "./utils/logger";

export * from "./errors";
export * from "./config/constants";
export { loadIngestionConfig, type IngestionConfig, type IngestionMode, type CorpusShape } from "./config/IngestionConfig";
export * from "./db/schema";
export { openCorpusStore, type CorpusStore, type CorpusDb } from "./db/store";
export * from "./db/seedData";
export { StructureRepository, type SeedCounts } from "./db/structureRepository";
export { AyatsRepository, type WriteResult, type WriteFailure } from "./db/ayatsRepository";
export * from "./orchestrator/keySpace";
export * from "./orchestrator/IngestionOrchestrator";
export * from "./services/RetryClient";
export * from "./services/VerseFetcher";
export type { VerseRecord, WordRecord } from "./services/VerseFetcher.types";
export * from "./services/ChapterCatalog";
export * from "./services/EnrichmentEngine";
export * from "./services/StoreVerifier";
export { logger, createLogger, type LogLevel, type LoggerConfig } from "./utils/logger";
export { computeBackoffDelay, parseRetryAfter, type RetryConfig } from "./utils/retry";

export interface Pipeline {
  config: IngestionConfig;
  store: CorpusStore;
  client: RetryClient;
  catalog: ChapterCatalog;
  structure: StructureRepository;
  ayats: AyatsRepository;
  orchestrator: IngestionOrchestrator;
  enrichment: EnrichmentEngine;
  verifier: StoreVerifier;
  /** Closes the store unless it was supplied by the caller */
  close(): Promise<void>;
}

export interface PipelineOverrides {
  fetchImpl?: RetryClientOptions["fetchImpl"];
  sleep?: RetryClientOptions["sleep"];
  random?: RetryClientOptions["random"];
  store?: CorpusStore;
}

export interface PipelineRunOptions {
  /** Defaults to the remote chapter catalog plus the standard layout */
  seed?: SeedSource;
  ingestion?: IngestionOptions;
  /** Restrict ingestion to these verse ids */
  ayatIds?: number[];
}

export interface PipelineReport {
  seeded: SeedCounts;
  ingestion: IngestionReport;
  /** Null when ingestion was cancelled */
  enrichment: PassReport[] | null;
  coverage: JuzCoverageReport | null;
  hezbMismatches: HezbCountMismatch[] | null;
  pageOrderViolations: PageOrderViolation[] | null;
}

/**
 * Wire every component of a run around one store and one retry client.
 */
export async function createPipeline(
  config: IngestionConfig = loadIngestionConfig(),
  overrides: PipelineOverrides = {}
): Promise<Pipeline> {
  const ownsStore = overrides.store === undefined;
  const store = overrides.store ?? (await openCorpusStore({ dataDir: config.dbPath }));

  const client = new RetryClient({
    retry: config.retry,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    fetchImpl: overrides.fetchImpl,
    sleep: overrides.sleep,
    random: overrides.random,
  });
  const fetcher = new VerseFetcher(client, {
    apiBaseUrl: config.apiBaseUrl,
    audioBaseUrl: config.audioBaseUrl,
    reciterId: config.reciterId,
    timeoutMs: config.timeoutMs,
  });
  const structure = new StructureRepository(store.db);
  const ayats = new AyatsRepository(store.db);

  return {
    config,
    store,
    client,
    catalog: new ChapterCatalog(client, { apiBaseUrl: config.apiBaseUrl }),
    structure,
    ayats,
    orchestrator: new IngestionOrchestrator(
      { fetcher, writer: ayats, seeds: structure },
      { mode: config.mode, concurrency: config.concurrency, progressEvery: config.progressEvery }
    ),
    enrichment: new EnrichmentEngine(store.db),
    verifier: new StoreVerifier(store.db),
    async close() {
      if (ownsStore) await store.close();
    },
  };
}

/**
 * Seed, ingest, then (unless cancelled) enrich and verify.
 */
export async function runPipeline(pipeline: Pipeline, options: PipelineRunOptions = {}): Promise<PipelineReport> {
  const source = options.seed ?? createRemoteSeedSource(pipeline.catalog, pipeline.config.shape);
  const seeded = await pipeline.structure.seed(source);

  const suras = await pipeline.structure.listSuras();
  const keySpace = buildKeySpace(suras);
  const keys = options.ayatIds ? selectKeys(keySpace, options.ayatIds) : keySpace;

  const ingestion = await pipeline.orchestrator.run(keys, options.ingestion);
  if (ingestion.cancelled) {
    logger.warn("Run cancelled before enrichment", { succeeded: ingestion.succeeded });
    return { seeded, ingestion, enrichment: null, coverage: null, hezbMismatches: null, pageOrderViolations: null };
  }

  const enrichment = await pipeline.enrichment.runAll();
  const coverage = await pipeline.verifier.checkJuzCoverage(keySpace.length);
  const hezbMismatches = await pipeline.verifier.checkHezbsPerJuz(pipeline.config.shape.hezbsPerJuz);
  const pageOrderViolations = await pipeline.verifier.checkPageOrdering();

  return { seeded, ingestion, enrichment, coverage, hezbMismatches, pageOrderViolations };
}
