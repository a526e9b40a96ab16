import { PGlite } from "@electric-sql/pglite";
import { drizzle, type PgliteDatabase } from "drizzle-orm/pglite";
import { CorpusDatabaseError } from "../errors";
import { logger } from "../utils/logger";
import { migrate } from "./migrate";
import * as schema from "./schema";

export type CorpusDb = PgliteDatabase<typeof schema>;
export type CorpusTx = Parameters<Parameters<CorpusDb["transaction"]>[0]>[0];

export interface CorpusStore {
  db: CorpusDb;
  client: PGlite;
  /** Data directory, or undefined for an in-memory store */
  dataDir?: string;
  close(): Promise<void>;
}

export interface OpenStoreOptions {
  dataDir?: string;
  /** Skip DDL, for read-only consumers of an already migrated store */
  skipMigrate?: boolean;
}

/**
 * Open (and migrate) the embedded corpus store.
 * The returned store is owned by the caller and must be closed.
 */
export async function openCorpusStore(opts: OpenStoreOptions = {}): Promise<CorpusStore> {
  const client = opts.dataDir ? new PGlite(opts.dataDir) : new PGlite();
  try {
    await client.waitReady;
    if (!opts.skipMigrate) await migrate(client);
  } catch (err) {
    await client.close().catch((closeErr: unknown) =>
      logger.warn("Corpus store close after failed open also failed", { error: String(closeErr) })
    );
    throw CorpusDatabaseError.connectionFailed(
      err instanceof Error ? err : undefined,
      { operation: "openCorpusStore", dataDir: opts.dataDir ?? "memory://" }
    );
  }

  const db = drizzle(client, { schema });
  logger.debug("Corpus store opened", { dataDir: opts.dataDir ?? "memory://" });

  return {
    db,
    client,
    dataDir: opts.dataDir,
    async close() {
      await client.close();
    },
  };
}

/**
 * Postgres SQLSTATE of a driver error, looking through wrapper errors.
 */
export function sqlStateOf(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 4 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && typeof current.code === "string" && /^[0-9A-Z]{5}$/.test(current.code)) {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

/** Class 23: integrity constraint violation */
export function isConstraintViolation(err: unknown): boolean {
  return sqlStateOf(err)?.startsWith("23") ?? false;
}
