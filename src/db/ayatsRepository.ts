import { asc, count, eq, getTableName, ne, sql, type SQL } from "drizzle-orm";
import type { PgColumn, PgTable } from "drizzle-orm/pg-core";
import { CorpusDatabaseError, ErrorCode, isCorpusError, type ErrorContext } from "../errors";
import { verseKey } from "../orchestrator/keySpace";
import type { VerseRecord, WordRecord } from "../services/VerseFetcher.types";
import { createLogger } from "../utils/logger";
import { ayats, hezbs, juzs, pages, suras, words, type AyatRow, type WordRow } from "./schema";
import { isConstraintViolation, sqlStateOf, type CorpusDb, type CorpusTx } from "./store";

export interface WriteFailure {
  kind: "WriteConstraintViolation";
  ayatId: number;
  verseKey?: string;
  reason: string;
  error: CorpusDatabaseError;
}

export type WriteResult =
  | { ok: true; ayatId: number; wordsWritten: number }
  | { ok: false; failure: WriteFailure };

interface ResolvedReferences {
  juzId: number;
  hezbId: number;
  pageId: number;
}

const log = createLogger({ component: "AyatsRepository" });

/** Value proposed by the conflicting insert. */
function incoming(column: PgColumn): SQL {
  return sql`excluded.${sql.identifier(column.name)}`;
}

/**
 * Keep the stored value when the incoming one is null (or blank, for text).
 * Both sides are written out by name: a bare parameter here has no inferable type.
 */
function keepExisting(table: PgTable, column: PgColumn, kind: "text" | "value"): SQL {
  const existing = sql`${sql.identifier(getTableName(table))}.${sql.identifier(column.name)}`;
  return kind === "text"
    ? sql`coalesce(nullif(${incoming(column)}, ''), ${existing})`
    : sql`coalesce(${incoming(column)}, ${existing})`;
}

function violation(reason: string, table: string, context: Partial<ErrorContext>): CorpusDatabaseError {
  return CorpusDatabaseError.constraintViolation(reason, { ...context, table });
}

/**
 * Upsert writer for Ayats and Words.
 *
 * Every verse is written in one transaction together with its words, after its structural
 * references are resolved from the seeded tables. Rows are keyed by upstream ids, so a repeated
 * write converges on the same state. Optional columns are never blanked by a leaner payload.
 */
export class AyatsRepository {
  constructor(private db: CorpusDb) {}

  async upsertVerse(record: VerseRecord): Promise<WriteResult> {
    const context = { operation: "upsertVerse", ayatId: record.ayatId, verseKey: verseKey(record) };

    try {
      const wordsWritten = await this.db.transaction(async (tx) => {
        const refs = await this.resolveReferences(tx, record, context);

        await tx
          .insert(ayats)
          .values({
            ayatId: record.ayatId,
            suraId: record.suraId,
            ayatNumber: record.ayatNumber,
            textUthmani: record.textUthmani,
            juzId: refs.juzId,
            hezbId: refs.hezbId,
            pageId: refs.pageId,
            sajdahNumber: record.sajdahNumber,
            audioUrl: record.audioUrl,
            audioSegments: record.audioSegments,
          })
          .onConflictDoUpdate({
            target: ayats.ayatId,
            set: {
              suraId: incoming(ayats.suraId),
              ayatNumber: incoming(ayats.ayatNumber),
              textUthmani: incoming(ayats.textUthmani),
              juzId: incoming(ayats.juzId),
              hezbId: incoming(ayats.hezbId),
              pageId: incoming(ayats.pageId),
              sajdahNumber: keepExisting(ayats, ayats.sajdahNumber, "value"),
              audioUrl: keepExisting(ayats, ayats.audioUrl, "text"),
              audioSegments: keepExisting(ayats, ayats.audioSegments, "value"),
            },
          });

        for (const word of record.words) {
          if (word.ayatId !== record.ayatId) {
            throw violation(
              `Word ${word.wordId} belongs to ayat ${word.ayatId}, not ${record.ayatId}`,
              "Words",
              context
            );
          }
        }
        await this.writeWords(tx, record.words);
        return record.words.length;
      });

      log.debug("Verse written", { ayatId: record.ayatId, wordsWritten });
      return { ok: true, ayatId: record.ayatId, wordsWritten };
    } catch (err) {
      return this.toWriteResult(err, record.ayatId, context.verseKey, context);
    }
  }

  /**
   * Upsert a single word. The owning verse must already be stored.
   */
  async upsertWord(record: WordRecord): Promise<WriteResult> {
    const context = { operation: "upsertWord", ayatId: record.ayatId, wordId: record.wordId };

    try {
      await this.db.transaction(async (tx) => {
        const [owner] = await tx
          .select({ ayatId: ayats.ayatId })
          .from(ayats)
          .where(eq(ayats.ayatId, record.ayatId))
          .limit(1);
        if (!owner) {
          throw violation(`Ayat ${record.ayatId} is not stored`, "Ayats", context);
        }
        await this.writeWords(tx, [record]);
      });
      return { ok: true, ayatId: record.ayatId, wordsWritten: 1 };
    } catch (err) {
      return this.toWriteResult(err, record.ayatId, undefined, context);
    }
  }

  /**
   * Verses that need no refetch: non-empty text and at least one word.
   */
  async listCompleteAyatIds(): Promise<number[]> {
    const rows = await this.db
      .selectDistinct({ ayatId: ayats.ayatId })
      .from(ayats)
      .innerJoin(words, eq(words.ayatId, ayats.ayatId))
      .where(ne(ayats.textUthmani, ""))
      .orderBy(asc(ayats.ayatId));
    return rows.map((r) => r.ayatId);
  }

  async getAyat(ayatId: number): Promise<AyatRow | null> {
    const rows = await this.db.select().from(ayats).where(eq(ayats.ayatId, ayatId)).limit(1);
    return rows[0] ?? null;
  }

  async listWords(ayatId: number): Promise<WordRow[]> {
    return this.db
      .select()
      .from(words)
      .where(eq(words.ayatId, ayatId))
      .orderBy(asc(words.wordNumber));
  }

  async count(): Promise<{ ayats: number; words: number }> {
    const [[a], [w]] = await Promise.all([
      this.db.select({ n: count() }).from(ayats),
      this.db.select({ n: count() }).from(words),
    ]);
    return { ayats: a?.n ?? 0, words: w?.n ?? 0 };
  }

  private async resolveReferences(
    tx: CorpusTx,
    record: VerseRecord,
    context: Partial<ErrorContext>
  ): Promise<ResolvedReferences> {
    const [sura] = await tx
      .select({ suraId: suras.suraId })
      .from(suras)
      .where(eq(suras.suraId, record.suraId))
      .limit(1);
    if (!sura) throw violation(`Sura ${record.suraId} is not seeded`, "Suras", context);

    const [juz] = await tx
      .select({ juzId: juzs.juzId })
      .from(juzs)
      .where(eq(juzs.juzNumber, record.juzNumber))
      .limit(1);
    if (!juz) throw violation(`Juz ${record.juzNumber} is not seeded`, "Juzs", context);

    const [hezb] = await tx
      .select({ hezbId: hezbs.hezbId, juzId: hezbs.juzId })
      .from(hezbs)
      .where(eq(hezbs.hezbNumber, record.hezbNumber))
      .limit(1);
    if (!hezb) throw violation(`Hezb ${record.hezbNumber} is not seeded`, "Hezbs", context);
    if (hezb.juzId !== juz.juzId) {
      throw violation(
        `Hezb ${record.hezbNumber} belongs to juz id ${hezb.juzId}, not juz ${record.juzNumber}`,
        "Hezbs",
        context
      );
    }

    const [page] = await tx
      .select({ pageId: pages.pageId })
      .from(pages)
      .where(eq(pages.pageNumber, record.pageNumber))
      .limit(1);
    if (!page) throw violation(`Page ${record.pageNumber} is not seeded`, "Pages", context);

    return { juzId: juz.juzId, hezbId: hezb.hezbId, pageId: page.pageId };
  }

  private async writeWords(tx: CorpusTx, records: readonly WordRecord[]): Promise<void> {
    if (records.length === 0) return;
    await tx
      .insert(words)
      .values(
        records.map((w) => ({
          wordId: w.wordId,
          ayatId: w.ayatId,
          wordNumber: w.wordNumber,
          textUthmani: w.textUthmani,
          type: w.type,
          pageNumber: w.pageNumber,
          lineNumber: w.lineNumber,
          audioUrl: w.audioUrl,
        }))
      )
      .onConflictDoUpdate({
        target: words.wordId,
        set: {
          ayatId: incoming(words.ayatId),
          wordNumber: incoming(words.wordNumber),
          textUthmani: incoming(words.textUthmani),
          type: incoming(words.type),
          pageNumber: keepExisting(words, words.pageNumber, "value"),
          lineNumber: keepExisting(words, words.lineNumber, "value"),
          audioUrl: keepExisting(words, words.audioUrl, "text"),
        },
      });
  }

  /**
   * Constraint problems become a unit failure; anything else is an infrastructure error and is rethrown.
   */
  private toWriteResult(
    err: unknown,
    ayatId: number,
    key: string | undefined,
    context: Partial<ErrorContext>
  ): WriteResult {
    let error: CorpusDatabaseError;
    if (err instanceof CorpusDatabaseError && err.code === ErrorCode.DB_CONSTRAINT_VIOLATION) {
      error = err;
    } else if (isConstraintViolation(err)) {
      const cause = err instanceof Error ? err : undefined;
      error = CorpusDatabaseError.constraintViolation(
        cause?.message ?? "Integrity constraint violated",
        { ...context, sqlState: sqlStateOf(err) },
        cause
      );
    } else if (isCorpusError(err)) {
      throw err;
    } else {
      throw CorpusDatabaseError.queryFailed(
        String(context.operation ?? "write"),
        "Ayats",
        err instanceof Error ? err : undefined,
        context
      );
    }

    log.warn("Write rejected", { ayatId, verseKey: key }, error);
    return {
      ok: false,
      failure: { kind: "WriteConstraintViolation", ayatId, verseKey: key, reason: error.message, error },
    };
  }
}
