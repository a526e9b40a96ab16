import { asc, count, eq, max, min } from "drizzle-orm";
import { ayats, hezbs, juzs, pages, suras, words } from "../db/schema";
import type { CorpusDb, CorpusTx } from "../db/store";
import { ErrorCode } from "../errors";
import { createLogger } from "../utils/logger";

export type EnrichmentPass = "juzRanges" | "groupPages" | "suraPageLines";

export interface EnrichmentFailure {
  table: "Juzs" | "Hezbs" | "Suras";
  groupId: number;
  reason: string;
  code: ErrorCode;
}

export interface PassReport {
  pass: EnrichmentPass;
  updated: number;
  failures: EnrichmentFailure[];
}

const log = createLogger({ component: "EnrichmentEngine" });

/**
 * Derives aggregate columns of the structural tables from the ingested verses and words.
 *
 * Each pass reads and writes inside one transaction and can be rerun at any time.
 * Groups without verses keep their previous values and are reported as failures.
 */
export class EnrichmentEngine {
  constructor(private db: CorpusDb) {}

  /**
   * Juzs: first/last ayat id and verses_count = last - first + 1.
   */
  async updateJuzRanges(): Promise<PassReport> {
    const report = this.emptyReport("juzRanges");

    await this.db.transaction(async (tx) => {
      const ranges = await tx
        .select({
          juzId: ayats.juzId,
          first: min(ayats.ayatId),
          last: max(ayats.ayatId),
          actual: count(),
        })
        .from(ayats)
        .groupBy(ayats.juzId);
      const byJuz = new Map(ranges.map((r) => [r.juzId, r]));

      for (const juz of await this.listJuzIds(tx)) {
        const range = byJuz.get(juz.juzId);
        if (!range || range.first === null || range.last === null) {
          this.fail(report, "Juzs", juz.juzId, `Juz ${juz.juzNumber} owns no verses`, ErrorCode.ENRICHMENT_EMPTY_GROUP);
          continue;
        }

        const versesCount = range.last - range.first + 1;
        if (range.actual !== versesCount) {
          log.warn("Juz range has gaps", {
            juzNumber: juz.juzNumber,
            first: range.first,
            last: range.last,
            actual: range.actual,
          });
        }

        await tx
          .update(juzs)
          .set({ firstAyatId: range.first, lastAyatId: range.last, versesCount })
          .where(eq(juzs.juzId, juz.juzId));
        report.updated++;
      }
    });

    return this.finish(report);
  }

  /**
   * Juzs and Hezbs: page_number = lowest page among the verses each one owns.
   */
  async updateGroupPages(): Promise<PassReport> {
    const report = this.emptyReport("groupPages");

    await this.db.transaction(async (tx) => {
      const juzPages = await tx
        .select({ juzId: ayats.juzId, page: min(pages.pageNumber) })
        .from(ayats)
        .innerJoin(pages, eq(pages.pageId, ayats.pageId))
        .groupBy(ayats.juzId);
      const pageByJuz = new Map(juzPages.map((r) => [r.juzId, r.page]));

      for (const juz of await this.listJuzIds(tx)) {
        const page = pageByJuz.get(juz.juzId);
        if (page === undefined || page === null) {
          this.fail(report, "Juzs", juz.juzId, `Juz ${juz.juzNumber} owns no verses`, ErrorCode.ENRICHMENT_EMPTY_GROUP);
          continue;
        }
        await tx.update(juzs).set({ pageNumber: page }).where(eq(juzs.juzId, juz.juzId));
        report.updated++;
      }

      const hezbPages = await tx
        .select({ hezbId: ayats.hezbId, page: min(pages.pageNumber) })
        .from(ayats)
        .innerJoin(pages, eq(pages.pageId, ayats.pageId))
        .groupBy(ayats.hezbId);
      const pageByHezb = new Map(hezbPages.map((r) => [r.hezbId, r.page]));

      const allHezbs = await tx
        .select({ hezbId: hezbs.hezbId, hezbNumber: hezbs.hezbNumber })
        .from(hezbs)
        .orderBy(asc(hezbs.hezbNumber));
      for (const hezb of allHezbs) {
        const page = pageByHezb.get(hezb.hezbId);
        if (page === undefined || page === null) {
          this.fail(report, "Hezbs", hezb.hezbId, `Hezb ${hezb.hezbNumber} owns no verses`, ErrorCode.ENRICHMENT_EMPTY_GROUP);
          continue;
        }
        await tx.update(hezbs).set({ pageNumber: page }).where(eq(hezbs.hezbId, hezb.hezbId));
        report.updated++;
      }
    });

    return this.finish(report);
  }

  /**
   * Suras: page and line of the first word of the first verse.
   */
  async updateSuraPageLines(): Promise<PassReport> {
    const report = this.emptyReport("suraPageLines");

    await this.db.transaction(async (tx) => {
      const firsts = await tx
        .select({ suraId: ayats.suraId, firstAyatId: min(ayats.ayatId) })
        .from(ayats)
        .groupBy(ayats.suraId);
      const firstBySura = new Map(firsts.map((r) => [r.suraId, r.firstAyatId]));

      const allSuras = await tx.select({ suraId: suras.suraId }).from(suras).orderBy(asc(suras.suraId));
      for (const { suraId } of allSuras) {
        const firstAyatId = firstBySura.get(suraId);
        if (firstAyatId === undefined || firstAyatId === null) {
          this.fail(report, "Suras", suraId, `Sura ${suraId} owns no verses`, ErrorCode.ENRICHMENT_EMPTY_GROUP);
          continue;
        }

        const [firstWord] = await tx
          .select({ pageNumber: words.pageNumber, lineNumber: words.lineNumber })
          .from(words)
          .where(eq(words.ayatId, firstAyatId))
          .orderBy(asc(words.wordNumber))
          .limit(1);
        if (!firstWord) {
          this.fail(report, "Suras", suraId, `First verse ${firstAyatId} has no words`, ErrorCode.ENRICHMENT_MISSING_LAYOUT);
          continue;
        }
        if (firstWord.pageNumber === null) {
          this.fail(report, "Suras", suraId, `First word of verse ${firstAyatId} has no page`, ErrorCode.ENRICHMENT_MISSING_LAYOUT);
          continue;
        }

        await tx
          .update(suras)
          .set({ pageNumber: firstWord.pageNumber, lineNumber: firstWord.lineNumber })
          .where(eq(suras.suraId, suraId));
        report.updated++;
      }
    });

    return this.finish(report);
  }

  /** Passes run one after another, in dependency-free order. */
  async runAll(): Promise<PassReport[]> {
    const reports: PassReport[] = [];
    reports.push(await this.updateJuzRanges());
    reports.push(await this.updateGroupPages());
    reports.push(await this.updateSuraPageLines());
    return reports;
  }

  private listJuzIds(tx: CorpusTx) {
    return tx.select({ juzId: juzs.juzId, juzNumber: juzs.juzNumber }).from(juzs).orderBy(asc(juzs.juzNumber));
  }

  private emptyReport(pass: EnrichmentPass): PassReport {
    return { pass, updated: 0, failures: [] };
  }

  private fail(
    report: PassReport,
    table: EnrichmentFailure["table"],
    groupId: number,
    reason: string,
    code: ErrorCode
  ): void {
    report.failures.push({ table, groupId, reason, code });
    log.warn(reason, { pass: report.pass, table, groupId, code });
  }

  private finish(report: PassReport): PassReport {
    log.info("Enrichment pass finished", {
      pass: report.pass,
      updated: report.updated,
      failures: report.failures.length,
    });
    return report;
  }
}
