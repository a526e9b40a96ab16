import { asc, count, eq } from "drizzle-orm";
import { ayats, hezbs, juzs, pages } from "../db/schema";
import type { CorpusDb } from "../db/store";
import { createLogger } from "../utils/logger";

export interface PageOrderViolation {
  ayatId: number;
  pageNumber: number;
  previousAyatId: number;
  previousPageNumber: number;
}

export interface JuzCoverageReport {
  /** Verse ids in 1..total that no juz range covers */
  gaps: Array<{ from: number; to: number }>;
  /** Juz pairs whose ranges intersect */
  overlaps: Array<{ juzNumber: number; otherJuzNumber: number }>;
  /** Juzs without a derived range */
  unenriched: number[];
}

export interface HezbCountMismatch {
  juzNumber: number;
  expected: number;
  actual: number;
}

const log = createLogger({ component: "StoreVerifier" });

/**
 * Read-only consistency checks over a populated and enriched store.
 */
export class StoreVerifier {
  constructor(private db: CorpusDb) {}

  /**
   * Verses whose page is lower than the page of the verse before them.
   */
  async checkPageOrdering(): Promise<PageOrderViolation[]> {
    const rows = await this.db
      .select({ ayatId: ayats.ayatId, pageNumber: pages.pageNumber })
      .from(ayats)
      .innerJoin(pages, eq(pages.pageId, ayats.pageId))
      .orderBy(asc(ayats.ayatId));

    const violations: PageOrderViolation[] = [];
    let previous: { ayatId: number; pageNumber: number } | undefined;
    for (const row of rows) {
      if (previous && row.pageNumber < previous.pageNumber) {
        violations.push({
          ayatId: row.ayatId,
          pageNumber: row.pageNumber,
          previousAyatId: previous.ayatId,
          previousPageNumber: previous.pageNumber,
        });
      }
      previous = row;
    }

    if (violations.length > 0) log.warn("Page order violations found", { count: violations.length });
    return violations;
  }

  async checkJuzCoverage(totalAyats: number): Promise<JuzCoverageReport> {
    const rows = await this.db
      .select({ juzNumber: juzs.juzNumber, first: juzs.firstAyatId, last: juzs.lastAyatId })
      .from(juzs)
      .orderBy(asc(juzs.juzNumber));

    const report: JuzCoverageReport = { gaps: [], overlaps: [], unenriched: [] };
    const ranges: Array<{ juzNumber: number; first: number; last: number }> = [];
    for (const row of rows) {
      if (row.first === null || row.last === null) {
        report.unenriched.push(row.juzNumber);
      } else {
        ranges.push({ juzNumber: row.juzNumber, first: row.first, last: row.last });
      }
    }
    ranges.sort((a, b) => a.first - b.first);

    let next = 1;
    let previous: (typeof ranges)[number] | undefined;
    for (const range of ranges) {
      if (previous && range.first <= previous.last) {
        report.overlaps.push({ juzNumber: previous.juzNumber, otherJuzNumber: range.juzNumber });
      }
      if (range.first > next) {
        report.gaps.push({ from: next, to: Math.min(range.first - 1, totalAyats) });
      }
      next = Math.max(next, range.last + 1);
      if (!previous || range.last > previous.last) previous = range;
    }
    if (next <= totalAyats) {
      report.gaps.push({ from: next, to: totalAyats });
    }

    log.info("Juz coverage checked", {
      totalAyats,
      gaps: report.gaps.length,
      overlaps: report.overlaps.length,
      unenriched: report.unenriched.length,
    });
    return report;
  }

  /**
   * Juzs whose hezb count differs from the configured number per juz.
   */
  async checkHezbsPerJuz(expected: number): Promise<HezbCountMismatch[]> {
    const counts = await this.db
      .select({ juzNumber: juzs.juzNumber, actual: count(hezbs.hezbId) })
      .from(juzs)
      .leftJoin(hezbs, eq(hezbs.juzId, juzs.juzId))
      .groupBy(juzs.juzNumber)
      .orderBy(asc(juzs.juzNumber));

    return counts
      .filter((c) => c.actual !== expected)
      .map((c) => ({ juzNumber: c.juzNumber, expected, actual: c.actual }));
  }
}
