import { asc, count, eq } from "drizzle-orm";
import { CorpusDatabaseError } from "../errors";
import { logger } from "../utils/logger";
import { hezbs, juzs, pages, suras, type SuraRow } from "./schema";
import type { SeedSource } from "./seedData";
import type { CorpusDb } from "./store";

export interface SeedCounts {
  suras: number;
  juzs: number;
  hezbs: number;
  pages: number;
}

/**
 * Seeded structural tables: Suras, Juzs, Hezbs, Pages.
 */
export class StructureRepository {
  constructor(private db: CorpusDb) {}

  /**
   * Insert seed rows, leaving existing rows untouched. Idempotent - safe to run multiple times.
   * Returns the number of rows actually inserted per table.
   */
  async seed(source: SeedSource): Promise<SeedCounts> {
    const [suraSeeds, juzSeeds, hezbSeeds, pageSeeds] = await Promise.all([
      source.loadSuras(),
      source.loadJuzs(),
      source.loadHezbs(),
      source.loadPages(),
    ]);

    const inserted = await this.db.transaction(async (tx) => {
      const counts: SeedCounts = { suras: 0, juzs: 0, hezbs: 0, pages: 0 };

      if (juzSeeds.length > 0) {
        const rows = await tx.insert(juzs).values(juzSeeds).onConflictDoNothing().returning({ id: juzs.juzId });
        counts.juzs = rows.length;
      }
      if (hezbSeeds.length > 0) {
        const rows = await tx.insert(hezbs).values(hezbSeeds).onConflictDoNothing().returning({ id: hezbs.hezbId });
        counts.hezbs = rows.length;
      }
      if (pageSeeds.length > 0) {
        const rows = await tx.insert(pages).values(pageSeeds).onConflictDoNothing().returning({ id: pages.pageId });
        counts.pages = rows.length;
      }
      if (suraSeeds.length > 0) {
        const rows = await tx.insert(suras).values(suraSeeds).onConflictDoNothing().returning({ id: suras.suraId });
        counts.suras = rows.length;
      }
      return counts;
    });

    logger.info("Seeded structural tables", { ...inserted });
    return inserted;
  }

  async counts(): Promise<SeedCounts> {
    const [[s], [j], [h], [p]] = await Promise.all([
      this.db.select({ n: count() }).from(suras),
      this.db.select({ n: count() }).from(juzs),
      this.db.select({ n: count() }).from(hezbs),
      this.db.select({ n: count() }).from(pages),
    ]);
    return { suras: s?.n ?? 0, juzs: j?.n ?? 0, hezbs: h?.n ?? 0, pages: p?.n ?? 0 };
  }

  /**
   * Fatal precondition for ingestion: every seeded table has rows.
   */
  async assertSeeded(): Promise<void> {
    const c = await this.counts();
    const missing: string[] = [];
    if (c.suras === 0) missing.push("Suras");
    if (c.juzs === 0) missing.push("Juzs");
    if (c.hezbs === 0) missing.push("Hezbs");
    if (c.pages === 0) missing.push("Pages");
    if (missing.length > 0) {
      throw CorpusDatabaseError.seedMissing(missing, { operation: "assertSeeded" });
    }
  }

  async listSuras(): Promise<SuraRow[]> {
    return this.db.select().from(suras).orderBy(asc(suras.suraId));
  }

  async getSura(suraId: number): Promise<SuraRow | null> {
    const rows = await this.db.select().from(suras).where(eq(suras.suraId, suraId)).limit(1);
    return rows[0] ?? null;
  }

  async listJuzs() {
    return this.db.select().from(juzs).orderBy(asc(juzs.juzNumber));
  }

  async listHezbs() {
    return this.db.select().from(hezbs).orderBy(asc(hezbs.hezbNumber));
  }
}
