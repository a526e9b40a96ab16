import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { AyatsRepository } from "../src/db/ayatsRepository";
import { StructureRepository } from "../src/db/structureRepository";
import type { CorpusStore } from "../src/db/store";
import { EnrichmentEngine } from "../src/services/EnrichmentEngine";
import { ErrorCode } from "../src/errors";
import { createTestStore, makeVerseRecord, seedTestStructure, TEST_LAYOUT } from "./setup";

describe("EnrichmentEngine", () => {
  let store: CorpusStore;
  let ayats: AyatsRepository;
  let structure: StructureRepository;
  let engine: EnrichmentEngine;

  async function writeVerses(ids: number[], options: { withoutWords?: number[] } = {}) {
    for (const id of ids) {
      const overrides = options.withoutWords?.includes(id) ? { words: [] } : {};
      const result = await ayats.upsertVerse(makeVerseRecord(id, overrides));
      if (!result.ok) throw result.failure.error;
    }
  }

  beforeEach(async () => {
    store = await createTestStore();
    await seedTestStructure(store);
    ayats = new AyatsRepository(store.db);
    structure = new StructureRepository(store.db);
    engine = new EnrichmentEngine(store.db);
  });

  afterEach(async () => {
    await store.close();
  });

  it("should derive juz ranges from the owned verses", async () => {
    await writeVerses(TEST_LAYOUT.map((e) => e.ayatId));

    const report = await engine.updateJuzRanges();

    expect(report).toEqual({ pass: "juzRanges", updated: 3, failures: [] });
    const juzs = await structure.listJuzs();
    expect(juzs.map((j) => [j.juzNumber, j.firstAyatId, j.lastAyatId, j.versesCount])).toEqual([
      [1, 1, 3, 3],
      [2, 4, 6, 3],
      [3, 7, 8, 2],
    ]);
  });

  it("should set group pages to the lowest page of their verses", async () => {
    await writeVerses(TEST_LAYOUT.map((e) => e.ayatId));

    const report = await engine.updateGroupPages();

    expect(report.updated).toBe(8);
    expect(report.failures).toEqual([
      { table: "Hezbs", groupId: 6, reason: "Hezb 6 owns no verses", code: ErrorCode.ENRICHMENT_EMPTY_GROUP },
    ]);
    expect((await structure.listJuzs()).map((j) => j.pageNumber)).toEqual([1, 2, 4]);
    expect((await structure.listHezbs()).map((h) => h.pageNumber)).toEqual([1, 2, 2, 3, 4, null]);
  });

  it("should take sura page and line from the first word of the first verse", async () => {
    await writeVerses(TEST_LAYOUT.map((e) => e.ayatId));

    const report = await engine.updateSuraPageLines();

    expect(report).toEqual({ pass: "suraPageLines", updated: 2, failures: [] });
    const suras = await structure.listSuras();
    expect(suras.map((s) => [s.suraId, s.pageNumber, s.lineNumber])).toEqual([
      [1, 1, 2],
      [2, 2, 5],
    ]);
  });

  it("should keep the range of a juz with a missing verse", async () => {
    await writeVerses([1, 3, 4, 5, 6, 7, 8]);

    const report = await engine.updateJuzRanges();

    expect(report.failures).toEqual([]);
    const [juz1] = await structure.listJuzs();
    expect(juz1).toMatchObject({ firstAyatId: 1, lastAyatId: 3, versesCount: 3 });
  });

  it("should report empty juzs and leave them untouched", async () => {
    await writeVerses([1, 2, 3]);

    const report = await engine.updateJuzRanges();

    expect(report.updated).toBe(1);
    expect(report.failures.map((f) => [f.table, f.groupId, f.code])).toEqual([
      ["Juzs", 2, ErrorCode.ENRICHMENT_EMPTY_GROUP],
      ["Juzs", 3, ErrorCode.ENRICHMENT_EMPTY_GROUP],
    ]);
    const juzs = await structure.listJuzs();
    expect(juzs.map((j) => j.versesCount)).toEqual([3, null, null]);
  });

  it("should report a sura whose first verse has no words", async () => {
    await writeVerses(TEST_LAYOUT.map((e) => e.ayatId), { withoutWords: [4] });

    const report = await engine.updateSuraPageLines();

    expect(report.updated).toBe(1);
    expect(report.failures).toEqual([
      {
        table: "Suras",
        groupId: 2,
        reason: "First verse 4 has no words",
        code: ErrorCode.ENRICHMENT_MISSING_LAYOUT,
      },
    ]);
    expect((await structure.getSura(2))?.pageNumber).toBeNull();
  });

  it("should run all passes and converge on rerun", async () => {
    await writeVerses(TEST_LAYOUT.map((e) => e.ayatId));

    const first = await engine.runAll();
    const snapshot = {
      juzs: await structure.listJuzs(),
      hezbs: await structure.listHezbs(),
      suras: await structure.listSuras(),
    };
    const second = await engine.runAll();

    expect(first.map((r) => r.pass)).toEqual(["juzRanges", "groupPages", "suraPageLines"]);
    expect(second).toEqual(first);
    expect({
      juzs: await structure.listJuzs(),
      hezbs: await structure.listHezbs(),
      suras: await structure.listSuras(),
    }).toEqual(snapshot);
  });
});
