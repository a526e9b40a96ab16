/**
 * Seed rows for the structural tables.
 * Juzs, Hezbs and Pages follow the standard 15-line mushaf; Suras come from the chapter catalog.
 */

import { CORPUS_SHAPE } from "../config/constants";
import type { CorpusShape } from "../config/IngestionConfig";

export interface SuraSeed {
  suraId: number;
  nameArabic: string;
  revelationOrder: number;
  ayatCount: number;
}

export interface JuzSeed {
  juzId: number;
  juzNumber: number;
}

export interface HezbSeed {
  hezbId: number;
  hezbNumber: number;
  juzId: number;
}

export interface PageSeed {
  pageId: number;
  pageNumber: number;
}

export interface StructureSeed {
  juzs: JuzSeed[];
  hezbs: HezbSeed[];
  pages: PageSeed[];
}

/**
 * Source of seed rows. The core never deletes what it provides.
 */
export interface SeedSource {
  loadSuras(): Promise<SuraSeed[]>;
  loadJuzs(): Promise<JuzSeed[]>;
  loadHezbs(): Promise<HezbSeed[]>;
  loadPages(): Promise<PageSeed[]>;
}

export const STANDARD_SHAPE: CorpusShape = {
  juzCount: CORPUS_SHAPE.JUZ_COUNT,
  hezbsPerJuz: CORPUS_SHAPE.HEZBS_PER_JUZ,
  pageCount: CORPUS_SHAPE.PAGE_COUNT,
};

/** Juz owning a hezb: hezbs 1..k in juz 1, k+1..2k in juz 2, and so on. */
export function juzOfHezb(hezbNumber: number, hezbsPerJuz: number): number {
  return Math.floor((hezbNumber - 1) / hezbsPerJuz) + 1;
}

export function buildStandardSeed(shape: CorpusShape = STANDARD_SHAPE): StructureSeed {
  const juzs: JuzSeed[] = [];
  for (let n = 1; n <= shape.juzCount; n++) {
    juzs.push({ juzId: n, juzNumber: n });
  }

  const hezbs: HezbSeed[] = [];
  for (let n = 1; n <= shape.juzCount * shape.hezbsPerJuz; n++) {
    hezbs.push({ hezbId: n, hezbNumber: n, juzId: juzOfHezb(n, shape.hezbsPerJuz) });
  }

  const pages: PageSeed[] = [];
  for (let n = 1; n <= shape.pageCount; n++) {
    pages.push({ pageId: n, pageNumber: n });
  }

  return { juzs, hezbs, pages };
}

/**
 * Seed source over rows already in memory (tests, pre-built metadata).
 */
export function createStaticSeedSource(suraSeeds: SuraSeed[], structure: StructureSeed): SeedSource {
  return {
    async loadSuras() {
      return suraSeeds;
    },
    async loadJuzs() {
      return structure.juzs;
    },
    async loadHezbs() {
      return structure.hezbs;
    },
    async loadPages() {
      return structure.pages;
    },
  };
}
