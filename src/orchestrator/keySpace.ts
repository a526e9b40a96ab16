import { CorpusDatabaseError, CorpusValidationError } from "../errors";

/**
 * Address of one structural unit (a verse).
 * ayatId is the global reading-order id; suraId:ayatNumber is the upstream verse key.
 */
export interface UnitKey {
  ayatId: number;
  suraId: number;
  ayatNumber: number;
}

export interface SuraExtent {
  suraId: number;
  ayatCount: number;
}

/**
 * Ordered key space over every verse of the seeded chapters.
 * Verse ids are assigned cumulatively in chapter order, matching upstream numbering.
 */
export function buildKeySpace(suraExtents: readonly SuraExtent[]): UnitKey[] {
  if (suraExtents.length === 0) {
    throw CorpusDatabaseError.seedMissing(["Suras"], { operation: "buildKeySpace" });
  }

  const ordered = [...suraExtents].sort((a, b) => a.suraId - b.suraId);
  const keys: UnitKey[] = [];
  let ayatId = 0;

  for (const sura of ordered) {
    if (!Number.isInteger(sura.ayatCount) || sura.ayatCount < 1) {
      throw CorpusValidationError.invalidFormat("ayatCount", "a positive integer", sura.ayatCount, {
        operation: "buildKeySpace",
        suraId: sura.suraId,
      });
    }
    for (let ayatNumber = 1; ayatNumber <= sura.ayatCount; ayatNumber++) {
      keys.push({ ayatId: ++ayatId, suraId: sura.suraId, ayatNumber });
    }
  }
  return keys;
}

export function verseKey(key: Pick<UnitKey, "suraId" | "ayatNumber">): string {
  return `${key.suraId}:${key.ayatNumber}`;
}

/**
 * Narrow a key space to the given verse ids, e.g. to re-run the failures of a previous report.
 */
export function selectKeys(keys: readonly UnitKey[], ayatIds: Iterable<number>): UnitKey[] {
  const wanted = new Set(ayatIds);
  return keys.filter((k) => wanted.has(k.ayatId));
}
