import type { AudioSegment } from "../db/schema";

export interface WordRecord {
  wordId: number;
  ayatId: number;
  wordNumber: number;
  textUthmani: string;
  /** "word", "end" (ayah number marker), ... */
  type: string;
  pageNumber: number | null;
  lineNumber: number | null;
  audioUrl: string | null;
}

/**
 * One verse as parsed from the remote source, ready for the writer.
 * Structural references are by number (juz/hizb/page); the writer resolves them to seeded ids.
 */
export interface VerseRecord {
  ayatId: number;
  suraId: number;
  ayatNumber: number;
  textUthmani: string;
  juzNumber: number;
  hezbNumber: number;
  pageNumber: number;
  sajdahNumber: number | null;
  audioUrl: string | null;
  audioSegments: AudioSegment[] | null;
  words: WordRecord[];
}
