/**
 * zod schemas for the quran.com v4 payloads the pipeline consumes.
 * Only the fields we persist are declared; unknown keys are stripped.
 */

import { z } from "zod";

const positiveInt = z.number().int().positive();
const optionalText = z.string().nullable().optional();

// ============================================================================
// verses/by_key/{chapter}:{verse}
// ============================================================================

export const wordPayloadSchema = z.object({
  id: positiveInt,
  position: positiveInt,
  text_uthmani: z.string(),
  char_type_name: z.string().optional(),
  page_number: positiveInt.nullable().optional(),
  line_number: positiveInt.nullable().optional(),
  audio_url: optionalText,
});

export type WordPayload = z.infer<typeof wordPayloadSchema>;

export const verseAudioSchema = z.object({
  url: optionalText,
  segments: z.array(z.array(z.number())).optional(),
});

export const versePayloadSchema = z.object({
  id: positiveInt.optional(),
  verse_number: positiveInt,
  verse_key: z.string().optional(),
  chapter_id: positiveInt.optional(),
  text_uthmani: z.string().min(1, "text_uthmani is empty"),
  juz_number: positiveInt,
  hizb_number: positiveInt,
  page_number: positiveInt,
  sajdah_number: positiveInt.nullable().optional(),
  audio: verseAudioSchema.nullable().optional(),
  words: z.array(wordPayloadSchema).min(1, "verse has no words"),
});

export type VersePayload = z.infer<typeof versePayloadSchema>;

export const verseResponseSchema = z.object({
  verse: versePayloadSchema,
});

// ============================================================================
// chapters?language=ar
// ============================================================================

export const chapterPayloadSchema = z.object({
  id: positiveInt,
  name_arabic: z.string().min(1),
  revelation_order: positiveInt,
  verses_count: positiveInt,
});

export const chaptersResponseSchema = z.object({
  chapters: z.array(chapterPayloadSchema).min(1, "chapter list is empty"),
});

export type ChapterPayload = z.infer<typeof chapterPayloadSchema>;

/** Compact one-line summary of a zod failure for reports. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
