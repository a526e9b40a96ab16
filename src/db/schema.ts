import {
  pgTable,
  integer,
  text,
  jsonb,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";

/** One audio timing tuple as served upstream, e.g. [wordIndex, wordIndex, startMs, endMs]. */
export type AudioSegment = number[];

// ============================================================================
// SEEDED TABLES
// Rows are created by the seed collaborator; only derived columns change later.
// ============================================================================

export const suras = pgTable("Suras", {
  suraId: integer("sura_id").primaryKey(),
  nameArabic: text("name_arabic").notNull(),
  revelationOrder: integer("revelation_order").notNull(),
  ayatCount: integer("ayat_count").notNull(),
  // derived: page/line of the first word of the first ayah
  pageNumber: integer("page_number"),
  lineNumber: integer("line_number"),
});
export type SuraRow = typeof suras.$inferSelect;

export const juzs = pgTable("Juzs", {
  juzId: integer("juz_id").primaryKey(),
  juzNumber: integer("juz_number").notNull().unique(),
  // derived
  versesCount: integer("verses_count"),
  firstAyatId: integer("first_ayat_id"),
  lastAyatId: integer("last_ayat_id"),
  pageNumber: integer("page_number"),
});
export type JuzRow = typeof juzs.$inferSelect;

export const hezbs = pgTable("Hezbs", {
  hezbId: integer("hezb_id").primaryKey(),
  hezbNumber: integer("hezb_number").notNull().unique(),
  juzId: integer("juz_id")
    .notNull()
    .references(() => juzs.juzId),
  // derived
  pageNumber: integer("page_number"),
});
export type HezbRow = typeof hezbs.$inferSelect;

export const pages = pgTable("Pages", {
  pageId: integer("page_id").primaryKey(),
  pageNumber: integer("page_number").notNull().unique(),
});
export type PageRow = typeof pages.$inferSelect;

// ============================================================================
// INGESTED TABLES
// ============================================================================

export const ayats = pgTable("Ayats", {
  ayatId: integer("ayat_id").primaryKey(),
  suraId: integer("sura_id")
    .notNull()
    .references(() => suras.suraId),
  ayatNumber: integer("ayat_number").notNull(),
  textUthmani: text("text_uthmani").notNull(),
  juzId: integer("juz_id")
    .notNull()
    .references(() => juzs.juzId),
  hezbId: integer("hezb_id")
    .notNull()
    .references(() => hezbs.hezbId),
  pageId: integer("page_id")
    .notNull()
    .references(() => pages.pageId),
  sajdahNumber: integer("sajdah_number"),
  audioUrl: text("audio_url"),
  audioSegments: jsonb("audio_segments").$type<AudioSegment[]>(),
}, (table) => ({
  suraNumberIdx: uniqueIndex("idx_ayats_sura_number").on(table.suraId, table.ayatNumber),
  juzIdx: index("idx_ayats_juz").on(table.juzId),
  hezbIdx: index("idx_ayats_hezb").on(table.hezbId),
  pageIdx: index("idx_ayats_page").on(table.pageId),
}));
export type AyatRow = typeof ayats.$inferSelect;

export const words = pgTable("Words", {
  wordId: integer("word_id").primaryKey(),
  ayatId: integer("ayat_id")
    .notNull()
    .references(() => ayats.ayatId),
  wordNumber: integer("word_number").notNull(),
  textUthmani: text("text_uthmani").notNull(),
  type: text("type").notNull(),
  pageNumber: integer("page_number"),
  lineNumber: integer("line_number"),
  audioUrl: text("audio_url"),
}, (table) => ({
  ayatNumberIdx: uniqueIndex("idx_words_ayat_number").on(table.ayatId, table.wordNumber),
}));
export type WordRow = typeof words.$inferSelect;
