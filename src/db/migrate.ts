import type { PGlite } from "@electric-sql/pglite";

/**
 * DDL mirroring schema.ts. Every statement is idempotent so migrate() can run on each open,
 * including against stores created before the derived columns existed.
 */
const STATEMENTS: string[] = [
  `CREATE TABLE IF NOT EXISTS "Suras" (
    sura_id INTEGER PRIMARY KEY,
    name_arabic TEXT NOT NULL,
    revelation_order INTEGER NOT NULL,
    ayat_count INTEGER NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS "Juzs" (
    juz_id INTEGER PRIMARY KEY,
    juz_number INTEGER NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS "Pages" (
    page_id INTEGER PRIMARY KEY,
    page_number INTEGER NOT NULL UNIQUE
  )`,
  `CREATE TABLE IF NOT EXISTS "Hezbs" (
    hezb_id INTEGER PRIMARY KEY,
    hezb_number INTEGER NOT NULL UNIQUE,
    juz_id INTEGER NOT NULL REFERENCES "Juzs"(juz_id)
  )`,
  `CREATE TABLE IF NOT EXISTS "Ayats" (
    ayat_id INTEGER PRIMARY KEY,
    sura_id INTEGER NOT NULL REFERENCES "Suras"(sura_id),
    ayat_number INTEGER NOT NULL,
    text_uthmani TEXT NOT NULL,
    juz_id INTEGER NOT NULL REFERENCES "Juzs"(juz_id),
    hezb_id INTEGER NOT NULL REFERENCES "Hezbs"(hezb_id),
    page_id INTEGER NOT NULL REFERENCES "Pages"(page_id),
    sajdah_number INTEGER,
    audio_url TEXT,
    audio_segments JSONB
  )`,
  `CREATE TABLE IF NOT EXISTS "Words" (
    word_id INTEGER PRIMARY KEY,
    ayat_id INTEGER NOT NULL REFERENCES "Ayats"(ayat_id),
    word_number INTEGER NOT NULL,
    text_uthmani TEXT NOT NULL,
    type TEXT NOT NULL,
    page_number INTEGER,
    line_number INTEGER,
    audio_url TEXT
  )`,

  // Derived columns, written only by the enrichment passes
  `ALTER TABLE "Suras" ADD COLUMN IF NOT EXISTS page_number INTEGER`,
  `ALTER TABLE "Suras" ADD COLUMN IF NOT EXISTS line_number INTEGER`,
  `ALTER TABLE "Juzs" ADD COLUMN IF NOT EXISTS verses_count INTEGER`,
  `ALTER TABLE "Juzs" ADD COLUMN IF NOT EXISTS first_ayat_id INTEGER`,
  `ALTER TABLE "Juzs" ADD COLUMN IF NOT EXISTS last_ayat_id INTEGER`,
  `ALTER TABLE "Juzs" ADD COLUMN IF NOT EXISTS page_number INTEGER`,
  `ALTER TABLE "Hezbs" ADD COLUMN IF NOT EXISTS page_number INTEGER`,

  `CREATE UNIQUE INDEX IF NOT EXISTS idx_ayats_sura_number ON "Ayats"(sura_id, ayat_number)`,
  `CREATE INDEX IF NOT EXISTS idx_ayats_juz ON "Ayats"(juz_id)`,
  `CREATE INDEX IF NOT EXISTS idx_ayats_hezb ON "Ayats"(hezb_id)`,
  `CREATE INDEX IF NOT EXISTS idx_ayats_page ON "Ayats"(page_id)`,
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_words_ayat_number ON "Words"(ayat_id, word_number)`,
];

export async function migrate(client: PGlite): Promise<void> {
  await client.transaction(async (tx) => {
    for (const statement of STATEMENTS) {
      await tx.exec(statement);
    }
  });
}
