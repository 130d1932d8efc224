import { readFileSync } from "node:fs";
import path from "node:path";

import type { Pool } from "pg";
import { newDb } from "pg-mem";

import type { Verse, VerseInput } from "@/lib/store";

const SCHEMA_SQL = readFileSync(path.join(process.cwd(), "db", "schema.sql"), "utf8");

export type TestDb = {
  pool: Pool;
  close: () => Promise<void>;
};

export async function createTestDb(): Promise<TestDb> {
  const db = newDb();
  const adapter = db.adapters.createPg();
  const pool = new adapter.Pool() as unknown as Pool;

  await pool.query(SCHEMA_SQL);
  global.__dailyVerseDbPool = pool;

  return {
    pool,
    close: async () => {
      await pool.end();
      if (global.__dailyVerseDbPool === pool) {
        global.__dailyVerseDbPool = undefined;
      }
    },
  };
}

/** "Genesis 1:1" → a verse input with placeholder text. */
export function verseInput(reference: string): VerseInput {
  const match = /^(.+) (\d+):(\d+)$/.exec(reference);
  if (!match) {
    throw new Error(`Bad test reference: ${reference}`);
  }
  const [, book, chapter, verseNumber] = match;
  return {
    book,
    chapter: Number(chapter),
    verseNumber: Number(verseNumber),
    text: `Text of ${reference}`,
  };
}

export async function insertVerses(pool: Pool, references: string[]): Promise<Verse[]> {
  const verses: Verse[] = [];
  for (const reference of references) {
    const input = verseInput(reference);
    const row = await pool.query<{ id: number }>(
      `INSERT INTO verses(book, chapter, verse_number, text_kjv)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [input.book, input.chapter, input.verseNumber, input.text],
    );
    verses.push({ id: Number(row.rows[0].id), ...input });
  }
  return verses;
}

export async function insertSelection(pool: Pool, date: string, verseId: number): Promise<void> {
  await pool.query(
    `INSERT INTO daily_selections(selection_date, verse_id)
     VALUES ($1, $2)`,
    [date, verseId],
  );
}

export async function countSelections(pool: Pool, date?: string): Promise<number> {
  const result = date
    ? await pool.query<{ count: string }>(
        `SELECT COUNT(*) AS count FROM daily_selections WHERE selection_date = $1`,
        [date],
      )
    : await pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM daily_selections`);
  return Number(result.rows[0].count);
}
