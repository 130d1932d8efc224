import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";

import { withTransaction } from "./db";
import { CorpusLoadError, EmptyCorpusError } from "./errors";
import { createLogger } from "./logger";
import { formatReference, normalizeBookName } from "./reference";
import { createPgVerseStore, type DailySelection, type VerseInput, type VerseStore } from "./store";

const log = createLogger("corpus");

const REQUIRED_COLUMNS = ["book", "chapter", "verse"] as const;
const TEXT_COLUMNS = ["text_kjv", "text"] as const;

const positiveInt = z
  .string()
  .trim()
  .regex(/^0*[1-9]\d*$/, { message: "must be a positive integer" })
  .transform(Number);

const verseRowSchema = z.object({
  book: z.string().transform(normalizeBookName).pipe(z.string().min(1, { message: "is required" })),
  chapter: positiveInt,
  verse: positiveInt,
  text: z.string().trim().min(1, { message: "is required" }),
});

const csvSchema = z.array(z.array(z.string()));

/**
 * Parses a verse CSV with a header row (book, chapter, verse, text_kjv|text).
 * Any bad row rejects the whole file.
 */
export function parseVerseCsv(content: string): VerseInput[] {
  let raw: unknown;
  try {
    raw = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusLoadError(`Could not parse verse CSV: ${reason}`);
  }

  const [header, ...rows] = csvSchema.parse(raw);
  if (!header) {
    throw new CorpusLoadError("Verse CSV is empty");
  }

  const columns = header.map((name) => name.trim().toLowerCase());
  const missing: string[] = REQUIRED_COLUMNS.filter((name) => !columns.includes(name));
  const textColumn = TEXT_COLUMNS.find((name) => columns.includes(name));
  if (!textColumn) {
    missing.push("text_kjv");
  }
  if (missing.length > 0 || !textColumn) {
    throw new CorpusLoadError(`Verse CSV is missing columns: ${missing.join(", ")}`);
  }

  const cell = (row: string[], name: string) => row[columns.indexOf(name)] ?? "";

  const issues: string[] = [];
  const verses: VerseInput[] = [];

  rows.forEach((row, index) => {
    const result = verseRowSchema.safeParse({
      book: cell(row, "book"),
      chapter: cell(row, "chapter"),
      verse: cell(row, "verse"),
      text: cell(row, textColumn),
    });

    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join(", ");
      // +2: one for the header, one for 1-based numbering
      issues.push(`row ${index + 2}: ${details}`);
      return;
    }

    verses.push({
      book: result.data.book,
      chapter: result.data.chapter,
      verseNumber: result.data.verse,
      text: result.data.text,
    });
  });

  if (issues.length > 0) {
    throw new CorpusLoadError(`Verse CSV has ${issues.length} invalid row(s)`, issues);
  }

  return verses;
}

export type LoadResult = {
  inserted: number;
  skipped: number;
};

async function insertAll(store: VerseStore, verses: VerseInput[]): Promise<LoadResult> {
  let inserted = 0;
  let skipped = 0;
  for (const verse of verses) {
    if (await store.insertVerse(verse)) {
      inserted += 1;
    } else {
      skipped += 1;
    }
  }
  return { inserted, skipped };
}

/** Inserts verses in one transaction; ones already stored are skipped. */
export async function loadVerses(verses: VerseInput[], store?: VerseStore): Promise<LoadResult> {
  const result = store
    ? await insertAll(store, verses)
    : await withTransaction((client) => insertAll(createPgVerseStore(client), verses));

  log.info("verses loaded", { ...result });
  return result;
}

export async function assertCorpusReady(store: VerseStore = createPgVerseStore()): Promise<number> {
  const count = await store.countVerses();
  if (count === 0) {
    throw new EmptyCorpusError();
  }
  return count;
}

export async function exportVersesCsv(store: VerseStore = createPgVerseStore()): Promise<string> {
  const verses = await store.allVerses();
  const sorted = [...verses].sort(
    (a, b) =>
      a.book.localeCompare(b.book) || a.chapter - b.chapter || a.verseNumber - b.verseNumber,
  );

  return stringify(
    sorted.map((verse) => ({
      book: verse.book,
      chapter: verse.chapter,
      verse: verse.verseNumber,
      text_kjv: verse.text,
    })),
    { header: true, columns: ["book", "chapter", "verse", "text_kjv"] },
  );
}

export function exportScheduleCsv(entries: Array<Pick<DailySelection, "date" | "verse">>): string {
  const sorted = [...entries].sort((a, b) => a.date.localeCompare(b.date));
  return stringify(
    sorted.map((entry) => ({
      date: entry.date,
      reference: formatReference(entry.verse),
      kjv: entry.verse.text,
    })),
    { header: true, columns: ["date", "reference", "kjv"] },
  );
}

export async function exportSelectionsCsv(store: VerseStore = createPgVerseStore()): Promise<string> {
  return exportScheduleCsv(await store.selectionsOrderedByDate());
}
