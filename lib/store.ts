import { dbQuery, dbQueryOne, isUniqueViolation, type DbQueryable } from "./db";
import { SelectionConflictError } from "./errors";

export type Verse = {
  id: number;
  book: string;
  chapter: number;
  verseNumber: number;
  text: string;
};

export type VerseInput = Omit<Verse, "id">;

export type DailySelection = {
  date: string;
  verse: Verse;
  createdAt: string;
};

/**
 * Storage boundary for the selection engine. The engine never mutates verses;
 * `createSelection` is the only write on the resolve path.
 */
export type VerseStore = {
  allVerses(): Promise<Verse[]>;
  countVerses(): Promise<number>;
  /** Verse at a zero-based position in id order, or null past the end. */
  verseAt(offset: number): Promise<Verse | null>;
  /** Verses never referenced by a selection, in id order. */
  unusedVerses(): Promise<Verse[]>;
  selectionFor(date: string): Promise<DailySelection | null>;
  /** Most recent selection strictly before `date`. */
  selectionBefore(date: string): Promise<DailySelection | null>;
  selectionsOrderedByDate(): Promise<DailySelection[]>;
  /**
   * Throws SelectionConflictError when `date` already has a selection, or when
   * `verseId` is already bound to another date.
   */
  createSelection(date: string, verseId: number): Promise<DailySelection>;
  deleteSelectionsBetween(startDate: string, endDate: string): Promise<number>;
  deleteAllSelections(): Promise<number>;
  /** False when a verse with the same book, chapter and number already exists. */
  insertVerse(input: VerseInput): Promise<boolean>;
};

type VerseRow = {
  id: number;
  book: string;
  chapter: number;
  verse_number: number;
  text_kjv: string;
};

type SelectionRow = VerseRow & {
  selection_date: string;
  created_at: Date | string;
};

const VERSE_COLUMNS = `v.id, v.book, v.chapter, v.verse_number, v.text_kjv`;

const SELECTION_QUERY = `SELECT s.selection_date, s.created_at, ${VERSE_COLUMNS}
     FROM daily_selections s
     JOIN verses v ON v.id = s.verse_id`;

function mapVerse(row: VerseRow): Verse {
  return {
    id: Number(row.id),
    book: row.book,
    chapter: Number(row.chapter),
    verseNumber: Number(row.verse_number),
    text: row.text_kjv,
  };
}

function mapSelection(row: SelectionRow): DailySelection {
  return {
    date: row.selection_date,
    verse: mapVerse(row),
    createdAt: row.created_at instanceof Date ? row.created_at.toISOString() : String(row.created_at),
  };
}

export function createPgVerseStore(client?: DbQueryable): VerseStore {
  async function selectionFor(date: string): Promise<DailySelection | null> {
    const row = await dbQueryOne<SelectionRow>(
      `${SELECTION_QUERY}
     WHERE s.selection_date = $1`,
      [date],
      client,
    );
    return row ? mapSelection(row) : null;
  }

  return {
    async allVerses() {
      const rows = await dbQuery<VerseRow>(
        `SELECT ${VERSE_COLUMNS}
         FROM verses v
         ORDER BY v.id ASC`,
        [],
        client,
      );
      return rows.map(mapVerse);
    },

    async countVerses() {
      const row = await dbQueryOne<{ count: string }>(
        `SELECT COUNT(*) AS count FROM verses`,
        [],
        client,
      );
      return Number(row?.count ?? 0);
    },

    async verseAt(offset) {
      const row = await dbQueryOne<VerseRow>(
        `SELECT ${VERSE_COLUMNS}
         FROM verses v
         ORDER BY v.id ASC
         LIMIT 1 OFFSET $1`,
        [offset],
        client,
      );
      return row ? mapVerse(row) : null;
    },

    async unusedVerses() {
      const rows = await dbQuery<VerseRow>(
        `SELECT ${VERSE_COLUMNS}
         FROM verses v
         LEFT JOIN daily_selections s ON s.verse_id = v.id
         WHERE s.id IS NULL
         ORDER BY v.id ASC`,
        [],
        client,
      );
      return rows.map(mapVerse);
    },

    selectionFor,

    async selectionBefore(date) {
      const row = await dbQueryOne<SelectionRow>(
        `${SELECTION_QUERY}
     WHERE s.selection_date < $1
     ORDER BY s.selection_date DESC
     LIMIT 1`,
        [date],
        client,
      );
      return row ? mapSelection(row) : null;
    },

    async selectionsOrderedByDate() {
      const rows = await dbQuery<SelectionRow>(
        `${SELECTION_QUERY}
     ORDER BY s.selection_date ASC`,
        [],
        client,
      );
      return rows.map(mapSelection);
    },

    async createSelection(date, verseId) {
      if (await selectionFor(date)) {
        throw new SelectionConflictError(date);
      }

      try {
        await dbQuery(
          `INSERT INTO daily_selections(selection_date, verse_id)
           VALUES ($1, $2)`,
          [date, verseId],
          client,
        );
      } catch (error) {
        // 23505 on selection_date (another writer got there first) or on verse_id
        // (the verse was taken for a different date in the meantime)
        if (isUniqueViolation(error)) {
          throw new SelectionConflictError(date);
        }
        throw error;
      }

      const created = await selectionFor(date);
      if (!created) {
        throw new Error(`Selection for ${date} vanished after insert`);
      }
      return created;
    },

    async deleteSelectionsBetween(startDate, endDate) {
      const deleted = await dbQuery<{ id: number }>(
        `DELETE FROM daily_selections
         WHERE selection_date >= $1 AND selection_date <= $2
         RETURNING id`,
        [startDate, endDate],
        client,
      );
      return deleted.length;
    },

    async deleteAllSelections() {
      const deleted = await dbQuery<{ id: number }>(
        `DELETE FROM daily_selections RETURNING id`,
        [],
        client,
      );
      return deleted.length;
    },

    async insertVerse(input) {
      const stored = await dbQueryOne<{ id: number }>(
        `SELECT id FROM verses
         WHERE book = $1 AND chapter = $2 AND verse_number = $3`,
        [input.book, input.chapter, input.verseNumber],
        client,
      );
      if (stored) {
        return false;
      }

      try {
        await dbQuery(
          `INSERT INTO verses(book, chapter, verse_number, text_kjv)
           VALUES ($1, $2, $3, $4)`,
          [input.book, input.chapter, input.verseNumber, input.text],
          client,
        );
      } catch (error) {
        if (isUniqueViolation(error)) {
          return false;
        }
        throw error;
      }
      return true;
    },
  };
}
