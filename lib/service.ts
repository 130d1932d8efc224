import { getConfig } from "./config";
import { addDays, currentDate, isIsoDate } from "./dates";
import { withTransaction } from "./db";
import {
  CorpusExhaustedError,
  EmptyCorpusError,
  SelectionConflictError,
  SelectionNotFoundError,
  ServiceError,
} from "./errors";
import { createLogger } from "./logger";
import { createSeededRandom, pickIndex, pickOne, type RandomSource } from "./random";
import { formatReference, isSameChapter } from "./reference";
import { createPgVerseStore, type DailySelection, type Verse, type VerseStore } from "./store";

export type SelectionOptions = {
  store?: VerseStore;
  random?: RandomSource;
};

export type DailyVerse = {
  date: string;
  verse: Verse;
};

export type ScheduledDay = DailyVerse & {
  status: "created" | "existing";
};

export type ScheduleResult = {
  entries: ScheduledDay[];
  scheduled: number;
  existing: number;
  failed: number;
  exhausted: boolean;
};

const MAX_SCHEDULE_DAYS = 3660;
// a lost race on verse_id means the pick was taken for another date; pick again
const MAX_PICK_ATTEMPTS = 3;

const log = createLogger("engine");

let randomSource: RandomSource | undefined;

function defaultRandom(): RandomSource {
  if (!randomSource) {
    const { seed } = getConfig();
    randomSource = seed === null ? Math.random : createSeededRandom(seed);
  }
  return randomSource;
}

export function __setRandomSourceForTests(source: RandomSource): void {
  randomSource = source;
}

export function __resetRandomSourceForTests(): void {
  randomSource = undefined;
}

function requireIsoDate(date: string): void {
  if (!isIsoDate(date)) {
    throw new ServiceError(`Invalid date "${date}" (expected YYYY-MM-DD)`, 422);
  }
}

/**
 * Unused verses, minus the chapter of the selection preceding `date` when that
 * leaves anything to choose from.
 */
async function eligiblePool(store: VerseStore, date: string): Promise<Verse[]> {
  const unused = await store.unusedVerses();
  if (unused.length === 0) {
    throw new CorpusExhaustedError(date);
  }

  const previous = await store.selectionBefore(date);
  if (!previous) {
    return unused;
  }

  const otherChapters = unused.filter((verse) => !isSameChapter(verse, previous.verse));
  if (otherChapters.length === 0) {
    log.debug("only the previous chapter remains; repeating it", {
      date,
      previousDate: previous.date,
      book: previous.verse.book,
      chapter: previous.verse.chapter,
    });
    return unused;
  }

  return otherChapters;
}

export async function resolveVerseForDate(
  date: string,
  options: SelectionOptions = {},
): Promise<DailyVerse> {
  requireIsoDate(date);
  const store = options.store ?? createPgVerseStore();
  const random = options.random ?? defaultRandom();

  for (let attempt = 1; ; attempt += 1) {
    const existing = await store.selectionFor(date);
    if (existing) {
      return { date, verse: existing.verse };
    }

    const pool = await eligiblePool(store, date);
    const choice = pickOne(pool, random);

    try {
      const created = await store.createSelection(date, choice.id);
      log.info("verse selected", { date, reference: formatReference(created.verse) });
      return { date, verse: created.verse };
    } catch (error) {
      if (!(error instanceof SelectionConflictError)) {
        throw error;
      }

      const winner = await store.selectionFor(date);
      if (winner) {
        log.warn("concurrent selection detected; using the committed verse", {
          date,
          reference: formatReference(winner.verse),
        });
        return { date, verse: winner.verse };
      }
      if (attempt >= MAX_PICK_ATTEMPTS) {
        throw error;
      }
      log.warn("picked verse was taken for another date; picking again", {
        date,
        reference: formatReference(choice),
        attempt,
      });
    }
  }
}

/** Read-only lookup of an already resolved date. */
export async function getVerseForDate(
  date: string,
  options: Pick<SelectionOptions, "store"> = {},
): Promise<DailyVerse> {
  requireIsoDate(date);
  const store = options.store ?? createPgVerseStore();

  const selection = await store.selectionFor(date);
  if (!selection) {
    throw new SelectionNotFoundError(date);
  }
  return { date, verse: selection.verse };
}

export async function resolveVerseForToday(options: SelectionOptions = {}): Promise<DailyVerse> {
  return resolveVerseForDate(currentDate(getConfig().timeZone), options);
}

export async function pickRandomVerse(options: SelectionOptions = {}): Promise<Verse> {
  const store = options.store ?? createPgVerseStore();
  const total = await store.countVerses();
  if (total === 0) {
    throw new EmptyCorpusError();
  }

  const verse = await store.verseAt(pickIndex(total, options.random ?? defaultRandom()));
  if (!verse) {
    throw new EmptyCorpusError();
  }
  return verse;
}

async function scheduleDays(
  store: VerseStore,
  startDate: string,
  dayCount: number,
  random: RandomSource | undefined,
): Promise<ScheduleResult> {
  const entries: ScheduledDay[] = [];
  let scheduled = 0;
  let existing = 0;

  for (let offset = 0; offset < dayCount; offset += 1) {
    const date = addDays(startDate, offset);

    const current = await store.selectionFor(date);
    if (current) {
      entries.push({ date, verse: current.verse, status: "existing" });
      existing += 1;
      continue;
    }

    try {
      const resolved = await resolveVerseForDate(date, { store, random });
      entries.push({ ...resolved, status: "created" });
      scheduled += 1;
    } catch (error) {
      if (!(error instanceof CorpusExhaustedError)) {
        throw error;
      }

      const failed = dayCount - offset;
      log.warn("corpus exhausted while scheduling", { startDate, date, scheduled, failed });
      return { entries, scheduled, existing, failed, exhausted: true };
    }
  }

  return { entries, scheduled, existing, failed: 0, exhausted: false };
}

/**
 * Resolves `dayCount` consecutive dates from `startDate`. With `overwrite`, the
 * range is cleared first so each day is recomputed against the freshly
 * scheduled day before it.
 */
export async function scheduleRange(
  startDate: string,
  dayCount: number,
  overwrite: boolean,
  options: SelectionOptions = {},
): Promise<ScheduleResult> {
  requireIsoDate(startDate);
  if (!Number.isInteger(dayCount) || dayCount < 1 || dayCount > MAX_SCHEDULE_DAYS) {
    throw new ServiceError(`Day count must be an integer between 1 and ${MAX_SCHEDULE_DAYS}`, 422);
  }

  const endDate = addDays(startDate, dayCount - 1);
  if (!isIsoDate(endDate)) {
    throw new ServiceError(`Schedule from ${startDate} for ${dayCount} days runs past 9999-12-31`, 422);
  }

  if (!overwrite) {
    return scheduleDays(options.store ?? createPgVerseStore(), startDate, dayCount, options.random);
  }

  if (options.store) {
    await options.store.deleteSelectionsBetween(startDate, endDate);
    return scheduleDays(options.store, startDate, dayCount, options.random);
  }

  return withTransaction(async (client) => {
    const store = createPgVerseStore(client);
    const removed = await store.deleteSelectionsBetween(startDate, endDate);
    if (removed > 0) {
      log.info("cleared selections for rescheduling", { startDate, endDate, removed });
    }
    return scheduleDays(store, startDate, dayCount, options.random);
  });
}

export async function getSelectionHistory(
  params: { limit?: number; store?: VerseStore } = {},
): Promise<DailySelection[]> {
  const store = params.store ?? createPgVerseStore();
  const history = await store.selectionsOrderedByDate();
  const newestFirst = history.reverse();
  return params.limit === undefined ? newestFirst : newestFirst.slice(0, Math.max(0, params.limit));
}

export type CorpusStats = {
  verseCount: number;
  bookCount: number;
  selectionCount: number;
  unusedCount: number;
  firstSelectionDate: string | null;
  lastSelectionDate: string | null;
  versesPerBook: Array<{ book: string; count: number }>;
  recentSelections: Array<{ date: string; reference: string }>;
};

export async function getCorpusStats(store: VerseStore = createPgVerseStore()): Promise<CorpusStats> {
  const [verses, history, unused] = await Promise.all([
    store.allVerses(),
    store.selectionsOrderedByDate(),
    store.unusedVerses(),
  ]);

  const perBook = new Map<string, number>();
  for (const verse of verses) {
    perBook.set(verse.book, (perBook.get(verse.book) ?? 0) + 1);
  }

  return {
    verseCount: verses.length,
    bookCount: perBook.size,
    selectionCount: history.length,
    unusedCount: unused.length,
    firstSelectionDate: history[0]?.date ?? null,
    lastSelectionDate: history[history.length - 1]?.date ?? null,
    versesPerBook: Array.from(perBook, ([book, count]) => ({ book, count })).sort((a, b) =>
      a.book.localeCompare(b.book),
    ),
    recentSelections: history
      .slice(-5)
      .reverse()
      .map((selection) => ({ date: selection.date, reference: formatReference(selection.verse) })),
  };
}

/** Clears the whole selection history. Operator action; nothing calls it automatically. */
export async function resetSelections(store: VerseStore = createPgVerseStore()): Promise<number> {
  const removed = await store.deleteAllSelections();
  log.warn("selection history reset", { removed });
  return removed;
}
