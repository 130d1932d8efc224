import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CorpusExhaustedError, ServiceError } from "@/lib/errors";
import { createSeededRandom } from "@/lib/random";
import { formatReference } from "@/lib/reference";
import {
  __resetRandomSourceForTests,
  __setRandomSourceForTests,
  resolveVerseForDate,
  resolveVerseForToday,
} from "@/lib/service";
import type { Verse } from "@/lib/store";
import {
  countSelections,
  createTestDb,
  insertSelection,
  insertVerses,
  type TestDb,
} from "@/tests/helpers/test-db";

const dateOf = (day: number) => `2024-01-${String(day).padStart(2, "0")}`;

describe("resolveVerseForDate", () => {
  let testDb: TestDb;

  beforeEach(async () => {
    testDb = await createTestDb();
    __resetRandomSourceForTests();
  });

  afterEach(async () => {
    vi.useRealTimers();
    __resetRandomSourceForTests();
    await testDb.close();
  });

  it("moves to another chapter the day after and then falls back to what is left", async () => {
    await insertVerses(testDb.pool, ["Genesis 1:1", "Genesis 1:2", "Exodus 1:1"]);
    __setRandomSourceForTests(() => 0);

    const day1 = await resolveVerseForDate("2024-01-01");
    const day2 = await resolveVerseForDate("2024-01-02");
    const day3 = await resolveVerseForDate("2024-01-03");

    expect(formatReference(day1.verse)).toBe("Genesis 1:1");
    expect(formatReference(day2.verse)).toBe("Exodus 1:1");
    expect(formatReference(day3.verse)).toBe("Genesis 1:2");
    expect(day2.date).toBe("2024-01-02");
  });

  it("returns the stored verse on repeat calls and writes a single selection", async () => {
    await insertVerses(testDb.pool, ["Genesis 1:1", "Genesis 1:2", "Exodus 1:1"]);

    const first = await resolveVerseForDate("2024-06-01", { random: () => 0 });
    const second = await resolveVerseForDate("2024-06-01", { random: () => 0.99 });

    expect(second).toEqual(first);
    expect(formatReference(second.verse)).toBe("Genesis 1:1");
    expect(await countSelections(testDb.pool, "2024-06-01")).toBe(1);
    expect(await countSelections(testDb.pool)).toBe(1);
  });

  it("never repeats a verse and only repeats a chapter when nothing else is left", async () => {
    const corpus = await insertVerses(testDb.pool, [
      "Genesis 1:1",
      "Genesis 1:2",
      "Genesis 2:1",
      "Genesis 2:2",
      "Exodus 1:1",
      "Exodus 1:2",
      "Exodus 2:1",
      "Exodus 2:2",
      "Ruth 1:1",
      "Ruth 1:2",
      "Ruth 2:1",
      "Ruth 2:2",
    ]);
    const random = createSeededRandom(20240101);

    const picks: Verse[] = [];
    for (let day = 1; day <= corpus.length; day += 1) {
      const resolved = await resolveVerseForDate(dateOf(day), { random });
      picks.push(resolved.verse);
    }

    expect(new Set(picks.map((verse) => verse.id)).size).toBe(corpus.length);

    for (let i = 1; i < picks.length; i += 1) {
      const usedBefore = new Set(picks.slice(0, i).map((verse) => verse.id));
      const previous = picks[i - 1];
      const alternativeExisted = corpus.some(
        (verse) =>
          !usedBefore.has(verse.id) &&
          (verse.book !== previous.book || verse.chapter !== previous.chapter),
      );
      if (alternativeExisted) {
        expect(`${picks[i].book} ${picks[i].chapter}`).not.toBe(`${previous.book} ${previous.chapter}`);
      }
    }

    await expect(resolveVerseForDate(dateOf(corpus.length + 1), { random })).rejects.toBeInstanceOf(
      CorpusExhaustedError,
    );
  });

  it("repeats the previous chapter when it is the only one with unused verses", async () => {
    const [genesis1, , exodus1] = await insertVerses(testDb.pool, [
      "Genesis 1:1",
      "Genesis 1:2",
      "Exodus 1:1",
    ]);
    await insertSelection(testDb.pool, "2024-01-01", exodus1.id);
    await insertSelection(testDb.pool, "2024-01-02", genesis1.id);

    const resolved = await resolveVerseForDate("2024-01-03", { random: () => 0.5 });

    expect(formatReference(resolved.verse)).toBe("Genesis 1:2");
  });

  it("compares against the most recent earlier selection when days were skipped", async () => {
    const [genesis1] = await insertVerses(testDb.pool, ["Genesis 1:1", "Genesis 1:2", "Exodus 1:1"]);
    await insertSelection(testDb.pool, "2024-01-01", genesis1.id);

    const resolved = await resolveVerseForDate("2024-01-10", { random: () => 0 });

    expect(formatReference(resolved.verse)).toBe("Exodus 1:1");
  });

  it("uses the selection before the target date, not the latest one overall", async () => {
    const [genesis1, exodus1] = await insertVerses(testDb.pool, [
      "Genesis 1:1",
      "Exodus 1:1",
      "Exodus 1:2",
      "Genesis 1:2",
    ]);
    await insertSelection(testDb.pool, "2024-01-01", genesis1.id);
    await insertSelection(testDb.pool, "2024-01-05", exodus1.id);

    const resolved = await resolveVerseForDate("2024-01-02", { random: () => 0 });

    expect(formatReference(resolved.verse)).toBe("Exodus 1:2");
  });

  it("fails with CorpusExhaustedError once every verse has been used", async () => {
    await insertVerses(testDb.pool, ["Genesis 1:1", "Exodus 1:1"]);
    await resolveVerseForDate("2024-01-01", { random: () => 0 });
    await resolveVerseForDate("2024-01-02", { random: () => 0 });

    const error = await resolveVerseForDate("2024-01-03", { random: () => 0 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CorpusExhaustedError);
    expect(error).toMatchObject({ status: 409, code: "CORPUS_EXHAUSTED" });
    expect(await countSelections(testDb.pool, "2024-01-03")).toBe(0);
  });

  it("rejects dates that are not YYYY-MM-DD calendar dates", async () => {
    await insertVerses(testDb.pool, ["Genesis 1:1"]);

    const error = await resolveVerseForDate("2024-02-30").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toMatchObject({ status: 422 });
    expect(await countSelections(testDb.pool)).toBe(0);
  });

  it("resolves today in the configured time zone", async () => {
    await insertVerses(testDb.pool, ["Genesis 1:1", "Exodus 1:1"]);
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-03-10T12:00:00Z"));
    __setRandomSourceForTests(() => 0.99);

    const today = await resolveVerseForToday();

    expect(today.date).toBe("2024-03-10");
    expect(formatReference(today.verse)).toBe("Exodus 1:1");
  });
});
