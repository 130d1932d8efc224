#!/usr/bin/env npx tsx
/**
 * Loads verses from a CSV file (columns: book, chapter, verse, text_kjv).
 * Verses already present are skipped; any malformed row aborts the load.
 *
 * Usage:
 *   npx tsx scripts/load-verses.ts data/kjv.csv
 */

import { readFile } from "fs/promises";

import { parseArgs, runScript } from "./cli";
import { loadVerses, parseVerseCsv } from "../lib/corpus";
import { CorpusLoadError } from "../lib/errors";
import type { VerseInput } from "../lib/store";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const file = args.positional[0];
  if (!file) {
    console.error("Usage: npx tsx scripts/load-verses.ts <verses.csv>");
    process.exit(1);
  }

  let verses: VerseInput[];
  try {
    verses = parseVerseCsv(await readFile(file, "utf8"));
  } catch (error) {
    if (error instanceof CorpusLoadError) {
      for (const issue of error.issues) {
        console.error(`  ${issue}`);
      }
    }
    throw error;
  }

  const result = await loadVerses(verses);
  console.log(`Inserted ${result.inserted} verses (${result.skipped} already present).`);
}

runScript(main);
