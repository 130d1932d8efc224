#!/usr/bin/env npx tsx
/**
 * Exports the corpus or the selection history to CSV.
 *
 * Usage:
 *   npx tsx scripts/export-data.ts --verses --out data/verses.csv
 *   npx tsx scripts/export-data.ts --selections --out data/selections.csv
 */

import { mkdir, writeFile } from "fs/promises";
import * as path from "path";

import { parseArgs, runScript, stringFlag } from "./cli";
import { exportSelectionsCsv, exportVersesCsv } from "../lib/corpus";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const out = stringFlag(args, "out");
  const verses = args.flags.has("verses");
  const selections = args.flags.has("selections");

  if (!out || verses === selections) {
    console.error("Usage: npx tsx scripts/export-data.ts (--verses | --selections) --out file.csv");
    process.exit(1);
  }

  const csv = verses ? await exportVersesCsv() : await exportSelectionsCsv();
  await mkdir(path.dirname(path.resolve(out)), { recursive: true });
  await writeFile(out, csv, "utf8");
  console.log(`Wrote ${out}`);
}

runScript(main);
