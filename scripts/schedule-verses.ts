#!/usr/bin/env npx tsx
/**
 * Pre-generates verses for a run of dates and writes them to CSV.
 * Dates that already have a verse are kept unless --overwrite is given.
 *
 * Usage:
 *   npx tsx scripts/schedule-verses.ts --start 2025-01-01 --days 30 --out data/schedule.csv
 *   npx tsx scripts/schedule-verses.ts --start 2025-01-01 --days 30 --out data/schedule.csv --overwrite
 */

import { mkdir, writeFile } from "fs/promises";
import * as path from "path";

import { parseArgs, runScript, stringFlag } from "./cli";
import { assertCorpusReady, exportScheduleCsv } from "../lib/corpus";
import { scheduleRange } from "../lib/service";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const start = stringFlag(args, "start");
  const days = stringFlag(args, "days");
  const out = stringFlag(args, "out");
  const overwrite = args.flags.get("overwrite") === true;

  if (!start || !days || !out) {
    console.error("Usage: npx tsx scripts/schedule-verses.ts --start YYYY-MM-DD --days N --out file.csv [--overwrite]");
    process.exit(1);
  }

  await assertCorpusReady();

  const result = await scheduleRange(start, Number(days), overwrite);

  await mkdir(path.dirname(path.resolve(out)), { recursive: true });
  await writeFile(out, exportScheduleCsv(result.entries), "utf8");

  console.log(`Scheduled ${result.scheduled} new day(s), kept ${result.existing} existing.`);
  if (result.exhausted) {
    console.log(`Corpus exhausted: ${result.failed} day(s) could not be scheduled.`);
  }
  console.log(`Schedule written to ${out}`);
}

runScript(main);
