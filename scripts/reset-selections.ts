#!/usr/bin/env npx tsx
/**
 * Deletes every daily selection so the corpus can be cycled again.
 *
 * Usage:
 *   npx tsx scripts/reset-selections.ts --yes
 */

import { parseArgs, runScript } from "./cli";
import { resetSelections } from "../lib/service";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.flags.get("yes") !== true) {
    console.error("This removes the whole selection history. Re-run with --yes to confirm.");
    process.exit(1);
  }

  const removed = await resetSelections();
  console.log(`Removed ${removed} selection(s).`);
}

runScript(main);
