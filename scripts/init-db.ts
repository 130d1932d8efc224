#!/usr/bin/env npx tsx
/**
 * Creates the verses and daily_selections tables if they do not exist.
 *
 * Usage:
 *   npx tsx scripts/init-db.ts
 */

import { readFile } from "fs/promises";
import * as path from "path";

import { runScript } from "./cli";
import { dbQuery } from "../lib/db";

async function main() {
  const schema = await readFile(path.resolve(__dirname, "..", "db", "schema.sql"), "utf8");
  await dbQuery(schema);
  console.log("Schema applied.");
}

runScript(main);
