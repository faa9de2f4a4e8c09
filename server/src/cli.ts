#!/usr/bin/env node
/**
 * itinera CLI — export, import and summarize planner data without the server.
 *
 * Usage:
 *   itinera export [--trip <id>] [--out <file>]
 *   itinera import <file> [--ids preserve|regenerate]
 *   itinera summary <tripId>
 *
 * A running server with WATCH_DATA_FILE enabled picks up imports on its own.
 */

import config from "./config.js";
import { PlannerDatabase } from "./data/database.js";
import { createPlanner } from "./planner.js";
import { CliUsageError, parseArgs } from "./cli/args.js";
import { runCommand } from "./cli/commands.js";

// stdout carries command output (export documents are piped); store logs go to stderr.
console.log = (...parts: unknown[]) => console.error(...parts);

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  const db = new PlannerDatabase(args.dataFile ?? config.dataFile);
  const planner = createPlanner(db, {
    deletePolicy: config.deletePolicy,
    defaultCurrency: config.defaultCurrency,
  });

  const code = runCommand(planner, args.command, {
    out: (text) => process.stdout.write(text + "\n"),
    err: (text) => process.stderr.write(text + "\n"),
  });
  process.exitCode = code;
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  if (err instanceof CliUsageError) {
    process.stderr.write("Run `itinera --help` for usage.\n");
  }
  process.exit(1);
});
