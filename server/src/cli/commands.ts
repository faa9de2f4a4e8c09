import fs from "fs";
import type { Planner } from "../planner.js";
import { PlannerError } from "../errors.js";
import { parseDocumentText } from "../transfer/import.js";
import type { TripSummary } from "../summary/trip-summary.js";
import { USAGE, type CliCommand } from "./args.js";

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export function formatSummary(summary: TripSummary): string {
  const lines = [
    `Trip ${summary.tripId}`,
    `  Tasks: ${summary.doneCount}/${summary.taskCount} done (${summary.progress}%)`,
    `  Total cost: ${summary.totalCost.toFixed(2)} ${summary.currency}`,
  ];
  for (const [category, cost] of Object.entries(summary.costByCategory)) {
    if (cost > 0) lines.push(`    ${category}: ${cost.toFixed(2)}`);
  }
  if (summary.issues.length === 0) {
    lines.push("  No issues found");
  } else {
    lines.push(`  Issues (${summary.issues.length}):`);
    for (const issue of summary.issues) lines.push(`    [${issue.kind}] ${issue.message}`);
  }
  return lines.join("\n");
}

function describeError(err: unknown): string {
  if (err instanceof PlannerError) {
    return `${err.message}\n${JSON.stringify(err.details(), null, 2)}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Runs one parsed command. Returns the process exit code. */
export function runCommand(planner: Planner, command: CliCommand, io: CliOutput): number {
  try {
    switch (command.kind) {
      case "help":
        io.out(USAGE);
        return 0;

      case "export": {
        const doc = command.tripId ? planner.exportTrip(command.tripId) : planner.exportAll();
        const text = JSON.stringify(doc, null, 2);
        if (command.outFile) {
          fs.writeFileSync(command.outFile, text + "\n", "utf-8");
          io.err(`Exported ${doc.trips.length} trip(s) and ${doc.members.length} member(s) to ${command.outFile}`);
        } else {
          io.out(text);
        }
        return 0;
      }

      case "import": {
        const doc = parseDocumentText(fs.readFileSync(command.inputFile, "utf-8"));
        const result = planner.importDocument(doc, command.ids);
        io.out(
          `Imported ${result.tripIds.length} trip(s): ${result.days} days, ${result.events} events, ` +
            `${result.tasks} tasks, ${result.checklists} checklists ` +
            `(members: ${result.membersCreated} created, ${result.membersMatched} matched)`
        );
        return 0;
      }

      case "summary":
        io.out(formatSummary(planner.summary.summarize(command.tripId)));
        return 0;
    }
  } catch (err) {
    io.err(`Error: ${describeError(err)}`);
    return 1;
  }
}
