import type { IdPolicy } from "../transfer/import.js";

// ---- Argument parsing (manual argv walk) ----

export type CliCommand =
  | { kind: "help" }
  | { kind: "export"; tripId: string | null; outFile: string | null }
  | { kind: "import"; inputFile: string; ids: IdPolicy }
  | { kind: "summary"; tripId: string };

export interface CliArgs {
  command: CliCommand;
  /** Overrides DATA_FILE */
  dataFile: string | null;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function takeValue(argv: string[], i: number, flag: string): string {
  const next = argv[i + 1];
  if (!next || next.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return next;
}

export function parseArgs(argv: string[]): CliArgs {
  let dataFile: string | null = null;
  let tripId: string | null = null;
  let outFile: string | null = null;
  let ids: IdPolicy = "preserve";
  let help = false;
  const positional: string[] = [];

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      help = true;
      i++;
    } else if (arg === "--data") {
      dataFile = takeValue(argv, i, "--data");
      i += 2;
    } else if (arg === "--trip") {
      tripId = takeValue(argv, i, "--trip");
      i += 2;
    } else if (arg === "--out") {
      outFile = takeValue(argv, i, "--out");
      i += 2;
    } else if (arg === "--ids") {
      const value = takeValue(argv, i, "--ids");
      if (value !== "preserve" && value !== "regenerate") {
        throw new CliUsageError(`--ids must be one of: preserve, regenerate`);
      }
      ids = value;
      i += 2;
    } else if (arg.startsWith("--")) {
      throw new CliUsageError(`Unknown flag: ${arg}`);
    } else {
      positional.push(arg);
      i++;
    }
  }

  const [name, ...rest] = positional;
  if (help || !name) {
    return { command: { kind: "help" }, dataFile };
  }

  switch (name) {
    case "export":
      if (rest.length > 0) throw new CliUsageError(`export takes no positional arguments (use --trip <id>)`);
      return { command: { kind: "export", tripId, outFile }, dataFile };
    case "import":
      if (rest.length !== 1) throw new CliUsageError(`import requires exactly one <file>`);
      return { command: { kind: "import", inputFile: rest[0], ids }, dataFile };
    case "summary":
      if (rest.length !== 1) throw new CliUsageError(`summary requires exactly one <tripId>`);
      return { command: { kind: "summary", tripId: rest[0] }, dataFile };
    default:
      throw new CliUsageError(`Unknown command: ${name}`);
  }
}

export const USAGE = `
itinera — trip planner data tool

USAGE:
  itinera export [--trip <id>] [--out <file>]      Write an export document (stdout by default)
  itinera import <file> [--ids preserve|regenerate] Import a document in one transaction
  itinera summary <tripId>                          Print cost, progress and data-quality findings

FLAGS:
  --data <file>   Planner data file (default: DATA_FILE or ~/.itinera/planner.json)
  --help, -h      Show this help
`.trim();
