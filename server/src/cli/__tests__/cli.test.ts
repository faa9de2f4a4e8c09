import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CliUsageError, parseArgs, USAGE } from "../args.js";
import { runCommand, type CliOutput } from "../commands.js";
import { memoryPlanner, seedTrip } from "../../__tests__/helpers.js";

describe("parseArgs()", () => {
  it("shows help with no arguments or --help", () => {
    expect(parseArgs([])).toEqual({ command: { kind: "help" }, dataFile: null });
    expect(parseArgs(["export", "--help"]).command).toEqual({ kind: "help" });
  });

  it("parses export with optional trip and output file", () => {
    expect(parseArgs(["export"])).toEqual({
      command: { kind: "export", tripId: null, outFile: null },
      dataFile: null,
    });
    expect(parseArgs(["--data", "/tmp/p.json", "export", "--trip", "trip_1", "--out", "t.json"])).toEqual({
      command: { kind: "export", tripId: "trip_1", outFile: "t.json" },
      dataFile: "/tmp/p.json",
    });
  });

  it("parses import with an id policy", () => {
    expect(parseArgs(["import", "doc.json"]).command).toEqual({
      kind: "import",
      inputFile: "doc.json",
      ids: "preserve",
    });
    expect(parseArgs(["import", "doc.json", "--ids", "regenerate"]).command).toEqual({
      kind: "import",
      inputFile: "doc.json",
      ids: "regenerate",
    });
  });

  it("parses summary", () => {
    expect(parseArgs(["summary", "trip_1"]).command).toEqual({ kind: "summary", tripId: "trip_1" });
  });

  it("rejects bad usage", () => {
    expect(() => parseArgs(["import"])).toThrow(CliUsageError);
    expect(() => parseArgs(["summary"])).toThrow("summary requires exactly one <tripId>");
    expect(() => parseArgs(["import", "a.json", "--ids", "random"])).toThrow(/--ids must be one of/);
    expect(() => parseArgs(["export", "--trip"])).toThrow("--trip requires a value");
    expect(() => parseArgs(["export", "--verbose"])).toThrow("Unknown flag: --verbose");
    expect(() => parseArgs(["sync"])).toThrow("Unknown command: sync");
  });
});

describe("runCommand()", () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let io: CliOutput;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "itinera-cli-"));
    out = [];
    err = [];
    io = { out: (text) => out.push(text), err: (text) => err.push(text) };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("prints usage for help", () => {
    expect(runCommand(memoryPlanner(), { kind: "help" }, io)).toBe(0);
    expect(out).toEqual([USAGE]);
  });

  it("exports to a file and imports it into another planner", () => {
    const source = memoryPlanner();
    const seed = seedTrip(source);
    const file = path.join(dir, "trip.json");

    expect(runCommand(source, { kind: "export", tripId: seed.trip.id, outFile: file }, io)).toBe(0);
    expect(err).toEqual([`Exported 1 trip(s) and 2 member(s) to ${file}`]);

    const target = memoryPlanner();
    expect(runCommand(target, { kind: "import", inputFile: file, ids: "preserve" }, io)).toBe(0);
    expect(out).toEqual([
      "Imported 1 trip(s): 2 days, 3 events, 4 tasks, 2 checklists (members: 2 created, 0 matched)",
    ]);
    expect(target.trips.get(seed.trip.id).title).toBe("Lisbon long weekend");
  });

  it("writes the export document to stdout without --out", () => {
    const planner = memoryPlanner();
    seedTrip(planner);
    expect(runCommand(planner, { kind: "export", tripId: null, outFile: null }, io)).toBe(0);
    expect(out).toHaveLength(1);
    expect(JSON.parse(out[0]).trips[0].title).toBe("Lisbon long weekend");
  });

  it("prints the summary", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    expect(runCommand(planner, { kind: "summary", tripId: seed.trip.id }, io)).toBe(0);
    expect(out[0].split("\n")).toEqual([
      `Trip ${seed.trip.id}`,
      "  Tasks: 1/4 done (25%)",
      "  Total cost: 168.50 USD",
      "    transport: 120.00",
      "    food: 45.50",
      "    sightseeing: 3.00",
      "  No issues found",
    ]);
  });

  it("reports failures on stderr with exit code 1", () => {
    const planner = memoryPlanner();
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ nope", "utf-8");

    expect(runCommand(planner, { kind: "import", inputFile: file, ids: "preserve" }, io)).toBe(1);
    expect(err[0]).toMatch(/^Error: Import rejected \(1 issue\)/);

    expect(runCommand(planner, { kind: "summary", tripId: "trip_missing" }, io)).toBe(1);
    expect(err[1]).toMatch(/^Error: trip trip_missing not found/);
  });
});
