import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ImportError, NotFoundError } from "../../errors.js";
import { memoryPlanner, seedTrip } from "../../__tests__/helpers.js";
import type { PlannerDocument } from "../document.js";
import { parseDocumentText } from "../import.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function withoutTimestamp(doc: PlannerDocument) {
  const { exportedAt: _exportedAt, ...rest } = doc;
  return rest;
}

function withoutIds(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(withoutIds);
  if (value === null || typeof value !== "object") return value;
  return Object.fromEntries(
    Object.entries(value)
      .filter(([key]) => key !== "id" && key !== "exportedAt")
      .map(([key, inner]) => [key, withoutIds(inner)])
  );
}

/** minimalDoc() with task k1 stamped with the given createdAt. */
function withTaskCreatedAt(createdAt: string) {
  const doc = minimalDoc();
  const [trip] = doc.trips;
  const [d2] = trip.days;
  const d1 = {
    id: "d1",
    dayNo: 1,
    events: [{ id: "e1", title: "Train", tasks: [{ id: "k1", title: "Print tickets", createdAt }] }],
  };
  return { ...doc, trips: [{ ...trip, days: [d2, d1] }] };
}

function importIssues(fn: () => unknown): { path: string; message: string }[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ImportError) return err.issues;
    throw err;
  }
  throw new Error("expected an ImportError");
}

const minimalDoc = () => ({
  version: 1,
  members: [{ id: "m1", name: "Erin", email: "erin@example.test" }],
  trips: [
    {
      id: "t1",
      title: "Weekend in Ghent",
      destination: "Belgium",
      startDate: "2026-09-04",
      endDate: "2026-09-06",
      memberIds: ["m1"],
      days: [
        {
          id: "d2",
          dayNo: 2,
          events: [{ id: "e2", title: "Canal tour", category: "sightseeing", cost: 12 }],
        },
        {
          id: "d1",
          dayNo: 1,
          date: "2026-09-04",
          events: [
            {
              id: "e1",
              time: "09:15",
              title: "Train",
              category: "transport",
              tasks: [{ id: "k1", title: "Print tickets", assigneeId: "m1" }],
            },
          ],
        },
      ],
      checklists: [{ id: "c1", title: "Bring", items: [{ id: "i1", text: "Umbrella" }] }],
    },
  ],
});

describe("export", () => {
  it("nests days in order with their events and tasks", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    const doc = planner.exportTrip(seed.trip.id);

    expect(doc.format).toBe("itinera");
    expect(doc.members.map((m) => m.name)).toEqual(["Alice", "Bob"]);
    expect(doc.trips).toHaveLength(1);
    const [trip] = doc.trips;
    expect(trip.memberIds).toEqual([seed.alice.id, seed.bob.id]);
    expect(trip.days.map((d) => d.dayNo)).toEqual([1, 2]);
    expect(trip.days[0].events.map((e) => e.title)).toEqual(["Flight in", "Dinner in Alfama"]);
    expect(trip.days[0].events[0].tasks[0]).toEqual({
      id: seed.checkIn.id,
      title: "Online check-in",
      description: "",
      status: "todo",
      priority: "high",
      assigneeId: seed.alice.id,
      dueDate: "2026-04-30",
      category: "transport",
      createdAt: seed.checkIn.createdAt,
    });
  });

  it("exports only the requested trip's team", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    const other = planner.trips.create({ title: "Solo", destination: "Bern" });
    planner.members.create({ name: "Frank" });

    expect(planner.exportTrip(other.id).members).toEqual([]);
    expect(planner.exportAll().members.map((m) => m.name)).toEqual(["Alice", "Bob", "Frank"]);
    expect(planner.exportAll().trips.map((t) => t.id)).toEqual([seed.trip.id, other.id]);
  });

  it("throws NotFoundError for an unknown trip", () => {
    expect(() => memoryPlanner().exportTrip("trip_missing")).toThrow(NotFoundError);
  });
});

describe("import", () => {
  it("round-trips an export into an empty planner with the same ids", () => {
    const source = memoryPlanner();
    seedTrip(source);
    const exported = source.exportAll();

    const target = memoryPlanner();
    const summary = target.importDocument(JSON.parse(JSON.stringify(exported)));

    expect(summary).toMatchObject({ membersCreated: 2, membersMatched: 0, days: 2, events: 3, tasks: 4 });
    expect(withoutTimestamp(target.exportAll())).toEqual(withoutTimestamp(exported));
  });

  it("regenerates ids and matches members by email, then name", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    const doc = planner.exportTrip(seed.trip.id);

    const summary = planner.importDocument(doc, "regenerate");

    expect(summary.membersMatched).toBe(2);
    expect(summary.membersCreated).toBe(0);
    expect(summary.tripIds).toHaveLength(1);
    const [copyId] = summary.tripIds;
    expect(copyId).not.toBe(seed.trip.id);
    expect(planner.members.list()).toHaveLength(2);

    const board = planner.board.query(copyId);
    expect(board.rows.map((r) => r.assigneeName)).toEqual(["Bob", "Alice", null, "Alice"]);
    expect(board.rows.map((r) => r.task.id)).not.toContain(seed.checkIn.id);
    expect(withoutIds(planner.exportTrip(copyId))).toEqual(withoutIds(doc));
  });

  it("rejects a createdAt that is not an ISO-8601 timestamp", () => {
    const planner = memoryPlanner();
    const doc = withTaskCreatedAt("zzz-not-a-date");

    const issues = importIssues(() => planner.importDocument(doc));

    expect(issues.map((i) => i.path)).toEqual(["trips.0.days.1.events.0.tasks.0.createdAt"]);
    expect(planner.trips.list()).toEqual([]);
    expect(planner.members.list()).toEqual([]);
  });

  it("keeps a valid imported createdAt", () => {
    const planner = memoryPlanner();
    const doc = withTaskCreatedAt("2026-01-01T00:00:00.000Z");

    planner.importDocument(doc);

    expect(planner.tasks.get("k1").createdAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("fills defaults, orders days by dayNo and inherits task categories", () => {
    const planner = memoryPlanner();
    const summary = planner.importDocument(minimalDoc());

    expect(summary).toEqual({
      tripIds: ["t1"],
      membersCreated: 1,
      membersMatched: 0,
      days: 2,
      events: 2,
      tasks: 1,
      checklists: 1,
      checklistItems: 1,
    });
    expect(planner.trips.get("t1").currency).toBe("USD");
    expect(planner.days.list("t1").map((d) => [d.id, d.dayNo])).toEqual([
      ["d1", 1],
      ["d2", 2],
    ]);
    expect(planner.events.get("e2")).toMatchObject({ time: "12:00", location: "", tags: [] });
    expect(planner.tasks.get("k1")).toMatchObject({ category: "transport", status: "todo", assigneeId: "m1" });
    expect(planner.checklists.get("c1")).toMatchObject({ listKey: "custom", items: [{ text: "Umbrella", checked: false }] });
  });

  it("reports a missing required field and commits nothing", () => {
    const planner = memoryPlanner();
    const doc = minimalDoc();
    const broken = { ...doc, trips: [{ ...doc.trips[0], title: undefined }] };

    const issues = importIssues(() => planner.importDocument(broken));

    expect(issues.map((i) => i.path)).toEqual(["trips.0.title"]);
    expect(planner.trips.list()).toEqual([]);
    expect(planner.members.list()).toEqual([]);
  });

  it("lists every reference problem in one error", () => {
    const planner = memoryPlanner();
    const doc = minimalDoc();
    const trip = doc.trips[0];
    const broken = {
      ...doc,
      trips: [
        {
          ...trip,
          endDate: "2026-09-01",
          memberIds: [],
          days: [trip.days[1], { id: "d1", dayNo: 1 }],
        },
      ],
    };

    const issues = importIssues(() => planner.importDocument(broken));

    expect(issues).toEqual([
      { path: "trips.0.endDate", message: "must not be before startDate" },
      { path: "trips.0.days.0.events.0.tasks.0.assigneeId", message: `assignee "m1" is not on the trip's team` },
      { path: "trips.0.days.1.id", message: `duplicate day id "d1"` },
      { path: "trips.0.days.1.dayNo", message: "duplicate dayNo 1" },
    ]);
    expect(planner.db.read((t) => t.trips.length + t.members.length)).toBe(0);
  });

  it("rejects team members missing from the document", () => {
    const planner = memoryPlanner();
    const doc = { ...minimalDoc(), members: [] };
    const issues = importIssues(() => planner.importDocument(doc));
    expect(issues).toContainEqual({ path: "trips.0.memberIds.0", message: `member "m1" is not in members` });
  });

  it("rejects id collisions under preserve and accepts them under regenerate", () => {
    const planner = memoryPlanner();
    planner.importDocument(minimalDoc());

    const issues = importIssues(() => planner.importDocument(minimalDoc()));
    expect(issues[0]).toEqual({ path: "trips.0.id", message: `trip id "t1" already exists` });
    expect(planner.trips.list()).toHaveLength(1);

    const summary = planner.importDocument(minimalDoc(), "regenerate");
    expect(summary.membersMatched).toBe(1);
    expect(planner.trips.list()).toHaveLength(2);
  });

  it("reuses a stored member whose id the document repeats", () => {
    const planner = memoryPlanner();
    planner.importDocument(minimalDoc());
    const second = {
      members: [{ id: "m1", name: "Erin" }],
      trips: [{ id: "t2", title: "Bruges", destination: "Belgium", memberIds: ["m1"] }],
    };

    const summary = planner.importDocument(second);

    expect(summary).toMatchObject({ membersCreated: 0, membersMatched: 1, days: 0 });
    expect(planner.members.listTeam("t2").map((m) => m.id)).toEqual(["m1"]);
  });

  it("reports unparseable JSON text as an ImportError", () => {
    const issues = importIssues(() => parseDocumentText("{ not json"));
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toBe("");
    expect(issues[0].message).toMatch(/^not valid JSON/);
  });
});
