import type { PlannerOptions } from "./config.js";
import { ChecklistStore } from "./checklists/store.js";
import type { PlannerDatabase } from "./data/database.js";
import { MemberStore } from "./members/store.js";
import { TripSummaryService } from "./summary/trip-summary.js";
import { TaskBoard } from "./tasks/board.js";
import { TaskStore } from "./tasks/store.js";
import { exportAll, exportTrip } from "./transfer/export.js";
import type { PlannerDocument } from "./transfer/document.js";
import { importDocument, type IdPolicy, type ImportSummary } from "./transfer/import.js";
import { DayStore } from "./trips/day-store.js";
import { EventStore } from "./trips/event-store.js";
import { TripStore } from "./trips/store.js";

/** Every service the HTTP routes and the CLI use, wired to one database handle. */
export interface Planner {
  db: PlannerDatabase;
  options: PlannerOptions;
  trips: TripStore;
  days: DayStore;
  events: EventStore;
  tasks: TaskStore;
  board: TaskBoard;
  members: MemberStore;
  checklists: ChecklistStore;
  summary: TripSummaryService;
  exportAll(): PlannerDocument;
  exportTrip(tripId: string): PlannerDocument;
  importDocument(raw: unknown, ids?: IdPolicy): ImportSummary;
}

export function createPlanner(db: PlannerDatabase, options: PlannerOptions): Planner {
  return {
    db,
    options,
    trips: new TripStore(db, options),
    days: new DayStore(db, options),
    events: new EventStore(db, options),
    tasks: new TaskStore(db),
    board: new TaskBoard(db),
    members: new MemberStore(db),
    checklists: new ChecklistStore(db, options),
    summary: new TripSummaryService(db),
    exportAll: () => exportAll(db),
    exportTrip: (tripId) => exportTrip(db, tripId),
    importDocument: (raw, ids) => importDocument(db, raw, { ids, defaultCurrency: options.defaultCurrency }),
  };
}
