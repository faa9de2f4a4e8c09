import type { PlannerOptions } from "../config.js";
import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import {
  getTripRow,
  orderedDays,
  orderedEvents,
  removeTrip,
} from "../data/relations.js";
import {
  CreateTripInput,
  UpdateTripInput,
  type Checklist,
  type ChecklistItem,
  type Day,
  type Member,
  type PlanEvent,
  type PlannerTables,
  type Task,
  type Trip,
  type CreateTripData,
  type UpdateTripData,
} from "../data/schema.js";
import { ValidationError } from "../errors.js";
import { nowIso } from "../utils/dates.js";
import { newId } from "../utils/ids.js";

export type TaskView = Task & { assigneeName: string | null };
export type EventWithTasks = PlanEvent & { tasks: TaskView[] };
export type DayWithEvents = Day & { events: EventWithTasks[] };
export type ChecklistWithItems = Checklist & { items: ChecklistItem[] };

/** A trip with everything it owns, nested the way the planner screens render it. */
export interface TripBundle {
  trip: Trip;
  days: DayWithEvents[];
  checklists: ChecklistWithItems[];
  /** Active members on the trip's team, in the order they joined the member list */
  members: Member[];
}

const DEFAULT_CHECKLISTS = [
  { listKey: "documents", title: "Documents & IDs" },
  { listKey: "packing", title: "Packing list" },
] as const;

function checkDateRange(startDate: string | null, endDate: string | null): void {
  if (startDate && endDate && startDate > endDate) {
    throw new ValidationError("trip", [{ field: "endDate", message: "must not be before startDate" }]);
  }
}

/** Assemble the nested view of one trip from the flat tables. */
export function buildTripBundle(t: Readonly<PlannerTables>, tripId: string): TripBundle {
  const trip = getTripRow(t, tripId);
  const memberNames = new Map(t.members.map((m) => [m.id, m.name]));

  const days = orderedDays(t, tripId).map((day) => ({
    ...day,
    events: orderedEvents(t, day.id).map((event) => ({
      ...event,
      tasks: t.tasks
        .filter((task) => task.eventId === event.id)
        .map((task) => ({
          ...task,
          assigneeName: task.assigneeId ? (memberNames.get(task.assigneeId) ?? null) : null,
        })),
    })),
  }));

  const checklists = t.checklists
    .filter((c) => c.tripId === tripId)
    .map((c) => ({ ...c, items: t.checklistItems.filter((i) => i.checklistId === c.id) }));

  const team = new Set(t.tripMembers.filter((tm) => tm.tripId === tripId).map((tm) => tm.memberId));
  const members = t.members.filter((m) => m.active && team.has(m.id));

  return { trip, days, checklists, members };
}

export class TripStore {
  constructor(
    private readonly db: PlannerDatabase,
    private readonly options: PlannerOptions
  ) {}

  /** Newest `createdAt` first; trips created in the same instant list the later-inserted one first. */
  list(): Trip[] {
    return this.db.read((t) =>
      t.trips
        .map((trip, index) => ({ trip, index }))
        .sort(
          (a, b) =>
            (a.trip.createdAt < b.trip.createdAt ? 1 : a.trip.createdAt > b.trip.createdAt ? -1 : 0) ||
            b.index - a.index
        )
        .map(({ trip }) => trip)
    );
  }

  get(id: string): Trip {
    return this.db.read((t) => getTripRow(t, id));
  }

  getBundle(id: string): TripBundle {
    return this.db.read((t) => buildTripBundle(t, id));
  }

  /** Creates the trip together with Day 1 and the default document and packing checklists. */
  create(data: CreateTripData): Trip {
    const input = parseInput(CreateTripInput, data, "trip");
    const startDate = input.startDate ?? null;
    const endDate = input.endDate ?? null;
    checkDateRange(startDate, endDate);

    return this.db.transaction("trip.create", (t) => {
      const now = nowIso();
      const trip: Trip = {
        id: newId("trip"),
        title: input.title,
        destination: input.destination,
        startDate,
        endDate,
        currency: input.currency ?? this.options.defaultCurrency,
        createdAt: now,
      };
      t.trips.push(trip);
      t.days.push({ id: newId("day"), tripId: trip.id, dayNo: 1, date: startDate, note: "", createdAt: now });
      for (const cl of DEFAULT_CHECKLISTS) {
        t.checklists.push({ id: newId("cl"), tripId: trip.id, listKey: cl.listKey, title: cl.title, createdAt: now });
      }
      return trip;
    });
  }

  update(id: string, data: UpdateTripData): Trip {
    const input = parseInput(UpdateTripInput, data, "trip");
    return this.db.transaction("trip.update", (t) => {
      const trip = getTripRow(t, id);
      const startDate = input.startDate !== undefined ? input.startDate : trip.startDate;
      const endDate = input.endDate !== undefined ? input.endDate : trip.endDate;
      checkDateRange(startDate, endDate);

      if (input.title !== undefined) trip.title = input.title;
      if (input.destination !== undefined) trip.destination = input.destination;
      if (input.currency !== undefined) trip.currency = input.currency;
      trip.startDate = startDate;
      trip.endDate = endDate;
      return trip;
    });
  }

  /** Removes the trip and, under the cascade policy, every day, event, task and checklist it owns. */
  delete(id: string): void {
    this.db.transaction("trip.delete", (t) => {
      getTripRow(t, id);
      removeTrip(t, id, this.options.deletePolicy);
    });
  }
}
