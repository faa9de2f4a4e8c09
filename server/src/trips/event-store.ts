import type { PlannerOptions } from "../config.js";
import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import { getDayRow, getEventRow, orderedEvents, removeEvent } from "../data/relations.js";
import {
  CreateEventInput,
  UpdateEventInput,
  type CreateEventData,
  type PlanEvent,
  type UpdateEventData,
} from "../data/schema.js";
import { ValidationError } from "../errors.js";
import { nowIso } from "../utils/dates.js";
import { newId } from "../utils/ids.js";

export class EventStore {
  constructor(
    private readonly db: PlannerDatabase,
    private readonly options: PlannerOptions
  ) {}

  /** Events of a day ordered by time, then creation. */
  list(dayId: string): PlanEvent[] {
    return this.db.read((t) => {
      getDayRow(t, dayId);
      return orderedEvents(t, dayId);
    });
  }

  get(id: string): PlanEvent {
    return this.db.read((t) => getEventRow(t, id));
  }

  create(dayId: string, data: CreateEventData = {}): PlanEvent {
    const input = parseInput(CreateEventInput, data, "event");
    return this.db.transaction("event.create", (t) => {
      getDayRow(t, dayId);
      const event: PlanEvent = {
        id: newId("ev"),
        dayId,
        time: input.time ?? "12:00",
        title: input.title ?? "",
        location: input.location ?? "",
        category: input.category ?? "other",
        cost: input.cost ?? 0,
        notes: input.notes ?? "",
        tags: input.tags ?? [],
        createdAt: nowIso(),
      };
      t.events.push(event);
      return event;
    });
  }

  /** Partial update; `dayId` moves the event to another day of the same trip. */
  update(id: string, data: UpdateEventData): PlanEvent {
    const input = parseInput(UpdateEventInput, data, "event");
    return this.db.transaction("event.update", (t) => {
      const event = getEventRow(t, id);
      if (input.dayId !== undefined && input.dayId !== event.dayId) {
        const from = getDayRow(t, event.dayId);
        const to = getDayRow(t, input.dayId);
        if (from.tripId !== to.tripId) {
          throw new ValidationError("event", [{ field: "dayId", message: "must be a day of the same trip" }]);
        }
        event.dayId = to.id;
      }
      if (input.time !== undefined) event.time = input.time;
      if (input.title !== undefined) event.title = input.title;
      if (input.location !== undefined) event.location = input.location;
      if (input.category !== undefined) event.category = input.category;
      if (input.cost !== undefined) event.cost = input.cost;
      if (input.notes !== undefined) event.notes = input.notes;
      if (input.tags !== undefined) event.tags = input.tags;
      return event;
    });
  }

  delete(id: string): void {
    this.db.transaction("event.delete", (t) => {
      getEventRow(t, id);
      removeEvent(t, id, this.options.deletePolicy);
    });
  }
}
