import type { PlannerOptions } from "../config.js";
import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import { getDayRow, getTripRow, orderedDays, removeDay, renumberDays } from "../data/relations.js";
import {
  CreateDayInput,
  UpdateDayInput,
  type CreateDayData,
  type Day,
  type UpdateDayData,
} from "../data/schema.js";
import { addDays, nowIso } from "../utils/dates.js";
import { newId } from "../utils/ids.js";

export class DayStore {
  constructor(
    private readonly db: PlannerDatabase,
    private readonly options: PlannerOptions
  ) {}

  /** Days of a trip in `dayNo` order. */
  list(tripId: string): Day[] {
    return this.db.read((t) => {
      getTripRow(t, tripId);
      return orderedDays(t, tripId);
    });
  }

  get(id: string): Day {
    return this.db.read((t) => getDayRow(t, id));
  }

  /**
   * Append a day to the trip. Without an explicit date, the day is dated from the
   * trip's start date (`startDate + dayNo - 1`), or left undated.
   */
  add(tripId: string, data: CreateDayData = {}): Day {
    const input = parseInput(CreateDayInput, data, "day");
    return this.db.transaction("day.create", (t) => {
      const trip = getTripRow(t, tripId);
      const dayNo = orderedDays(t, tripId).reduce((max, d) => Math.max(max, d.dayNo), 0) + 1;
      const date =
        input.date !== undefined ? input.date : trip.startDate ? addDays(trip.startDate, dayNo - 1) : null;

      const day: Day = {
        id: newId("day"),
        tripId,
        dayNo,
        date,
        note: input.note ?? "",
        createdAt: nowIso(),
      };
      t.days.push(day);
      return day;
    });
  }

  update(id: string, data: UpdateDayData): Day {
    const input = parseInput(UpdateDayInput, data, "day");
    return this.db.transaction("day.update", (t) => {
      const day = getDayRow(t, id);
      if (input.date !== undefined) day.date = input.date;
      if (input.note !== undefined) day.note = input.note;
      return day;
    });
  }

  /** Remove the day (and its events and tasks), then renumber the remaining days 1..n. */
  delete(id: string): void {
    this.db.transaction("day.delete", (t) => {
      const day = getDayRow(t, id);
      removeDay(t, id, this.options.deletePolicy);
      renumberDays(t, day.tripId);
    });
  }
}
