import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConstraintError, NotFoundError, ValidationError } from "../../errors.js";
import { memoryPlanner, seedTrip } from "../../__tests__/helpers.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("TripStore", () => {
  it("creates a trip with Day 1 and the default checklists", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Kyoto", destination: "Japan", startDate: "2026-10-01" });

    expect(trip.id).toMatch(/^trip_/);
    expect(trip.currency).toBe("USD");
    expect(trip.endDate).toBeNull();

    const days = planner.days.list(trip.id);
    expect(days).toHaveLength(1);
    expect(days[0].dayNo).toBe(1);
    expect(days[0].date).toBe("2026-10-01");

    const lists = planner.checklists.list(trip.id);
    expect(lists.map((c) => [c.listKey, c.title])).toEqual([
      ["documents", "Documents & IDs"],
      ["packing", "Packing list"],
    ]);
  });

  it("upper-cases the currency code", () => {
    const planner = memoryPlanner();
    expect(planner.trips.create({ title: "Oslo", destination: "Norway", currency: "nok" }).currency).toBe("NOK");
  });

  it("rejects a missing title and an end date before the start date", () => {
    const planner = memoryPlanner();
    expect(() => planner.trips.create({ title: " ", destination: "Rome" })).toThrow(ValidationError);
    expect(() =>
      planner.trips.create({ title: "Rome", destination: "Italy", startDate: "2026-06-10", endDate: "2026-06-01" })
    ).toThrow(/endDate must not be before startDate/);
    expect(planner.trips.list()).toEqual([]);
  });

  it("rejects unknown fields on update", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Rome", destination: "Italy" });
    const patch = { title: "Rome", id: "trip_other" };
    expect(() => planner.trips.update(trip.id, patch)).toThrow(ValidationError);
  });

  it("checks the date range against stored dates on partial update", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Rome", destination: "Italy", startDate: "2026-06-10" });
    expect(() => planner.trips.update(trip.id, { endDate: "2026-06-09" })).toThrow(ValidationError);

    const updated = planner.trips.update(trip.id, { endDate: "2026-06-12", title: "Rome again" });
    expect(updated).toMatchObject({ title: "Rome again", startDate: "2026-06-10", endDate: "2026-06-12" });
  });

  it("lists trips newest first", () => {
    const planner = memoryPlanner();
    const first = planner.trips.create({ title: "First", destination: "A" });
    const second = planner.trips.create({ title: "Second", destination: "B" });
    expect(planner.trips.list().map((t) => t.id)).toEqual([second.id, first.id]);
  });

  it("orders listed trips by createdAt, not insertion", () => {
    const planner = memoryPlanner();
    const current = planner.trips.create({ title: "Current", destination: "A" });
    planner.importDocument({
      trips: [{ id: "trip_old", title: "Old", destination: "B", createdAt: "2020-01-01T00:00:00.000Z" }],
    });

    expect(planner.trips.list().map((t) => t.id)).toEqual([current.id, "trip_old"]);
  });

  it("throws NotFoundError for an unknown trip", () => {
    const planner = memoryPlanner();
    expect(() => planner.trips.get("trip_missing")).toThrow(NotFoundError);
    expect(() => planner.trips.delete("trip_missing")).toThrow(NotFoundError);
  });

  it("nests days, events and tasks in the bundle with assignee names", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    const bundle = planner.trips.getBundle(seed.trip.id);

    expect(bundle.days.map((d) => d.dayNo)).toEqual([1, 2]);
    expect(bundle.days[0].events.map((e) => e.title)).toEqual(["Flight in", "Dinner in Alfama"]);
    expect(bundle.days[0].events[0].tasks[0]).toMatchObject({
      title: "Online check-in",
      assigneeName: "Alice",
    });
    expect(bundle.days[1].events[0].tasks.map((k) => k.assigneeName)).toEqual([null, "Alice"]);
    expect(bundle.members.map((m) => m.name)).toEqual(["Alice", "Bob"]);
  });

  it("cascades a delete to everything the trip owns", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    planner.trips.delete(seed.trip.id);

    const counts = planner.db.read((t) => [
      t.trips.length,
      t.days.length,
      t.events.length,
      t.tasks.length,
      t.checklists.length,
      t.tripMembers.length,
      t.members.length,
    ]);
    // Members are global and survive the trip
    expect(counts).toEqual([0, 0, 0, 0, 0, 0, 2]);
  });

  it("refuses to delete a trip that still has days under the restrict policy", () => {
    const planner = memoryPlanner("restrict");
    const trip = planner.trips.create({ title: "Rome", destination: "Italy" });

    let caught: unknown;
    try {
      planner.trips.delete(trip.id);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConstraintError);
    expect(caught).toMatchObject({ entity: "trip", blockedBy: "day", childCount: 1 });
    expect(planner.trips.list()).toHaveLength(1);
  });
});

describe("DayStore", () => {
  it("dates new days from the trip start and numbers them in sequence", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Road trip", destination: "Iceland", startDate: "2026-03-30" });
    const day2 = planner.days.add(trip.id);
    const day3 = planner.days.add(trip.id, { note: "Rest day" });
    const day4 = planner.days.add(trip.id, { date: null });

    expect([day2.dayNo, day2.date]).toEqual([2, "2026-03-31"]);
    expect([day3.dayNo, day3.date, day3.note]).toEqual([3, "2026-04-01", "Rest day"]);
    expect([day4.dayNo, day4.date]).toEqual([4, null]);
  });

  it("leaves days undated when the trip has no start date", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Someday", destination: "Patagonia" });
    expect(planner.days.add(trip.id).date).toBeNull();
  });

  it("rejects impossible calendar dates", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Leap", destination: "Anywhere" });
    expect(() => planner.days.add(trip.id, { date: "2026-02-30" })).toThrow(ValidationError);
  });

  it("renumbers the remaining days after a delete", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Week", destination: "Crete" });
    const [day1] = planner.days.list(trip.id);
    const day2 = planner.days.add(trip.id);
    const day3 = planner.days.add(trip.id);

    planner.days.delete(day2.id);

    expect(planner.days.list(trip.id).map((d) => [d.id, d.dayNo])).toEqual([
      [day1.id, 1],
      [day3.id, 2],
    ]);
  });

  it("cascades a day delete to its events and tasks", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    planner.days.delete(seed.day1.id);

    expect(() => planner.events.get(seed.flight.id)).toThrow(NotFoundError);
    expect(() => planner.tasks.get(seed.checkIn.id)).toThrow(NotFoundError);
    expect(planner.tasks.listByTrip(seed.trip.id).map((k) => k.title)).toEqual([
      "Buy Viva Viagem card",
      "Withdraw euros",
    ]);
  });

  it("refuses to delete a day with events under restrict, but allows an empty one", () => {
    const planner = memoryPlanner("restrict");
    const trip = planner.trips.create({ title: "Week", destination: "Crete" });
    const [day1] = planner.days.list(trip.id);
    const day2 = planner.days.add(trip.id);
    planner.events.create(day1.id, { title: "Ferry" });

    expect(() => planner.days.delete(day1.id)).toThrow(ConstraintError);
    planner.days.delete(day2.id);
    expect(planner.days.list(trip.id).map((d) => d.id)).toEqual([day1.id]);
  });
});

describe("EventStore", () => {
  it("fills defaults and orders a day's events by time", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Day out", destination: "Porto" });
    const [day] = planner.days.list(trip.id);

    const lunch = planner.events.create(day.id);
    const breakfast = planner.events.create(day.id, { time: "08:00", title: "Breakfast", category: "food" });

    expect(lunch).toMatchObject({ time: "12:00", title: "", category: "other", cost: 0, tags: [] });
    expect(planner.events.list(day.id).map((e) => e.id)).toEqual([breakfast.id, lunch.id]);
  });

  it("rejects a malformed time and a negative cost", () => {
    const planner = memoryPlanner();
    const trip = planner.trips.create({ title: "Day out", destination: "Porto" });
    const [day] = planner.days.list(trip.id);

    expect(() => planner.events.create(day.id, { time: "24:00" })).toThrow(ValidationError);
    expect(() => planner.events.create(day.id, { cost: -1 })).toThrow(ValidationError);
  });

  it("moves an event to another day of the same trip only", () => {
    const planner = memoryPlanner();
    const seed = seedTrip(planner);
    const other = planner.trips.create({ title: "Other", destination: "Madrid" });
    const [otherDay] = planner.days.list(other.id);

    const moved = planner.events.update(seed.dinner.id, { dayId: seed.day2.id });
    expect(moved.dayId).toBe(seed.day2.id);
    expect(planner.tasks.listByEvent(seed.dinner.id)).toHaveLength(1);

    expect(() => planner.events.update(seed.dinner.id, { dayId: otherDay.id })).toThrow(/same trip/);
  });

  it("throws NotFoundError when creating on a missing day", () => {
    const planner = memoryPlanner();
    expect(() => planner.events.create("day_missing", { title: "Ghost" })).toThrow(NotFoundError);
  });

  it("refuses to delete an event with tasks under restrict", () => {
    const planner = memoryPlanner("restrict");
    const seed = seedTrip(planner);
    expect(() => planner.events.delete(seed.flight.id)).toThrow(ConstraintError);

    planner.tasks.delete(seed.checkIn.id);
    planner.events.delete(seed.flight.id);
    expect(planner.events.list(seed.day1.id).map((e) => e.id)).toEqual([seed.dinner.id]);
  });
});
