import type { PlannerDatabase } from "../data/database.js";
import { getTripRow, orderedDays, orderedEvents } from "../data/relations.js";
import type { PlannerTables, Trip } from "../data/schema.js";
import { nowIso } from "../utils/dates.js";
import type { MemberDoc, PlannerDocument, TripDoc } from "./document.js";

function tripToDoc(t: Readonly<PlannerTables>, trip: Trip): TripDoc {
  return {
    id: trip.id,
    title: trip.title,
    destination: trip.destination,
    startDate: trip.startDate,
    endDate: trip.endDate,
    currency: trip.currency,
    createdAt: trip.createdAt,
    memberIds: t.tripMembers.filter((tm) => tm.tripId === trip.id).map((tm) => tm.memberId),
    days: orderedDays(t, trip.id).map((day) => ({
      id: day.id,
      dayNo: day.dayNo,
      date: day.date,
      note: day.note,
      createdAt: day.createdAt,
      events: orderedEvents(t, day.id).map((event) => ({
        id: event.id,
        time: event.time,
        title: event.title,
        location: event.location,
        category: event.category,
        cost: event.cost,
        notes: event.notes,
        tags: [...event.tags],
        createdAt: event.createdAt,
        tasks: t.tasks
          .filter((task) => task.eventId === event.id)
          .map(({ eventId: _eventId, ...task }) => task),
      })),
    })),
    checklists: t.checklists
      .filter((c) => c.tripId === trip.id)
      .map(({ tripId: _tripId, ...checklist }) => ({
        ...checklist,
        items: t.checklistItems
          .filter((i) => i.checklistId === checklist.id)
          .map(({ checklistId: _checklistId, ...item }) => item),
      })),
  };
}

function buildDocument(t: Readonly<PlannerTables>, trips: Trip[], members: MemberDoc[]): PlannerDocument {
  return {
    format: "itinera",
    version: 1,
    exportedAt: nowIso(),
    members,
    trips: trips.map((trip) => tripToDoc(t, trip)),
  };
}

/** Every trip and every member, oldest trip first. */
export function exportAll(db: PlannerDatabase): PlannerDocument {
  return db.read((t) => buildDocument(t, t.trips, t.members));
}

/** One trip plus the members its team references. */
export function exportTrip(db: PlannerDatabase, tripId: string): PlannerDocument {
  return db.read((t) => {
    const trip = getTripRow(t, tripId);
    const team = new Set(t.tripMembers.filter((tm) => tm.tripId === tripId).map((tm) => tm.memberId));
    return buildDocument(t, [trip], t.members.filter((m) => team.has(m.id)));
  });
}
