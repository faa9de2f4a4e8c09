import type { DeletePolicy } from "../config.js";
import { ConstraintError, NotFoundError, type EntityName } from "../errors.js";
import type {
  Checklist,
  ChecklistItem,
  Day,
  Member,
  PlanEvent,
  PlannerTables,
  Task,
  Trip,
} from "./schema.js";

// Lookups and cascading removal shared by the stores and the importer.
// Every function works on the tables handed in, so it composes inside a transaction.

type Tables = Readonly<PlannerTables>;

function findOrThrow<T extends { id: string }>(rows: readonly T[], entity: EntityName, id: string): T {
  const row = rows.find((r) => r.id === id);
  if (!row) throw new NotFoundError(entity, id);
  return row;
}

export const getTripRow = (t: Tables, id: string): Trip => findOrThrow(t.trips, "trip", id);
export const getDayRow = (t: Tables, id: string): Day => findOrThrow(t.days, "day", id);
export const getEventRow = (t: Tables, id: string): PlanEvent => findOrThrow(t.events, "event", id);
export const getTaskRow = (t: Tables, id: string): Task => findOrThrow(t.tasks, "task", id);
export const getMemberRow = (t: Tables, id: string): Member => findOrThrow(t.members, "member", id);
export const getChecklistRow = (t: Tables, id: string): Checklist =>
  findOrThrow(t.checklists, "checklist", id);
export const getChecklistItemRow = (t: Tables, id: string): ChecklistItem =>
  findOrThrow(t.checklistItems, "checklistItem", id);

/** Trip that (transitively) owns an event. */
export function tripIdOfEvent(t: Tables, event: PlanEvent): string {
  return getDayRow(t, event.dayId).tripId;
}

export function tripIdOfTask(t: Tables, task: Task): string {
  return tripIdOfEvent(t, getEventRow(t, task.eventId));
}

export function isOnTeam(t: Tables, tripId: string, memberId: string): boolean {
  return t.tripMembers.some((tm) => tm.tripId === tripId && tm.memberId === memberId);
}

export function dayIdsOfTrip(t: Tables, tripId: string): Set<string> {
  return new Set(t.days.filter((d) => d.tripId === tripId).map((d) => d.id));
}

export function eventIdsOfDays(t: Tables, dayIds: Set<string>): Set<string> {
  return new Set(t.events.filter((e) => dayIds.has(e.dayId)).map((e) => e.id));
}

/** Every task under a trip, in creation order. */
export function tasksOfTrip(t: Tables, tripId: string): Task[] {
  const eventIds = eventIdsOfDays(t, dayIdsOfTrip(t, tripId));
  return t.tasks.filter((task) => eventIds.has(task.eventId));
}

/** Days of a trip in `dayNo` order. */
export function orderedDays(t: Tables, tripId: string): Day[] {
  return t.days.filter((d) => d.tripId === tripId).sort((a, b) => a.dayNo - b.dayNo);
}

/** Events of a day by time, then creation order (stable sort keeps insertion order on ties). */
export function orderedEvents(t: Tables, dayId: string): PlanEvent[] {
  return t.events
    .filter((e) => e.dayId === dayId)
    .sort((a, b) => (a.time < b.time ? -1 : a.time > b.time ? 1 : 0));
}

export function renumberDays(t: PlannerTables, tripId: string): void {
  orderedDays(t, tripId).forEach((day, i) => {
    day.dayNo = i + 1;
  });
}

function refuseIfChildren(
  policy: DeletePolicy,
  entity: EntityName,
  id: string,
  child: EntityName,
  count: number
): void {
  if (policy === "restrict" && count > 0) {
    throw new ConstraintError(entity, id, child, count);
  }
}

// ---- Cascading removal ----

export function removeEvent(t: PlannerTables, eventId: string, policy: DeletePolicy): void {
  refuseIfChildren(policy, "event", eventId, "task", t.tasks.filter((k) => k.eventId === eventId).length);
  t.tasks = t.tasks.filter((k) => k.eventId !== eventId);
  t.events = t.events.filter((e) => e.id !== eventId);
}

export function removeDay(t: PlannerTables, dayId: string, policy: DeletePolicy): void {
  const eventIds = eventIdsOfDays(t, new Set([dayId]));
  refuseIfChildren(policy, "day", dayId, "event", eventIds.size);
  t.tasks = t.tasks.filter((k) => !eventIds.has(k.eventId));
  t.events = t.events.filter((e) => !eventIds.has(e.id));
  t.days = t.days.filter((d) => d.id !== dayId);
}

export function removeChecklist(t: PlannerTables, checklistId: string, policy: DeletePolicy): void {
  refuseIfChildren(
    policy,
    "checklist",
    checklistId,
    "checklistItem",
    t.checklistItems.filter((i) => i.checklistId === checklistId).length
  );
  t.checklistItems = t.checklistItems.filter((i) => i.checklistId !== checklistId);
  t.checklists = t.checklists.filter((c) => c.id !== checklistId);
}

export function removeTrip(t: PlannerTables, tripId: string, policy: DeletePolicy): void {
  const dayIds = dayIdsOfTrip(t, tripId);
  const checklistIds = new Set(t.checklists.filter((c) => c.tripId === tripId).map((c) => c.id));
  refuseIfChildren(policy, "trip", tripId, "day", dayIds.size);
  refuseIfChildren(policy, "trip", tripId, "checklist", checklistIds.size);

  const eventIds = eventIdsOfDays(t, dayIds);
  t.tasks = t.tasks.filter((k) => !eventIds.has(k.eventId));
  t.events = t.events.filter((e) => !eventIds.has(e.id));
  t.days = t.days.filter((d) => !dayIds.has(d.id));
  t.checklistItems = t.checklistItems.filter((i) => !checklistIds.has(i.checklistId));
  t.checklists = t.checklists.filter((c) => !checklistIds.has(c.id));
  // Team links are not owned children; they go with the trip under either policy.
  t.tripMembers = t.tripMembers.filter((tm) => tm.tripId !== tripId);
  t.trips = t.trips.filter((trip) => trip.id !== tripId);
}

/** Clear the assignee of every task under `tripId` (or every trip when null) held by `memberId`. */
export function unassignMember(t: PlannerTables, memberId: string, tripId: string | null): number {
  const scope = tripId === null ? null : new Set(tasksOfTrip(t, tripId).map((k) => k.id));
  let cleared = 0;
  for (const task of t.tasks) {
    if (task.assigneeId === memberId && (scope === null || scope.has(task.id))) {
      task.assigneeId = null;
      cleared++;
    }
  }
  return cleared;
}
