import type { PlannerDatabase } from "../data/database.js";
import { getTripRow, orderedDays, orderedEvents } from "../data/relations.js";
import type { EventCategory, PlannerTables } from "../data/schema.js";

export type SummaryIssueKind =
  | "untitled_event"
  | "undated_day"
  | "day_outside_trip"
  | "inactive_assignee";

export interface SummaryIssue {
  kind: SummaryIssueKind;
  /** Id of the offending day, event or task */
  id: string;
  message: string;
}

export interface TripSummary {
  tripId: string;
  currency: string;
  taskCount: number;
  doneCount: number;
  /** Percent of tasks done, rounded; 0 when there are no tasks */
  progress: number;
  totalCost: number;
  costByCategory: Record<EventCategory, number>;
  issues: SummaryIssue[];
}

export function summarizeTrip(t: Readonly<PlannerTables>, tripId: string): TripSummary {
  const trip = getTripRow(t, tripId);
  const members = new Map(t.members.map((m) => [m.id, m]));
  const costByCategory: Record<EventCategory, number> = {
    transport: 0,
    lodging: 0,
    food: 0,
    sightseeing: 0,
    shopping: 0,
    activity: 0,
    other: 0,
  };
  const issues: SummaryIssue[] = [];
  let taskCount = 0;
  let doneCount = 0;
  let totalCost = 0;

  for (const day of orderedDays(t, tripId)) {
    if (!day.date) {
      issues.push({ kind: "undated_day", id: day.id, message: `Day ${day.dayNo} has no date` });
    } else if (
      (trip.startDate && day.date < trip.startDate) ||
      (trip.endDate && day.date > trip.endDate)
    ) {
      issues.push({
        kind: "day_outside_trip",
        id: day.id,
        message: `Day ${day.dayNo} (${day.date}) falls outside the trip dates`,
      });
    }

    for (const event of orderedEvents(t, day.id)) {
      totalCost += event.cost;
      costByCategory[event.category] += event.cost;
      if (!event.title.trim()) {
        issues.push({ kind: "untitled_event", id: event.id, message: `Day ${day.dayNo} has an untitled event at ${event.time}` });
      }

      for (const task of t.tasks) {
        if (task.eventId !== event.id) continue;
        taskCount++;
        if (task.status === "done") doneCount++;
        const assignee = task.assigneeId ? members.get(task.assigneeId) : undefined;
        if (assignee && !assignee.active) {
          issues.push({
            kind: "inactive_assignee",
            id: task.id,
            message: `"${task.title}" is assigned to inactive member ${assignee.name}`,
          });
        }
      }
    }
  }

  return {
    tripId,
    currency: trip.currency,
    taskCount,
    doneCount,
    progress: taskCount ? Math.round((doneCount / taskCount) * 100) : 0,
    totalCost,
    costByCategory,
    issues,
  };
}

export class TripSummaryService {
  constructor(private readonly db: PlannerDatabase) {}

  summarize(tripId: string): TripSummary {
    return this.db.read((t) => summarizeTrip(t, tripId));
  }
}
