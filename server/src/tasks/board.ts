import { z } from "zod";
import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import { getTripRow, orderedDays } from "../data/relations.js";
import {
  IdSchema,
  TaskPrioritySchema,
  TaskStatusSchema,
  type PlannerTables,
  type Task,
} from "../data/schema.js";

function toArray<V>(value: V | V[]): V[] {
  return Array.isArray(value) ? value : [value];
}

const CategoryFilter = z.string().trim().min(1);

export const BoardFiltersSchema = z
  .object({
    keyword: z.string().optional(),
    category: z.union([CategoryFilter, z.array(CategoryFilter)]).transform(toArray).optional(),
    status: z.union([TaskStatusSchema, z.array(TaskStatusSchema)]).transform(toArray).optional(),
    priority: z.union([TaskPrioritySchema, z.array(TaskPrioritySchema)]).transform(toArray).optional(),
    /** `null` selects unassigned tasks */
    assigneeId: IdSchema.nullable().optional(),
  })
  .strict();

export type BoardFilters = z.input<typeof BoardFiltersSchema>;

export interface BoardRow {
  task: Task;
  eventId: string;
  eventTitle: string;
  eventCategory: string;
  dayId: string;
  dayNo: number;
  dayDate: string | null;
  assigneeName: string | null;
}

export interface BoardResult {
  rows: BoardRow[];
  total: number;
  done: number;
}

// No due date sorts after every dated task.
function compareDueDates(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

/**
 * Flatten a trip's tasks with their event/day context, apply the filters (AND-ed,
 * absent ones ignored) and order by due date, then creation time.
 */
export function queryBoard(t: Readonly<PlannerTables>, tripId: string, filters: z.output<typeof BoardFiltersSchema>): BoardResult {
  getTripRow(t, tripId);
  const memberNames = new Map(t.members.map((m) => [m.id, m.name]));
  const days = new Map(orderedDays(t, tripId).map((d) => [d.id, d]));
  const events = new Map(t.events.filter((e) => days.has(e.dayId)).map((e) => [e.id, e]));

  const keyword = filters.keyword?.trim().toLowerCase() ?? "";
  const categories = filters.category ? new Set(filters.category.map((c) => c.toLowerCase())) : null;
  const statuses = filters.status ? new Set<string>(filters.status) : null;
  const priorities = filters.priority ? new Set<string>(filters.priority) : null;

  const rows: BoardRow[] = [];
  // t.tasks is in insertion order; the stable sort keeps it for equal due date and createdAt
  for (const task of t.tasks) {
    const event = events.get(task.eventId);
    if (!event) continue;
    const day = days.get(event.dayId);
    if (!day) continue;
    const assigneeName = task.assigneeId ? (memberNames.get(task.assigneeId) ?? null) : null;

    if (statuses && !statuses.has(task.status)) continue;
    if (priorities && !priorities.has(task.priority)) continue;
    if (categories && !categories.has(task.category.toLowerCase())) continue;
    if (filters.assigneeId !== undefined && task.assigneeId !== filters.assigneeId) continue;
    if (keyword) {
      const haystack = [task.title, task.description, event.title, assigneeName ?? ""];
      if (!haystack.some((text) => text.toLowerCase().includes(keyword))) continue;
    }

    rows.push({
      task,
      eventId: event.id,
      eventTitle: event.title,
      eventCategory: event.category,
      dayId: day.id,
      dayNo: day.dayNo,
      dayDate: day.date,
      assigneeName,
    });
  }

  rows.sort(
    (a, b) =>
      compareDueDates(a.task.dueDate, b.task.dueDate) ||
      (a.task.createdAt < b.task.createdAt ? -1 : a.task.createdAt > b.task.createdAt ? 1 : 0)
  );
  return {
    rows,
    total: rows.length,
    done: rows.filter((r) => r.task.status === "done").length,
  };
}

export class TaskBoard {
  constructor(private readonly db: PlannerDatabase) {}

  /** `filters` is validated here, so raw query input can be passed straight through. */
  query(tripId: string, filters: BoardFilters | Record<string, unknown> = {}): BoardResult {
    const parsed = parseInput(BoardFiltersSchema, filters, "task");
    return this.db.read((t) => queryBoard(t, tripId, parsed));
  }
}
