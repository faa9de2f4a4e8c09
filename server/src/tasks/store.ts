import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import {
  getEventRow,
  getMemberRow,
  getTaskRow,
  getTripRow,
  isOnTeam,
  tasksOfTrip,
  tripIdOfEvent,
} from "../data/relations.js";
import {
  CreateTaskInput,
  UpdateTaskInput,
  type CreateTaskData,
  type PlannerTables,
  type Task,
  type UpdateTaskData,
} from "../data/schema.js";
import { ValidationError } from "../errors.js";
import { nowIso } from "../utils/dates.js";
import { newId } from "../utils/ids.js";

// An assignee must exist, be active and sit on the team of the trip owning the task.
function checkAssignee(t: Readonly<PlannerTables>, tripId: string, assigneeId: string): void {
  const member = getMemberRow(t, assigneeId);
  if (!member.active) {
    throw new ValidationError("task", [{ field: "assigneeId", message: `member ${assigneeId} is inactive` }]);
  }
  if (!isOnTeam(t, tripId, assigneeId)) {
    throw new ValidationError("task", [
      { field: "assigneeId", message: `member ${assigneeId} is not on the team of trip ${tripId}` },
    ]);
  }
}

export class TaskStore {
  constructor(private readonly db: PlannerDatabase) {}

  get(id: string): Task {
    return this.db.read((t) => getTaskRow(t, id));
  }

  listByEvent(eventId: string): Task[] {
    return this.db.read((t) => {
      getEventRow(t, eventId);
      return t.tasks.filter((task) => task.eventId === eventId);
    });
  }

  /** Every task of a trip in creation order. */
  listByTrip(tripId: string): Task[] {
    return this.db.read((t) => {
      getTripRow(t, tripId);
      return tasksOfTrip(t, tripId);
    });
  }

  /** Category defaults to the owning event's category. */
  create(eventId: string, data: CreateTaskData): Task {
    const input = parseInput(CreateTaskInput, data, "task");
    return this.db.transaction("task.create", (t) => {
      const event = getEventRow(t, eventId);
      const assigneeId = input.assigneeId ?? null;
      if (assigneeId) checkAssignee(t, tripIdOfEvent(t, event), assigneeId);

      const task: Task = {
        id: newId("tk"),
        eventId,
        title: input.title,
        description: input.description ?? "",
        status: input.status ?? "todo",
        priority: input.priority ?? "medium",
        assigneeId,
        dueDate: input.dueDate ?? null,
        category: input.category || event.category,
        createdAt: nowIso(),
      };
      t.tasks.push(task);
      return task;
    });
  }

  /** Partial update; `eventId` moves the task to another event of the same trip. */
  update(id: string, data: UpdateTaskData): Task {
    const input = parseInput(UpdateTaskInput, data, "task");
    return this.db.transaction("task.update", (t) => {
      const task = getTaskRow(t, id);
      const tripId = tripIdOfEvent(t, getEventRow(t, task.eventId));

      if (input.eventId !== undefined && input.eventId !== task.eventId) {
        const target = getEventRow(t, input.eventId);
        if (tripIdOfEvent(t, target) !== tripId) {
          throw new ValidationError("task", [{ field: "eventId", message: "must be an event of the same trip" }]);
        }
        task.eventId = target.id;
      }
      if (input.assigneeId !== undefined) {
        if (input.assigneeId) checkAssignee(t, tripId, input.assigneeId);
        task.assigneeId = input.assigneeId;
      }
      if (input.title !== undefined) task.title = input.title;
      if (input.description !== undefined) task.description = input.description;
      if (input.status !== undefined) task.status = input.status;
      if (input.priority !== undefined) task.priority = input.priority;
      if (input.dueDate !== undefined) task.dueDate = input.dueDate;
      if (input.category !== undefined) task.category = input.category;
      return task;
    });
  }

  delete(id: string): void {
    this.db.transaction("task.delete", (t) => {
      getTaskRow(t, id);
      t.tasks = t.tasks.filter((task) => task.id !== id);
    });
  }
}
