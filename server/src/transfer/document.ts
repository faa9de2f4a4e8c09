import { z } from "zod";
import {
  ChecklistKeySchema,
  CurrencySchema,
  DateSchema,
  EventCategorySchema,
  IdSchema,
  TaskPrioritySchema,
  TaskStatusSchema,
  TimeSchema,
  TimestampSchema,
} from "../data/schema.js";

// Shape of an export/import document. Children are nested under their owner
// instead of carrying a parent id; members sit at the top level and trips
// reference them through `memberIds`.
//
// Only ids and the fields a row cannot exist without are required; everything
// else falls back to the same defaults the stores use on create.

const Text = z.string().default("");
const RequiredText = z.string().trim().min(1, "is required");
const OptionalDate = DateSchema.nullable().default(null);
const CreatedAt = TimestampSchema.optional();

export const TaskDocSchema = z.object({
  id: IdSchema,
  title: RequiredText,
  description: Text,
  status: TaskStatusSchema.default("todo"),
  priority: TaskPrioritySchema.default("medium"),
  assigneeId: IdSchema.nullable().default(null),
  dueDate: OptionalDate,
  /** Missing category inherits the owning event's */
  category: z.string().optional(),
  createdAt: CreatedAt,
});

export const EventDocSchema = z.object({
  id: IdSchema,
  time: TimeSchema.default("12:00"),
  title: Text,
  location: Text,
  category: EventCategorySchema.default("other"),
  cost: z.number().nonnegative().finite().default(0),
  notes: Text,
  tags: z.array(z.string()).default([]),
  createdAt: CreatedAt,
  tasks: z.array(TaskDocSchema).default([]),
});

export const DayDocSchema = z.object({
  id: IdSchema,
  dayNo: z.number().int().positive().optional(),
  date: OptionalDate,
  note: Text,
  createdAt: CreatedAt,
  events: z.array(EventDocSchema).default([]),
});

export const ChecklistItemDocSchema = z.object({
  id: IdSchema,
  text: RequiredText,
  checked: z.boolean().default(false),
  createdAt: CreatedAt,
});

export const ChecklistDocSchema = z.object({
  id: IdSchema,
  listKey: ChecklistKeySchema.default("custom"),
  title: RequiredText,
  createdAt: CreatedAt,
  items: z.array(ChecklistItemDocSchema).default([]),
});

export const TripDocSchema = z.object({
  id: IdSchema,
  title: RequiredText,
  destination: RequiredText,
  startDate: OptionalDate,
  endDate: OptionalDate,
  currency: CurrencySchema.optional(),
  createdAt: CreatedAt,
  memberIds: z.array(IdSchema).default([]),
  days: z.array(DayDocSchema).default([]),
  checklists: z.array(ChecklistDocSchema).default([]),
});

export const MemberDocSchema = z.object({
  id: IdSchema,
  name: RequiredText,
  role: Text,
  email: Text,
  active: z.boolean().default(true),
  createdAt: CreatedAt,
});

export const PlannerDocumentSchema = z.object({
  format: z.literal("itinera").optional(),
  version: z.literal(1).default(1),
  exportedAt: z.string().optional(),
  members: z.array(MemberDocSchema).default([]),
  trips: z.array(TripDocSchema),
});

export type TaskDoc = z.output<typeof TaskDocSchema>;
export type EventDoc = z.output<typeof EventDocSchema>;
export type DayDoc = z.output<typeof DayDocSchema>;
export type ChecklistDoc = z.output<typeof ChecklistDocSchema>;
export type TripDoc = z.output<typeof TripDocSchema>;
export type MemberDoc = z.output<typeof MemberDocSchema>;
export type PlannerDocument = z.output<typeof PlannerDocumentSchema>;
