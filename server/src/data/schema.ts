import { z } from "zod";
import { isCalendarDate } from "../utils/dates.js";

// ---- Enumerations ----

export const TASK_STATUSES = ["todo", "doing", "done"] as const;
export const TASK_PRIORITIES = ["low", "medium", "high"] as const;
export const EVENT_CATEGORIES = [
  "transport",
  "lodging",
  "food",
  "sightseeing",
  "shopping",
  "activity",
  "other",
] as const;
export const CHECKLIST_KEYS = ["documents", "packing", "custom"] as const;

export const TaskStatusSchema = z.enum(TASK_STATUSES);
export const TaskPrioritySchema = z.enum(TASK_PRIORITIES);
export const EventCategorySchema = z.enum(EVENT_CATEGORIES);
export const ChecklistKeySchema = z.enum(CHECKLIST_KEYS);

export type TaskStatus = z.infer<typeof TaskStatusSchema>;
export type TaskPriority = z.infer<typeof TaskPrioritySchema>;
export type EventCategory = z.infer<typeof EventCategorySchema>;
export type ChecklistKey = z.infer<typeof ChecklistKeySchema>;

// ---- Field primitives ----

export const IdSchema = z.string().min(1, "must not be empty");

export const DateSchema = z
  .string()
  .refine(isCalendarDate, { message: "must be a calendar date (YYYY-MM-DD)" });

export const NullableDateSchema = DateSchema.nullable();

export const TimeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "must be a time of day (HH:MM)");

export const CurrencySchema = z
  .string()
  .regex(/^[A-Z]{3}$/, "must be a three-letter currency code");

/** ISO-8601 UTC timestamp as written by `Date#toISOString()` */
export const TimestampSchema = z.string().datetime({ message: "must be an ISO-8601 timestamp" });

const RequiredText = z.string().trim().min(1, "is required");

// ---- Stored rows ----
// Each table is an array of rows; children point at their parent by id.

export const TripRowSchema = z.object({
  id: IdSchema,
  title: RequiredText,
  destination: RequiredText,
  startDate: NullableDateSchema,
  endDate: NullableDateSchema,
  currency: CurrencySchema,
  createdAt: TimestampSchema,
});

export const DayRowSchema = z.object({
  id: IdSchema,
  tripId: IdSchema,
  dayNo: z.number().int().positive(),
  date: NullableDateSchema,
  note: z.string(),
  createdAt: TimestampSchema,
});

export const EventRowSchema = z.object({
  id: IdSchema,
  dayId: IdSchema,
  time: TimeSchema,
  title: z.string(),
  location: z.string(),
  category: EventCategorySchema,
  cost: z.number().nonnegative(),
  notes: z.string(),
  tags: z.array(z.string()),
  createdAt: TimestampSchema,
});

export const TaskRowSchema = z.object({
  id: IdSchema,
  eventId: IdSchema,
  title: RequiredText,
  description: z.string(),
  status: TaskStatusSchema,
  priority: TaskPrioritySchema,
  assigneeId: IdSchema.nullable(),
  dueDate: NullableDateSchema,
  category: z.string(),
  createdAt: TimestampSchema,
});

export const MemberRowSchema = z.object({
  id: IdSchema,
  name: RequiredText,
  role: z.string(),
  email: z.string(),
  active: z.boolean(),
  createdAt: TimestampSchema,
});

export const TripMemberRowSchema = z.object({
  tripId: IdSchema,
  memberId: IdSchema,
});

export const ChecklistRowSchema = z.object({
  id: IdSchema,
  tripId: IdSchema,
  listKey: ChecklistKeySchema,
  title: RequiredText,
  createdAt: TimestampSchema,
});

export const ChecklistItemRowSchema = z.object({
  id: IdSchema,
  checklistId: IdSchema,
  text: RequiredText,
  checked: z.boolean(),
  createdAt: TimestampSchema,
});

export const PlannerTablesSchema = z.object({
  version: z.literal(1),
  trips: z.array(TripRowSchema),
  days: z.array(DayRowSchema),
  events: z.array(EventRowSchema),
  tasks: z.array(TaskRowSchema),
  members: z.array(MemberRowSchema),
  tripMembers: z.array(TripMemberRowSchema),
  checklists: z.array(ChecklistRowSchema),
  checklistItems: z.array(ChecklistItemRowSchema),
});

export type Trip = z.infer<typeof TripRowSchema>;
export type Day = z.infer<typeof DayRowSchema>;
export type PlanEvent = z.infer<typeof EventRowSchema>;
export type Task = z.infer<typeof TaskRowSchema>;
export type Member = z.infer<typeof MemberRowSchema>;
export type TripMember = z.infer<typeof TripMemberRowSchema>;
export type Checklist = z.infer<typeof ChecklistRowSchema>;
export type ChecklistItem = z.infer<typeof ChecklistItemRowSchema>;
export type PlannerTables = z.infer<typeof PlannerTablesSchema>;

export function emptyTables(): PlannerTables {
  return {
    version: 1,
    trips: [],
    days: [],
    events: [],
    tasks: [],
    members: [],
    tripMembers: [],
    checklists: [],
    checklistItems: [],
  };
}

// ---- Operation inputs ----
// Create inputs fill defaults; update inputs are partial and strict so that
// unknown or read-only fields (id, parent ids other than the movable ones) are rejected.

export const CreateTripInput = z
  .object({
    title: RequiredText,
    destination: RequiredText,
    startDate: NullableDateSchema.optional(),
    endDate: NullableDateSchema.optional(),
    currency: z.string().trim().toUpperCase().pipe(CurrencySchema).optional(),
  })
  .strict();

export const UpdateTripInput = CreateTripInput.partial().strict();

export const CreateDayInput = z
  .object({
    date: NullableDateSchema.optional(),
    note: z.string().optional(),
  })
  .strict();

export const UpdateDayInput = CreateDayInput;

export const CreateEventInput = z
  .object({
    time: TimeSchema.optional(),
    title: z.string().trim().optional(),
    location: z.string().trim().optional(),
    category: EventCategorySchema.optional(),
    cost: z.number().nonnegative().finite().optional(),
    notes: z.string().optional(),
    tags: z.array(z.string().trim().min(1)).optional(),
  })
  .strict();

export const UpdateEventInput = CreateEventInput.extend({ dayId: IdSchema.optional() }).strict();

export const CreateTaskInput = z
  .object({
    title: RequiredText,
    description: z.string().optional(),
    status: TaskStatusSchema.optional(),
    priority: TaskPrioritySchema.optional(),
    assigneeId: IdSchema.nullable().optional(),
    dueDate: NullableDateSchema.optional(),
    category: z.string().trim().optional(),
  })
  .strict();

export const UpdateTaskInput = CreateTaskInput.partial()
  .extend({ eventId: IdSchema.optional() })
  .strict();

export const CreateMemberInput = z
  .object({
    name: RequiredText,
    role: z.string().trim().optional(),
    email: z.union([z.literal(""), z.string().trim().email()]).optional(),
  })
  .strict();

export const UpdateMemberInput = CreateMemberInput.partial()
  .extend({ active: z.boolean().optional() })
  .strict();

export const CreateChecklistInput = z
  .object({
    listKey: ChecklistKeySchema.optional(),
    title: RequiredText,
  })
  .strict();

export const UpdateChecklistInput = CreateChecklistInput.partial().strict();

export const CreateChecklistItemInput = z
  .object({
    text: RequiredText,
    checked: z.boolean().optional(),
  })
  .strict();

export const UpdateChecklistItemInput = CreateChecklistItemInput.partial().strict();

export type CreateTripData = z.input<typeof CreateTripInput>;
export type UpdateTripData = z.input<typeof UpdateTripInput>;
export type CreateDayData = z.input<typeof CreateDayInput>;
export type UpdateDayData = z.input<typeof UpdateDayInput>;
export type CreateEventData = z.input<typeof CreateEventInput>;
export type UpdateEventData = z.input<typeof UpdateEventInput>;
export type CreateTaskData = z.input<typeof CreateTaskInput>;
export type UpdateTaskData = z.input<typeof UpdateTaskInput>;
export type CreateMemberData = z.input<typeof CreateMemberInput>;
export type UpdateMemberData = z.input<typeof UpdateMemberInput>;
export type CreateChecklistData = z.input<typeof CreateChecklistInput>;
export type UpdateChecklistData = z.input<typeof UpdateChecklistInput>;
export type CreateChecklistItemData = z.input<typeof CreateChecklistItemInput>;
export type UpdateChecklistItemData = z.input<typeof UpdateChecklistItemInput>;
