import type { PlannerDatabase } from "../data/database.js";
import type { Member, PlannerTables } from "../data/schema.js";
import { ImportError, type ImportIssue } from "../errors.js";
import { nowIso } from "../utils/dates.js";
import { newId, type IdPrefix } from "../utils/ids.js";
import { PlannerDocumentSchema, type MemberDoc, type PlannerDocument } from "./document.js";

/**
 * `preserve` keeps the document's ids and rejects any that already exist (members
 * excepted: an existing member id is reused). `regenerate` gives every row a fresh
 * id and matches members to stored ones by email, then by name.
 */
export type IdPolicy = "preserve" | "regenerate";

export interface ImportOptions {
  ids?: IdPolicy;
  /** Currency for trips that carry none */
  defaultCurrency: string;
}

export interface ImportSummary {
  /** Ids of the imported trips as stored, in document order */
  tripIds: string[];
  membersCreated: number;
  membersMatched: number;
  days: number;
  events: number;
  tasks: number;
  checklists: number;
  checklistItems: number;
}

/** Parse JSON text into a document, reporting syntax errors as an ImportError. */
export function parseDocumentText(text: string): PlannerDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ImportError([
      { path: "", message: `not valid JSON: ${err instanceof Error ? err.message : String(err)}` },
    ]);
  }
  return parseDocument(raw);
}

/** Structural validation: required keys, enum values, date and time formats. */
export function parseDocument(raw: unknown): PlannerDocument {
  const result = PlannerDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ImportError(
      result.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }))
    );
  }
  return result.data;
}

type IdKind = "trip" | "day" | "event" | "task" | "checklist" | "checklistItem" | "member";

/**
 * Referential checks that need the whole document (and, for `preserve`, the stored
 * tables): unique ids, team members present, assignees on the team, sane day numbers.
 * Returns every problem found rather than stopping at the first.
 */
export function checkReferences(
  doc: PlannerDocument,
  tables: Readonly<PlannerTables>,
  policy: IdPolicy
): ImportIssue[] {
  const issues: ImportIssue[] = [];
  const seen = new Map<IdKind, Set<string>>();
  const stored: Record<Exclude<IdKind, "member">, Set<string>> = {
    trip: new Set(tables.trips.map((r) => r.id)),
    day: new Set(tables.days.map((r) => r.id)),
    event: new Set(tables.events.map((r) => r.id)),
    task: new Set(tables.tasks.map((r) => r.id)),
    checklist: new Set(tables.checklists.map((r) => r.id)),
    checklistItem: new Set(tables.checklistItems.map((r) => r.id)),
  };

  const claim = (kind: IdKind, id: string, path: string): void => {
    let ids = seen.get(kind);
    if (!ids) {
      ids = new Set();
      seen.set(kind, ids);
    }
    if (ids.has(id)) {
      issues.push({ path, message: `duplicate ${kind} id "${id}"` });
    }
    ids.add(id);
    if (policy === "preserve" && kind !== "member" && stored[kind].has(id)) {
      issues.push({ path, message: `${kind} id "${id}" already exists` });
    }
  };

  doc.members.forEach((m, i) => claim("member", m.id, `members.${i}.id`));
  const documentMembers = new Set(doc.members.map((m) => m.id));

  doc.trips.forEach((trip, ti) => {
    const tp = `trips.${ti}`;
    claim("trip", trip.id, `${tp}.id`);
    if (trip.startDate && trip.endDate && trip.startDate > trip.endDate) {
      issues.push({ path: `${tp}.endDate`, message: "must not be before startDate" });
    }

    trip.memberIds.forEach((memberId, mi) => {
      if (!documentMembers.has(memberId)) {
        issues.push({ path: `${tp}.memberIds.${mi}`, message: `member "${memberId}" is not in members` });
      }
    });
    const team = new Set(trip.memberIds);

    const dayNumbers = new Set<number>();
    trip.days.forEach((day, di) => {
      const dp = `${tp}.days.${di}`;
      claim("day", day.id, `${dp}.id`);
      if (day.dayNo !== undefined) {
        if (dayNumbers.has(day.dayNo)) {
          issues.push({ path: `${dp}.dayNo`, message: `duplicate dayNo ${day.dayNo}` });
        }
        dayNumbers.add(day.dayNo);
      }

      day.events.forEach((event, ei) => {
        const ep = `${dp}.events.${ei}`;
        claim("event", event.id, `${ep}.id`);
        event.tasks.forEach((task, ki) => {
          const kp = `${ep}.tasks.${ki}`;
          claim("task", task.id, `${kp}.id`);
          if (task.assigneeId !== null && !team.has(task.assigneeId)) {
            issues.push({
              path: `${kp}.assigneeId`,
              message: `assignee "${task.assigneeId}" is not on the trip's team`,
            });
          }
        });
      });
    });

    trip.checklists.forEach((checklist, ci) => {
      const cp = `${tp}.checklists.${ci}`;
      claim("checklist", checklist.id, `${cp}.id`);
      checklist.items.forEach((item, ii) => claim("checklistItem", item.id, `${cp}.items.${ii}.id`));
    });
  });

  return issues;
}

function findStoredMember(members: readonly Member[], doc: MemberDoc): Member | undefined {
  const email = doc.email.trim().toLowerCase();
  if (email) {
    const byEmail = members.find((m) => m.email.trim().toLowerCase() === email);
    if (byEmail) return byEmail;
  }
  return members.find((m) => m.name === doc.name);
}

/** Insert a validated document into the tables. Caller runs this inside a transaction. */
export function applyDocument(
  t: PlannerTables,
  doc: PlannerDocument,
  policy: IdPolicy,
  defaultCurrency: string
): ImportSummary {
  const now = nowIso();
  const idFor = (prefix: IdPrefix, id: string): string => (policy === "preserve" ? id : newId(prefix));
  const summary: ImportSummary = {
    tripIds: [],
    membersCreated: 0,
    membersMatched: 0,
    days: 0,
    events: 0,
    tasks: 0,
    checklists: 0,
    checklistItems: 0,
  };

  const memberIds = new Map<string, string>();
  for (const m of doc.members) {
    const existing =
      policy === "preserve" ? t.members.find((row) => row.id === m.id) : findStoredMember(t.members, m);
    if (existing) {
      memberIds.set(m.id, existing.id);
      summary.membersMatched++;
      continue;
    }
    const id = idFor("mem", m.id);
    t.members.push({
      id,
      name: m.name,
      role: m.role,
      email: m.email,
      active: m.active,
      createdAt: m.createdAt ?? now,
    });
    memberIds.set(m.id, id);
    summary.membersCreated++;
  }

  for (const trip of doc.trips) {
    const tripId = idFor("trip", trip.id);
    t.trips.push({
      id: tripId,
      title: trip.title,
      destination: trip.destination,
      startDate: trip.startDate,
      endDate: trip.endDate,
      currency: trip.currency ?? defaultCurrency,
      createdAt: trip.createdAt ?? now,
    });
    summary.tripIds.push(tripId);

    for (const docMemberId of new Set(trip.memberIds)) {
      const memberId = memberIds.get(docMemberId);
      if (memberId && !t.tripMembers.some((tm) => tm.tripId === tripId && tm.memberId === memberId)) {
        t.tripMembers.push({ tripId, memberId });
      }
    }

    // Explicit day numbers decide the order; days without one keep their position.
    const days = trip.days
      .map((day, index) => ({ day, order: day.dayNo ?? index + 1 }))
      .sort((a, b) => a.order - b.order);

    days.forEach(({ day }, index) => {
      const dayId = idFor("day", day.id);
      t.days.push({
        id: dayId,
        tripId,
        dayNo: index + 1,
        date: day.date,
        note: day.note,
        createdAt: day.createdAt ?? now,
      });
      summary.days++;

      for (const event of day.events) {
        const eventId = idFor("ev", event.id);
        t.events.push({
          id: eventId,
          dayId,
          time: event.time,
          title: event.title,
          location: event.location,
          category: event.category,
          cost: event.cost,
          notes: event.notes,
          tags: event.tags,
          createdAt: event.createdAt ?? now,
        });
        summary.events++;

        for (const task of event.tasks) {
          t.tasks.push({
            id: idFor("tk", task.id),
            eventId,
            title: task.title,
            description: task.description,
            status: task.status,
            priority: task.priority,
            assigneeId: task.assigneeId === null ? null : (memberIds.get(task.assigneeId) ?? null),
            dueDate: task.dueDate,
            category: task.category ?? event.category,
            createdAt: task.createdAt ?? now,
          });
          summary.tasks++;
        }
      }
    });

    for (const checklist of trip.checklists) {
      const checklistId = idFor("cl", checklist.id);
      t.checklists.push({
        id: checklistId,
        tripId,
        listKey: checklist.listKey,
        title: checklist.title,
        createdAt: checklist.createdAt ?? now,
      });
      summary.checklists++;

      for (const item of checklist.items) {
        t.checklistItems.push({
          id: idFor("it", item.id),
          checklistId,
          text: item.text,
          checked: item.checked,
          createdAt: item.createdAt ?? now,
        });
        summary.checklistItems++;
      }
    }
  }

  return summary;
}

/**
 * Validate and import a document as one transaction: either every row is stored
 * or, on any problem, nothing is and an ImportError lists each offending record.
 */
export function importDocument(db: PlannerDatabase, raw: unknown, options: ImportOptions): ImportSummary {
  const policy = options.ids ?? "preserve";
  let doc: PlannerDocument;
  try {
    doc = parseDocument(raw);
  } catch (err) {
    if (err instanceof ImportError) console.warn(`[import] Rejected malformed document (${err.issues.length} issue(s))`);
    throw err;
  }

  const summary = db.transaction("import", (t) => {
    const issues = checkReferences(doc, t, policy);
    if (issues.length > 0) {
      console.warn(`[import] Rejected document with ${issues.length} reference issue(s); nothing committed`);
      throw new ImportError(issues);
    }
    return applyDocument(t, doc, policy, options.defaultCurrency);
  });

  console.log(
    `[import] Imported ${summary.tripIds.length} trip(s), ${summary.tasks} task(s); ` +
      `members: ${summary.membersCreated} created, ${summary.membersMatched} matched (ids: ${policy})`
  );
  return summary;
}
