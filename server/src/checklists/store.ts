import type { PlannerOptions } from "../config.js";
import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import { getChecklistItemRow, getChecklistRow, getTripRow, removeChecklist } from "../data/relations.js";
import {
  CreateChecklistInput,
  CreateChecklistItemInput,
  UpdateChecklistInput,
  UpdateChecklistItemInput,
  type Checklist,
  type ChecklistItem,
  type CreateChecklistData,
  type CreateChecklistItemData,
  type UpdateChecklistData,
  type UpdateChecklistItemData,
} from "../data/schema.js";
import { nowIso } from "../utils/dates.js";
import { newId } from "../utils/ids.js";
import type { ChecklistWithItems } from "../trips/store.js";

export class ChecklistStore {
  constructor(
    private readonly db: PlannerDatabase,
    private readonly options: PlannerOptions
  ) {}

  /** Checklists of a trip in creation order, each with its items. */
  list(tripId: string): ChecklistWithItems[] {
    return this.db.read((t) => {
      getTripRow(t, tripId);
      return t.checklists
        .filter((c) => c.tripId === tripId)
        .map((c) => ({ ...c, items: t.checklistItems.filter((i) => i.checklistId === c.id) }));
    });
  }

  get(id: string): ChecklistWithItems {
    return this.db.read((t) => {
      const checklist = getChecklistRow(t, id);
      return { ...checklist, items: t.checklistItems.filter((i) => i.checklistId === id) };
    });
  }

  create(tripId: string, data: CreateChecklistData): Checklist {
    const input = parseInput(CreateChecklistInput, data, "checklist");
    return this.db.transaction("checklist.create", (t) => {
      getTripRow(t, tripId);
      const checklist: Checklist = {
        id: newId("cl"),
        tripId,
        listKey: input.listKey ?? "custom",
        title: input.title,
        createdAt: nowIso(),
      };
      t.checklists.push(checklist);
      return checklist;
    });
  }

  update(id: string, data: UpdateChecklistData): Checklist {
    const input = parseInput(UpdateChecklistInput, data, "checklist");
    return this.db.transaction("checklist.update", (t) => {
      const checklist = getChecklistRow(t, id);
      if (input.listKey !== undefined) checklist.listKey = input.listKey;
      if (input.title !== undefined) checklist.title = input.title;
      return checklist;
    });
  }

  delete(id: string): void {
    this.db.transaction("checklist.delete", (t) => {
      getChecklistRow(t, id);
      removeChecklist(t, id, this.options.deletePolicy);
    });
  }

  // ---- Items ----

  getItem(id: string): ChecklistItem {
    return this.db.read((t) => getChecklistItemRow(t, id));
  }

  addItem(checklistId: string, data: CreateChecklistItemData): ChecklistItem {
    const input = parseInput(CreateChecklistItemInput, data, "checklistItem");
    return this.db.transaction("checklist.item.create", (t) => {
      getChecklistRow(t, checklistId);
      const item: ChecklistItem = {
        id: newId("it"),
        checklistId,
        text: input.text,
        checked: input.checked ?? false,
        createdAt: nowIso(),
      };
      t.checklistItems.push(item);
      return item;
    });
  }

  updateItem(id: string, data: UpdateChecklistItemData): ChecklistItem {
    const input = parseInput(UpdateChecklistItemInput, data, "checklistItem");
    return this.db.transaction("checklist.item.update", (t) => {
      const item = getChecklistItemRow(t, id);
      if (input.text !== undefined) item.text = input.text;
      if (input.checked !== undefined) item.checked = input.checked;
      return item;
    });
  }

  deleteItem(id: string): void {
    this.db.transaction("checklist.item.delete", (t) => {
      getChecklistItemRow(t, id);
      t.checklistItems = t.checklistItems.filter((i) => i.id !== id);
    });
  }
}
