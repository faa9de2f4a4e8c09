import type { PlannerDatabase } from "../data/database.js";
import { parseInput } from "../data/parse.js";
import { getMemberRow, getTripRow, unassignMember } from "../data/relations.js";
import {
  CreateMemberInput,
  UpdateMemberInput,
  type CreateMemberData,
  type Member,
  type UpdateMemberData,
} from "../data/schema.js";
import { nowIso } from "../utils/dates.js";
import { newId } from "../utils/ids.js";

/**
 * Members are global people; a trip's team links to them through `tripMembers`.
 * Tasks reference members by id and lose the reference (never the task) when the
 * member leaves the team or is deleted.
 */
export class MemberStore {
  constructor(private readonly db: PlannerDatabase) {}

  list(options: { activeOnly?: boolean } = {}): Member[] {
    const activeOnly = options.activeOnly ?? true;
    return this.db.read((t) => t.members.filter((m) => !activeOnly || m.active));
  }

  get(id: string): Member {
    return this.db.read((t) => getMemberRow(t, id));
  }

  create(data: CreateMemberData): Member {
    const input = parseInput(CreateMemberInput, data, "member");
    return this.db.transaction("member.create", (t) => {
      const member: Member = {
        id: newId("mem"),
        name: input.name,
        role: input.role ?? "",
        email: input.email ?? "",
        active: true,
        createdAt: nowIso(),
      };
      t.members.push(member);
      return member;
    });
  }

  update(id: string, data: UpdateMemberData): Member {
    const input = parseInput(UpdateMemberInput, data, "member");
    return this.db.transaction("member.update", (t) => {
      const member = getMemberRow(t, id);
      if (input.name !== undefined) member.name = input.name;
      if (input.role !== undefined) member.role = input.role;
      if (input.email !== undefined) member.email = input.email;
      if (input.active !== undefined) member.active = input.active;
      return member;
    });
  }

  /** Inactive members drop out of team listings but keep their task assignments. */
  setActive(id: string, active: boolean): Member {
    return this.update(id, { active });
  }

  /** Delete the member everywhere: off every team, unassigned from every task. */
  delete(id: string): void {
    const cleared = this.db.transaction("member.delete", (t) => {
      getMemberRow(t, id);
      const count = unassignMember(t, id, null);
      t.tripMembers = t.tripMembers.filter((tm) => tm.memberId !== id);
      t.members = t.members.filter((m) => m.id !== id);
      return count;
    });
    if (cleared > 0) {
      console.log(`[members] Deleted ${id}; unassigned ${cleared} task(s)`);
    }
  }

  /** Active team members of a trip. */
  listTeam(tripId: string): Member[] {
    return this.db.read((t) => {
      getTripRow(t, tripId);
      const team = new Set(t.tripMembers.filter((tm) => tm.tripId === tripId).map((tm) => tm.memberId));
      return t.members.filter((m) => m.active && team.has(m.id));
    });
  }

  /** Idempotent: adding a member already on the team changes nothing. */
  addToTrip(tripId: string, memberId: string): void {
    this.db.transaction("team.add", (t) => {
      getTripRow(t, tripId);
      getMemberRow(t, memberId);
      if (!t.tripMembers.some((tm) => tm.tripId === tripId && tm.memberId === memberId)) {
        t.tripMembers.push({ tripId, memberId });
      }
    });
  }

  /** Take the member off the trip's team and unassign their tasks on that trip. Returns how many were unassigned. */
  removeFromTrip(tripId: string, memberId: string): number {
    return this.db.transaction("team.remove", (t) => {
      getTripRow(t, tripId);
      getMemberRow(t, memberId);
      t.tripMembers = t.tripMembers.filter((tm) => !(tm.tripId === tripId && tm.memberId === memberId));
      return unassignMember(t, memberId, tripId);
    });
  }
}
