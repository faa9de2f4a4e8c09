import { v4 as uuidv4 } from "uuid";

export type IdPrefix = "trip" | "day" | "ev" | "tk" | "mem" | "cl" | "it";

/** Prefixed random id, e.g. `tk_3b241101-e2bb-4255-8caf-4136c566a962`. */
export function newId(prefix: IdPrefix): string {
  return `${prefix}_${uuidv4()}`;
}
