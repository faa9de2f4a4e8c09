import type { z } from "zod";
import { ValidationError, type EntityName } from "../errors.js";

/** Validate operation input, turning zod issues into a ValidationError naming the entity. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown, entity: EntityName): z.output<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZod(entity, result.error.issues);
  }
  return result.data;
}
