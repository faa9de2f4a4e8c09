import type { Response } from "express";
import type { ZodIssue } from "zod";

export type EntityName =
  | "trip"
  | "day"
  | "event"
  | "task"
  | "member"
  | "checklist"
  | "checklistItem";

export interface FieldIssue {
  field: string;
  message: string;
}

export interface ImportIssue {
  /** Dotted location inside the import document, e.g. `trips.0.days.1.date` */
  path: string;
  message: string;
}

/**
 * Base class for every error the planner surfaces to callers.
 * `status` is the HTTP status the API answers with; `details()` is merged
 * into the JSON error body.
 */
export abstract class PlannerError extends Error {
  abstract readonly code: string;
  abstract readonly status: number;

  details(): Record<string, unknown> {
    return {};
  }
}

export class ValidationError extends PlannerError {
  readonly code = "validation_error";
  readonly status = 400;

  constructor(
    readonly entity: EntityName,
    readonly issues: FieldIssue[]
  ) {
    super(
      `Invalid ${entity}: ` +
        issues.map((i) => (i.field ? `${i.field} ${i.message}` : i.message)).join("; ")
    );
    this.name = "ValidationError";
  }

  static fromZod(entity: EntityName, issues: ZodIssue[]): ValidationError {
    return new ValidationError(
      entity,
      issues.map((issue) => ({ field: issue.path.join("."), message: issue.message }))
    );
  }

  details(): Record<string, unknown> {
    return { entity: this.entity, issues: this.issues };
  }
}

export class NotFoundError extends PlannerError {
  readonly code = "not_found";
  readonly status = 404;

  constructor(
    readonly entity: EntityName,
    readonly id: string
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }

  details(): Record<string, unknown> {
    return { entity: this.entity, id: this.id };
  }
}

export class ConstraintError extends PlannerError {
  readonly code = "constraint_error";
  readonly status = 409;

  constructor(
    readonly entity: EntityName,
    readonly id: string,
    readonly blockedBy: EntityName,
    readonly childCount: number
  ) {
    super(`Cannot delete ${entity} ${id}: it still has ${childCount} ${blockedBy}(s)`);
    this.name = "ConstraintError";
  }

  details(): Record<string, unknown> {
    return { entity: this.entity, id: this.id, blockedBy: this.blockedBy, childCount: this.childCount };
  }
}

export class ImportError extends PlannerError {
  readonly code = "import_error";
  readonly status = 422;

  constructor(readonly issues: ImportIssue[]) {
    super(
      `Import rejected (${issues.length} issue${issues.length === 1 ? "" : "s"}): ` +
        issues
          .slice(0, 5)
          .map((i) => `${i.path || "(root)"}: ${i.message}`)
          .join("; ")
    );
    this.name = "ImportError";
  }

  details(): Record<string, unknown> {
    return { issues: this.issues };
  }
}

export class PersistenceError extends PlannerError {
  readonly code = "persistence_error";
  readonly status = 500;

  constructor(
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to persist planner data to ${filePath}`, options);
    this.name = "PersistenceError";
  }
}

/** Translate any thrown value into the API's `{ error, code, ... }` body. */
export function sendError(res: Response, err: unknown, tag: string): void {
  if (err instanceof PlannerError) {
    if (err.status >= 500) {
      console.error(`[${tag}] ${err.message}:`, err.cause ?? err);
    }
    res.status(err.status).json({ error: err.message, code: err.code, ...err.details() });
    return;
  }
  console.error(`[${tag}] Unexpected error:`, err);
  res.status(500).json({ error: "Internal server error", code: "internal_error" });
}
