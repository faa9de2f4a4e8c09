import fs from "fs";
import path from "path";
import { PersistenceError } from "../errors.js";
import { nowIso } from "../utils/dates.js";
import { PlannerTablesSchema, emptyTables, type PlannerTables } from "./schema.js";

export interface ChangeNotice {
  /** What was committed, e.g. `task.update` or `import` */
  action: string;
  at: string;
}

type ChangeListener = (notice: ChangeNotice) => void;

/**
 * Holds every planner table in memory and persists them to one JSON file.
 *
 * The in-memory copy is authoritative; disk is read once at construction.
 * Writes go through `transaction()`, which mutates a deep copy and swaps it in
 * only after the atomic file write (temp file + rename) has succeeded. An
 * operation that throws, or a failed write, leaves both memory and disk as they were.
 *
 * Pass `null` as the file path for a memory-only database.
 */
export class PlannerDatabase {
  private tables: PlannerTables;
  private readonly filePath: string | null;
  private readonly listeners = new Set<ChangeListener>();
  /** mtime of our own last write, so the file watcher can ignore it */
  private lastWriteMtimeMs = 0;

  constructor(filePath: string | null, seed?: PlannerTables) {
    this.filePath = filePath;
    this.tables = seed ? PlannerTablesSchema.parse(seed) : this.load();
  }

  static inMemory(seed?: PlannerTables): PlannerDatabase {
    return new PlannerDatabase(null, seed);
  }

  get location(): string {
    return this.filePath ?? ":memory:";
  }

  private load(): PlannerTables {
    if (!this.filePath || !fs.existsSync(this.filePath)) return emptyTables();

    const tables = this.parseFile(this.filePath);
    console.log(
      `[store] Loaded ${this.filePath} (${tables.trips.length} trips, ${tables.members.length} members)`
    );
    return tables;
  }

  // A corrupt data file stops startup instead of being replaced by an empty one.
  private parseFile(filePath: string): PlannerTables {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    const result = PlannerTablesSchema.safeParse(raw);
    if (!result.success) {
      console.error(`[store] ${filePath} failed validation:`);
      for (const issue of result.error.issues) {
        console.error(`  • path: [${issue.path.join(".")}] — ${issue.message}`);
      }
      throw new Error(`Planner data file ${filePath} is invalid — fix or move it aside`);
    }
    return result.data;
  }

  private persist(tables: PlannerTables): void {
    if (!this.filePath) return;
    const tmp = this.filePath + ".tmp";
    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      // Atomic write: write to temp file, then rename
      fs.writeFileSync(tmp, JSON.stringify(tables, null, 2), "utf-8");
      fs.renameSync(tmp, this.filePath);
      this.lastWriteMtimeMs = fs.statSync(this.filePath).mtimeMs;
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw new PersistenceError(this.filePath, { cause: err });
    }
  }

  /** Run a read against the live tables. The result is copied so callers cannot mutate state. */
  read<T>(fn: (tables: Readonly<PlannerTables>) => T): T {
    return structuredClone(fn(this.tables));
  }

  transaction<T>(action: string, fn: (tx: PlannerTables) => T): T {
    const draft = structuredClone(this.tables);
    const result = fn(draft);
    this.persist(draft);
    this.tables = draft;

    const notice: ChangeNotice = { action, at: nowIso() };
    for (const listener of this.listeners) {
      listener(notice);
    }
    return structuredClone(result);
  }

  /** Subscribe to committed transactions. Returns an unsubscribe function. */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Watch the data file for changes made by another process (e.g. the CLI importing
   * while the server runs). Reloads and calls `onReload` with the fresh tables.
   *
   * Uses `fs.watchFile()` (stat polling) because the atomic rename in `persist()`
   * swaps the inode, which silently orphans an `fs.watch()` handle.
   *
   * Returns a cleanup function.
   */
  watchFile(onReload: (tables: PlannerTables) => void): () => void {
    const filePath = this.filePath;
    if (!filePath) return () => {};

    fs.watchFile(filePath, { persistent: false, interval: 500 }, (curr, prev) => {
      if (curr.mtimeMs === prev.mtimeMs && curr.size === prev.size) return;
      // Deleted (or mid-rename) — wait for it to reappear
      if (curr.mtimeMs === 0) return;
      if (curr.mtimeMs === this.lastWriteMtimeMs) return;

      try {
        this.tables = this.parseFile(filePath);
        console.log(`[store] Reloaded ${filePath} after external change`);
        onReload(structuredClone(this.tables));
      } catch (err) {
        // Keep serving the last good state; the next valid write will be picked up.
        console.error(`[store] Ignoring unreadable external change to ${filePath}:`, err);
      }
    });

    console.log(`[store] Watching ${filePath} for external changes (polling)`);
    return () => {
      fs.unwatchFile(filePath);
    };
  }
}
