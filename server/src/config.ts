import dotenv from "dotenv";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// .env lives at the project root, two levels above server/src (or dist/)
const envPath = path.resolve(__dirname, "../../.env");
dotenv.config({ path: envPath });

export type DeletePolicy = "cascade" | "restrict";

export interface Config {
  host: string;
  port: number;
  allowedOrigins: string[];
  /** JSON file holding every planner table */
  dataFile: string;
  /** `cascade` removes owned children on delete; `restrict` refuses while children exist */
  deletePolicy: DeletePolicy;
  /** ISO 4217 code given to trips created without one */
  defaultCurrency: string;
  /** Max JSON body size accepted by Express — imports can be large */
  bodyLimit: string;
  /** Requests allowed per client per 15 minutes */
  rateLimitMax: number;
  /** Reload the data file when another process rewrites it */
  watchDataFile: boolean;
}

/** The settings the planner stores need; injected so tests and the CLI can pick their own. */
export type PlannerOptions = Pick<Config, "deletePolicy" | "defaultCurrency">;

function parseInteger(name: string, raw: string, min: number, max: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return value;
}

function parseDeletePolicy(raw: string): DeletePolicy {
  if (raw === "cascade" || raw === "restrict") return raw;
  throw new Error(`DELETE_POLICY must be "cascade" or "restrict" (got "${raw}")`);
}

function parseCurrency(raw: string): string {
  const code = raw.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(code)) {
    throw new Error(`DEFAULT_CURRENCY must be a three-letter currency code (got "${raw}")`);
  }
  return code;
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const home = env.HOME || env.USERPROFILE || os.homedir();
  return {
    host: env.HOST || "0.0.0.0",
    port: parseInteger("PORT", env.PORT || "4310", 1, 65535),
    allowedOrigins: (env.ALLOWED_ORIGINS || "http://localhost:3000,http://localhost:5173")
      .split(",")
      .map((o) => o.trim())
      .filter(Boolean),
    dataFile: env.DATA_FILE
      ? path.resolve(env.DATA_FILE)
      : path.join(home, ".itinera", "planner.json"),
    deletePolicy: parseDeletePolicy(env.DELETE_POLICY || "cascade"),
    defaultCurrency: parseCurrency(env.DEFAULT_CURRENCY || "USD"),
    bodyLimit: env.BODY_LIMIT || "5mb",
    rateLimitMax: parseInteger("RATE_LIMIT_MAX", env.RATE_LIMIT_MAX || "500", 1, 1_000_000),
    watchDataFile: env.WATCH_DATA_FILE !== "false",
  };
}

const config: Config = parseConfig(process.env);

export default config;
