import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Config } from "./config.js";
import type { Planner } from "./planner.js";
import { createHealthRouter } from "./routes/health.js";
import { createTripsRouter } from "./routes/trips.js";
import { createItineraryRouter } from "./routes/itinerary.js";
import { createMembersRouter } from "./routes/members.js";
import { createChecklistsRouter } from "./routes/checklists.js";
import { createTransferRouter } from "./routes/transfer.js";

export type AppConfig = Pick<Config, "allowedOrigins" | "bodyLimit" | "rateLimitMax">;

/** Build the Express app around a planner. Kept apart from index.ts so tests can mount it. */
export function createApp(planner: Planner, config: AppConfig): Express {
  const app = express();

  app.use(
    cors({
      origin: config.allowedOrigins,
      credentials: true,
    })
  );
  app.use(express.json({ limit: config.bodyLimit }));

  // Single-user local app — generous limit, guards against runaway scripts only.
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: config.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many requests — please slow down" },
  });

  // Health is mounted ahead of the limiter so monitoring never trips it.
  app.use("/api/health", createHealthRouter(planner));
  app.use("/api", limiter);
  app.use("/api/trips", createTripsRouter(planner));
  app.use("/api/members", createMembersRouter(planner));
  app.use("/api", createItineraryRouter(planner));
  app.use("/api", createChecklistsRouter(planner));
  app.use("/api", createTransferRouter(planner));

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found", code: "not_found" });
  });

  // Body parser failures (malformed JSON, oversized body) carry their own 4xx status
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    if (status < 500) {
      const message = err instanceof SyntaxError ? "Request body is not valid JSON" : "Request rejected";
      res.status(status).json({ error: message, code: "bad_request" });
      return;
    }
    console.error("[itinera] Unhandled request error:", err);
    res.status(500).json({ error: "Internal server error", code: "internal_error" });
  });

  return app;
}
