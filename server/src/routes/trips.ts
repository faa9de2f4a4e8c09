import { Router, Request, Response } from "express";
import type { Planner } from "../planner.js";
import { sendError } from "../errors.js";

// Query strings arrive as strings or repeated keys; the board takes one value or a list.
function queryList(value: unknown): string | string[] | undefined {
  if (typeof value === "string") return value.includes(",") ? value.split(",").map((v) => v.trim()) : value;
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  return undefined;
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function createTripsRouter(planner: Planner): Router {
  const router = Router();

  // GET / — list trips, newest first
  router.get("/", (_req: Request, res: Response) => {
    res.json(planner.trips.list());
  });

  // POST / — create a trip (with Day 1 and the default checklists)
  router.post("/", (req: Request, res: Response) => {
    try {
      const trip = planner.trips.create(req.body);
      console.log(`[trips] Created ${trip.id} "${trip.title}"`);
      res.status(201).json(trip);
    } catch (err) {
      sendError(res, err, "trips");
    }
  });

  // GET /:tripId — the nested trip bundle
  router.get("/:tripId", (req: Request, res: Response) => {
    try {
      res.json(planner.trips.getBundle(req.params.tripId));
    } catch (err) {
      sendError(res, err, "trips");
    }
  });

  router.patch("/:tripId", (req: Request, res: Response) => {
    try {
      res.json(planner.trips.update(req.params.tripId, req.body));
    } catch (err) {
      sendError(res, err, "trips");
    }
  });

  router.delete("/:tripId", (req: Request, res: Response) => {
    try {
      planner.trips.delete(req.params.tripId);
      console.log(`[trips] Deleted ${req.params.tripId}`);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "trips");
    }
  });

  // GET /:tripId/board?keyword=&category=&status=&priority=&assigneeId=
  // `assigneeId=none` selects unassigned tasks.
  router.get("/:tripId/board", (req: Request, res: Response) => {
    try {
      const filters: Record<string, unknown> = {};
      const keyword = queryString(req.query.keyword);
      if (keyword !== undefined) filters.keyword = keyword;
      for (const key of ["category", "status", "priority"] as const) {
        const value = queryList(req.query[key]);
        if (value !== undefined) filters[key] = value;
      }
      const assignee = queryString(req.query.assigneeId);
      if (assignee !== undefined) filters.assigneeId = assignee === "none" ? null : assignee;

      res.json(planner.board.query(req.params.tripId, filters));
    } catch (err) {
      sendError(res, err, "board");
    }
  });

  router.get("/:tripId/summary", (req: Request, res: Response) => {
    try {
      res.json(planner.summary.summarize(req.params.tripId));
    } catch (err) {
      sendError(res, err, "summary");
    }
  });

  // GET /:tripId/export — download one trip as an import-ready document
  router.get("/:tripId/export", (req: Request, res: Response) => {
    try {
      const doc = planner.exportTrip(req.params.tripId);
      res.setHeader("Content-Disposition", `attachment; filename="${req.params.tripId}.json"`);
      res.json(doc);
    } catch (err) {
      sendError(res, err, "export");
    }
  });

  // ---- Days ----

  router.get("/:tripId/days", (req: Request, res: Response) => {
    try {
      res.json(planner.days.list(req.params.tripId));
    } catch (err) {
      sendError(res, err, "days");
    }
  });

  router.post("/:tripId/days", (req: Request, res: Response) => {
    try {
      res.status(201).json(planner.days.add(req.params.tripId, req.body ?? {}));
    } catch (err) {
      sendError(res, err, "days");
    }
  });

  // ---- Team ----

  router.get("/:tripId/members", (req: Request, res: Response) => {
    try {
      res.json(planner.members.listTeam(req.params.tripId));
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  // PUT /:tripId/members/:memberId — add to the team (idempotent)
  router.put("/:tripId/members/:memberId", (req: Request, res: Response) => {
    try {
      planner.members.addToTrip(req.params.tripId, req.params.memberId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  // DELETE /:tripId/members/:memberId — remove from the team, unassigning their tasks there
  router.delete("/:tripId/members/:memberId", (req: Request, res: Response) => {
    try {
      const unassigned = planner.members.removeFromTrip(req.params.tripId, req.params.memberId);
      res.json({ ok: true, unassigned });
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  // ---- Checklists ----

  router.get("/:tripId/checklists", (req: Request, res: Response) => {
    try {
      res.json(planner.checklists.list(req.params.tripId));
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  router.post("/:tripId/checklists", (req: Request, res: Response) => {
    try {
      res.status(201).json(planner.checklists.create(req.params.tripId, req.body));
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  return router;
}
