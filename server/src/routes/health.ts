import { Router, Request, Response } from "express";
import type { Planner } from "../planner.js";

export function createHealthRouter(planner: Planner): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    const counts = planner.db.read((t) => ({
      trips: t.trips.length,
      members: t.members.length,
      tasks: t.tasks.length,
    }));
    res.json({
      ok: true,
      uptime: process.uptime(),
      dataFile: planner.db.location,
      deletePolicy: planner.options.deletePolicy,
      counts,
    });
  });

  return router;
}
