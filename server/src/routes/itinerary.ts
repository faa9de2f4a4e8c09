import { Router, Request, Response } from "express";
import type { Planner } from "../planner.js";
import { sendError } from "../errors.js";

/**
 * Routes addressed by a day, event or task id. Mounted at /api so paths read
 * `/api/days/:dayId`, `/api/events/:eventId/tasks`, and so on.
 */
export function createItineraryRouter(planner: Planner): Router {
  const router = Router();

  // ---- Days ----

  router.get("/days/:dayId", (req: Request, res: Response) => {
    try {
      res.json(planner.days.get(req.params.dayId));
    } catch (err) {
      sendError(res, err, "days");
    }
  });

  router.patch("/days/:dayId", (req: Request, res: Response) => {
    try {
      res.json(planner.days.update(req.params.dayId, req.body));
    } catch (err) {
      sendError(res, err, "days");
    }
  });

  // DELETE /days/:dayId — remaining days are renumbered 1..n
  router.delete("/days/:dayId", (req: Request, res: Response) => {
    try {
      planner.days.delete(req.params.dayId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "days");
    }
  });

  // ---- Events ----

  router.get("/days/:dayId/events", (req: Request, res: Response) => {
    try {
      res.json(planner.events.list(req.params.dayId));
    } catch (err) {
      sendError(res, err, "events");
    }
  });

  router.post("/days/:dayId/events", (req: Request, res: Response) => {
    try {
      res.status(201).json(planner.events.create(req.params.dayId, req.body ?? {}));
    } catch (err) {
      sendError(res, err, "events");
    }
  });

  router.get("/events/:eventId", (req: Request, res: Response) => {
    try {
      res.json(planner.events.get(req.params.eventId));
    } catch (err) {
      sendError(res, err, "events");
    }
  });

  router.patch("/events/:eventId", (req: Request, res: Response) => {
    try {
      res.json(planner.events.update(req.params.eventId, req.body));
    } catch (err) {
      sendError(res, err, "events");
    }
  });

  router.delete("/events/:eventId", (req: Request, res: Response) => {
    try {
      planner.events.delete(req.params.eventId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "events");
    }
  });

  // ---- Tasks ----

  router.get("/events/:eventId/tasks", (req: Request, res: Response) => {
    try {
      res.json(planner.tasks.listByEvent(req.params.eventId));
    } catch (err) {
      sendError(res, err, "tasks");
    }
  });

  router.post("/events/:eventId/tasks", (req: Request, res: Response) => {
    try {
      res.status(201).json(planner.tasks.create(req.params.eventId, req.body));
    } catch (err) {
      sendError(res, err, "tasks");
    }
  });

  router.get("/tasks/:taskId", (req: Request, res: Response) => {
    try {
      res.json(planner.tasks.get(req.params.taskId));
    } catch (err) {
      sendError(res, err, "tasks");
    }
  });

  router.patch("/tasks/:taskId", (req: Request, res: Response) => {
    try {
      res.json(planner.tasks.update(req.params.taskId, req.body));
    } catch (err) {
      sendError(res, err, "tasks");
    }
  });

  router.delete("/tasks/:taskId", (req: Request, res: Response) => {
    try {
      planner.tasks.delete(req.params.taskId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "tasks");
    }
  });

  return router;
}
