import { Router, Request, Response } from "express";
import type { Planner } from "../planner.js";
import { sendError } from "../errors.js";

/** Checklist and item routes, mounted at /api. Listing and creation live under /api/trips/:tripId. */
export function createChecklistsRouter(planner: Planner): Router {
  const router = Router();

  router.get("/checklists/:checklistId", (req: Request, res: Response) => {
    try {
      res.json(planner.checklists.get(req.params.checklistId));
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  router.patch("/checklists/:checklistId", (req: Request, res: Response) => {
    try {
      res.json(planner.checklists.update(req.params.checklistId, req.body));
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  router.delete("/checklists/:checklistId", (req: Request, res: Response) => {
    try {
      planner.checklists.delete(req.params.checklistId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  router.post("/checklists/:checklistId/items", (req: Request, res: Response) => {
    try {
      res.status(201).json(planner.checklists.addItem(req.params.checklistId, req.body));
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  // PATCH /checklist-items/:itemId — edit text or tick/untick
  router.patch("/checklist-items/:itemId", (req: Request, res: Response) => {
    try {
      res.json(planner.checklists.updateItem(req.params.itemId, req.body));
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  router.delete("/checklist-items/:itemId", (req: Request, res: Response) => {
    try {
      planner.checklists.deleteItem(req.params.itemId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "checklists");
    }
  });

  return router;
}
