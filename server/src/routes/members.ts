import { Router, Request, Response } from "express";
import type { Planner } from "../planner.js";
import { sendError } from "../errors.js";

export function createMembersRouter(planner: Planner): Router {
  const router = Router();

  // GET /?all=true — active members only unless `all` is set
  router.get("/", (req: Request, res: Response) => {
    res.json(planner.members.list({ activeOnly: req.query.all !== "true" }));
  });

  router.post("/", (req: Request, res: Response) => {
    try {
      res.status(201).json(planner.members.create(req.body));
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  router.get("/:memberId", (req: Request, res: Response) => {
    try {
      res.json(planner.members.get(req.params.memberId));
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  // PATCH /:memberId — name, role, email, active
  router.patch("/:memberId", (req: Request, res: Response) => {
    try {
      res.json(planner.members.update(req.params.memberId, req.body));
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  // DELETE /:memberId — removes the member from every team and unassigns their tasks
  router.delete("/:memberId", (req: Request, res: Response) => {
    try {
      planner.members.delete(req.params.memberId);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "members");
    }
  });

  return router;
}
