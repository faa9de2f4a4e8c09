import { Router, Request, Response } from "express";
import type { Planner } from "../planner.js";
import { sendError } from "../errors.js";
import type { IdPolicy } from "../transfer/import.js";

export function createTransferRouter(planner: Planner): Router {
  const router = Router();

  // GET /export — every trip and member as one document
  router.get("/export", (_req: Request, res: Response) => {
    res.setHeader("Content-Disposition", `attachment; filename="itinera-export.json"`);
    res.json(planner.exportAll());
  });

  // POST /import?ids=preserve|regenerate — body is an export document
  router.post("/import", (req: Request, res: Response) => {
    const raw = req.query.ids;
    const ids: IdPolicy | null =
      raw === undefined || raw === "preserve" ? "preserve" : raw === "regenerate" ? "regenerate" : null;
    if (!ids) {
      res.status(400).json({ error: `ids must be "preserve" or "regenerate"`, code: "validation_error" });
      return;
    }

    try {
      const summary = planner.importDocument(req.body, ids);
      res.status(201).json(summary);
    } catch (err) {
      sendError(res, err, "import");
    }
  });

  return router;
}
