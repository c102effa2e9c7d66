import { Router, Request, Response, NextFunction } from "express";
import { comparisonRequestSchema } from "../utils/telemetry-validators.js";
import * as comparisonSvc from "../services/comparison.js";

export const comparisonRouter = Router();

// ─── POST /api/comparison — Head-to-head lap comparison ─────────────────────

comparisonRouter.post(
  "/",
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = comparisonRequestSchema.parse(req.body);
      const result = comparisonSvc.runComparison(params);
      res.json(result);
    } catch (err) {
      next(err);
    }
  }
);
