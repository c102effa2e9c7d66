import { Router, Request, Response, NextFunction } from "express";
import { dominanceRequestSchema } from "../utils/telemetry-validators.js";
import * as comparisonSvc from "../services/comparison.js";

export const circuitDominationRouter = Router();

// ─── POST /api/circuit-domination — Fastest driver per microsector ──────────

circuitDominationRouter.post(
  "/",
  (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = dominanceRequestSchema.parse(req.body);
      const result = comparisonSvc.runCircuitDomination(params);
      res.json(result);
    } catch (err) {
      next(err);
    }
  }
);
