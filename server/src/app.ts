import express from "express";
import cors from "cors";
import helmet from "helmet";
import { env } from "./config/env.js";
import { errorHandler } from "./middleware/error-handler.js";
import { apiLimiter } from "./middleware/rate-limit.js";
import { healthRouter } from "./routes/health.js";
import { comparisonRouter } from "./routes/comparison.js";
import { circuitDominationRouter } from "./routes/circuit-domination.js";

export function createApp() {
  const app = express();

  // Trust proxy (reverse proxy in front of the service)
  app.set("trust proxy", 1);

  // ─── Security ───────────────────────────────────────────────────────────────
  app.use(helmet());

  app.use(
    cors({
      origin: env.FRONTEND_URL,
      methods: ["GET", "POST"],
      allowedHeaders: ["Content-Type"],
    })
  );

  // ─── Body Parsing ──────────────────────────────────────────────────────────
  // Lap payloads carry thousands of samples per channel
  app.use(express.json({ limit: env.BODY_LIMIT }));

  // ─── Rate Limiting ───────────────────────────────────────────────────────
  app.use("/api", apiLimiter);

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use("/api/health", healthRouter);
  app.use("/api/comparison", comparisonRouter);
  app.use("/api/circuit-domination", circuitDominationRouter);

  // ─── Error Handling ─────────────────────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
