import { Request, Response, NextFunction } from "express";
import { env } from "../config/env.js";
import { ZodError } from "zod";
import { TelemetryError } from "../utils/telemetry/index.js";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
) {
  // Zod validation errors
  if (err instanceof ZodError) {
    res.status(400).json({
      error: "Validation Error",
      code: "VALIDATION_ERROR",
      details: err.errors.map((e) => ({
        field: e.path.join("."),
        message: e.message,
      })),
    });
    return;
  }

  // Engine input errors: bad/missing channels (4xx) or no usable data
  if (err instanceof TelemetryError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
      driver: err.driver,
      stage: err.stage,
    });
    return;
  }

  // Known application errors
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: err.message,
      code: err.code,
    });
    return;
  }

  // Body parser failures (malformed JSON, payload over BODY_LIMIT)
  if ("status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    res.status(err.status).json({
      error: err.message,
      code: "INVALID_REQUEST_BODY",
    });
    return;
  }

  // Unknown errors
  console.error("Unhandled error:", err);
  res.status(500).json({
    error:
      env.NODE_ENV === "production"
        ? "Internal server error"
        : err.message,
    code: "INTERNAL_ERROR",
  });
}
