import rateLimit from "express-rate-limit";
import { env } from "../config/env.js";

/**
 * General API: RATE_LIMIT_PER_MINUTE requests per minute per IP
 */
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: env.RATE_LIMIT_PER_MINUTE,
  message: { error: "Too many requests. Please slow down.", code: "RATE_LIMITED" },
  standardHeaders: true,
  legacyHeaders: false,
});
