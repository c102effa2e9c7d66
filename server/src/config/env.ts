import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const envSchema = z.object({
  // Comparison engine
  SYNC_POINTS: z.coerce.number().int().min(2).max(20000).default(1000),
  MICROSECTOR_COUNT: z.coerce.number().int().min(1).max(500).default(25),

  // HTTP
  BODY_LIMIT: z.string().default("10mb"),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(100),

  // URLs
  FRONTEND_URL: z.string().url().default("http://localhost:5173"),

  // General
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().default(3000),
});

export const env = envSchema.parse(process.env);

export type Env = z.infer<typeof envSchema>;
