import { z } from "zod";

// ─── Incoming lap schema (columnar, as exported by the timing provider) ──────

const hexColorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, "Color must be a #RRGGBB hex string");

const channelSchema = z.array(z.number());
// GPS channels may have gaps
const gpsChannelSchema = z.array(z.number().nullable());

export const rawLapSchema = z.object({
  name: z.string().trim().min(1).max(64),
  lap: z.number().int().min(0).optional(),
  distance: channelSchema
    .refine(
      (d) => d.every((v, i) => i === 0 || v >= d[i - 1]),
      "Distance must be non-decreasing"
    )
    .optional(),
  x: gpsChannelSchema.optional(),
  y: gpsChannelSchema.optional(),
  speed: channelSchema.optional(),
  throttle: channelSchema.optional(),
  brake: channelSchema.optional(),
});

const sharedRequestFields = {
  circuit: z.string().trim().max(100).optional(),
  unit: z.enum(["m", "dm", "mm"]).default("m"),
  colors: z.record(z.string(), hexColorSchema).default({}),
  microsectors: z.number().int().min(1).max(500).optional(),
};

// ─── POST /api/comparison ────────────────────────────────────────────────────

export const comparisonRequestSchema = z
  .object({
    driver1: rawLapSchema,
    driver2: rawLapSchema,
    points: z.number().int().min(2).max(20000).optional(),
    ...sharedRequestFields,
  })
  .refine((r) => r.driver1.name.toUpperCase() !== r.driver2.name.toUpperCase(), {
    message: "Driver names must be unique",
    path: ["driver2", "name"],
  });

export type ComparisonRequest = z.infer<typeof comparisonRequestSchema>;

// ─── POST /api/circuit-domination ────────────────────────────────────────────

export const dominanceRequestSchema = z.object({
  drivers: z
    .array(rawLapSchema)
    .min(1, "At least one driver must be specified")
    .max(3, "Maximum 3 drivers allowed")
    .refine(
      (laps) => new Set(laps.map((l) => l.name.toUpperCase())).size === laps.length,
      "Driver names must be unique"
    ),
  ...sharedRequestFields,
});

export type DominanceRequest = z.infer<typeof dominanceRequestSchema>;
