import type {
  CircuitDominationResponse,
  ComparisonResponse,
  LayoutMetadata,
  MicrosectorSummary,
  PilotTelemetry,
} from "@trackdelta/shared";
import {
  calculateDeltaTime,
  classifyMicrosectors,
  optimizeTrackLayout,
  synchronizeTelemetry,
  prepareDriverLap,
  validateDriverLap,
  DEFAULT_MICROSECTORS,
  DEFAULT_SYNC_POINTS,
  EmptyDataError,
  type ColorLookup,
  type DriverLap,
  type MicrosectorWinner,
  type OrientedTrack,
  type PrepareOptions,
  type SynchronizedTelemetry,
} from "../utils/telemetry/index.js";
import type { ComparisonRequest, DominanceRequest } from "../utils/telemetry-validators.js";
import { AppError } from "../middleware/error-handler.js";
import { createColorLookup } from "../config/driver-colors.js";
import { getTrackLength } from "../config/track-lengths.js";
import { env } from "../config/env.js";

export const MAX_DOMINANCE_DRIVERS = 3;

export interface ComparisonOptions {
  colors: ColorLookup;
  points?: number;
  microsectors?: number;
}

export type DominanceOptions = Omit<ComparisonOptions, "points">;

// ─── Helpers ─────────────────────────────────────────────────────────────────

function toMetadata(track: OrientedTrack): LayoutMetadata {
  return {
    rotation: track.rotation,
    aspect_ratio: Number.isFinite(track.aspectRatio) ? track.aspectRatio : null,
  };
}

function toSectorSummaries(sectors: MicrosectorWinner[]): MicrosectorSummary[] {
  return sectors.map((s) => ({
    index: s.index,
    start: s.start,
    end: s.end,
    driver: s.driver,
    color: s.color,
    meanSpeeds: s.meanSpeeds,
  }));
}

function toPilot(
  synced: SynchronizedTelemetry,
  lap: DriverLap,
  color: string
): PilotTelemetry {
  return { ...synced, color, name: lap.name, lap: lap.lap };
}

function formatRatio(ratio: number): string {
  return Number.isFinite(ratio) ? ratio.toFixed(2) : "inf";
}

// ─── Two-driver comparison ───────────────────────────────────────────────────

/**
 * Full head-to-head comparison. Driver 1 is the reference: its outline is
 * oriented and shared by both drivers' synchronized records.
 */
export function prepareComparison(
  driver1: DriverLap,
  driver2: DriverLap,
  options: ComparisonOptions
): ComparisonResponse {
  validateDriverLap(driver1, "normalize");
  validateDriverLap(driver2, "synchronize");

  const color1 = options.colors(driver1.name, 0);
  const color2 = options.colors(driver2.name, 1);

  const track = optimizeTrackLayout(driver1.x, driver1.y);

  const [sync1, sync2] = synchronizeTelemetry([driver1, driver2], track, {
    points: options.points ?? DEFAULT_SYNC_POINTS,
    referenceIndex: 0,
  });

  const delta = calculateDeltaTime(sync1, sync2);

  const microsectors = classifyMicrosectors(
    sync1.distance.length,
    [
      { driver: driver1.name, color: color1, speed: sync1.speed },
      { driver: driver2.name, color: color2, speed: sync2.speed },
    ],
    { numSectors: options.microsectors ?? DEFAULT_MICROSECTORS }
  );

  console.log(
    `Comparison ${driver1.name} L${driver1.lap} vs ${driver2.name} L${driver2.lap}: ` +
      `${track.rotation}° rotation, ratio ${formatRatio(track.aspectRatio)}, ` +
      `${microsectors.sectors.length} microsectors`
  );

  return {
    circuit: {
      x: sync1.x,
      y: sync1.y,
      colors: microsectors.colors,
      sectors: toSectorSummaries(microsectors.sectors),
    },
    pilot1: toPilot(sync1, driver1, color1),
    pilot2: toPilot(sync2, driver2, color2),
    delta,
    metadata: toMetadata(track),
  };
}

// ─── Circuit dominance ───────────────────────────────────────────────────────

/**
 * Which of up to three drivers was quickest through each microsector, drawn
 * on the first driver's outline. Other drivers' speeds are matched to the
 * outline by sample index, so no shared checkpoint grid is built.
 */
export function getCircuitDomination(
  laps: readonly DriverLap[],
  options: DominanceOptions
): CircuitDominationResponse {
  const reference = laps[0];
  if (!reference) throw new EmptyDataError(undefined, "normalize", "no drivers requested");
  if (laps.length > MAX_DOMINANCE_DRIVERS) {
    throw new AppError(
      400,
      `Maximum ${MAX_DOMINANCE_DRIVERS} drivers allowed`,
      "TOO_MANY_DRIVERS"
    );
  }

  laps.forEach((lap, i) => validateDriverLap(lap, i === 0 ? "normalize" : "microsectors"));

  const track = optimizeTrackLayout(reference.x, reference.y);
  const pointCount = track.x.length;

  const drivers = laps.map((lap, i) => ({ driver: lap.name, color: options.colors(lap.name, i) }));
  const microsectors = classifyMicrosectors(
    pointCount,
    laps.map((lap, i) => ({ ...drivers[i], speed: lap.speed })),
    { numSectors: options.microsectors ?? DEFAULT_MICROSECTORS }
  );

  console.log(
    `Circuit dominance for ${drivers.map((d) => d.driver).join(", ")}: ` +
      `${pointCount} points, ${microsectors.sectors.length} microsectors`
  );

  return {
    x: track.x,
    y: track.y,
    // A segment joins point i to point i + 1 and takes point i's color
    colors: microsectors.colors.slice(0, Math.max(0, pointCount - 1)),
    drivers,
    sectors: toSectorSummaries(microsectors.sectors),
    metadata: toMetadata(track),
  };
}

// ─── Request entry points ────────────────────────────────────────────────────

function prepareOptions(request: { unit: PrepareOptions["unit"]; circuit?: string }): PrepareOptions {
  const trackLength = getTrackLength(request.circuit);
  if (request.circuit && trackLength === undefined) {
    console.warn(`No official track length for ${request.circuit}, using calculated length`);
  }
  return { unit: request.unit, trackLength };
}

export function runComparison(request: ComparisonRequest): ComparisonResponse {
  const prep = prepareOptions(request);
  const driver1 = prepareDriverLap(request.driver1, prep);
  const driver2 = prepareDriverLap(request.driver2, prep);

  return prepareComparison(driver1, driver2, {
    colors: createColorLookup(request.colors),
    points: request.points ?? env.SYNC_POINTS,
    microsectors: request.microsectors ?? env.MICROSECTOR_COUNT,
  });
}

export function runCircuitDomination(request: DominanceRequest): CircuitDominationResponse {
  const prep = prepareOptions(request);
  const laps = request.drivers.map((raw) => prepareDriverLap(raw, prep));

  return getCircuitDomination(laps, {
    colors: createColorLookup(request.colors),
    microsectors: request.microsectors ?? env.MICROSECTOR_COUNT,
  });
}
