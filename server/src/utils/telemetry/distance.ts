/**
 * Distance and unit helpers for raw provider laps.
 */

export type CoordinateUnit = "m" | "dm" | "mm";

const UNIT_TO_METERS: Record<CoordinateUnit, number> = {
  m: 1,
  dm: 0.1,
  mm: 0.001,
};

/** Convert coordinates to meters; gaps (null) pass through. */
export function toMeters(
  values: ReadonlyArray<number | null>,
  unit: CoordinateUnit
): Array<number | null> {
  const factor = UNIT_TO_METERS[unit];
  if (factor === 1) return values.slice();
  return values.map((v) => (v === null ? v : v * factor));
}

/** Running Euclidean distance along the outline, starting at 0. */
export function calculateCumulativeDistance(
  x: readonly number[],
  y: readonly number[]
): number[] {
  const n = Math.min(x.length, y.length);
  if (n === 0) return [];
  const out = new Array<number>(n);
  out[0] = 0;
  for (let i = 1; i < n; i++) {
    out[i] = out[i - 1] + Math.hypot(x[i] - x[i - 1], y[i] - y[i - 1]);
  }
  return out;
}

/** Stretch a distance axis so it ends at `trackLength`. A zero-length axis is returned as is. */
export function scaleDistance(distance: readonly number[], trackLength: number): number[] {
  const last = distance[distance.length - 1];
  if (last === undefined || last <= 0) return distance.slice();
  const factor = trackLength / last;
  return distance.map((d) => d * factor);
}
