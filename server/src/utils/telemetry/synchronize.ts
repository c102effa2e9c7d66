/**
 * Telemetry synchronization
 *
 * Resamples every driver onto one grid of equally spaced distance
 * checkpoints so channels can be compared index by index. The reference
 * driver's oriented outline is resampled onto the same grid and shared by
 * every driver: all records in one comparison have identical distance, x
 * and y arrays and differ only in their channel values.
 */

import type {
  DriverLap,
  OrientedTrack,
  ResampledChannel,
  SynchronizedTelemetry,
} from "./types.js";
import { EmptyDataError } from "./errors.js";

export const DEFAULT_SYNC_POINTS = 1000;

export interface SynchronizeOptions {
  /** Number of checkpoints, at least 2 */
  points?: number;
  /** Index into `laps` of the driver the track outline was built from */
  referenceIndex?: number;
}

/** `count` equally spaced values from 0 to `maxDistance`, last one exact. */
export function buildCheckpoints(maxDistance: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [0];
  const step = maxDistance / (count - 1);
  const out = new Array<number>(count);
  for (let i = 0; i < count; i++) out[i] = i * step;
  out[count - 1] = maxDistance;
  return out;
}

/** Largest index j with xp[j] <= value, or -1 if value is below xp[0]. */
function lowerIndex(xp: readonly number[], value: number): number {
  let lo = 0;
  let hi = xp.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (xp[mid] <= value) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

/**
 * Piecewise-linear interpolation of (xp, fp) at every value of `xs`.
 * Outside [xp[0], xp[last]] the nearest boundary value is held.
 * `xp` must be non-decreasing; repeated distances resolve to the last sample.
 */
export function interpolate(
  xs: readonly number[],
  xp: readonly number[],
  fp: readonly number[]
): number[] {
  const n = Math.min(xp.length, fp.length);
  if (n === 0) return xs.map(() => NaN);
  const first = xp[0];
  const last = xp[n - 1];
  const axis = n === xp.length ? xp : xp.slice(0, n);

  return xs.map((value) => {
    if (value < first) return fp[0];
    if (value >= last) return fp[n - 1];
    const j = lowerIndex(axis, value);
    const x0 = axis[j];
    const x1 = axis[j + 1];
    const f0 = fp[j];
    const f1 = fp[j + 1];
    return f0 + ((value - x0) * (f1 - f0)) / (x1 - x0);
  });
}

function lastDistance(lap: DriverLap): number {
  const d = lap.distance;
  if (d.length === 0) throw new EmptyDataError(lap.name, "synchronize", "empty distance axis");
  return d[d.length - 1];
}

function resample(
  checkpoints: readonly number[],
  lap: DriverLap,
  channel: ResampledChannel
): number[] | undefined {
  const values = lap[channel];
  if (!values) return undefined;
  return interpolate(checkpoints, lap.distance, values);
}

export function synchronizeTelemetry(
  laps: readonly DriverLap[],
  track: OrientedTrack,
  options: SynchronizeOptions = {}
): SynchronizedTelemetry[] {
  const points = options.points ?? DEFAULT_SYNC_POINTS;
  const referenceIndex = options.referenceIndex ?? 0;
  const reference = laps[referenceIndex];
  if (!reference) throw new EmptyDataError(undefined, "synchronize", "no reference driver");

  let maxDistance = 0;
  for (const lap of laps) maxDistance = Math.max(maxDistance, lastDistance(lap));

  const distance = buildCheckpoints(maxDistance, points);

  // The outline lines up sample-for-sample with the reference driver's distance axis
  const x = interpolate(distance, reference.distance, track.x);
  const y = interpolate(distance, reference.distance, track.y);

  return laps.map((lap) => {
    const synced: SynchronizedTelemetry = {
      distance,
      x,
      y,
      speed: interpolate(distance, lap.distance, lap.speed),
    };
    const throttle = resample(distance, lap, "throttle");
    if (throttle) synced.throttle = throttle;
    const brake = resample(distance, lap, "brake");
    if (brake) synced.brake = brake;
    return synced;
  });
}
