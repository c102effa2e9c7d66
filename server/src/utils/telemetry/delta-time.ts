/**
 * Delta time between two synchronized drivers.
 *
 * This is an approximation: each checkpoint interval is assumed to be
 * covered at the speed recorded at its start, and the per-interval time
 * differences are summed. It does not use lap timestamps, so it drifts from
 * an official timing delta where speed changes sharply within an interval.
 *
 * Sign: positive means driver 1 is behind driver 2 at that checkpoint.
 */

import type { SynchronizedTelemetry } from "./types.js";
import { ChannelLengthError, DistanceAxisError } from "./errors.js";

const KMH_TO_MS = 1 / 3.6;
const SPEED_EPSILON = 1e-6;

export function calculateDeltaTime(
  driver1: SynchronizedTelemetry,
  driver2: SynchronizedTelemetry
): number[] {
  const distance = driver1.distance;
  const n = distance.length;

  if (driver2.distance.length !== n) {
    throw new ChannelLengthError("distance", n, driver2.distance.length, undefined, "delta");
  }
  if (driver1.speed.length !== n) {
    throw new ChannelLengthError("speed", n, driver1.speed.length, undefined, "delta");
  }
  if (driver2.speed.length !== n) {
    throw new ChannelLengthError("speed", n, driver2.speed.length, undefined, "delta");
  }
  if (driver2.distance !== distance) {
    const mismatch = distance.findIndex((d, i) => d !== driver2.distance[i]);
    if (mismatch !== -1) throw new DistanceAxisError(mismatch, undefined, "delta");
  }
  if (n === 0) return [];

  const delta = new Array<number>(n);
  delta[0] = 0;
  let cumulative = 0;
  for (let i = 0; i < n - 1; i++) {
    const step = distance[i + 1] - distance[i];
    const t1 = step / (driver1.speed[i] * KMH_TO_MS + SPEED_EPSILON);
    const t2 = step / (driver2.speed[i] * KMH_TO_MS + SPEED_EPSILON);
    cumulative += t1 - t2;
    delta[i + 1] = cumulative;
  }
  return delta;
}
