/**
 * Input checks and preparation for raw provider laps.
 *
 * `prepareDriverLap` is the boundary between loosely shaped upstream data
 * and the engine: it rejects missing channels, converts coordinates to
 * meters, drops samples without a GPS fix and reconstructs the distance axis
 * from the driven line when the provider sent none.
 */

import type { DriverLap } from "./types.js";
import type { TelemetryStage } from "./errors.js";
import { ChannelLengthError, EmptyDataError, MissingChannelError } from "./errors.js";
import {
  calculateCumulativeDistance,
  scaleDistance,
  toMeters,
  type CoordinateUnit,
} from "./distance.js";

/** Lap as delivered upstream: any channel may be absent, x/y may contain gaps */
export interface RawDriverLap {
  name: string;
  lap?: number;
  distance?: readonly number[];
  x?: ReadonlyArray<number | null>;
  y?: ReadonlyArray<number | null>;
  speed?: readonly number[];
  throttle?: readonly number[];
  brake?: readonly number[];
}

export interface PrepareOptions {
  unit?: CoordinateUnit;
  /** Official track length in meters; applied only to a reconstructed distance axis */
  trackLength?: number;
}

function requireChannel<T>(
  values: readonly T[] | undefined,
  channel: string,
  driver: string
): readonly T[] {
  if (!Array.isArray(values)) throw new MissingChannelError(channel, driver, "prepare");
  return values;
}

function isFiniteNumber(v: number | null | undefined): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/**
 * Check a lap is usable as engine input: x, y and speed present, every
 * channel the same length as x, and at least one sample.
 */
export function validateDriverLap(lap: DriverLap, stage: TelemetryStage): void {
  const x = requireChannel(lap.x, "x", lap.name);
  requireChannel(lap.y, "y", lap.name);
  requireChannel(lap.speed, "speed", lap.name);
  requireChannel(lap.distance, "distance", lap.name);

  if (x.length === 0) throw new EmptyDataError(lap.name, stage);

  const channels: Array<[string, readonly number[] | undefined]> = [
    ["y", lap.y],
    ["distance", lap.distance],
    ["speed", lap.speed],
    ["throttle", lap.throttle],
    ["brake", lap.brake],
  ];
  for (const [channel, values] of channels) {
    if (values && values.length !== x.length) {
      throw new ChannelLengthError(channel, x.length, values.length, lap.name, stage);
    }
  }
}

/**
 * Indices of the samples that carry a GPS fix (finite x and y). Throws
 * EmptyDataError when no sample does.
 */
export function filterValidSamples(
  driver: string,
  x: ReadonlyArray<number | null>,
  y: ReadonlyArray<number | null>
): number[] {
  const keep: number[] = [];
  for (let i = 0; i < x.length; i++) {
    if (isFiniteNumber(x[i]) && isFiniteNumber(y[i])) keep.push(i);
  }
  if (keep.length === 0) throw new EmptyDataError(driver, "prepare", "no valid GPS points");
  return keep;
}

export function prepareDriverLap(raw: RawDriverLap, options: PrepareOptions = {}): DriverLap {
  const name = raw.name;
  const rawX = requireChannel(raw.x, "x", name);
  const rawY = requireChannel(raw.y, "y", name);
  const speed = requireChannel(raw.speed, "speed", name);

  const expected = rawX.length;
  const aligned: Array<[string, readonly unknown[] | undefined]> = [
    ["y", rawY],
    ["speed", speed],
    ["distance", raw.distance],
    ["throttle", raw.throttle],
    ["brake", raw.brake],
  ];
  for (const [channel, values] of aligned) {
    if (values && values.length !== expected) {
      throw new ChannelLengthError(channel, expected, values.length, name, "prepare");
    }
  }

  const unit = options.unit ?? "m";
  const xm = toMeters(rawX, unit);
  const ym = toMeters(rawY, unit);

  const keep = filterValidSamples(name, xm, ym);
  const x = keep.map((i) => xm[i] ?? 0);
  const y = keep.map((i) => ym[i] ?? 0);

  let distance: number[];
  if (raw.distance) {
    const source = raw.distance;
    distance = keep.map((i) => source[i]);
  } else {
    distance = calculateCumulativeDistance(x, y);
    if (options.trackLength) distance = scaleDistance(distance, options.trackLength);
  }

  const lap: DriverLap = {
    name,
    lap: raw.lap ?? 0,
    distance,
    x,
    y,
    speed: keep.map((i) => speed[i]),
  };
  const throttle = raw.throttle;
  if (throttle) lap.throttle = keep.map((i) => throttle[i]);
  const brake = raw.brake;
  if (brake) lap.brake = keep.map((i) => brake[i]);
  return lap;
}
