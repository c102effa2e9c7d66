/**
 * Track outline normalization
 *
 * Centers a driver's (x, y) outline on the origin and picks the display
 * rotation with the widest bounding box. The search is a coarse grid of
 * 0°, 10°, ..., 170° and the first angle to reach the best ratio wins.
 */

import type { OrientedTrack } from "./types.js";

export const ROTATION_STEP_DEG = 10;
export const ROTATION_LIMIT_DEG = 180;

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function span(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return max - min;
}

/** Translate the outline so its centroid sits at (0, 0). */
export function centerCoordinates(
  x: readonly number[],
  y: readonly number[]
): { x: number[]; y: number[] } {
  const xMean = mean(x);
  const yMean = mean(y);
  return {
    x: x.map((v) => v - xMean),
    y: y.map((v) => v - yMean),
  };
}

/** Rotate counter-clockwise around the origin. */
export function rotateCoordinates(
  x: readonly number[],
  y: readonly number[],
  angleRad: number
): { x: number[]; y: number[] } {
  const cos = Math.cos(angleRad);
  const sin = Math.sin(angleRad);
  const outX = new Array<number>(x.length);
  const outY = new Array<number>(x.length);
  for (let i = 0; i < x.length; i++) {
    outX[i] = x[i] * cos - y[i] * sin;
    outY[i] = x[i] * sin + y[i] * cos;
  }
  return { x: outX, y: outY };
}

/** Bounding-box width / height. A flat outline has no height: Infinity. */
export function calculateAspectRatio(
  x: readonly number[],
  y: readonly number[]
): number {
  const height = span(y);
  if (height === 0) return Infinity;
  return span(x) / height;
}

export function optimizeTrackLayout(
  x: readonly number[],
  y: readonly number[]
): OrientedTrack {
  const centered = centerCoordinates(x, y);
  if (centered.x.length === 0) {
    return { x: [], y: [], rotation: 0, aspectRatio: 0 };
  }

  let best: OrientedTrack = {
    x: centered.x,
    y: centered.y,
    rotation: 0,
    aspectRatio: 0,
  };

  for (let deg = 0; deg < ROTATION_LIMIT_DEG; deg += ROTATION_STEP_DEG) {
    const rotated = rotateCoordinates(centered.x, centered.y, (deg * Math.PI) / 180);
    const ratio = calculateAspectRatio(rotated.x, rotated.y);
    // Strict: an equal ratio later in the sweep never replaces an earlier one
    if (ratio > best.aspectRatio) {
      best = { x: rotated.x, y: rotated.y, rotation: deg, aspectRatio: ratio };
    }
  }

  return best;
}
