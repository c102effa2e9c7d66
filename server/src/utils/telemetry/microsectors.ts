/**
 * Microsector dominance
 *
 * Splits a run of circuit points into fixed-size sectors and gives each
 * sector to the driver with the highest mean speed across it. Ties go to the
 * driver listed first.
 */

import type { MicrosectorAssignment, MicrosectorWinner, SectorBounds } from "./types.js";
import { EmptyDataError } from "./errors.js";

export const DEFAULT_MICROSECTORS = 25;

export interface MicrosectorEntry {
  driver: string;
  color: string;
  /** Speeds aligned by index to the circuit points; may be shorter than the point count */
  speed: readonly number[];
}

export interface MicrosectorOptions {
  numSectors?: number;
}

/**
 * Contiguous [start, end) ranges covering [0, pointCount). Every sector holds
 * floor(pointCount / n) points except the last, which takes the remainder.
 * More sectors than points are clamped to one point per sector.
 */
export function microsectorBounds(pointCount: number, numSectors: number): SectorBounds[] {
  if (pointCount <= 0) return [];
  const count = Math.max(1, Math.min(Math.floor(numSectors), pointCount));
  const perSector = Math.floor(pointCount / count);

  const bounds: SectorBounds[] = [];
  for (let k = 0; k < count; k++) {
    const start = k * perSector;
    const end = k === count - 1 ? pointCount : start + perSector;
    bounds.push({ index: k, start, end });
  }
  return bounds;
}

function meanOver(values: readonly number[], start: number, end: number): number | null {
  const stop = Math.min(end, values.length);
  if (stop <= start) return null;
  let sum = 0;
  for (let i = start; i < stop; i++) sum += values[i];
  return sum / (stop - start);
}

export function classifyMicrosectors(
  pointCount: number,
  entries: readonly MicrosectorEntry[],
  options: MicrosectorOptions = {}
): MicrosectorAssignment {
  const first = entries[0];
  if (!first) throw new EmptyDataError(undefined, "microsectors", "no drivers to classify");

  const bounds = microsectorBounds(pointCount, options.numSectors ?? DEFAULT_MICROSECTORS);
  const sectors: MicrosectorWinner[] = [];
  const colors = new Array<string>(Math.max(0, pointCount));

  for (const sector of bounds) {
    const meanSpeeds: Array<number | null> = [];
    let winner = first;
    let bestMean = -Infinity;

    for (const entry of entries) {
      const avg = meanOver(entry.speed, sector.start, sector.end);
      meanSpeeds.push(avg);
      if (avg !== null && avg > bestMean) {
        bestMean = avg;
        winner = entry;
      }
    }

    sectors.push({ ...sector, driver: winner.driver, color: winner.color, meanSpeeds });
    colors.fill(winner.color, sector.start, sector.end);
  }

  return { sectors, colors };
}
