/**
 * Shared types for the telemetry comparison engine.
 *
 * Every engine function takes these as read-only input and returns fresh
 * objects; nothing here is cached between requests.
 */

/** One driver's lap, columnar, already in meters and km/h */
export interface DriverLap {
  name: string;
  lap: number;
  distance: readonly number[];
  x: readonly number[];
  y: readonly number[];
  speed: readonly number[];
  throttle?: readonly number[];
  brake?: readonly number[];
}

/** Channels resampled onto the checkpoint grid */
export type ResampledChannel = "speed" | "throttle" | "brake";

export interface OrientedTrack {
  x: number[];
  y: number[];
  /** Degrees, one of 0, 10, ..., 170 */
  rotation: number;
  /** Bounding-box width / height; Infinity when the height is zero */
  aspectRatio: number;
}

export interface SynchronizedTelemetry {
  distance: number[];
  x: number[];
  y: number[];
  speed: number[];
  throttle?: number[];
  brake?: number[];
}

export interface SectorBounds {
  index: number;
  start: number; // inclusive
  end: number;   // exclusive
}

export interface MicrosectorWinner extends SectorBounds {
  driver: string;
  color: string;
  /** Mean speed per driver, in entry order; null where the driver has no points */
  meanSpeeds: Array<number | null>;
}

export interface MicrosectorAssignment {
  sectors: MicrosectorWinner[];
  /** One color per point */
  colors: string[];
}

/** Resolves a display color for a driver; index is the driver's position in the request */
export type ColorLookup = (driver: string, index: number) => string;
