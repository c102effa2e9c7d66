/**
 * Telemetry comparison engine
 *
 * Pure, synchronous transforms over per-driver lap arrays:
 *   1. track-layout: center and orient the reference outline
 *   2. synchronize: resample every driver onto shared checkpoints
 *   3. delta-time: cumulative time gap from local speeds
 *   4. microsectors: fixed-size sectors won on mean speed
 *
 * `prepare` and `distance` shape raw provider laps into engine input.
 */

export {
  centerCoordinates,
  rotateCoordinates,
  calculateAspectRatio,
  optimizeTrackLayout,
} from "./track-layout.js";
export {
  DEFAULT_SYNC_POINTS,
  buildCheckpoints,
  interpolate,
  synchronizeTelemetry,
} from "./synchronize.js";
export { calculateDeltaTime } from "./delta-time.js";
export {
  DEFAULT_MICROSECTORS,
  microsectorBounds,
  classifyMicrosectors,
} from "./microsectors.js";
export { calculateCumulativeDistance, scaleDistance, toMeters } from "./distance.js";
export { filterValidSamples, prepareDriverLap, validateDriverLap } from "./prepare.js";
export {
  TelemetryError,
  MissingChannelError,
  ChannelLengthError,
  DistanceAxisError,
  EmptyDataError,
} from "./errors.js";

export type { SynchronizeOptions } from "./synchronize.js";
export type { MicrosectorEntry, MicrosectorOptions } from "./microsectors.js";
export type { CoordinateUnit } from "./distance.js";
export type { RawDriverLap, PrepareOptions } from "./prepare.js";
export type { TelemetryStage } from "./errors.js";
export type {
  DriverLap,
  OrientedTrack,
  SynchronizedTelemetry,
  SectorBounds,
  MicrosectorWinner,
  MicrosectorAssignment,
  ColorLookup,
} from "./types.js";
