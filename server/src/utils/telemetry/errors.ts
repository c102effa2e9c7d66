/**
 * Typed failures raised by the comparison engine.
 *
 * "Bad input" (a channel is missing or misaligned) and "no data" (nothing
 * usable left for a driver) are separate classes so callers can report them
 * differently. Both carry the driver and the stage that rejected the input.
 */

export type TelemetryStage =
  | "prepare"
  | "normalize"
  | "synchronize"
  | "delta"
  | "microsectors";

export abstract class TelemetryError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly driver: string | undefined,
    public readonly stage: TelemetryStage
  ) {
    super(message);
    this.name = "TelemetryError";
  }
}

export class MissingChannelError extends TelemetryError {
  readonly statusCode = 400;
  readonly code = "MISSING_CHANNEL";

  constructor(
    public readonly channel: string,
    driver: string | undefined,
    stage: TelemetryStage
  ) {
    super(
      driver
        ? `Channel "${channel}" is missing for driver ${driver}`
        : `Channel "${channel}" is missing`,
      driver,
      stage
    );
    this.name = "MissingChannelError";
  }
}

export class ChannelLengthError extends TelemetryError {
  readonly statusCode = 400;
  readonly code = "CHANNEL_LENGTH_MISMATCH";

  constructor(
    public readonly channel: string,
    public readonly expected: number,
    public readonly actual: number,
    driver: string | undefined,
    stage: TelemetryStage
  ) {
    super(
      `Channel "${channel}" has ${actual} samples, expected ${expected}` +
        (driver ? ` (driver ${driver})` : ""),
      driver,
      stage
    );
    this.name = "ChannelLengthError";
  }
}

export class DistanceAxisError extends TelemetryError {
  readonly statusCode = 400;
  readonly code = "DISTANCE_AXIS_MISMATCH";

  constructor(
    public readonly index: number,
    driver: string | undefined,
    stage: TelemetryStage
  ) {
    super(`Distance axes differ at checkpoint ${index}`, driver, stage);
    this.name = "DistanceAxisError";
  }
}

export class EmptyDataError extends TelemetryError {
  readonly statusCode = 404;
  readonly code = "NO_TELEMETRY_DATA";

  constructor(driver: string | undefined, stage: TelemetryStage, detail?: string) {
    super(
      `No usable telemetry${driver ? ` for driver ${driver}` : ""}` +
        (detail ? `: ${detail}` : ""),
      driver,
      stage
    );
    this.name = "EmptyDataError";
  }
}
