// ─── Comparison ───────────────────────────────────────────────────────────────

export interface PilotTelemetry {
  distance: number[];
  x: number[];
  y: number[];
  speed: number[];
  throttle?: number[];
  brake?: number[];
  color: string;
  name: string;
  lap: number;
}

export interface MicrosectorSummary {
  index: number;
  start: number;   // first point index
  end: number;     // one past the last point index
  driver: string;
  color: string;
  /** Mean speed per driver in request order */
  meanSpeeds: Array<number | null>;
}

export interface LayoutMetadata {
  rotation: number;
  /** null when the outline has no height (JSON cannot carry Infinity) */
  aspect_ratio: number | null;
}

/** Response from POST /api/comparison */
export interface ComparisonResponse {
  circuit: {
    x: number[];
    y: number[];
    colors: string[];
    sectors: MicrosectorSummary[];
  };
  pilot1: PilotTelemetry;
  pilot2: PilotTelemetry;
  delta: number[];
  metadata: LayoutMetadata;
}

// ─── Circuit Dominance ────────────────────────────────────────────────────────

export interface DriverColor {
  driver: string;
  color: string;
}

/** Response from POST /api/circuit-domination */
export interface CircuitDominationResponse {
  x: number[];
  y: number[];
  /** One color per segment between adjacent points */
  colors: string[];
  drivers: DriverColor[];
  sectors: MicrosectorSummary[];
  metadata: LayoutMetadata;
}

// ─── API Responses ────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: "ok";
  timestamp: string;
}

export interface ApiError {
  error: string;
  code?: string;
  driver?: string;
  stage?: string;
  details?: Array<{ field: string; message: string }>;
}
