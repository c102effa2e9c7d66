import { describe, it, expect, beforeAll, afterAll, vi } from "vitest";
import type { Server } from "http";
import type {
  ApiError,
  CircuitDominationResponse,
  ComparisonResponse,
  HealthResponse,
} from "@trackdelta/shared";
import { createApp } from "../src/app.js";
import { makeFlatRawLap, makeStraightLap } from "./fixtures.js";

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  server = createApp().listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  vi.restoreAllMocks();
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve()))
  );
});

async function post<T>(path: string, body: unknown): Promise<{ status: number; body: T }> {
  const res = await fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
  return { status: res.status, body: (await res.json()) as T };
}

describe("GET /api/health", () => {
  it("reports ok", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    const body = (await res.json()) as HealthResponse;
    expect(res.status).toBe(200);
    expect(body.status).toBe("ok");
  });
});

describe("POST /api/comparison", () => {
  it("returns the comparison for two laps", async () => {
    const { status, body } = await post<ComparisonResponse>("/api/comparison", {
      driver1: makeFlatRawLap("VER", 100),
      driver2: makeFlatRawLap("LEC", 50),
      points: 5,
      colors: { LEC: "#112233" },
    });

    expect(status).toBe(200);
    expect(body.pilot1.distance).toEqual([0, 5, 10, 15, 20]);
    expect(body.pilot1.name).toBe("VER");
    expect(body.pilot2.color).toBe("#112233");
    expect(body.delta).toHaveLength(5);
    expect(body.delta[0]).toBe(0);
    expect(body.circuit.colors).toEqual(["#0600EF", "#0600EF", "#0600EF", "#0600EF", "#0600EF"]);
    expect(body.metadata).toEqual({ rotation: 0, aspect_ratio: null });
  });

  it("rejects a lap without a speed channel", async () => {
    const { speed: _speed, ...noSpeed } = makeFlatRawLap("LEC", 50);
    const { status, body } = await post<ApiError>("/api/comparison", {
      driver1: makeFlatRawLap("VER", 100),
      driver2: noSpeed,
    });

    expect(status).toBe(400);
    expect(body).toEqual({
      error: 'Channel "speed" is missing for driver LEC',
      code: "MISSING_CHANNEL",
      driver: "LEC",
      stage: "prepare",
    });
  });

  it("reports a driver with no GPS fix as having no data", async () => {
    const { status, body } = await post<ApiError>("/api/comparison", {
      driver1: makeFlatRawLap("VER", 100),
      driver2: { name: "PIA", x: [null, null], y: [null, null], speed: [200, 210] },
    });

    expect(status).toBe(404);
    expect(body.code).toBe("NO_TELEMETRY_DATA");
    expect(body.driver).toBe("PIA");
  });

  it("validates the distance axis", async () => {
    const { status, body } = await post<ApiError>("/api/comparison", {
      driver1: { ...makeFlatRawLap("VER", 100), distance: [0, 20, 10] },
      driver2: makeFlatRawLap("LEC", 50),
    });

    expect(status).toBe(400);
    expect(body.code).toBe("VALIDATION_ERROR");
    expect(body.details).toEqual([
      { field: "driver1.distance", message: "Distance must be non-decreasing" },
    ]);
  });

  it("rejects comparing a driver against themselves", async () => {
    const { status, body } = await post<ApiError>("/api/comparison", {
      driver1: { ...makeFlatRawLap("VER", 100), lap: 1 },
      driver2: { ...makeFlatRawLap("ver", 90), lap: 2 },
    });

    expect(status).toBe(400);
    expect(body.code).toBe("VALIDATION_ERROR");
    expect(body.details).toEqual([
      { field: "driver2.name", message: "Driver names must be unique" },
    ]);
  });

  it("rejects a body over the size limit", async () => {
    const { status, body } = await post<ApiError>("/api/comparison", {
      driver1: makeFlatRawLap("VER", 100),
      driver2: makeFlatRawLap("LEC", 50),
      padding: "x".repeat(100 * 1024),
    });

    expect(status).toBe(413);
    expect(body.code).toBe("INVALID_REQUEST_BODY");
  });

  it("rejects malformed JSON", async () => {
    const { status, body } = await post<ApiError>("/api/comparison", "{not json");
    expect(status).toBe(400);
    expect(body.code).toBe("INVALID_REQUEST_BODY");
  });
});

describe("POST /api/circuit-domination", () => {
  it("returns segment colors and the driver legend", async () => {
    const { status, body } = await post<CircuitDominationResponse>("/api/circuit-domination", {
      drivers: [makeStraightLap("VER", 250), makeStraightLap("HAM", 240)],
      microsectors: 5,
    });

    expect(status).toBe(200);
    expect(body.x).toHaveLength(21);
    expect(body.colors).toHaveLength(20);
    expect(new Set(body.colors)).toEqual(new Set(["#0600EF"]));
    expect(body.drivers).toEqual([
      { driver: "VER", color: "#0600EF" },
      { driver: "HAM", color: "#C0C0C0" },
    ]);
    expect(body.metadata.rotation).toBe(90);
  });

  it("allows at most three drivers", async () => {
    const { status, body } = await post<ApiError>("/api/circuit-domination", {
      drivers: ["VER", "LEC", "HAM", "NOR"].map((name) => makeStraightLap(name, 200)),
    });

    expect(status).toBe(400);
    expect(body.code).toBe("VALIDATION_ERROR");
    expect(body.details).toEqual([{ field: "drivers", message: "Maximum 3 drivers allowed" }]);
  });

  it("rejects the same driver twice", async () => {
    const { status, body } = await post<ApiError>("/api/circuit-domination", {
      drivers: [makeStraightLap("VER", 200), makeStraightLap("ver", 210)],
    });

    expect(status).toBe(400);
    expect(body.details).toEqual([{ field: "drivers", message: "Driver names must be unique" }]);
  });
});
