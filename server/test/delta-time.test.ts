import { describe, it, expect } from "vitest";
import {
  calculateDeltaTime,
  ChannelLengthError,
  DistanceAxisError,
  type SynchronizedTelemetry,
} from "../src/utils/telemetry/index.js";

function synced(distance: number[], speed: number[]): SynchronizedTelemetry {
  return { distance, x: distance, y: distance, speed };
}

describe("calculateDeltaTime", () => {
  const distance = [0, 10, 20, 30];

  it("accumulates the gap when driver 1 is faster", () => {
    const delta = calculateDeltaTime(
      synced(distance, [100, 100, 100, 100]),
      synced(distance, [50, 50, 50, 50])
    );

    expect(delta).toHaveLength(4);
    expect(delta[0]).toBe(0);
    // 10 m at 100 km/h takes 0.36 s, at 50 km/h 0.72 s
    expect(delta[1]).toBeCloseTo(-0.36, 6);
    expect(delta[2]).toBeCloseTo(-0.72, 6);
    expect(delta[3]).toBeCloseTo(-1.08, 6);
    for (let i = 1; i < delta.length; i++) {
      expect(delta[i]).toBeLessThan(delta[i - 1]);
    }
  });

  it("is positive when driver 1 is behind", () => {
    const delta = calculateDeltaTime(
      synced(distance, [50, 50, 50, 50]),
      synced(distance, [100, 100, 100, 100])
    );
    expect(delta[3]).toBeCloseTo(1.08, 6);
  });

  it("stays at zero for identical speed traces", () => {
    const speed = [120, 180, 95, 240];
    expect(calculateDeltaTime(synced(distance, speed), synced(distance, speed))).toEqual([
      0, 0, 0, 0,
    ]);
  });

  it("uses the speed at the start of each interval", () => {
    const delta = calculateDeltaTime(
      synced([0, 36], [36, 1000]),
      synced([0, 36], [72, 1])
    );
    // 36 m: 3.6 s at 36 km/h against 1.8 s at 72 km/h
    expect(delta[1]).toBeCloseTo(1.8, 5);
  });

  it("stays finite when a driver is stationary", () => {
    const delta = calculateDeltaTime(synced(distance, [0, 0, 0, 0]), synced(distance, [100, 100, 100, 100]));
    delta.forEach((d) => expect(Number.isFinite(d)).toBe(true));
    expect(delta[3]).toBeGreaterThan(0);
  });

  it("rejects records on different distance axes", () => {
    expect(() =>
      calculateDeltaTime(synced(distance, [1, 1, 1, 1]), synced([0, 10], [1, 1]))
    ).toThrow(ChannelLengthError);
  });

  it("rejects axes of the same length that disagree", () => {
    const attempt = () =>
      calculateDeltaTime(synced([0, 10, 20], [100, 100, 100]), synced([0, 50, 100], [50, 50, 50]));
    expect(attempt).toThrow(DistanceAxisError);
    expect(attempt).toThrow("Distance axes differ at checkpoint 1");
  });

  it("accepts equal axes held in separate arrays", () => {
    const delta = calculateDeltaTime(synced([0, 10], [100, 100]), synced([0, 10], [50, 50]));
    expect(delta[1]).toBeCloseTo(-0.36, 6);
  });

  it("returns an empty series for an empty axis", () => {
    expect(calculateDeltaTime(synced([], []), synced([], []))).toEqual([]);
  });
});
