import type { DriverLap } from "../src/utils/telemetry/index.js";

/**
 * A 21-sample lap running up the y axis with a 1 m zigzag in x:
 * distance 0..200 m in 10 m steps, constant speed unless given.
 */
export function makeStraightLap(
  name: string,
  speed: number | ((i: number) => number),
  lap = 1
): DriverLap {
  const n = 21;
  const at = typeof speed === "number" ? () => speed : speed;
  return {
    name,
    lap,
    distance: Array.from({ length: n }, (_, i) => i * 10),
    x: Array.from({ length: n }, (_, i) => i % 2),
    y: Array.from({ length: n }, (_, i) => i * 10),
    speed: Array.from({ length: n }, (_, i) => at(i)),
    throttle: Array.from({ length: n }, () => 100),
    brake: Array.from({ length: n }, () => 0),
  };
}

/** Three samples along the x axis: a flat outline with zero height */
export function makeFlatRawLap(name: string, speed: number) {
  return {
    name,
    lap: 3,
    distance: [0, 10, 20],
    x: [0, 10, 20],
    y: [0, 0, 0],
    speed: [speed, speed, speed],
  };
}
