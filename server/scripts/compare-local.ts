/**
 * Compare two laps stored as local JSON files and print a summary.
 * Usage: npx tsx scripts/compare-local.ts <lap1.json> <lap2.json> [circuit]
 *
 * Each file holds one lap: { name, lap, distance?, x, y, speed, throttle?, brake? }
 */
import { readFileSync } from "fs";
import { resolve } from "path";
import { comparisonRequestSchema } from "../src/utils/telemetry-validators.js";
import { runComparison } from "../src/services/comparison.js";

function readLap(file: string): unknown {
  return JSON.parse(readFileSync(resolve(file), "utf-8"));
}

function main() {
  const [file1, file2, circuit] = process.argv.slice(2);
  if (!file1 || !file2) {
    console.error("Usage: npx tsx scripts/compare-local.ts <lap1.json> <lap2.json> [circuit]");
    process.exit(1);
  }

  const request = comparisonRequestSchema.parse({
    driver1: readLap(file1),
    driver2: readLap(file2),
    circuit,
  });
  const result = runComparison(request);

  const { pilot1, pilot2, delta, metadata, circuit: track } = result;
  const finalDelta = delta[delta.length - 1] ?? 0;

  console.log(`\n=== ${pilot1.name} (lap ${pilot1.lap}) vs ${pilot2.name} (lap ${pilot2.lap}) ===`);
  console.log(`  Rotation: ${metadata.rotation}°  Aspect ratio: ${metadata.aspect_ratio ?? "inf"}`);
  console.log(
    `  Final delta: ${finalDelta >= 0 ? "+" : ""}${finalDelta.toFixed(3)}s ` +
      `(${finalDelta > 0 ? pilot2.name : pilot1.name} ahead)`
  );

  const wins = new Map<string, number>();
  for (const sector of track.sectors) {
    wins.set(sector.driver, (wins.get(sector.driver) ?? 0) + 1);
  }
  console.log(`  Microsectors (${track.sectors.length}):`);
  for (const [driver, count] of wins) {
    console.log(`    ${driver}: ${count}`);
  }
}

try {
  main();
} catch (err) {
  console.error("✗ Comparison failed:", err instanceof Error ? err.message : err);
  process.exit(1);
}
