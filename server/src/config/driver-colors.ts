import type { ColorLookup } from "../utils/telemetry/index.js";

/** Display colors by three-letter driver code, chosen for dark backgrounds */
export const DRIVER_COLORS: Readonly<Record<string, string>> = Object.freeze({
  VER: "#0600EF",
  PER: "#3671C6",
  LEC: "#DC0000",
  SAI: "#FF6B6B",
  HAM: "#C0C0C0",
  RUS: "#E8E8E8",
  NOR: "#FF8700",
  PIA: "#FFB347",
  ALO: "#00665F",
  STR: "#2BA572",
  GAS: "#FF87BC",
  OCO: "#FFC0E3",
  ALB: "#041E42",
  SAR: "#1B4F91",
  COL: "#2E6DB5",
  TSU: "#FFFFFF",
  RIC: "#F5F5F5",
  LAW: "#DCDCDC",
  BOT: "#52E252",
  ZHO: "#90EE90",
  MAG: "#787878",
  HUL: "#A8A8A8",
  BEA: "#959595",
  DOO: "#FFB0D3",
});

/** Purple, blue, green: used by position for drivers without a known color */
export const FALLBACK_PALETTE: readonly string[] = Object.freeze([
  "#A259F7",
  "#00B4D8",
  "#43FF64",
]);

/**
 * Build an immutable driver → color lookup. Request overrides win, then the
 * driver table, then the fallback palette by the driver's position.
 */
export function createColorLookup(
  overrides: Readonly<Record<string, string>> = {}
): ColorLookup {
  const custom = new Map<string, string>();
  for (const [driver, color] of Object.entries(overrides)) {
    custom.set(driver.toUpperCase(), color);
  }

  return (driver, index) => {
    const code = driver.toUpperCase();
    return (
      custom.get(code) ??
      DRIVER_COLORS[code] ??
      FALLBACK_PALETTE[index % FALLBACK_PALETTE.length]
    );
  };
}
