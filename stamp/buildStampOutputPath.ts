import path from "node:path";
import type { ObservationInstant } from "../astro/ephemeris/observationTime.js";

export function safeCityName(city: string): string {
  const kept = Array.from(city)
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join("")
    .trim()
    .replace(/ /g, "_");
  return kept || "Unknown";
}

function pad(value: number, width: number): string {
  return String(Math.abs(value)).padStart(width, "0");
}

/** YYYYMMDD_HHMM from the civil tuple; years beyond 9999 keep all digits. */
export function stampTimestamp(instant: ObservationInstant): string {
  const year = `${instant.year < 0 ? "-" : ""}${pad(instant.year, 4)}`;
  return `${year}${pad(instant.month, 2)}${pad(instant.day, 2)}_${pad(instant.hour, 2)}${pad(instant.minute, 2)}`;
}

export function buildStampOutputPath(params: {
  outputDir: string;
  city: string;
  instant: ObservationInstant;
}): string {
  const { outputDir, city, instant } = params;
  return path.join(outputDir, `cipher_${safeCityName(city)}_${stampTimestamp(instant)}.svg`);
}

export function ensureSvgExtension(outputPath: string): string {
  return outputPath.endsWith(".svg") ? outputPath : `${outputPath}.svg`;
}
