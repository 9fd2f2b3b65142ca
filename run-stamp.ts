#!/usr/bin/env node
/**
 * Generate a star cipher stamp: a zenith-centred star chart whose dot pattern
 * encodes a time and a place.
 *
 * Usage:
 *   npx tsx run-stamp.ts [--lat N] [--lon N] [--time YYYY-MM-DDTHH:MM[:SS]]
 *                        [--output PATH] [--size N] [--no-ecliptic] [--debug]
 */

import "dotenv/config";
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { phaseNameFromFraction } from "./astro/computeLunar.js";
import {
  formatInstant,
  instantFromDate,
  parseInstant,
  type ObservationInstant,
} from "./astro/ephemeris/observationTime.js";
import { GeoLocationSchema } from "./astro/schemas/celestial.schema.js";
import { loadStampConfig } from "./config/stampConfig.js";
import { buildStampOutputPath, ensureSvgExtension } from "./stamp/buildStampOutputPath.js";
import { generateCipherStamp, type CipherStampSummary } from "./stamp/generateCipherStamp.js";
import { resolveLocation } from "./stamp/location/resolveLocation.js";

const USAGE =
  "Usage: tsx run-stamp.ts [--lat N] [--lon N] [--time YYYY-MM-DDTHH:MM[:SS]] [--output PATH] [--size N] [--no-ecliptic] [--debug]";

export type StampCliArgs = {
  lat?: number;
  lon?: number;
  time?: ObservationInstant;
  output?: string;
  size?: number;
  ecliptic: boolean;
  debug: boolean;
};

function parseNumberFlag(flag: string, value: string | undefined): number {
  if (value === undefined || value.trim() === "" || Number.isNaN(Number(value))) {
    throw new Error(`${flag} must be a number\n${USAGE}`);
  }
  return Number(value);
}

export function parseStampArgs(argv: string[]): StampCliArgs {
  const args: StampCliArgs = { ecliptic: true, debug: false };
  const rest = argv.slice(2);

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const value = rest[i + 1];
    switch (token) {
      case "--lat":
        args.lat = parseNumberFlag(token, value);
        i += 1;
        break;
      case "--lon":
        args.lon = parseNumberFlag(token, value);
        i += 1;
        break;
      case "--time":
        if (value === undefined) throw new Error(`--time requires a value\n${USAGE}`);
        args.time = parseInstant(value);
        i += 1;
        break;
      case "--output":
        if (value === undefined) throw new Error(`--output requires a value\n${USAGE}`);
        args.output = value;
        i += 1;
        break;
      case "--size": {
        const size = parseNumberFlag(token, value);
        if (!Number.isInteger(size) || size < 64) {
          throw new Error(`--size must be an integer >= 64\n${USAGE}`);
        }
        args.size = size;
        i += 1;
        break;
      }
      case "--no-ecliptic":
        args.ecliptic = false;
        break;
      case "--debug":
        args.debug = true;
        break;
      default:
        throw new Error(`Unknown argument: ${token}\n${USAGE}`);
    }
  }

  return args;
}

function printDebug(summary: CipherStampSummary): void {
  console.log("\n--- Projection Data (for verification) ---");
  const onDisk = (b: { x: number; y: number }) => Math.hypot(b.x, b.y) <= 1;
  if (summary.sun && onDisk(summary.sun)) {
    console.log(`Sun: x=${summary.sun.x.toFixed(4)}, y=${summary.sun.y.toFixed(4)}`);
  } else {
    console.log("Sun: below horizon");
  }
  if (summary.moon && onDisk(summary.moon)) {
    console.log(
      `Moon: x=${summary.moon.x.toFixed(4)}, y=${summary.moon.y.toFixed(4)} ` +
        `(${phaseNameFromFraction(summary.moon.illuminated_fraction)}, ` +
        `${(summary.moon.illuminated_fraction * 100).toFixed(1)}% lit)`
    );
  } else {
    console.log("Moon: below horizon");
  }
  console.log(`Moon→Sun angle: ${summary.moonAngleDeg.toFixed(2)}°`);
  const stars = summary.projected.filter((b) => b.category === "star").length;
  console.log(`Total visible stars: ${stars}`);
}

async function main() {
  const args = parseStampArgs(process.argv);
  const config = loadStampConfig();

  const timeSource = args.time ? "USER-PROVIDED" : "SYSTEM CLOCK";
  const instant = args.time ?? instantFromDate(new Date());

  let latitude: number;
  let longitude: number;
  let city = "Unknown";
  let locationSource = "USER-PROVIDED";

  if (args.lat === undefined || args.lon === undefined) {
    console.log("[stamp] Detecting location via IP...");
    const location = await resolveLocation({
      url: config.geolocationUrl,
      timeoutMs: config.geolocationTimeoutMs,
    });
    latitude = location.latitude;
    longitude = location.longitude;
    city = location.city;
    locationSource = location.source === "fallback" ? "FALLBACK" : "IP-GEOLOCATION";
  } else {
    latitude = args.lat;
    longitude = args.lon;
  }

  const observer = GeoLocationSchema.parse({ latitude, longitude });

  console.log("\n--- TIMESTAMP DATA ---");
  console.log(`Time   : ${formatInstant(instant)} (${timeSource})`);
  console.log(`Place  : ${city} [${latitude.toFixed(4)}, ${longitude.toFixed(4)}] (${locationSource})`);
  console.log("----------------------\n");

  const outputPath = args.output
    ? ensureSvgExtension(args.output)
    : buildStampOutputPath({ outputDir: config.outputDir, city, instant });

  const summary = await generateCipherStamp({
    instant,
    observer,
    size: args.size ?? config.size,
    outputPath,
    catalogPath: config.catalogPath,
    includeEcliptic: args.ecliptic,
  });

  console.log(
    `[stamp] Loaded ${summary.starCount} stars + ${summary.solarSystemCount} solar-system bodies (with precession)`
  );
  console.log(`[stamp] Visible: ${summary.aboveHorizonCount} bodies above horizon, ${summary.drawnCount} drawn`);

  if (args.debug) {
    printDebug(summary);
  }

  console.log(`[stamp] Cipher saved to ${summary.outputPath}`);
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // realpath so an npm bin symlink still counts
  return fileURLToPath(import.meta.url) === fs.realpathSync(entry);
}

if (invokedDirectly()) {
  main().catch((err) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
