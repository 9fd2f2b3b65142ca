/**
 * Solar-system and ecliptic samples supplied by the ephemeris oracle,
 * ready to merge with the precessed catalog.
 */

import { ComputationError } from "../lib/errors.js";
import { createStampLogHelpers, type StampLogger } from "../logging/stampLog.js";
import {
  GEOCENTRIC_OBSERVER,
  type EphemerisOracle,
  type ObserverPosition,
  type SolarSystemBodyName,
} from "./ephemeris/ephemerisOracle.js";
import type { ObservationInstant } from "./ephemeris/observationTime.js";
import type { BodyCategory, CelestialSample } from "./schemas/celestial.schema.js";

type SolarSystemBody = {
  name: SolarSystemBodyName;
  category: Extract<BodyCategory, "sun" | "moon" | "planet">;
  // Fixed display magnitude; only used for draw order and glyph size.
  magnitude: number;
};

export const SOLAR_SYSTEM_BODIES: readonly SolarSystemBody[] = [
  { name: "Sun", category: "sun", magnitude: -26.7 },
  { name: "Moon", category: "moon", magnitude: -12.0 },
  { name: "Mercury", category: "planet", magnitude: -0.5 },
  { name: "Venus", category: "planet", magnitude: -4.0 },
  { name: "Mars", category: "planet", magnitude: -1.0 },
  { name: "Jupiter", category: "planet", magnitude: -2.0 },
  { name: "Saturn", category: "planet", magnitude: 0.0 },
];

export const ECLIPTIC_MARKER_MAGNITUDE = 99;
export const DEFAULT_ECLIPTIC_STEP_DEG = 15;

/**
 * Of-date positions of the Sun, Moon and naked-eye planets.
 *
 * A planet the oracle cannot place is dropped and logged; the Sun and Moon
 * are required, so their failures propagate.
 */
export function collectSolarSystemSamples(
  instant: ObservationInstant,
  oracle: EphemerisOracle,
  options: { observer?: ObserverPosition; logger?: StampLogger } = {}
): CelestialSample[] {
  const observer = options.observer ?? GEOCENTRIC_OBSERVER;
  const logs = createStampLogHelpers(options.logger);
  const samples: CelestialSample[] = [];

  for (const body of SOLAR_SYSTEM_BODIES) {
    try {
      const pos = oracle.equatorialOfDate(body.name, instant, observer);
      samples.push({
        name: body.name,
        category: body.category,
        ra_hours: pos.ra_hours,
        dec_deg: pos.dec_deg,
        magnitude: body.magnitude,
      });
    } catch (err) {
      if (body.category !== "planet" || !(err instanceof ComputationError)) throw err;
      logs.bodyDropped({ body: body.name, stage: err.stage, error_message: err.message });
    }
  }

  return samples;
}

function markerName(longitudeDeg: number): string {
  return `ecliptic-${String(longitudeDeg).padStart(3, "0")}`;
}

/**
 * Points along the ecliptic, generated at longitudes 0, step, …, 360.
 * The returned order is the generation order and is what the renderer
 * connects; it must not be re-sorted.
 */
export function collectEclipticMarkers(
  instant: ObservationInstant,
  oracle: EphemerisOracle,
  options: { stepDeg?: number; logger?: StampLogger } = {}
): CelestialSample[] {
  const stepDeg = options.stepDeg ?? DEFAULT_ECLIPTIC_STEP_DEG;
  if (!(stepDeg > 0 && stepDeg <= 90)) {
    throw new Error(`Ecliptic step must be in (0, 90] degrees, got ${stepDeg}`);
  }
  const logs = createStampLogHelpers(options.logger);
  const markers: CelestialSample[] = [];

  for (let i = 0; i * stepDeg <= 360; i++) {
    const longitude = i * stepDeg;
    try {
      const pos = oracle.eclipticToEquatorialOfDate(longitude, instant);
      markers.push({
        name: markerName(longitude),
        category: "ecliptic",
        ra_hours: pos.ra_hours,
        dec_deg: pos.dec_deg,
        magnitude: ECLIPTIC_MARKER_MAGNITUDE,
      });
    } catch (err) {
      if (!(err instanceof ComputationError)) throw err;
      logs.bodyDropped({ body: markerName(longitude), stage: err.stage, error_message: err.message });
    }
  }

  return markers;
}
