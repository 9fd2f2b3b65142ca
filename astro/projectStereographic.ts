/**
 * Zenith-centred stereographic projection of the observer's sky.
 *
 * Zenith maps to the origin, the horizon to the unit circle. Points outside
 * the unit circle are below the horizon.
 */

import { ComputationError } from "../lib/errors.js";
import { createStampLogHelpers, type StampLogger } from "../logging/stampLog.js";
import { localSiderealTimeHours, toHorizontal } from "./computeHorizontal.js";
import type { EphemerisOracle } from "./ephemeris/ephemerisOracle.js";
import type { ObservationInstant } from "./ephemeris/observationTime.js";
import {
  isKeyBody,
  type BodyCategory,
  type CelestialSample,
  type GeoLocation,
  type ProjectedBody,
} from "./schemas/celestial.schema.js";

/** Radius used instead of tan(z/2) when the body sits at the nadir. */
export const NADIR_SENTINEL_RADIUS = 1000;
const NADIR_EPSILON = 1e-5;

export function stereographicRadius(altitudeRad: number): number {
  const zenithDistance = Math.PI / 2 - altitudeRad;
  if (zenithDistance >= Math.PI - NADIR_EPSILON) {
    return NADIR_SENTINEL_RADIUS;
  }
  // tan(z/2) in half-angle form: exact 0 at the zenith and 1 on the horizon
  return Math.sin(zenithDistance) / (1 + Math.cos(zenithDistance));
}

/** South ends up at the bottom of the canvas (+y), north at the top. */
export function toPlane(altitudeRad: number, azimuthRad: number): { x: number; y: number } {
  const r = stereographicRadius(altitudeRad);
  return {
    x: r * Math.sin(azimuthRad),
    y: -r * Math.cos(azimuthRad),
  };
}

export function planarRadius(body: { x: number; y: number }): number {
  return Math.sqrt(body.x * body.x + body.y * body.y);
}

/**
 * Sun and Moon are kept below the horizon so the Moon glyph can still be
 * oriented; ecliptic markers are kept so the path can be drawn up to the
 * horizon edge. Everything else below the horizon is dropped.
 */
export function keepsBelowHorizon(category: BodyCategory): boolean {
  return isKeyBody(category) || category === "ecliptic";
}

export type ProjectSamplesInput = {
  samples: readonly CelestialSample[];
  observer: GeoLocation;
  instant: ObservationInstant;
  oracle: EphemerisOracle;
  logger?: StampLogger;
};

export function projectSamples(input: ProjectSamplesInput): ProjectedBody[] {
  const { samples, observer, instant, oracle } = input;
  const logs = createStampLogHelpers(input.logger);

  const gmst = oracle.siderealTimeHours(instant);
  if (!Number.isFinite(gmst)) {
    throw new ComputationError("sidereal time is not finite", "sidereal_time");
  }
  const lst = localSiderealTimeHours(gmst, observer.longitude);

  const hasMoon = samples.some((s) => s.category === "moon");
  const moonFraction = hasMoon ? oracle.moonIlluminatedFraction(instant) : 1;
  if (!(moonFraction >= 0 && moonFraction <= 1)) {
    throw new ComputationError(`illuminated fraction out of range: ${moonFraction}`, "illumination", "Moon");
  }

  const projected: ProjectedBody[] = [];

  for (const sample of samples) {
    if (!Number.isFinite(sample.ra_hours) || !Number.isFinite(sample.dec_deg)) {
      const err = new ComputationError("non-finite equatorial coordinates", "horizontal", sample.name);
      if (isKeyBody(sample.category)) throw err;
      logs.bodyDropped({ body: sample.name, stage: err.stage, error_message: err.message });
      continue;
    }

    const { altitude_rad, azimuth_rad } = toHorizontal(sample, observer.latitude, lst);

    if (altitude_rad < 0 && !keepsBelowHorizon(sample.category)) {
      continue;
    }

    const { x, y } = toPlane(altitude_rad, azimuth_rad);

    projected.push({
      name: sample.name,
      category: sample.category,
      x,
      y,
      magnitude: sample.magnitude,
      illuminated_fraction: sample.category === "moon" ? moonFraction : 1,
      ra_rad: (sample.ra_hours * Math.PI) / 12,
      dec_rad: (sample.dec_deg * Math.PI) / 180,
      altitude_rad,
    });
  }

  return projected;
}
