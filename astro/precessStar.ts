/**
 * Epoch precession: J2000 catalog positions → equator of date.
 *
 * Pure geometry; the rotation itself comes from the ephemeris oracle.
 */

import type { EphemerisOracle, RotationMatrix } from "./ephemeris/ephemerisOracle.js";
import type { ObservationInstant } from "./ephemeris/observationTime.js";
import type { CatalogStar, CelestialSample } from "./schemas/celestial.schema.js";

const DEG = Math.PI / 180;

export type EquatorialDegrees = {
  ra_deg: number;
  dec_deg: number;
};

function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-15 % 360 + 360 rounds to exactly 360
  return v >= 360 ? 0 : v;
}

/**
 * Rotate a J2000 (RA, Dec) direction by the given matrix.
 *
 * Dec = ±90° is not special-cased: asin(±1) still gives ±90° and RA becomes
 * whatever atan2 returns for the degenerate vector.
 */
export function rotateEquatorial(
  raDeg: number,
  decDeg: number,
  rotation: RotationMatrix
): EquatorialDegrees {
  const ra = raDeg * DEG;
  const dec = decDeg * DEG;
  const cosDec = Math.cos(dec);
  const v = [cosDec * Math.cos(ra), cosDec * Math.sin(ra), Math.sin(dec)] as const;

  const [r0, r1, r2] = rotation;
  const x = r0[0] * v[0] + r0[1] * v[1] + r0[2] * v[2];
  const y = r1[0] * v[0] + r1[1] * v[1] + r1[2] * v[2];
  const z = r2[0] * v[0] + r2[1] * v[1] + r2[2] * v[2];

  return {
    ra_deg: normalizeDegrees(Math.atan2(y, x) / DEG),
    dec_deg: Math.asin(Math.max(-1, Math.min(1, z))) / DEG,
  };
}

export function precessStar(
  star: Pick<CatalogStar, "ra_deg" | "dec_deg">,
  instant: ObservationInstant,
  oracle: EphemerisOracle
): EquatorialDegrees {
  return rotateEquatorial(star.ra_deg, star.dec_deg, oracle.rotationJ2000ToDate(instant));
}

/**
 * Precess every catalog star to the instant, keeping catalog order.
 * The rotation is requested once; if it fails, no star can be placed.
 */
export function precessCatalog(
  stars: readonly CatalogStar[],
  instant: ObservationInstant,
  oracle: EphemerisOracle
): CelestialSample[] {
  const rotation = oracle.rotationJ2000ToDate(instant);

  return stars.map((star) => {
    const { ra_deg, dec_deg } = rotateEquatorial(star.ra_deg, star.dec_deg, rotation);
    return {
      name: star.name,
      category: "star" as const,
      ra_hours: ra_deg / 15,
      dec_deg,
      magnitude: star.magnitude,
    };
  });
}
