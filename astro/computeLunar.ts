/**
 * Pure functions for the Moon glyph.
 * Geometry only: the illuminated fraction comes from the ephemeris.
 */

export type LunarPhaseName = "new" | "crescent" | "quarter" | "gibbous" | "full";

/**
 * Mask travel per unit of illuminated fraction, in Moon radii.
 * At 2.5R the mask (1.05R) clears the disk (R) entirely.
 */
export const MOON_MASK_SHIFT_FACTOR = 2.5;
export const MOON_MASK_RADIUS_FACTOR = 1.05;

export interface MoonGlyph {
  /** Direction from Moon to Sun in the canvas plane, degrees. */
  angle_deg: number;
  disk_radius: number;
  mask_radius: number;
  /** Distance the mask sits from the disk centre, away from the Sun. */
  mask_offset: number;
  illuminated_fraction: number;
}

type PlanarPoint = { x: number; y: number };

/**
 * Angle of the Moon→Sun vector in degrees; 0 when either body is missing.
 */
export function moonToSunAngleDeg(sun: PlanarPoint | undefined, moon: PlanarPoint | undefined): number {
  if (!sun || !moon) return 0;
  return (Math.atan2(sun.y - moon.y, sun.x - moon.x) * 180) / Math.PI;
}

function clampFraction(fraction: number): number {
  if (Number.isNaN(fraction)) return 1;
  return Math.min(1, Math.max(0, fraction));
}

/**
 * Linear mask offset: 0 at new moon (disk fully covered), k·R at full moon.
 */
export function moonMaskOffset(
  fraction: number,
  diskRadius: number,
  shiftFactor: number = MOON_MASK_SHIFT_FACTOR
): number {
  return clampFraction(fraction) * shiftFactor * diskRadius;
}

/**
 * Crescent-by-mask approximation. Above half illumination this gives a
 * "fat crescent" rather than a true convex gibbous outline.
 */
export function computeMoonGlyph(params: {
  sun?: PlanarPoint;
  moon: PlanarPoint;
  diskRadius: number;
  illuminatedFraction: number;
}): MoonGlyph {
  const fraction = clampFraction(params.illuminatedFraction);
  return {
    angle_deg: moonToSunAngleDeg(params.sun, params.moon),
    disk_radius: params.diskRadius,
    mask_radius: params.diskRadius * MOON_MASK_RADIUS_FACTOR,
    mask_offset: moonMaskOffset(fraction, params.diskRadius),
    illuminated_fraction: fraction,
  };
}

/**
 * Coarse phase label from the illuminated fraction (no waxing/waning:
 * the fraction alone cannot tell them apart).
 */
export function phaseNameFromFraction(fraction: number): LunarPhaseName {
  const f = clampFraction(fraction);
  if (f < 0.03) return "new";
  if (f < 0.4) return "crescent";
  if (f <= 0.6) return "quarter";
  if (f < 0.97) return "gibbous";
  return "full";
}
