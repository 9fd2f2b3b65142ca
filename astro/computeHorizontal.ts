/**
 * Equatorial-of-date → horizontal (altitude/azimuth) for a fixed observer.
 */

import type { HorizontalPosition } from "./schemas/celestial.schema.js";

const DEG = Math.PI / 180;
const HOUR = Math.PI / 12;

export function localSiderealTimeHours(greenwichSiderealHours: number, longitudeDeg: number): number {
  return greenwichSiderealHours + longitudeDeg / 15;
}

/**
 * Azimuth is measured from north through east; altitude is clamped through
 * asin so floating-point overshoot past ±1 cannot produce NaN.
 */
export function toHorizontal(
  position: { ra_hours: number; dec_deg: number },
  latitudeDeg: number,
  localSiderealHours: number
): HorizontalPosition {
  const lat = latitudeDeg * DEG;
  const dec = position.dec_deg * DEG;
  const hourAngle = localSiderealHours * HOUR - position.ra_hours * HOUR;

  const sinLat = Math.sin(lat);
  const cosLat = Math.cos(lat);
  const sinDec = Math.sin(dec);
  const cosDec = Math.cos(dec);
  const cosHa = Math.cos(hourAngle);

  const sinAlt = Math.max(-1, Math.min(1, sinLat * sinDec + cosLat * cosDec * cosHa));

  return {
    altitude_rad: Math.asin(sinAlt),
    azimuth_rad: Math.atan2(-cosDec * Math.sin(hourAngle), sinDec * cosLat - cosDec * sinLat * cosHa),
  };
}
