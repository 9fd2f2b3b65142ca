import type { GeoLocation } from "../schemas/celestial.schema.js";
import type { ObservationInstant } from "./observationTime.js";

/**
 * Ephemeris boundary.
 *
 * The stamp core never computes body positions, sidereal time or
 * illumination itself; it asks an oracle behind this interface.
 */

export const SOLAR_SYSTEM_BODY_NAMES = [
  "Sun",
  "Moon",
  "Mercury",
  "Venus",
  "Mars",
  "Jupiter",
  "Saturn",
] as const;

export type SolarSystemBodyName = (typeof SOLAR_SYSTEM_BODY_NAMES)[number];

/** Row-major 3×3 rotation matrix. */
export type RotationMatrix = readonly [
  readonly [number, number, number],
  readonly [number, number, number],
  readonly [number, number, number],
];

export type EquatorialOfDate = {
  ra_hours: number;
  dec_deg: number;
};

export type ObserverPosition = GeoLocation & {
  height_m: number;
};

export const GEOCENTRIC_OBSERVER: ObserverPosition = {
  latitude: 0,
  longitude: 0,
  height_m: 0,
};

export interface EphemerisOracle {
  name: string;

  /** Greenwich sidereal time in hours. */
  siderealTimeHours(instant: ObservationInstant): number;

  /** Maps a J2000 equatorial unit vector to the true equator of date. */
  rotationJ2000ToDate(instant: ObservationInstant): RotationMatrix;

  equatorialOfDate(
    body: SolarSystemBodyName,
    instant: ObservationInstant,
    observer: ObserverPosition
  ): EquatorialOfDate;

  /** Illuminated fraction of the Moon's disk in [0, 1]. */
  moonIlluminatedFraction(instant: ObservationInstant): number;

  /** Equatorial-of-date coordinates of the ecliptic point at the given longitude. */
  eclipticToEquatorialOfDate(longitudeDeg: number, instant: ObservationInstant): EquatorialOfDate;
}
