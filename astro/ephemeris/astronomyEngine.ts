import {
  AstroTime,
  Body,
  Equator,
  EquatorFromVector,
  Illumination,
  MakeTime,
  Observer,
  RotateVector,
  Rotation_ECL_EQD,
  Rotation_EQJ_EQD,
  SiderealTime,
  Vector,
} from "astronomy-engine";
import { ComputationError, type ComputationStage } from "../../lib/errors.js";
import type {
  EphemerisOracle,
  EquatorialOfDate,
  ObserverPosition,
  RotationMatrix,
  SolarSystemBodyName,
} from "./ephemerisOracle.js";
import { instantToDate, type ObservationInstant } from "./observationTime.js";

const BODY_MAP: Record<SolarSystemBodyName, Body> = {
  Sun: Body.Sun,
  Moon: Body.Moon,
  Mercury: Body.Mercury,
  Venus: Body.Venus,
  Mars: Body.Mars,
  Jupiter: Body.Jupiter,
  Saturn: Body.Saturn,
};

function toAstroTime(instant: ObservationInstant): AstroTime {
  return MakeTime(instantToDate(instant));
}

function requireFinite(value: number, stage: ComputationStage, what: string, body?: string): number {
  if (!Number.isFinite(value)) {
    throw new ComputationError(`astronomy-engine returned non-finite ${what}`, stage, body);
  }
  return value;
}

/**
 * Runs a single ephemeris call and rewraps library failures so callers know
 * which stage and body failed.
 */
function guarded<T>(stage: ComputationStage, body: string | undefined, compute: () => T): T {
  try {
    return compute();
  } catch (err) {
    if (err instanceof ComputationError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new ComputationError(message, stage, body, { cause: err });
  }
}

function normalizeHours(hours: number): number {
  let h = hours % 24;
  if (h < 0) h += 24;
  return h;
}

/**
 * Ephemeris oracle backed by astronomy-engine.
 */
export class AstronomyEngineOracle implements EphemerisOracle {
  name = "astronomy-engine";

  siderealTimeHours(instant: ObservationInstant): number {
    return guarded("sidereal_time", undefined, () =>
      requireFinite(SiderealTime(toAstroTime(instant)), "sidereal_time", "sidereal time")
    );
  }

  rotationJ2000ToDate(instant: ObservationInstant): RotationMatrix {
    return guarded("rotation", undefined, () => {
      const { rot } = Rotation_EQJ_EQD(toAstroTime(instant));
      const row = (i: number): readonly [number, number, number] => {
        const r = rot[i];
        if (!r || r.length !== 3) {
          throw new ComputationError("rotation matrix is not 3×3", "rotation");
        }
        return [
          requireFinite(r[0], "rotation", "rotation element"),
          requireFinite(r[1], "rotation", "rotation element"),
          requireFinite(r[2], "rotation", "rotation element"),
        ];
      };
      return [row(0), row(1), row(2)];
    });
  }

  equatorialOfDate(
    body: SolarSystemBodyName,
    instant: ObservationInstant,
    observer: ObserverPosition
  ): EquatorialOfDate {
    return guarded("equatorial", body, () => {
      const equ = Equator(
        BODY_MAP[body],
        toAstroTime(instant),
        new Observer(observer.latitude, observer.longitude, observer.height_m),
        true,
        true
      );
      return {
        ra_hours: normalizeHours(requireFinite(equ.ra, "equatorial", "right ascension", body)),
        dec_deg: requireFinite(equ.dec, "equatorial", "declination", body),
      };
    });
  }

  moonIlluminatedFraction(instant: ObservationInstant): number {
    return guarded("illumination", "Moon", () => {
      const illum = Illumination(Body.Moon, toAstroTime(instant));
      const fraction = requireFinite(illum.phase_fraction, "illumination", "phase fraction", "Moon");
      return Math.min(1, Math.max(0, fraction));
    });
  }

  eclipticToEquatorialOfDate(longitudeDeg: number, instant: ObservationInstant): EquatorialOfDate {
    const name = `ecliptic@${longitudeDeg}`;
    return guarded("ecliptic", name, () => {
      const time = toAstroTime(instant);
      const lon = (longitudeDeg * Math.PI) / 180;
      // J2000 mean ecliptic point rotated onto the equator of date.
      const vec = RotateVector(Rotation_ECL_EQD(time), new Vector(Math.cos(lon), Math.sin(lon), 0, time));
      const equ = EquatorFromVector(vec);
      return {
        ra_hours: normalizeHours(requireFinite(equ.ra, "ecliptic", "right ascension", name)),
        dec_deg: requireFinite(equ.dec, "ecliptic", "declination", name),
      };
    });
  }
}
