import { z } from "zod";

/**
 * Civil UTC instant as a (year, month, day, hour, minute, second) tuple.
 *
 * Kept as a tuple rather than a Date so that deep-time instants (year 12025,
 * negative years) can be formed and passed to the ephemeris unchanged.
 * No timezone conversion is ever applied.
 */
export const ObservationInstantSchema = z
  .object({
    year: z.number().int().min(-271820).max(275759),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31),
    hour: z.number().int().min(0).max(23),
    minute: z.number().int().min(0).max(59),
    second: z.number().min(0).lt(60),
  })
  .superRefine((t, ctx) => {
    const last = daysInMonth(t.year, t.month);
    if (t.day > last) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["day"],
        message: `day ${t.day} exceeds the ${last} days of month ${t.month} in year ${t.year}`,
      });
    }
  });

export type ObservationInstant = z.infer<typeof ObservationInstantSchema>;

// Proleptic Gregorian, same calendar as Date.
export function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

export function makeInstant(tuple: ObservationInstant): ObservationInstant {
  const result = ObservationInstantSchema.safeParse(tuple);
  if (!result.success) {
    throw new Error(`Invalid observation instant: ${result.error.message}`);
  }
  return Object.freeze(result.data);
}

// YYYY-MM-DDTHH:MM[:SS[.fff]][Z], with optional +/-YYYYYY extended years.
const ISO_INSTANT = /^([+-]\d{6}|\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}(?:\.\d+)?))?Z?$/;

export function parseInstant(value: string): ObservationInstant {
  const match = ISO_INSTANT.exec(value.trim());
  if (!match) {
    throw new Error(
      `Invalid time "${value}"; expected YYYY-MM-DDTHH:MM[:SS] (UTC, no offset)`
    );
  }

  return makeInstant({
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: match[6] === undefined ? 0 : Number(match[6]),
  });
}

/**
 * Build a JS Date for the instant.
 * setUTCFullYear keeps years 0–99 from being remapped to 1900–1999.
 */
export function instantToDate(instant: ObservationInstant): Date {
  const date = new Date(0);
  date.setUTCFullYear(instant.year, instant.month - 1, instant.day);
  date.setUTCHours(instant.hour, instant.minute, 0, 0);
  date.setTime(date.getTime() + instant.second * 1000);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Observation instant out of range: ${formatInstant(instant)}`);
  }
  return date;
}

export function instantFromDate(date: Date): ObservationInstant {
  return makeInstant({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
  });
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function formatInstant(instant: ObservationInstant): string {
  const year =
    instant.year >= 0 && instant.year <= 9999
      ? pad(instant.year, 4)
      : `${instant.year < 0 ? "-" : "+"}${pad(Math.abs(instant.year), 6)}`;
  const seconds = pad(Math.floor(instant.second), 2);
  return `${year}-${pad(instant.month, 2)}-${pad(instant.day, 2)}T${pad(instant.hour, 2)}:${pad(
    instant.minute,
    2
  )}:${seconds}Z`;
}
