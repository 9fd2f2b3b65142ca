import { stringify } from "csv-stringify/sync";
import { CATALOG_COLUMNS } from "./loadStarCatalog.js";

/**
 * Yale Bright Star Catalogue (5th revised ed.) fixed-width reader.
 *
 * Byte ranges are zero-based and end-exclusive. A usable record is at
 * least 197 characters wide.
 */
const BSC5_RECORD_WIDTH = 197;

const FIELDS = {
  hr: [0, 4],
  name: [4, 14],
  raHours: [75, 77],
  raMinutes: [77, 79],
  raSeconds: [79, 83],
  decSign: [83, 84],
  decDegrees: [84, 86],
  decMinutes: [86, 88],
  decSeconds: [88, 90],
  vmag: [102, 107],
} as const satisfies Record<string, readonly [number, number]>;

export const DEFAULT_MAX_MAGNITUDE = 4.0;

export type Bsc5Star = {
  hr: number;
  name: string;
  ra_deg: number;
  dec_deg: number;
  magnitude: number;
};

function field(line: string, key: keyof typeof FIELDS): string {
  const [start, end] = FIELDS[key];
  return line.slice(start, end).trim();
}

// Blank sexagesimal parts read as zero.
function part(line: string, key: keyof typeof FIELDS): number {
  const raw = field(line, key);
  return raw === "" ? 0 : Number(raw);
}

/**
 * Decode one catalogue record, or null when it is too short or lacks a
 * catalogue number, a parsable position or a visual magnitude.
 */
export function parseBsc5Line(line: string): Bsc5Star | null {
  if (line.length < BSC5_RECORD_WIDTH) return null;

  const hrRaw = field(line, "hr");
  if (!/^\d+$/.test(hrRaw)) return null;
  const hr = Number(hrRaw);

  const vmagRaw = field(line, "vmag");
  const magnitude = Number(vmagRaw);
  if (vmagRaw === "" || !Number.isFinite(magnitude)) return null;

  const ra_deg = (part(line, "raHours") + part(line, "raMinutes") / 60 + part(line, "raSeconds") / 3600) * 15;
  const sign = field(line, "decSign") === "-" ? -1 : 1;
  const dec_deg =
    sign * (part(line, "decDegrees") + part(line, "decMinutes") / 60 + part(line, "decSeconds") / 3600);
  if (!Number.isFinite(ra_deg) || !Number.isFinite(dec_deg)) return null;

  return { hr, name: field(line, "name") || `HR${hr}`, ra_deg, dec_deg, magnitude };
}

/**
 * Naked-eye subset of the catalogue, brightest first.
 *
 * Ties keep catalogue order. A name already taken by a brighter star
 * falls back to the star's HR designation.
 */
export function selectBrightStars(
  lines: Iterable<string>,
  maxMagnitude: number = DEFAULT_MAX_MAGNITUDE
): Bsc5Star[] {
  const stars: Bsc5Star[] = [];
  for (const line of lines) {
    const star = parseBsc5Line(line);
    if (star && star.magnitude <= maxMagnitude) stars.push(star);
  }
  stars.sort((a, b) => a.magnitude - b.magnitude);

  const taken = new Set<string>();
  return stars.map((star) => {
    const name = taken.has(star.name) ? `HR${star.hr}` : star.name;
    taken.add(name);
    return name === star.name ? star : { ...star, name };
  });
}

export function formatStarCatalogCsv(stars: readonly Bsc5Star[]): string {
  return stringify([
    [CATALOG_COLUMNS.name, CATALOG_COLUMNS.ra_deg, CATALOG_COLUMNS.dec_deg, CATALOG_COLUMNS.magnitude],
    ...stars.map((s) => [s.name, s.ra_deg.toFixed(4), s.dec_deg.toFixed(4), s.magnitude.toFixed(2)]),
  ]);
}
