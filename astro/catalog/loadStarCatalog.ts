import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Options } from "csv-parse";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { DataError } from "../../lib/errors.js";
import { CatalogStarSchema, type CatalogStar } from "../schemas/celestial.schema.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "data/bright_stars.csv");

export const CATALOG_COLUMNS = {
  name: "Name",
  ra_deg: "RA_Degrees",
  dec_deg: "Dec_Degrees",
  magnitude: "Magnitude",
} as const;

const COLUMN_KEYS = ["name", "ra_deg", "dec_deg", "magnitude"] as const;

// Header row and data rows as csv-parse hands them back with `info: true`.
const HeaderRowsSchema = z.array(z.array(z.string()));
const CsvRowsSchema = z.array(
  z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number().int() }),
  })
);

function parseNumber(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") return Number.NaN;
  return Number(raw);
}

function parseCsv(text: string, source: string, options: Options): unknown {
  try {
    return parse(text, options);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DataError(`malformed CSV (${message})`, source, undefined, { cause: err });
  }
}

/**
 * Parse a bright-star table.
 *
 * Columns are located by header name. Rows keep file order. Any bad row
 * rejects the whole table.
 */
export function parseStarCatalog(text: string, source: string): readonly CatalogStar[] {
  const headerRows = HeaderRowsSchema.parse(parseCsv(text, source, { bom: true, trim: true, to_line: 1 }));
  const headers = headerRows[0];
  if (headers === undefined || headers.every((h) => h === "")) {
    throw new DataError("catalog is empty", source);
  }

  const missing = COLUMN_KEYS
    .map((key) => CATALOG_COLUMNS[key])
    .filter((column) => !headers.includes(column));
  if (missing.length) {
    throw new DataError(`missing required columns: ${missing.join(", ")}`, source, 1);
  }

  const rows = CsvRowsSchema.parse(
    parseCsv(text, source, {
      columns: true,
      bom: true,
      trim: true,
      info: true,
      skip_empty_lines: true,
      skip_records_with_empty_values: true,
      relax_column_count: true,
    })
  );

  const stars: CatalogStar[] = [];
  const seen = new Set<string>();

  for (const { record, info } of rows) {
    const result = CatalogStarSchema.safeParse({
      name: record[CATALOG_COLUMNS.name] ?? "",
      ra_deg: parseNumber(record[CATALOG_COLUMNS.ra_deg]),
      dec_deg: parseNumber(record[CATALOG_COLUMNS.dec_deg]),
      magnitude: parseNumber(record[CATALOG_COLUMNS.magnitude]),
    });

    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new DataError(`malformed star record (${issues})`, source, info.lines);
    }

    const star = result.data;
    if (seen.has(star.name)) {
      throw new DataError(`duplicate star name "${star.name}"`, source, info.lines);
    }
    seen.add(star.name);
    stars.push(Object.freeze(star));
  }

  if (!stars.length) {
    throw new DataError("catalog has no star records", source);
  }

  return Object.freeze(stars);
}

const cache = new Map<string, readonly CatalogStar[]>();

/**
 * Load the star catalog once per process (per path).
 */
export function loadStarCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): readonly CatalogStar[] {
  const resolved = path.resolve(catalogPath);
  const cached = cache.get(resolved);
  if (cached) return cached;

  let raw: string;
  try {
    raw = fs.readFileSync(resolved, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DataError(`cannot read catalog (${message})`, resolved);
  }

  const stars = parseStarCatalog(raw, resolved);
  cache.set(resolved, stars);
  return stars;
}
