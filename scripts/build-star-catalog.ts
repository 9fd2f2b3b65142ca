/**
 * Rebuild the bundled bright-star table from a local copy of the Yale
 * Bright Star Catalogue (the fixed-width `catalog` / `bsc5.dat` file).
 *
 * Run: npx tsx scripts/build-star-catalog.ts <bsc5.dat> [output.csv] [max-magnitude]
 */

import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_MAX_MAGNITUDE, formatStarCatalogCsv, selectBrightStars } from "../astro/catalog/bsc5.js";
import { DEFAULT_CATALOG_PATH, parseStarCatalog } from "../astro/catalog/loadStarCatalog.js";

async function main() {
  const [input, output = DEFAULT_CATALOG_PATH, maxRaw] = process.argv.slice(2);
  if (!input) {
    throw new Error("Usage: build-star-catalog <bsc5.dat> [output.csv] [max-magnitude]");
  }
  const maxMagnitude = maxRaw === undefined ? DEFAULT_MAX_MAGNITUDE : Number(maxRaw);
  if (!Number.isFinite(maxMagnitude)) {
    throw new Error(`max-magnitude must be a number, got "${maxRaw}"`);
  }

  const raw = await fs.readFile(path.resolve(input), "latin1");
  const stars = selectBrightStars(raw.split(/\r?\n/), maxMagnitude);
  const csv = formatStarCatalogCsv(stars);

  // The loader must accept what we ship.
  parseStarCatalog(csv, output);

  await fs.mkdir(path.dirname(path.resolve(output)), { recursive: true });
  await fs.writeFile(output, csv, "utf-8");
  console.log(`Wrote ${stars.length} stars (V <= ${maxMagnitude}) to ${path.resolve(output)}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
