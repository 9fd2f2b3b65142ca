/**
 * Moon glyph diagnostic: illuminated fraction and mask geometry for a date.
 *
 * Run: npx tsx scripts/diagnostic-moon-illumination.ts [YYYY-MM-DDTHH:MM]
 */

import { computeMoonGlyph, phaseNameFromFraction } from "../astro/computeLunar.js";
import { AstronomyEngineOracle } from "../astro/ephemeris/astronomyEngine.js";
import { GEOCENTRIC_OBSERVER } from "../astro/ephemeris/ephemerisOracle.js";
import { formatInstant, parseInstant } from "../astro/ephemeris/observationTime.js";
import { computeStampGeometry, DEFAULT_STAMP_SIZE } from "../stamp/render/stampGeometry.js";

async function main() {
  const instant = parseInstant(process.argv[2] ?? "2025-12-10T12:00:00");
  const oracle = new AstronomyEngineOracle();

  const fraction = oracle.moonIlluminatedFraction(instant);
  const sun = oracle.equatorialOfDate("Sun", instant, GEOCENTRIC_OBSERVER);
  const moon = oracle.equatorialOfDate("Moon", instant, GEOCENTRIC_OBSERVER);
  const geometry = computeStampGeometry(DEFAULT_STAMP_SIZE);
  const glyph = computeMoonGlyph({
    moon: { x: 0, y: 0 },
    diskRadius: 1.5 * geometry.point,
    illuminatedFraction: fraction,
  });

  console.log(`=== Moon diagnostic (${formatInstant(instant)}) ===\n`);
  console.log(`  Illuminated fraction: ${fraction.toFixed(4)} (${phaseNameFromFraction(fraction)})`);
  console.log(`  Sun  RA/Dec (of date): ${sun.ra_hours.toFixed(4)}h ${sun.dec_deg.toFixed(4)}°`);
  console.log(`  Moon RA/Dec (of date): ${moon.ra_hours.toFixed(4)}h ${moon.dec_deg.toFixed(4)}°`);
  console.log(`  Disk radius: ${glyph.disk_radius.toFixed(3)}px @ ${DEFAULT_STAMP_SIZE}px`);
  console.log(`  Mask radius: ${glyph.mask_radius.toFixed(3)}px, offset ${glyph.mask_offset.toFixed(3)}px`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
