/**
 * Deep-time diagnostic: precession of Polaris and Vega between J2025 and J12025.
 * Polaris should no longer be the pole star ~10,000 years from now.
 *
 * Run: npx tsx scripts/diagnostic-deep-time.ts
 */

import { loadStarCatalog } from "../astro/catalog/loadStarCatalog.js";
import { AstronomyEngineOracle } from "../astro/ephemeris/astronomyEngine.js";
import { formatInstant, makeInstant } from "../astro/ephemeris/observationTime.js";
import { precessCatalog } from "../astro/precessStar.js";

async function main() {
  const oracle = new AstronomyEngineOracle();
  const catalog = loadStarCatalog();
  const t1 = makeInstant({ year: 2025, month: 12, day: 10, hour: 12, minute: 0, second: 0 });
  const t2 = makeInstant({ year: 12025, month: 12, day: 10, hour: 12, minute: 0, second: 0 });

  console.log(`=== Precession diagnostic: ${formatInstant(t1)} vs ${formatInstant(t2)} ===\n`);

  const stars1 = precessCatalog(catalog, t1, oracle);
  const stars2 = precessCatalog(catalog, t2, oracle);

  for (const name of ["Polaris", "Vega"]) {
    const a = stars1.find((s) => s.name === name);
    const b = stars2.find((s) => s.name === name);
    if (!a || !b) {
      console.log(`${name}: not in catalog`);
      continue;
    }
    const shift = Math.abs(a.dec_deg - b.dec_deg);
    console.log(`${name}`);
    console.log(`  J2025:  RA=${a.ra_hours.toFixed(4)}h  Dec=${a.dec_deg.toFixed(4)}°`);
    console.log(`  J12025: RA=${b.ra_hours.toFixed(4)}h  Dec=${b.dec_deg.toFixed(4)}°`);
    console.log(`  Dec shift: ${shift.toFixed(4)}° ${shift > 5 ? "(PASS)" : "(FAIL: shift too small)"}`);
    console.log("");
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
