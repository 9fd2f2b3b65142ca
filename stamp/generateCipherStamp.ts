import { loadStarCatalog, DEFAULT_CATALOG_PATH } from "../astro/catalog/loadStarCatalog.js";
import { collectEclipticMarkers, collectSolarSystemSamples } from "../astro/collectSkySamples.js";
import { AstronomyEngineOracle } from "../astro/ephemeris/astronomyEngine.js";
import type { EphemerisOracle } from "../astro/ephemeris/ephemerisOracle.js";
import { formatInstant, type ObservationInstant } from "../astro/ephemeris/observationTime.js";
import { precessCatalog } from "../astro/precessStar.js";
import type { GeoLocation, ProjectedBody } from "../astro/schemas/celestial.schema.js";
import { classifyStampError } from "../lib/errors.js";
import { createStampLogHelpers, stampLog, type StampLogger } from "../logging/stampLog.js";
import { writeStampFile } from "./persistence/writeStampFile.js";
import type { StampRenderOptions } from "./render/composeStamp.js";
import { renderStamp } from "./renderStamp.js";

export type GenerateCipherStampInput = {
  instant: ObservationInstant;
  observer: GeoLocation;
  size: number;
  outputPath: string;
  oracle?: EphemerisOracle;
  catalogPath?: string;
  includeEcliptic?: boolean;
  render?: StampRenderOptions;
  logger?: StampLogger;
};

export type CipherStampSummary = {
  outputPath: string;
  starCount: number;
  solarSystemCount: number;
  /** Bodies carried past the horizon policy, ecliptic markers excluded. */
  aboveHorizonCount: number;
  drawnCount: number;
  sun: ProjectedBody | null;
  moon: ProjectedBody | null;
  moonAngleDeg: number;
  projected: ProjectedBody[];
};

/**
 * Full pipeline: catalog → precession → ephemeris bodies → projection →
 * render → write. Any stage failure aborts before anything is written.
 */
export async function generateCipherStamp(input: GenerateCipherStampInput): Promise<CipherStampSummary> {
  const oracle = input.oracle ?? new AstronomyEngineOracle();
  const logger = input.logger ?? stampLog;
  const logs = createStampLogHelpers(logger);
  const instantLabel = formatInstant(input.instant);

  logs.renderStarted({
    instant: instantLabel,
    latitude: input.observer.latitude,
    longitude: input.observer.longitude,
    size: input.size,
  });

  try {
    const catalogPath = input.catalogPath ?? DEFAULT_CATALOG_PATH;
    const catalog = loadStarCatalog(catalogPath);
    logs.catalogLoaded({ source: catalogPath, star_count: catalog.length });

    const stars = precessCatalog(catalog, input.instant, oracle);
    const solarSystem = collectSolarSystemSamples(input.instant, oracle, { logger });
    const ecliptic =
      (input.includeEcliptic ?? true) ? collectEclipticMarkers(input.instant, oracle, { logger }) : [];

    const rendered = renderStamp({
      samples: [...stars, ...solarSystem, ...ecliptic],
      observer: input.observer,
      instant: input.instant,
      size: input.size,
      oracle,
      options: input.render,
      logger,
    });

    const outputPath = await writeStampFile(input.outputPath, rendered.svg);

    const bodies = rendered.projected.filter((b) => b.category !== "ecliptic");
    const summary: CipherStampSummary = {
      outputPath,
      starCount: stars.length,
      solarSystemCount: solarSystem.length,
      aboveHorizonCount: bodies.filter((b) => b.altitude_rad >= 0).length,
      drawnCount: rendered.drawn.length,
      sun: bodies.find((b) => b.category === "sun") ?? null,
      moon: bodies.find((b) => b.category === "moon") ?? null,
      moonAngleDeg: rendered.moonAngleDeg,
      projected: rendered.projected,
    };

    logs.renderSucceeded({
      instant: instantLabel,
      output_path: outputPath,
      projected_count: bodies.length,
      drawn_count: summary.drawnCount,
    });

    return summary;
  } catch (err) {
    const { errorClass, message } = classifyStampError(err);
    logs.renderFailed({ instant: instantLabel, error_code: errorClass, error_message: message });
    throw err;
  }
}
