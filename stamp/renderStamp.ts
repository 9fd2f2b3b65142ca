import type { EphemerisOracle } from "../astro/ephemeris/ephemerisOracle.js";
import type { ObservationInstant } from "../astro/ephemeris/observationTime.js";
import { projectSamples } from "../astro/projectStereographic.js";
import type { CelestialSample, GeoLocation, ProjectedBody } from "../astro/schemas/celestial.schema.js";
import type { MoonGlyph } from "../astro/computeLunar.js";
import type { StampLogger } from "../logging/stampLog.js";
import { composeStamp, type StampRenderOptions } from "./render/composeStamp.js";
import { serializeSvg } from "./render/svgDocument.js";

export type RenderStampInput = {
  /** Epoch-adjusted samples: precessed stars plus ephemeris bodies. */
  samples: readonly CelestialSample[];
  observer: GeoLocation;
  instant: ObservationInstant;
  size: number;
  oracle: EphemerisOracle;
  options?: StampRenderOptions;
  logger?: StampLogger;
};

export type RenderedStamp = {
  svg: string;
  /** Everything that survived the horizon policy, including off-disk Sun/Moon. */
  projected: ProjectedBody[];
  drawn: ProjectedBody[];
  moon: MoonGlyph | null;
  moonAngleDeg: number;
};

/**
 * Core entry point: samples in, one SVG document out. No I/O.
 */
export function renderStamp(input: RenderStampInput): RenderedStamp {
  const projected = projectSamples({
    samples: input.samples,
    observer: input.observer,
    instant: input.instant,
    oracle: input.oracle,
    logger: input.logger,
  });

  const composed = composeStamp(projected, input.size, input.options);

  return {
    svg: serializeSvg(composed.document),
    projected,
    drawn: composed.drawn,
    moon: composed.moon,
    moonAngleDeg: composed.moonAngleDeg,
  };
}
