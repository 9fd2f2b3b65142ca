import { z } from "zod";

/**
 * Zod schemas for the records flowing through the stamp pipeline.
 *
 * Catalog coordinates are J2000 degrees; samples carry of-date right ascension
 * in hours. Bodies are tagged with an explicit category at creation time so the
 * renderer never has to infer "Sun"/"Moon" from a display name.
 */

export const BODY_CATEGORIES = ["star", "planet", "sun", "moon", "ecliptic"] as const;

export const BodyCategorySchema = z.enum(BODY_CATEGORIES);

export const CatalogStarSchema = z.object({
  name: z.string().trim().min(1),
  ra_deg: z.number().min(0).lt(360),
  dec_deg: z.number().min(-90).max(90),
  magnitude: z.number().finite(),
});

export const CelestialSampleSchema = z.object({
  name: z.string().min(1),
  category: BodyCategorySchema,
  ra_hours: z.number().min(0).lt(24),
  dec_deg: z.number().min(-90).max(90),
  magnitude: z.number().finite(),
});

export const GeoLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const ProjectedBodySchema = z.object({
  name: z.string(),
  category: BodyCategorySchema,
  x: z.number().finite(),
  y: z.number().finite(),
  magnitude: z.number(),
  illuminated_fraction: z.number().min(0).max(1),
  // Diagnostic only; nothing downstream reads these.
  ra_rad: z.number(),
  dec_rad: z.number(),
  altitude_rad: z.number(),
});

export type BodyCategory = z.infer<typeof BodyCategorySchema>;
export type CatalogStar = z.infer<typeof CatalogStarSchema>;
export type CelestialSample = z.infer<typeof CelestialSampleSchema>;
export type GeoLocation = z.infer<typeof GeoLocationSchema>;
export type ProjectedBody = z.infer<typeof ProjectedBodySchema>;

export type HorizontalPosition = {
  altitude_rad: number;
  azimuth_rad: number;
};

/** Sun and Moon are carried through the pipeline even when below the horizon. */
export function isKeyBody(category: BodyCategory): boolean {
  return category === "sun" || category === "moon";
}
