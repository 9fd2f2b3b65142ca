/**
 * Canvas geometry derived from the stamp size.
 *
 * Everything here is a pure function of `size`; the renderer receives the
 * result explicitly instead of reading shared constants.
 */

/** One typographic point at 300 DPI, in pixels. */
export const ONE_POINT_PX = 300 / 72;

/** Size at which stroke widths are used unscaled. */
export const REFERENCE_SIZE = 472;

/** Default stamp: 3cm at 300 DPI. */
export const DEFAULT_STAMP_SIZE = 354;

export type StampGeometry = {
  size: number;
  center: number;
  /** Horizon ring radius (centre of its stroke). */
  radius: number;
  inner_radius: number;
  clip_radius: number;
  scale: number;
  /** One point scaled to this canvas; glyph sizes are multiples of it. */
  point: number;
  stroke: {
    primary: number;
    secondary: number;
  };
  border_width: number;
};

export function computeStampGeometry(size: number): StampGeometry {
  if (!Number.isFinite(size) || size <= 0) {
    throw new Error(`Stamp size must be a positive number, got ${size}`);
  }

  const scale = size / REFERENCE_SIZE;
  const primary = 0.3 * ONE_POINT_PX * scale;
  const secondary = 0.15 * ONE_POINT_PX * scale;
  const borderWidth = primary;
  const center = size / 2;
  // Outer edge of the horizon stroke touches the canvas edge.
  const radius = size / 2 - borderWidth / 2;

  return {
    size,
    center,
    radius,
    inner_radius: radius * 0.7,
    clip_radius: radius - borderWidth / 2,
    scale,
    point: ONE_POINT_PX * scale,
    stroke: { primary, secondary },
    border_width: borderWidth,
  };
}

/** Planar (unit-disk) coordinates → canvas pixels. */
export function toCanvas(geometry: StampGeometry, body: { x: number; y: number }): { x: number; y: number } {
  return {
    x: geometry.center + body.x * geometry.radius,
    y: geometry.center + body.y * geometry.radius,
  };
}
