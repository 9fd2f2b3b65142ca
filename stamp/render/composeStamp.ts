/**
 * Layered stamp composition.
 *
 * Order is fixed: frame → clip → ecliptic path → Moon → remaining bodies
 * (dimmest first). Equal inputs always produce equal documents.
 */

import { computeMoonGlyph, moonToSunAngleDeg, type MoonGlyph } from "../../astro/computeLunar.js";
import { planarRadius } from "../../astro/projectStereographic.js";
import type { ProjectedBody } from "../../astro/schemas/celestial.schema.js";
import { computeStampGeometry, toCanvas, type StampGeometry } from "./stampGeometry.js";
import {
  circle,
  clipPath,
  createSvgDocument,
  group,
  line,
  polyline,
  rotateTransform,
  type SvgDocument,
  type SvgElement,
} from "./svgDocument.js";

export const HORIZON_CLIP_ID = "horizon_clip";

/**
 * Consecutive ecliptic markers further out than this (altitude below about
 * -62°) break the path instead of being joined across the sky.
 */
export const ECLIPTIC_BREAK_RADIUS = 4;

export type StampRenderOptions = {
  meridian?: boolean;
  cardinalTicks?: boolean;
  /** Emitted as <desc> when given; unused by default. */
  metadata?: string;
};

export type ComposedStamp = {
  document: SvgDocument;
  geometry: StampGeometry;
  /** Bodies actually drawn, in draw order (Moon first). */
  drawn: ProjectedBody[];
  moon: MoonGlyph | null;
  moonAngleDeg: number;
};

function drawFrame(doc: SvgDocument, g: StampGeometry, options: StampRenderOptions): void {
  const { center, radius, point } = g;
  const { primary, secondary } = g.stroke;

  doc.body.push(
    circle(center, center, radius, {
      fill: "none",
      stroke: "black",
      strokeWidth: primary,
      shapeRendering: "geometricPrecision",
    })
  );

  doc.body.push(
    circle(center, center, g.inner_radius, {
      fill: "none",
      stroke: "black",
      strokeWidth: secondary,
      opacity: 0.5,
    })
  );

  // Zenith crosshair
  const zenithLen = point * 0.8;
  doc.body.push(
    line({ x: center - zenithLen, y: center }, { x: center + zenithLen, y: center }, { stroke: "black", strokeWidth: secondary })
  );
  doc.body.push(
    line({ x: center, y: center - zenithLen }, { x: center, y: center + zenithLen }, { stroke: "black", strokeWidth: secondary })
  );

  if (options.meridian ?? true) {
    doc.body.push(
      line(
        { x: center, y: center - radius },
        { x: center, y: center + radius },
        {
          stroke: "black",
          strokeWidth: secondary,
          strokeDasharray: [point * 0.5, point * 2],
          opacity: 0.4,
        }
      )
    );
  }

  if (options.cardinalTicks ?? true) {
    const tickLen = point * 1.5;
    // N, S, E, W as unit directions from the centre
    const directions = [
      { x: 0, y: -1 },
      { x: 0, y: 1 },
      { x: 1, y: 0 },
      { x: -1, y: 0 },
    ];
    for (const d of directions) {
      const outer = { x: center + d.x * radius, y: center + d.y * radius };
      const inner = { x: outer.x - d.x * tickLen, y: outer.y - d.y * tickLen };
      doc.body.push(line(outer, inner, { stroke: "black", strokeWidth: primary }));
    }
  }
}

function eclipticRuns(markers: readonly ProjectedBody[]): ProjectedBody[][] {
  const runs: ProjectedBody[][] = [];
  let current: ProjectedBody[] = [];
  for (const marker of markers) {
    if (planarRadius(marker) <= ECLIPTIC_BREAK_RADIUS) {
      current.push(marker);
    } else if (current.length) {
      runs.push(current);
      current = [];
    }
  }
  if (current.length) runs.push(current);
  return runs.filter((run) => run.length >= 2);
}

function moonElement(g: StampGeometry, moon: ProjectedBody, glyph: MoonGlyph): SvgElement {
  const { x, y } = toCanvas(g, moon);
  return group(
    [["transform", rotateTransform(glyph.angle_deg, x, y)]],
    [
      circle(x, y, glyph.disk_radius, { fill: "black" }),
      // Mask slides away from the Sun (-x in the rotated frame).
      circle(x - glyph.mask_offset, y, glyph.mask_radius, { fill: "white" }),
    ]
  );
}

function sunElements(g: StampGeometry, body: ProjectedBody): SvgElement[] {
  const { x, y } = toCanvas(g, body);
  return [
    circle(x, y, 3.2 * g.point, { fill: "white", stroke: "black", strokeWidth: g.stroke.primary }),
    circle(x, y, 1.0 * g.point, { fill: "black" }),
  ];
}

export function planetRadius(magnitude: number, point: number): number {
  return Math.max(0.8, 1.5 - magnitude * 0.15) * point;
}

export function starRadius(magnitude: number, point: number): number {
  return Math.max(0.2, 0.65 - magnitude * 0.12) * point;
}

/**
 * Bodies inside the horizon disk, dimmest first. Array.prototype.sort is
 * stable, so equal magnitudes keep their input order.
 */
export function selectDrawnBodies(bodies: readonly ProjectedBody[]): ProjectedBody[] {
  return bodies
    .filter((b) => b.category !== "ecliptic" && planarRadius(b) <= 1)
    .sort((a, b) => b.magnitude - a.magnitude);
}

export function composeStamp(
  bodies: readonly ProjectedBody[],
  size: number,
  options: StampRenderOptions = {}
): ComposedStamp {
  const g = computeStampGeometry(size);
  const doc = createSvgDocument(size, options.metadata);

  drawFrame(doc, g, options);

  const sun = bodies.find((b) => b.category === "sun");
  const moonBody = bodies.find((b) => b.category === "moon");
  // Taken from the full body list: the Sun may be below the horizon.
  const moonAngleDeg = moonToSunAngleDeg(sun, moonBody);

  doc.defs.push(clipPath(HORIZON_CLIP_ID, [circle(g.center, g.center, g.clip_radius)]));
  const bodyGroup = group([["clip-path", `url(#${HORIZON_CLIP_ID})`]]);
  doc.body.push(bodyGroup);

  const markers = bodies.filter((b) => b.category === "ecliptic");
  for (const run of eclipticRuns(markers)) {
    bodyGroup.children.push(
      polyline(
        run.map((m) => toCanvas(g, m)),
        {
          fill: "none",
          stroke: "black",
          strokeWidth: g.stroke.secondary,
          strokeDasharray: [g.point, g.point * 2],
          opacity: 0.6,
        }
      )
    );
  }

  const visible = selectDrawnBodies(bodies);
  const drawn: ProjectedBody[] = [];
  let moon: MoonGlyph | null = null;

  const visibleMoon = visible.find((b) => b.category === "moon");
  if (visibleMoon) {
    moon = computeMoonGlyph({
      sun,
      moon: visibleMoon,
      diskRadius: 1.5 * g.point,
      illuminatedFraction: visibleMoon.illuminated_fraction,
    });
    bodyGroup.children.push(moonElement(g, visibleMoon, moon));
    drawn.push(visibleMoon);
  }

  for (const body of visible) {
    if (body.category === "moon") continue;
    const { x, y } = toCanvas(g, body);

    if (body.category === "sun") {
      bodyGroup.children.push(...sunElements(g, body));
    } else if (body.category === "planet") {
      bodyGroup.children.push(
        circle(x, y, planetRadius(body.magnitude, g.point), {
          fill: "white",
          stroke: "black",
          strokeWidth: g.stroke.secondary,
        })
      );
    } else {
      bodyGroup.children.push(circle(x, y, starRadius(body.magnitude, g.point), { fill: "black" }));
    }
    drawn.push(body);
  }

  return { document: doc, geometry: g, drawn, moon, moonAngleDeg };
}
