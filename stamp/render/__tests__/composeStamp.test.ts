import { describe, expect, it } from "vitest";
import { projectedBody } from "../../../astro/__tests__/testHelpers.js";
import type { ProjectedBody } from "../../../astro/schemas/celestial.schema.js";
import { composeStamp, planetRadius, selectDrawnBodies, starRadius } from "../composeStamp.js";
import { serializeSvg } from "../svgDocument.js";

const FRAME_472 = [
  '<circle cx="236" cy="236" r="235.375" fill="none" stroke="black" stroke-width="1.25" shape-rendering="geometricPrecision"/>',
  '<circle cx="236" cy="236" r="164.7625" fill="none" stroke="black" stroke-width="0.625" opacity="0.5"/>',
  '<line x1="232.6667" y1="236" x2="239.3333" y2="236" stroke="black" stroke-width="0.625"/>',
  '<line x1="236" y1="232.6667" x2="236" y2="239.3333" stroke="black" stroke-width="0.625"/>',
  '<line x1="236" y1="0.625" x2="236" y2="471.375" stroke="black" stroke-width="0.625" stroke-dasharray="2.0833,8.3333" opacity="0.4"/>',
  '<line x1="236" y1="0.625" x2="236" y2="6.875" stroke="black" stroke-width="1.25"/>',
  '<line x1="236" y1="471.375" x2="236" y2="465.125" stroke="black" stroke-width="1.25"/>',
  '<line x1="471.375" y1="236" x2="465.125" y2="236" stroke="black" stroke-width="1.25"/>',
  '<line x1="0.625" y1="236" x2="6.875" y2="236" stroke="black" stroke-width="1.25"/>',
].join("");

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

function star(name: string, magnitude: number, x: number, y: number): ProjectedBody {
  return projectedBody({ name, category: "star", magnitude, x, y });
}

describe("composeStamp", () => {
  it("draws only the frame for an empty sky", () => {
    const { document, drawn, moon, moonAngleDeg } = composeStamp([], 472);

    expect(serializeSvg(document)).toBe(
      '<?xml version="1.0" encoding="utf-8" ?>\n' +
        '<svg xmlns="http://www.w3.org/2000/svg" version="1.1" width="472" height="472" viewBox="0 0 472 472">' +
        '<defs><clipPath id="horizon_clip"><circle cx="236" cy="236" r="234.75"/></clipPath></defs>' +
        FRAME_472 +
        '<g clip-path="url(#horizon_clip)"/>' +
        "</svg>\n"
    );
    expect(drawn).toEqual([]);
    expect(moon).toBeNull();
    expect(moonAngleDeg).toBe(0);
  });

  it("draws the Moon first, then bodies dimmest to brightest", () => {
    const bodies = [
      projectedBody({ name: "Moon", category: "moon", magnitude: -12, illuminated_fraction: 0.5 }),
      projectedBody({ name: "Sun", category: "sun", magnitude: -26.7, x: 0.5 }),
      star("Bright", 0, 0, 0.5),
      star("Dim", 5, -0.5, 0),
      projectedBody({ name: "Venus", category: "planet", magnitude: -4, y: -0.5 }),
      star("Outside", 1, 0.9, 0.9),
      star("Edge", 5, 1, 0),
    ];

    const { document, drawn, moon, moonAngleDeg } = composeStamp(bodies, 472);

    expect(drawn.map((b) => b.name)).toEqual(["Moon", "Dim", "Edge", "Bright", "Venus", "Sun"]);
    expect(moonAngleDeg).toBe(0);
    expect(moon?.mask_offset).toBeCloseTo(7.8125, 9);

    expect(serializeSvg(document)).toContain(
      '<g clip-path="url(#horizon_clip)">' +
        '<g transform="rotate(0,236,236)">' +
        '<circle cx="236" cy="236" r="6.25" fill="black"/>' +
        '<circle cx="228.1875" cy="236" r="6.5625" fill="white"/>' +
        "</g>" +
        '<circle cx="118.3125" cy="236" r="0.8333" fill="black"/>' +
        '<circle cx="471.375" cy="236" r="0.8333" fill="black"/>' +
        '<circle cx="236" cy="353.6875" r="2.7083" fill="black"/>' +
        '<circle cx="236" cy="118.3125" r="8.75" fill="white" stroke="black" stroke-width="0.625"/>' +
        '<circle cx="353.6875" cy="236" r="13.3333" fill="white" stroke="black" stroke-width="1.25"/>' +
        '<circle cx="353.6875" cy="236" r="4.1667" fill="black"/>' +
        "</g>"
    );
  });

  it("orients the Moon toward a Sun below the horizon without drawing the Sun", () => {
    const bodies = [
      projectedBody({ name: "Sun", category: "sun", magnitude: -26.7, x: 0, y: 3 }),
      projectedBody({ name: "Moon", category: "moon", magnitude: -12, x: 0, y: 0.5, illuminated_fraction: 0.2 }),
    ];

    const { drawn, moon, moonAngleDeg } = composeStamp(bodies, 472);

    expect(drawn.map((b) => b.name)).toEqual(["Moon"]);
    expect(moonAngleDeg).toBeCloseTo(90, 10);
    expect(moon?.angle_deg).toBeCloseTo(90, 10);
  });

  it("skips the Moon glyph when the Moon is off the disk", () => {
    const bodies = [
      projectedBody({ name: "Sun", category: "sun", magnitude: -26.7, x: 0.5, y: 0 }),
      projectedBody({ name: "Moon", category: "moon", magnitude: -12, x: 2, y: 0 }),
    ];

    const { document, drawn, moon, moonAngleDeg } = composeStamp(bodies, 472);

    expect(moon).toBeNull();
    expect(drawn.map((b) => b.name)).toEqual(["Sun"]);
    expect(moonAngleDeg).toBeCloseTo(180, 10);
    expect(serializeSvg(document)).not.toContain("transform=");
  });

  it("joins ecliptic markers in order and breaks the path far below the horizon", () => {
    const marker = (i: number, x: number, y: number) =>
      projectedBody({ name: `ecliptic-${i}`, category: "ecliptic", magnitude: 99, x, y });
    const bodies = [
      marker(0, 0, 0),
      marker(1, 0.5, 0),
      marker(2, 5, 0),
      marker(3, 0, 0.5),
      marker(4, 0, -0.5),
      marker(5, 4.5, 0),
      marker(6, 0.2, 0),
    ];

    const { document, drawn } = composeStamp(bodies, 472);
    const svg = serializeSvg(document);

    expect(drawn).toEqual([]);
    expect(count(svg, "<polyline")).toBe(2);
    expect(svg).toContain(
      '<polyline points="236,236 353.6875,236" fill="none" stroke="black" stroke-width="0.625" stroke-dasharray="4.1667,8.3333" opacity="0.6"/>' +
        '<polyline points="236,353.6875 236,118.3125" fill="none" stroke="black" stroke-width="0.625" stroke-dasharray="4.1667,8.3333" opacity="0.6"/>'
    );
  });

  it("omits the meridian and cardinal ticks on request", () => {
    expect(count(serializeSvg(composeStamp([], 472).document), "<line")).toBe(7);
    expect(count(serializeSvg(composeStamp([], 472, { meridian: false }).document), "<line")).toBe(6);
    expect(count(serializeSvg(composeStamp([], 472, { cardinalTicks: false }).document), "<line")).toBe(3);
  });

  it("emits metadata as a description", () => {
    const svg = serializeSvg(composeStamp([], 472, { metadata: "2025-12-10T12:00:00Z 41.9,12.5" }).document);
    expect(svg).toContain('viewBox="0 0 472 472"><desc>2025-12-10T12:00:00Z 41.9,12.5</desc><defs>');
  });

  it("is deterministic", () => {
    const bodies = [star("A", 1, 0.1, 0.2), star("B", 2, -0.3, 0.4)];
    expect(serializeSvg(composeStamp(bodies, 354).document)).toBe(
      serializeSvg(composeStamp(bodies, 354).document)
    );
  });
});

describe("selectDrawnBodies", () => {
  it("keeps input order for equal magnitudes and ignores ecliptic markers", () => {
    const bodies = [
      star("First", 2, 0, 0),
      projectedBody({ name: "ecliptic-000", category: "ecliptic", magnitude: 99 }),
      star("Second", 2, 0.1, 0),
      star("Third", 3, 0.2, 0),
    ];
    expect(selectDrawnBodies(bodies).map((b) => b.name)).toEqual(["Third", "First", "Second"]);
  });
});

describe("glyph sizes", () => {
  it("grows with brightness and bottoms out at a floor", () => {
    expect(starRadius(0, 1)).toBeCloseTo(0.65, 12);
    expect(starRadius(6, 1)).toBe(0.2);
    expect(planetRadius(-4, 1)).toBeCloseTo(2.1, 12);
    expect(planetRadius(6, 1)).toBe(0.8);
  });
});
