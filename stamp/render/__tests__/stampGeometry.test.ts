import { describe, expect, it } from "vitest";
import { ONE_POINT_PX, computeStampGeometry, toCanvas } from "../stampGeometry.js";

describe("computeStampGeometry", () => {
  it("uses unscaled strokes at the reference size", () => {
    const g = computeStampGeometry(472);
    expect(g.scale).toBe(1);
    expect(g.center).toBe(236);
    expect(g.point).toBeCloseTo(ONE_POINT_PX, 12);
    expect(g.stroke.primary).toBeCloseTo(1.25, 12);
    expect(g.stroke.secondary).toBeCloseTo(0.625, 12);
    expect(g.radius).toBeCloseTo(235.375, 12);
    expect(g.inner_radius).toBeCloseTo(164.7625, 12);
    expect(g.clip_radius).toBeCloseTo(234.75, 12);
  });

  it("keeps the ring's outer edge on the canvas edge at any size", () => {
    for (const size of [64, 354, 1000]) {
      const g = computeStampGeometry(size);
      expect(g.radius + g.border_width / 2).toBeCloseTo(size / 2, 12);
    }
  });

  it("scales strokes with the default stamp size", () => {
    const g = computeStampGeometry(354);
    expect(g.scale).toBe(0.75);
    expect(g.point).toBeCloseTo(3.125, 12);
    expect(g.stroke.primary).toBeCloseTo(0.9375, 12);
  });

  it("rejects non-positive sizes", () => {
    expect(() => computeStampGeometry(0)).toThrow(/positive/);
    expect(() => computeStampGeometry(Number.NaN)).toThrow(/positive/);
  });
});

describe("toCanvas", () => {
  it("maps the unit disk onto the horizon ring", () => {
    const g = computeStampGeometry(472);
    expect(toCanvas(g, { x: 0, y: 0 })).toEqual({ x: 236, y: 236 });
    const south = toCanvas(g, { x: 0, y: 1 });
    expect(south.x).toBe(236);
    expect(south.y).toBeCloseTo(471.375, 12);
  });
});
