import { describe, expect, it } from "vitest";
import { FakeEphemerisOracle, TEST_INSTANT } from "../../astro/__tests__/testHelpers.js";
import type { CelestialSample } from "../../astro/schemas/celestial.schema.js";
import { renderStamp } from "../renderStamp.js";

const SAMPLES: CelestialSample[] = [
  { name: "Overhead", category: "star", ra_hours: 0, dec_deg: 0, magnitude: 1 },
  { name: "Underfoot", category: "star", ra_hours: 12, dec_deg: 0, magnitude: 1 },
  { name: "Sun", category: "sun", ra_hours: 12, dec_deg: 0, magnitude: -26.7 },
  { name: "Moon", category: "moon", ra_hours: 1, dec_deg: 10, magnitude: -12 },
];

describe("renderStamp", () => {
  it("projects, filters and renders in one pass", () => {
    const result = renderStamp({
      samples: SAMPLES,
      observer: { latitude: 0, longitude: 0 },
      instant: TEST_INSTANT,
      size: 472,
      oracle: new FakeEphemerisOracle({ moonFraction: 0.25 }),
    });

    // Underfoot star is gone; the Sun survives projection but is not drawn
    expect(result.projected.map((b) => b.name)).toEqual(["Overhead", "Sun", "Moon"]);
    expect(result.drawn.map((b) => b.name)).toEqual(["Moon", "Overhead"]);
    expect(result.moon?.illuminated_fraction).toBe(0.25);
    expect(Number.isFinite(result.moonAngleDeg)).toBe(true);
    expect(result.svg.startsWith('<?xml version="1.0" encoding="utf-8" ?>\n<svg ')).toBe(true);
    expect(result.svg.endsWith("</svg>\n")).toBe(true);
  });

  it("produces identical bytes for identical inputs", () => {
    const input = {
      samples: SAMPLES,
      observer: { latitude: 41.9, longitude: 12.5 },
      instant: TEST_INSTANT,
      size: 354,
      oracle: new FakeEphemerisOracle({ gmstHours: 3.2, moonFraction: 0.6 }),
    };
    expect(renderStamp(input).svg).toBe(renderStamp(input).svg);
  });
});
