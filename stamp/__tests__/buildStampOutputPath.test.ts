import path from "node:path";
import { describe, expect, it } from "vitest";
import { makeInstant } from "../../astro/ephemeris/observationTime.js";
import { buildStampOutputPath, ensureSvgExtension, safeCityName, stampTimestamp } from "../buildStampOutputPath.js";

describe("safeCityName", () => {
  it("keeps letters, digits, spaces, underscores and hyphens", () => {
    expect(safeCityName("New York, NY")).toBe("New_York_NY");
    expect(safeCityName("São Paulo")).toBe("São_Paulo");
    expect(safeCityName("Winston-Salem")).toBe("Winston-Salem");
  });

  it("falls back to Unknown when nothing is left", () => {
    expect(safeCityName("")).toBe("Unknown");
    expect(safeCityName("../")).toBe("Unknown");
  });
});

describe("stampTimestamp", () => {
  it("formats the civil tuple as YYYYMMDD_HHMM", () => {
    expect(stampTimestamp(makeInstant({ year: 2025, month: 3, day: 7, hour: 9, minute: 5, second: 59 }))).toBe(
      "20250307_0905"
    );
    expect(
      stampTimestamp(makeInstant({ year: 12025, month: 12, day: 10, hour: 12, minute: 0, second: 0 }))
    ).toBe("120251210_1200");
  });
});

describe("buildStampOutputPath", () => {
  it("names the file after city and time", () => {
    const instant = makeInstant({ year: 2025, month: 12, day: 10, hour: 12, minute: 0, second: 0 });
    expect(buildStampOutputPath({ outputDir: "/tmp/out", city: "Rome", instant })).toBe(
      path.join("/tmp/out", "cipher_Rome_20251210_1200.svg")
    );
  });
});

describe("ensureSvgExtension", () => {
  it("appends .svg only when missing", () => {
    expect(ensureSvgExtension("stamp")).toBe("stamp.svg");
    expect(ensureSvgExtension("stamp.svg")).toBe("stamp.svg");
  });
});
