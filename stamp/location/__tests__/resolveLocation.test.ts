import { describe, expect, it, vi } from "vitest";
import { collectingLogger } from "../../../astro/__tests__/testHelpers.js";
import { FALLBACK_LOCATION, resolveLocation } from "../resolveLocation.js";

const GEO_URL = "http://geo.test/json";

function respondWith(body: unknown, init: { ok?: boolean; status?: number } = {}) {
  return vi.fn(async (_url: string, _init?: { signal?: AbortSignal }) => ({
    ok: init.ok ?? true,
    status: init.status ?? 200,
    json: async () => body,
  }));
}

describe("resolveLocation", () => {
  it("returns the geolocated position and city", async () => {
    const { logger, entries } = collectingLogger();
    const fetchImpl = respondWith({ status: "success", lat: 48.8566, lon: 2.3522, city: "Paris" });

    const location = await resolveLocation({ url: GEO_URL, timeoutMs: 1000, fetchImpl, logger });

    expect(location).toEqual({ latitude: 48.8566, longitude: 2.3522, city: "Paris", source: "ip-geolocation" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(GEO_URL);
    expect(entries).toEqual([
      { event: "stamp.location.resolved", latitude: 48.8566, longitude: 2.3522, city: "Paris" },
    ]);
  });

  it("falls back when the service reports failure", async () => {
    const { logger, entries } = collectingLogger();
    const location = await resolveLocation({
      url: GEO_URL,
      timeoutMs: 1000,
      fetchImpl: respondWith({ status: "fail", message: "private range" }),
      logger,
    });

    expect(location).toBe(FALLBACK_LOCATION);
    expect(entries).toEqual([
      {
        event: "stamp.location.fallback",
        city: "Rome",
        error_message: "geolocation lookup failed: private range",
      },
    ]);
  });

  it("falls back on an HTTP error", async () => {
    const { logger, entries } = collectingLogger();
    const location = await resolveLocation({
      url: GEO_URL,
      timeoutMs: 1000,
      fetchImpl: respondWith({}, { ok: false, status: 503 }),
      logger,
    });

    expect(location.source).toBe("fallback");
    expect(entries[0]?.error_message).toBe("geolocation request failed (503)");
  });

  it("falls back on a malformed body or a network error", async () => {
    const { logger } = collectingLogger();
    const malformed = await resolveLocation({
      url: GEO_URL,
      timeoutMs: 1000,
      fetchImpl: respondWith({ status: "success", lat: "north" }),
      logger,
    });
    expect(malformed).toBe(FALLBACK_LOCATION);

    const offline = await resolveLocation({
      url: GEO_URL,
      timeoutMs: 1000,
      fetchImpl: vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
      logger,
    });
    expect(offline).toBe(FALLBACK_LOCATION);
  });
});
