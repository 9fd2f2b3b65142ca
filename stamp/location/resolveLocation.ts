import { z } from "zod";
import { createStampLogHelpers, type StampLogger } from "../../logging/stampLog.js";

export type ResolvedLocation = {
  latitude: number;
  longitude: number;
  city: string;
  source: "ip-geolocation" | "fallback";
};

export const FALLBACK_LOCATION: ResolvedLocation = {
  latitude: 41.9028,
  longitude: 12.4964,
  city: "Rome",
  source: "fallback",
};

const IpApiResponseSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    city: z.string().default("Unknown"),
  }),
  z.object({
    status: z.literal("fail"),
    message: z.string().optional(),
  }),
]);

type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

async function lookup(url: string, timeoutMs: number, fetchImpl: FetchLike): Promise<ResolvedLocation> {
  const res = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  if (!res.ok) {
    throw new Error(`geolocation request failed (${res.status})`);
  }

  const parsed = IpApiResponseSchema.safeParse(await res.json());
  if (!parsed.success) {
    throw new Error(`unexpected geolocation response: ${parsed.error.message}`);
  }
  if (parsed.data.status === "fail") {
    throw new Error(`geolocation lookup failed: ${parsed.data.message ?? "no reason given"}`);
  }

  return {
    latitude: parsed.data.lat,
    longitude: parsed.data.lon,
    city: parsed.data.city,
    source: "ip-geolocation",
  };
}

/**
 * Approximate the observer's position from their IP address.
 *
 * Never throws: any failure is logged and the fixed fallback is returned.
 */
export async function resolveLocation(params: {
  url: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
  logger?: StampLogger;
}): Promise<ResolvedLocation> {
  const logs = createStampLogHelpers(params.logger);
  try {
    const location = await lookup(params.url, params.timeoutMs, params.fetchImpl ?? fetch);
    logs.locationResolved({
      latitude: location.latitude,
      longitude: location.longitude,
      city: location.city,
    });
    return location;
  } catch (err) {
    logs.locationFallback({
      city: FALLBACK_LOCATION.city,
      error_message: err instanceof Error ? err.message : String(err),
    });
    return FALLBACK_LOCATION;
  }
}
