/**
 * Structured logging for stamp pipeline events.
 *
 * Emits one JSON object per line on stdout.
 */

export type StampLogEvent =
  | "stamp.catalog.loaded"
  | "stamp.render.started"
  | "stamp.render.succeeded"
  | "stamp.render.failed"
  | "stamp.body.dropped"
  | "stamp.location.resolved"
  | "stamp.location.fallback";

export type StampLogData = {
  event: StampLogEvent;
  instant?: string;
  latitude?: number;
  longitude?: number;
  body?: string;
  stage?: string;
  output_path?: string;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown; // Allow additional fields
};

export type StampLogger = (data: StampLogData) => void;

export function stampLog(data: StampLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

/**
 * Convenience helpers for common events, bound to a logger so tests can
 * collect entries instead of printing them.
 */
export function createStampLogHelpers(log: StampLogger = stampLog) {
  return {
    catalogLoaded(params: { source: string; star_count: number }): void {
      log({
        event: "stamp.catalog.loaded",
        source: params.source,
        star_count: params.star_count,
      });
    },

    renderStarted(params: { instant: string; latitude: number; longitude: number; size: number }): void {
      log({
        event: "stamp.render.started",
        instant: params.instant,
        latitude: params.latitude,
        longitude: params.longitude,
        size: params.size,
      });
    },

    renderSucceeded(params: {
      instant: string;
      output_path: string;
      projected_count: number;
      drawn_count: number;
    }): void {
      log({
        event: "stamp.render.succeeded",
        instant: params.instant,
        output_path: params.output_path,
        projected_count: params.projected_count,
        drawn_count: params.drawn_count,
      });
    },

    renderFailed(params: { instant: string; error_code: string; error_message: string }): void {
      log({
        event: "stamp.render.failed",
        instant: params.instant,
        error_code: params.error_code,
        error_message: params.error_message,
      });
    },

    bodyDropped(params: { body: string; stage: string; error_message: string }): void {
      log({
        event: "stamp.body.dropped",
        body: params.body,
        stage: params.stage,
        error_message: params.error_message,
      });
    },

    locationResolved(params: { latitude: number; longitude: number; city: string }): void {
      log({
        event: "stamp.location.resolved",
        latitude: params.latitude,
        longitude: params.longitude,
        city: params.city,
      });
    },

    locationFallback(params: { city: string; error_message: string }): void {
      log({
        event: "stamp.location.fallback",
        city: params.city,
        error_message: params.error_message,
      });
    },
  };
}
