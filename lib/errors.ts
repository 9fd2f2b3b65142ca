/**
 * Stamp pipeline error model.
 *
 * - DataError: the star catalog is malformed (fatal, no partial catalog)
 * - ComputationError: the ephemeris returned nothing usable for a body or stage
 * - GeometryError: degenerate projection input (clamped locally, never thrown by the projector)
 * - OutputError: the stamp could not be persisted (fatal, no retry)
 */

export type ComputationStage =
  | "sidereal_time"
  | "rotation"
  | "equatorial"
  | "illumination"
  | "ecliptic"
  | "horizontal";

export class DataError extends Error {
  constructor(
    message: string,
    public source: string,
    public line?: number,
    options?: { cause?: unknown }
  ) {
    super(line === undefined ? `${source}: ${message}` : `${source}:${line}: ${message}`, options);
    this.name = "DataError";
  }
}

export class ComputationError extends Error {
  constructor(
    message: string,
    public stage: ComputationStage,
    public body?: string,
    options?: { cause?: unknown }
  ) {
    super(body ? `[${stage}] ${body}: ${message}` : `[${stage}] ${message}`, options);
    this.name = "ComputationError";
  }
}

export class GeometryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeometryError";
  }
}

export class OutputError extends Error {
  constructor(message: string, public path: string, options?: { cause?: unknown }) {
    super(`Failed to write stamp to ${path}: ${message}`, options);
    this.name = "OutputError";
  }
}

export type StampErrorClass =
  | "data_error"
  | "computation_error"
  | "geometry_error"
  | "output_error"
  | "unexpected_error";

export function classifyStampError(e: unknown): { errorClass: StampErrorClass; message: string } {
  const message = e instanceof Error ? e.message : String(e);

  if (e instanceof DataError) return { errorClass: "data_error", message };
  if (e instanceof ComputationError) return { errorClass: "computation_error", message };
  if (e instanceof GeometryError) return { errorClass: "geometry_error", message };
  if (e instanceof OutputError) return { errorClass: "output_error", message };

  return { errorClass: "unexpected_error", message };
}
