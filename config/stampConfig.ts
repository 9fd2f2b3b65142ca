import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_STAMP_SIZE } from "../stamp/render/stampGeometry.js";

/**
 * Runtime configuration from the environment (loaded via dotenv by the
 * entry points). Only defaults live here; CLI flags override them.
 */

const StampEnvSchema = z.object({
  STAR_CIPHER_SIZE: z.coerce.number().int().min(64).max(20000).default(DEFAULT_STAMP_SIZE),
  STAR_CIPHER_OUTPUT_DIR: z.string().min(1).default("~/Desktop"),
  STAR_CIPHER_GEOLOCATION_URL: z.string().url().default("http://ip-api.com/json"),
  STAR_CIPHER_GEOLOCATION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  STAR_CIPHER_CATALOG_PATH: z.string().min(1).optional(),
});

export type StampConfig = {
  size: number;
  outputDir: string;
  geolocationUrl: string;
  geolocationTimeoutMs: number;
  catalogPath?: string;
};

export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return path.join(home, p.slice(2));
  return p;
}

function emptyToUndefined(env: Record<string, string | undefined>): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    out[key] = value === undefined || value.trim() === "" ? undefined : value;
  }
  return out;
}

export function loadStampConfig(env: Record<string, string | undefined> = process.env): StampConfig {
  const result = StampEnvSchema.safeParse(emptyToUndefined(env));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid star-cipher configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    size: parsed.STAR_CIPHER_SIZE,
    outputDir: expandHome(parsed.STAR_CIPHER_OUTPUT_DIR),
    geolocationUrl: parsed.STAR_CIPHER_GEOLOCATION_URL,
    geolocationTimeoutMs: parsed.STAR_CIPHER_GEOLOCATION_TIMEOUT_MS,
    catalogPath: parsed.STAR_CIPHER_CATALOG_PATH ? expandHome(parsed.STAR_CIPHER_CATALOG_PATH) : undefined,
  };
}
