/**
 * config.ts
 *
 * Purpose:
 * - Resolve every environment setting once, at process start, into a frozen AppConfig.
 *   Nothing downstream reads process.env afterwards.
 *
 * Env:
 * - OPENAI_API_KEY / OPENAI_MODEL / OPENAI_BASE_URL: language model collaborator
 * - API_RATE_LIMIT_DELAY: seconds between two calls to the same source (default 1.0)
 * - <SOURCE>_RATE_LIMIT_DELAY: per-source override of the delay above
 * - <SOURCE>_BASE_URL / OVERPASS_URL: endpoint overrides
 * - HTTP_TIMEOUT_MS, USER_AGENT, TRIP_DATA_FILE, PORT, LOG_LEVEL
 */

import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { LogLevel } from "./logger";
import type { ServerParams } from "./types";

export type SourceKey = "nominatim" | "osrm" | "overpass" | "openMeteo" | "airQuality";

export type AppConfig = Readonly<{
  openai: Readonly<{ apiKey?: string; model: string; baseUrl?: string }>;
  sources: Readonly<Record<SourceKey, ServerParams>>;
  http: Readonly<{ timeoutMs: number; userAgent: string }>;
  tripDataFile: string;
  port: number;
  logLevel: LogLevel | "silent";
}>;

// Blank variables (FOO=) count as unset.
const unsetIfBlank = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const seconds = z.coerce.number().finite().nonnegative();
const delay = z.preprocess(unsetIfBlank, seconds.optional());
const url = (fallback: string) => z.preprocess(unsetIfBlank, z.string().url().default(fallback));

const EnvSchema = z.object({
  OPENAI_API_KEY: z.preprocess(unsetIfBlank, z.string().optional()),
  OPENAI_MODEL: z.preprocess(unsetIfBlank, z.string().default("gpt-4o-mini")),
  OPENAI_BASE_URL: z.preprocess(unsetIfBlank, z.string().url().optional()),

  API_RATE_LIMIT_DELAY: z.preprocess(unsetIfBlank, seconds.default(1)),
  NOMINATIM_RATE_LIMIT_DELAY: delay,
  OSRM_RATE_LIMIT_DELAY: delay,
  OVERPASS_RATE_LIMIT_DELAY: delay,
  OPEN_METEO_RATE_LIMIT_DELAY: delay,
  AIR_QUALITY_RATE_LIMIT_DELAY: delay,

  NOMINATIM_BASE_URL: url("https://nominatim.openstreetmap.org"),
  OSRM_BASE_URL: url("https://router.project-osrm.org"),
  OVERPASS_URL: url("https://overpass-api.de/api/interpreter"),
  OPEN_METEO_BASE_URL: url("https://api.open-meteo.com/v1"),
  AIR_QUALITY_BASE_URL: url("https://air-quality-api.open-meteo.com/v1"),

  HTTP_TIMEOUT_MS: z.preprocess(unsetIfBlank, z.coerce.number().int().positive().default(30_000)),
  USER_AGENT: z.preprocess(unsetIfBlank, z.string().default("map-agent-gateway/1.0")),
  TRIP_DATA_FILE: z.preprocess(unsetIfBlank, z.string().default("backend/data/trip_history.csv")),
  PORT: z.preprocess(unsetIfBlank, z.coerce.number().int().min(1).max(65_535).default(8787)),
  LOG_LEVEL: z.preprocess(
    unsetIfBlank,
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  ),
});

function source(name: string, description: string, baseUrl: string, rateLimitDelay: number): ServerParams {
  return Object.freeze({ name, description, baseUrl: baseUrl.replace(/\/+$/, ""), rateLimitDelay });
}

/**
 * Build the application config from an environment map.
 * Throws ConfigError naming the first offending variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join(".") || "environment";
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? "unreadable value"}`);
  }
  const e = parsed.data;
  const shared = e.API_RATE_LIMIT_DELAY;

  return Object.freeze({
    openai: Object.freeze({
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      baseUrl: e.OPENAI_BASE_URL,
    }),
    sources: Object.freeze({
      nominatim: source(
        "nominatim",
        "OpenStreetMap Nominatim geocoding and place lookup",
        e.NOMINATIM_BASE_URL,
        e.NOMINATIM_RATE_LIMIT_DELAY ?? shared
      ),
      osrm: source("osrm", "OSRM route planner", e.OSRM_BASE_URL, e.OSRM_RATE_LIMIT_DELAY ?? shared),
      overpass: source(
        "overpass",
        "Overpass API point-of-interest search",
        e.OVERPASS_URL,
        e.OVERPASS_RATE_LIMIT_DELAY ?? shared
      ),
      openMeteo: source(
        "open-meteo",
        "Open-Meteo forecast, daily sun times",
        e.OPEN_METEO_BASE_URL,
        e.OPEN_METEO_RATE_LIMIT_DELAY ?? shared
      ),
      airQuality: source(
        "open-meteo-air-quality",
        "Open-Meteo air quality",
        e.AIR_QUALITY_BASE_URL,
        e.AIR_QUALITY_RATE_LIMIT_DELAY ?? shared
      ),
    }),
    http: Object.freeze({ timeoutMs: e.HTTP_TIMEOUT_MS, userAgent: e.USER_AGENT }),
    tripDataFile: path.resolve(cwd, e.TRIP_DATA_FILE),
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
  });
}
