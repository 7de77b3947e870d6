import assert from "node:assert/strict";
import path from "node:path";
import { test } from "node:test";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

test("falls back to defaults for an empty environment", () => {
  const config = loadConfig({}, "/srv/app");

  assert.equal(config.openai.apiKey, undefined);
  assert.equal(config.openai.model, "gpt-4o-mini");
  assert.deepEqual(config.http, { timeoutMs: 30_000, userAgent: "map-agent-gateway/1.0" });
  assert.equal(config.tripDataFile, path.resolve("/srv/app", "backend/data/trip_history.csv"));
  assert.equal(config.port, 8787);
  assert.equal(config.logLevel, "info");

  assert.deepEqual(config.sources.nominatim, {
    name: "nominatim",
    description: "OpenStreetMap Nominatim geocoding and place lookup",
    baseUrl: "https://nominatim.openstreetmap.org",
    rateLimitDelay: 1,
  });
  assert.equal(config.sources.overpass.baseUrl, "https://overpass-api.de/api/interpreter");
  assert.equal(config.sources.openMeteo.name, "open-meteo");
  assert.equal(config.sources.airQuality.baseUrl, "https://air-quality-api.open-meteo.com/v1");
});

test("server params are frozen", () => {
  const config = loadConfig({}, "/srv/app");
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.sources));
  assert.ok(Object.isFrozen(config.sources.osrm));
});

test("per-source delay overrides the shared delay; blank values count as unset", () => {
  const config = loadConfig(
    {
      API_RATE_LIMIT_DELAY: "0.5",
      NOMINATIM_RATE_LIMIT_DELAY: "2",
      OVERPASS_RATE_LIMIT_DELAY: "",
      OSRM_BASE_URL: "http://localhost:5000/",
      OPENAI_API_KEY: "test-secret",
      OPENAI_MODEL: "  ",
    },
    "/srv/app"
  );

  assert.equal(config.sources.nominatim.rateLimitDelay, 2);
  assert.equal(config.sources.overpass.rateLimitDelay, 0.5);
  assert.equal(config.sources.openMeteo.rateLimitDelay, 0.5);
  assert.equal(config.sources.osrm.baseUrl, "http://localhost:5000");
  assert.equal(config.openai.apiKey, "test-secret");
  assert.equal(config.openai.model, "gpt-4o-mini");
});

test("absolute trip data paths are kept", () => {
  const config = loadConfig({ TRIP_DATA_FILE: "/data/trips.json" }, "/srv/app");
  assert.equal(config.tripDataFile, path.resolve("/data/trips.json"));
});

test("invalid values fail with a ConfigError naming the variable", () => {
  assert.throws(() => loadConfig({ API_RATE_LIMIT_DELAY: "-1" }), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.match(err.message, /^Invalid API_RATE_LIMIT_DELAY: /);
    return true;
  });
  assert.throws(() => loadConfig({ PORT: "abc" }), /^ConfigError: Invalid PORT: /);
  assert.throws(() => loadConfig({ LOG_LEVEL: "loud" }), /Invalid LOG_LEVEL: /);
  assert.throws(() => loadConfig({ NOMINATIM_BASE_URL: "not a url" }), /Invalid NOMINATIM_BASE_URL: /);
});
