/**
 * gateway.ts
 *
 * Purpose:
 * - Wire resolved config into the running gateway: one RateLimitedFetcher per source,
 *   the three operation sets on top of them, and the tool registry over all of it.
 */

import type { AxiosInstance } from "axios";
import type { AppConfig, SourceKey } from "./config";
import { createToolRegistry } from "./agent/tools";
import type { ToolRegistry } from "./agent/registry";
import { createCoreMap, type CoreMap } from "./tools/coreMap";
import { RateLimitedFetcher } from "./tools/fetcher";
import { createHistory, type History } from "./tools/history";
import type { Trip } from "./tools/trips";
import { createWeather, type Weather } from "./tools/weather";

export type GatewayDeps = {
  /** Shared HTTP client; tests pass one with an in-process adapter. */
  client?: AxiosInstance;
  trips?: readonly Trip[];
  now?: () => Date;
};

export type Gateway = {
  fetchers: Readonly<Record<SourceKey, RateLimitedFetcher>>;
  core: CoreMap;
  history: History;
  weather: Weather;
  registry: ToolRegistry;
};

export function createGateway(config: AppConfig, deps: GatewayDeps = {}): Gateway {
  const fetcher = (key: SourceKey) =>
    new RateLimitedFetcher(config.sources[key], {
      client: deps.client,
      timeoutMs: config.http.timeoutMs,
      userAgent: config.http.userAgent,
    });

  const fetchers = Object.freeze({
    nominatim: fetcher("nominatim"),
    osrm: fetcher("osrm"),
    overpass: fetcher("overpass"),
    openMeteo: fetcher("openMeteo"),
    airQuality: fetcher("airQuality"),
  });

  const core = createCoreMap({
    nominatim: fetchers.nominatim,
    osrm: fetchers.osrm,
    overpass: fetchers.overpass,
  });
  const history = createHistory(deps.trips ?? []);
  const weather = createWeather({ forecast: fetchers.openMeteo, airQuality: fetchers.airQuality, now: deps.now });

  return { fetchers, core, history, weather, registry: createToolRegistry({ core, history, weather }) };
}
