/**
 * bootstrap.ts
 *
 * Purpose:
 * - Shared startup for the HTTP server and the terminal loop: .env → AppConfig →
 *   log level → trip dataset → gateway, plus an agent factory when an OpenAI key is set.
 *
 * Env:
 * - see config.ts
 */

import OpenAI from "openai";
import { configDotenv } from "dotenv";
import { createMapAgent, openAICompletion, type MapAgent } from "./agent/agent";
import { loadConfig, type AppConfig } from "./config";
import { createGateway, type Gateway } from "./gateway";
import { logEvent, setLogLevel } from "./logger";
import { loadTrips } from "./tools/trips";

export type Runtime = {
  config: AppConfig;
  gateway: Gateway;
  /** Undefined when OPENAI_API_KEY is not configured. */
  newAgent?: () => MapAgent;
};

export function bootstrap(): Runtime {
  configDotenv();
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const trips = loadTrips(config.tripDataFile);
  logEvent("info", "trips_loaded", { file: config.tripDataFile, count: trips.length });

  const gateway = createGateway(config, { trips });

  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    logEvent("warn", "openai_not_configured", { hint: "set OPENAI_API_KEY to enable chat" });
    return { config, gateway };
  }

  const openai = new OpenAI({ apiKey, baseURL: config.openai.baseUrl });
  const complete = openAICompletion(openai);
  return {
    config,
    gateway,
    newAgent: () => createMapAgent({ complete, model: config.openai.model, registry: gateway.registry }),
  };
}
