import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { RateLimitedFetcher } from "../src/tools/fetcher";
import { setLogLevel } from "../src/logger";
import type { ServerParams } from "../src/types";

// Keep test output readable; tests that care about logging turn it back on.
setLogLevel("silent");

export type RecordedCall = {
  baseURL: string | undefined;
  url: string;
  method: string;
  params: Record<string, unknown>;
  data: unknown;
  headers: Record<string, unknown>;
  /** performance.now() when the adapter saw the request. */
  at: number;
};

export type StubReply = { status?: number; statusText?: string; data?: unknown } | Error;
export type StubHandler = (call: RecordedCall) => StubReply | Promise<StubReply>;

/** An axios instance whose requests never leave the process. */
export function stubClient(handler: StubHandler): { client: AxiosInstance; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const call: RecordedCall = {
      baseURL: config.baseURL,
      url: config.url ?? "",
      method: (config.method ?? "get").toUpperCase(),
      params: config.params ?? {},
      data: config.data,
      headers: config.headers.toJSON(),
      at: performance.now(),
    };
    calls.push(call);
    const reply = await handler(call);
    if (reply instanceof Error) throw reply;
    return {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: reply.statusText ?? "OK",
      headers: {},
      config,
    };
  };
  return { client: axios.create({ adapter }), calls };
}

export function params(name: string, rateLimitDelay = 0, baseUrl = `https://${name}.test`): ServerParams {
  return Object.freeze({ name, description: `${name} stand-in`, baseUrl, rateLimitDelay });
}

export function fetcherFor(name: string, client: AxiosInstance, rateLimitDelay = 0): RateLimitedFetcher {
  return new RateLimitedFetcher(params(name, rateLimitDelay), { client, timeoutMs: 1000, userAgent: "test-agent" });
}

/** Route stub replies by request path prefix. */
export function byPath(routes: Record<string, StubReply>): StubHandler {
  return (call) => {
    const hit = Object.keys(routes).find((prefix) => call.url.startsWith(prefix));
    return hit === undefined ? { status: 404, statusText: "Not Found", data: {} } : routes[hit] ?? {};
  };
}
