/**
 * fetcher.ts
 *
 * Purpose:
 * - One RateLimitedFetcher per external source. Every outbound call goes through it.
 * - Enforces the source's minimum spacing between calls and turns transport faults,
 *   non-2xx replies and payloads of the wrong shape into a Failure envelope.
 *
 * Pacing:
 * - Waiting callers queue up per source; each one sleeps (timer promise) until
 *   `rateLimitDelay` seconds have passed since the previous call was dispatched or settled.
 * - The last-call stamp is written on dispatch and again in `finally`, so failed or
 *   abandoned calls still count.
 */

import { setTimeout as sleep } from "node:timers/promises";
import axios, { type AxiosInstance } from "axios";
import type { z } from "zod";
import { TransportError, describeError, describeIssue } from "../errors";
import { logEvent } from "../logger";
import { fail, ok, type Envelope, type Failure, type ServerParams } from "../types";

export type QueryValue = string | number | boolean | undefined;

export type RequestSpec = {
  /** Appended to the source's base URL. */
  path?: string;
  method?: "GET" | "POST";
  params?: Record<string, QueryValue>;
  /** Sent as an application/x-www-form-urlencoded body (POST). */
  form?: Record<string, string>;
};

export type FetcherOptions = {
  client?: AxiosInstance;
  timeoutMs?: number;
  userAgent?: string;
};

export class RateLimitedFetcher {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  // RateState
  private lastCallAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly params: ServerParams,
    options: FetcherOptions = {}
  ) {
    this.client = options.client ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.userAgent = options.userAgent ?? "map-agent-gateway/1.0";
  }

  get name() {
    return this.params.name;
  }

  /** Issue one request and validate its JSON payload against `schema`. Never throws. */
  async fetch<S extends z.ZodTypeAny>(request: RequestSpec, schema: S): Promise<Envelope<z.output<S>>> {
    await this.acquireSlot();
    const started = performance.now();
    const path = request.path ?? "";

    try {
      const res = await this.client.request<unknown>({
        baseURL: this.params.baseUrl,
        url: path,
        method: request.method ?? "GET",
        params: request.params,
        data: request.form ? new URLSearchParams(request.form).toString() : undefined,
        headers: {
          Accept: "application/json",
          "User-Agent": this.userAgent,
          ...(request.form ? { "Content-Type": "application/x-www-form-urlencoded" } : {}),
        },
        timeout: this.timeoutMs,
        // Status handling is ours, not axios'.
        validateStatus: () => true,
      });

      logEvent("debug", "source_call", {
        source: this.name,
        path,
        status: res.status,
        ms: Math.round(performance.now() - started),
      });

      if (res.status < 200 || res.status >= 300) {
        const reason = res.statusText ? `HTTP ${res.status} ${res.statusText}` : `HTTP ${res.status}`;
        return this.reject(reason);
      }

      const parsed = schema.safeParse(res.data);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return this.reject(`malformed response: ${issue ? describeIssue(issue) : "unexpected payload"}`);
      }
      return ok(parsed.data);
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")) {
        return this.reject(`request timed out after ${this.timeoutMs} ms`, err);
      }
      return this.reject(`request failed: ${describeError(err)}`, err);
    } finally {
      this.lastCallAt = performance.now();
    }
  }

  private reject(detail: string, cause?: unknown): Failure {
    const error = new TransportError(this.name, detail, cause);
    logEvent("warn", "source_failed", { source: this.name, error: error.message });
    return fail(error.message);
  }

  private acquireSlot(): Promise<void> {
    // waitForSlot never rejects, so the chain cannot break.
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    const spacingMs = this.params.rateLimitDelay * 1000;
    // Re-check after waking: a call still in flight may have settled meanwhile.
    while (this.lastCallAt !== null) {
      const remaining = this.lastCallAt + spacingMs - performance.now();
      if (remaining <= 0) break;
      await sleep(Math.ceil(remaining));
    }
    this.lastCallAt = performance.now();
  }
}
