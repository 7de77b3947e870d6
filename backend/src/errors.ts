import type { ZodIssue } from "zod";
import { fail, type Envelope, type Failure } from "./types";
import { logEvent } from "./logger";

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** Malformed, missing or out-of-range argument. Always names the field. */
export class ValidationError extends GatewayError {
  constructor(
    public readonly field: string,
    problem: string,
  ) {
    super(`Invalid ${field}: ${problem}`, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class TransportError extends GatewayError {
  constructor(
    public readonly source: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`${source}: ${detail}`, "TRANSPORT_ERROR", cause);
    this.name = "TransportError";
  }
}

export class DataNotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "DataNotFoundError";
  }
}

export class InternalError extends GatewayError {
  constructor(summary: string, cause?: unknown) {
    super(`internal error: ${summary}`, "INTERNAL_ERROR", cause);
    this.name = "InternalError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export function describeIssue(issue: ZodIssue): string {
  const where = issue.path.length ? `${issue.path.join(".")}: ` : "";
  return `${where}${issue.message}`;
}

/**
 * Converts anything thrown at an operation or router boundary into a Failure.
 * Anticipated gateway errors keep their message; everything else is reported
 * as an internal error and logged.
 */
export function toFailure(err: unknown, operation: string): Failure {
  if (err instanceof GatewayError && !(err instanceof InternalError)) {
    logEvent("debug", "operation_rejected", { operation, code: err.code, error: err.message });
    return fail(err.message);
  }
  const internal = err instanceof InternalError ? err : new InternalError(describeError(err), err);
  logEvent("error", "operation_crashed", { operation, error: internal.message });
  return fail(internal.message);
}

/** Operation boundary: nothing thrown inside `body` escapes. */
export async function guard<T>(
  operation: string,
  body: () => Promise<Envelope<T>>,
): Promise<Envelope<T>> {
  try {
    return await body();
  } catch (err) {
    return toFailure(err, operation);
  }
}
