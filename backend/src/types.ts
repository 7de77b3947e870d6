/**
 * Shared result and configuration shapes used by every tool source.
 */

/** Successful tool result. */
export type Success<T> = { success: true; data: T };

/** Failed tool result. Carries a human-readable message and never a `data` field. */
export type Failure = { success: false; error: string };

/**
 * Envelope returned by every operation and by the router.
 * Consumers must branch on `success` before touching `data`.
 */
export type Envelope<T = Record<string, unknown>> = Success<T> | Failure;

export const ok = <T>(data: T): Success<T> => ({ success: true, data });

export const fail = (error: string): Failure => ({ success: false, error });

/**
 * Static description of one external data source. Built once at startup and frozen.
 * `rateLimitDelay` is the minimum spacing between two calls, in seconds.
 */
export type ServerParams = Readonly<{
  name: string;
  description: string;
  baseUrl: string;
  rateLimitDelay: number;
}>;
