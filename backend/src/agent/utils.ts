import type { Envelope } from "../types";

export const TOOL_RESULT_LIMIT = 15_000;

/**
 * Serialize a tool result for the model. Oversized payloads (long route geometries,
 * big POI lists) are cut at `limit` characters.
 */
export const serializeToolResult = (result: Envelope<unknown>, limit = TOOL_RESULT_LIMIT) => {
  return JSON.stringify(result).slice(0, limit);
};
