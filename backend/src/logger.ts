export type LogLevel = "debug" | "info" | "warn" | "error";

const RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold = RANK.info;

export function setLogLevel(level: LogLevel | "silent") {
  threshold = RANK[level];
}

/** One JSON line per event; warnings and errors go to stderr. */
export function logEvent(
  level: LogLevel,
  event: string,
  fields?: Record<string, unknown>
) {
  if (RANK[level] < threshold) return;

  const line = JSON.stringify({
    ts: new Date().toISOString(),
    level,
    event,
    ...(fields ?? {}),
  });
  switch (level) {
    case "warn":
      console.warn(line);
      return;
    case "error":
      console.error(line);
      return;
    case "debug":
      console.debug(line);
      return;
    default:
      console.info(line);
  }
}
