import type { LogEntry, Logger } from "./types.ts";

const PREFIX = "[Roomwire]";

type Level = "debug" | "info" | "warn" | "error";

function print(level: Level, entry: LogEntry): void {
  const line = `${PREFIX} ${level.toUpperCase()} ${entry.atFunction}: ${entry.message}`;
  if (entry.data === null || entry.data === undefined) {
    console[level](line);
  } else {
    console[level](line, entry.data);
  }
}

/**
 * Console logger used when ClientConfig has no `logger`. One line per
 * entry, followed by its data when there is any. Debug lines need
 * NODE_ENV=development or DEBUG.
 */
export function createDefaultLogger(): Logger {
  const verbose = process.env.NODE_ENV === "development" || Boolean(process.env.DEBUG);
  return {
    debug: (entry) => {
      if (verbose) print("debug", entry);
    },
    info: (entry) => print("info", entry),
    warn: (entry) => print("warn", entry),
    error: (entry) => print("error", entry),
  };
}

/** Logger that drops everything. */
export function createSilentLogger(): Logger {
  const discard = (_entry: LogEntry): void => undefined;
  return {
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
  };
}

/**
 * Wraps a logger so every entry carries a fixed context object,
 * e.g. the room name and connection attempt.
 *
 * @param logger - Logger to forward to
 * @param context - Fields merged into each entry's data
 */
export function withLogContext(
  logger: Logger,
  context: Record<string, unknown>
): Logger {
  const merge = (entry: LogEntry): LogEntry => ({
    ...entry,
    data:
      typeof entry.data === "object" && entry.data !== null
        ? { ...context, ...entry.data }
        : { ...context, detail: entry.data },
  });
  return {
    debug: (entry) => logger.debug(merge(entry)),
    info: (entry) => logger.info(merge(entry)),
    warn: (entry) => logger.warn(merge(entry)),
    error: (entry) => logger.error(merge(entry)),
  };
}
