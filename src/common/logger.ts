import { pino, type DestinationStream, type Level, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: Level | "silent";
  /** Where log lines go; defaults to stdout. */
  destination?: DestinationStream;
}

export type LogTag = "game:play" | "analyzer:tabulate" | "analyzer:degraded";

export interface LogPayload {
  tag: LogTag;
  [key: string]: unknown;
}

const DEBUG_TAGS = new Set<LogTag>(["game:play", "analyzer:tabulate"]);

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = { name: "montecarlo", level: options.level ?? "info" };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}

/** Shared logger used when a game or analyzer is built without one. */
export const defaultLogger: Logger = createLogger();

function timestamp() {
  return new Date().toISOString();
}

/** Emits a tagged payload. Plays and tabulations go to debug, the rest to info. */
export function logEvent(logger: Logger, payload: LogPayload): void {
  const entry = { ts: timestamp(), ...payload };
  if (DEBUG_TAGS.has(payload.tag)) {
    logger.debug(entry);
    return;
  }
  logger.info(entry);
}
