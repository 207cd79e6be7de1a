import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, {
  type DestinationStream,
  type Level,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from "pino";

export type { Logger };

/**
 * Level from the environment; unknown names fall back to info
 */
function parseLevel(value: string | undefined): LevelWithSilent {
  const level = value?.trim().toLowerCase() ?? "";
  switch (level) {
    case "fatal":
    case "error":
    case "warn":
    case "info":
    case "debug":
    case "trace":
    case "silent":
      return level;
    default:
      return "info";
  }
}

const LOG_LEVEL = parseLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

function createDestination(): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "") {
    return undefined;
  }

  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // stdout and file share the same level
  const streamLevel: Level = LOG_LEVEL === "silent" ? "fatal" : LOG_LEVEL;
  const streams: pino.StreamEntry[] = [
    { level: streamLevel, stream: process.stdout },
    {
      level: streamLevel,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination();

const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: { app: "presence" },
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const pipelineLogger = logger.child({ module: "pipeline" });
export const readerLogger = logger.child({ module: "reader" });
export const resolverLogger = logger.child({ module: "resolver" });

/**
 * Pipeline logger bound to one country's dataset
 */
export function countryLogger(countryCode: string, dataset: string): Logger {
  return pipelineLogger.child({ countryCode, dataset });
}

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
