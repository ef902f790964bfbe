import "dotenv/config";

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type LoggerOptions,
} from "pino";

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function resolveLevel(value: string | undefined): LevelWithSilent {
  const match = LEVELS.find((level) => level === value);
  return match ?? "info";
}

const LOG_LEVEL = resolveLevel(process.env.LOG_LEVEL);
const LOG_FILE = process.env.LOG_FILE;

// Build the destination stream
function createDestination(
  level: LevelWithSilent
): DestinationStream | undefined {
  if (LOG_FILE === undefined || LOG_FILE === "" || level === "silent") {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(LOG_FILE);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  // Both stdout and the file receive every record at or above the level
  const streams: pino.StreamEntry[] = [
    { level, stream: process.stdout },
    {
      level,
      stream: pino.destination({
        dest: LOG_FILE,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

const destination = createDestination(LOG_LEVEL);

export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
};

export const logger =
  destination !== undefined
    ? pino(loggerOptions, destination)
    : pino(loggerOptions);

// Child loggers for different modules
export const sourceLogger = logger.child({ module: "source" });
export const registryLogger = logger.child({ module: "registry" });
export const vocabularyLogger = logger.child({ module: "vocabulary" });
export const mapperLogger = logger.child({ module: "mapper" });
export const harvestLogger = logger.child({ module: "harvest" });
export const dbLogger = logger.child({ module: "database" });

if (LOG_FILE !== undefined && LOG_FILE !== "") {
  logger.info(
    { logFile: LOG_FILE, logLevel: LOG_LEVEL },
    "Logging to file enabled"
  );
}
