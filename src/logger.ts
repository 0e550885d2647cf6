import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import pino, { type DestinationStream, type Logger } from "pino";

import type { LoggingConfig, LogLevel } from "./config.js";

export type { Logger } from "pino";

export interface CreatedLogger {
  logger: Logger;
  /** Fastify accepts this object directly as its `logger` option */
  fastifyLoggerConfig: { level: LogLevel; stream?: DestinationStream };
}

// Build the destination stream
function createDestination(
  options: LoggingConfig
): DestinationStream | undefined {
  if (options.file === undefined) {
    return undefined;
  }

  // Ensure log directory exists
  const logDir = dirname(options.file);
  if (logDir !== "." && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const level: pino.Level = options.level === "silent" ? "fatal" : options.level;

  // Create streams for both stdout and file
  const streams: pino.StreamEntry[] = [
    { level, stream: process.stdout },
    {
      level,
      stream: pino.destination({
        dest: options.file,
        sync: false,
      }),
    },
  ];

  return pino.multistream(streams);
}

/**
 * Create the root logger. Components derive their own child with a
 * `module` binding.
 */
export function createLogger(options: LoggingConfig): CreatedLogger {
  const destination = createDestination(options);

  const logger =
    destination !== undefined
      ? pino({ level: options.level }, destination)
      : pino({ level: options.level });

  if (options.file !== undefined) {
    logger.info(
      { logFile: options.file, logLevel: options.level },
      "Logging to file enabled"
    );
  }

  return {
    logger,
    fastifyLoggerConfig:
      destination !== undefined
        ? { level: options.level, stream: destination }
        : { level: options.level },
  };
}

/**
 * Logger that drops everything; the default for components built without one.
 */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
