// packages/cli/src/logger.ts
import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

import type { ProgressListener } from "../../pipeline/src/index.js";

import type { LogLevel } from "./config.js";

export type LoggerSettings = {
  level: LogLevel;
  pretty: boolean;
  /** Defaults to stderr; stdout is kept for reports. */
  destination?: DestinationStream;
};

export function createLogger(settings: LoggerSettings): Logger {
  const options: LoggerOptions = {
    level: settings.level,
    base: { service: "hydrocheck" },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (settings.destination) return pino(options, settings.destination);
  if (settings.pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2, translateTime: "SYS:standard", ignore: "pid,hostname,service" },
      },
    });
  }
  return pino(options, pino.destination(2));
}

/** Pipeline progress as log lines: stages at debug/info, warnings at warn. */
export function progressLogger(logger: Logger): ProgressListener {
  return (event) => {
    switch (event.type) {
      case "stage_started":
        logger.debug({ stage: event.stage }, "stage started");
        return;
      case "stage_completed":
        logger.info({ stage: event.stage, duration_ms: event.duration_ms }, "stage completed");
        return;
      case "warning": {
        const { message, ...where } = event.warning;
        logger.warn(where, message);
        return;
      }
    }
  };
}
