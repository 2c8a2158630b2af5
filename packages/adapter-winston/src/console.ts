import winston from "winston";
import { EVENT_LEVELS, toWinstonLevel } from "./levels.js";
import type { EventSinkPort, LogEvent } from "@vdiag/core";

export interface ConsoleLoggerOptions {
  verbose?: boolean; // debug output only when set
}

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): winston.Logger {
  return winston.createLogger({
    levels: EVENT_LEVELS,
    level: opts.verbose ? "debug" : "info",
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => `${info.level} ${String(info.message)}`),
    ),
    transports: [new winston.transports.Console({ stderrLevels: ["critical", "error", "warning"] })],
  });
}

/** Echoes pipeline events to a console logger as they are appended. */
export function consoleEventSink(logger: winston.Logger): EventSinkPort {
  return {
    append(event: LogEvent) {
      logger.log(toWinstonLevel(event.level), `[${event.phase}] ${event.message}`);
    },
  };
}
