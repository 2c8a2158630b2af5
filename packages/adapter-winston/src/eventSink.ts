import { join } from "node:path";
import winston from "winston";
import type Transport from "winston-transport";
import type { EventSinkPort, LogEvent, Phase } from "@vdiag/core";
import { EVENT_LEVELS, toWinstonLevel } from "./levels.js";

export interface WinstonEventSinkOptions {
  dir: string; // one <phase>.log per phase lands here
  /** Extra transports every phase logger also writes to (e.g. a console). */
  transports?: Transport[];
}

interface PhaseLogger {
  logger: winston.Logger;
  file: Transport;
}

const lineFormat = winston.format.printf((info) => {
  const tag = typeof info.category === "string" ? ` (${info.category})` : "";
  return `${String(info.eventTime)} [${info.level.toUpperCase()}]${tag} ${String(info.message)}`;
});

/**
 * Mirrors the Event Log into append-only files, one winston logger per phase,
 * stamped with the event's own timestamp.
 */
export function makeWinstonEventSink(opts: WinstonEventSinkOptions): EventSinkPort & { loggerFor(phase: Phase): winston.Logger } {
  const loggers = new Map<Phase, PhaseLogger>();

  const loggerFor = (phase: Phase): PhaseLogger => {
    let entry = loggers.get(phase);
    if (!entry) {
      const file = new winston.transports.File({ filename: join(opts.dir, `${phase}.log`) });
      const logger = winston.createLogger({
        levels: EVENT_LEVELS,
        level: "debug",
        format: lineFormat,
        transports: [file, ...(opts.transports ?? [])],
      });
      entry = { logger, file };
      loggers.set(phase, entry);
    }
    return entry;
  };

  return {
    append(event: LogEvent) {
      loggerFor(event.phase).logger.log({
        level: toWinstonLevel(event.level),
        message: event.message,
        eventTime: event.timestamp,
        ...(event.category ? { category: event.category } : {}),
        ...(event.detail ? { detail: event.detail } : {}),
      });
    },

    loggerFor(phase: Phase) {
      return loggerFor(phase).logger;
    },

    async close() {
      await Promise.all(
        [...loggers.values()].map(
          ({ logger, file }) =>
            new Promise<void>((resolve) => {
              file.once("finish", () => resolve());
              logger.end();
            }),
        ),
      );
      loggers.clear();
    },
  };
}
