import winston from "winston";
import type { LogLevel } from "@vdiag/core";

/** winston levels for pipeline events; lower is more severe. */
export const EVENT_LEVELS = {
  critical: 0,
  error: 1,
  warning: 2,
  success: 3,
  highlight: 4,
  info: 5,
  debug: 6,
} as const;

export type EventLevelName = keyof typeof EVENT_LEVELS;

winston.addColors({
  critical: "bold red",
  error: "red",
  warning: "yellow",
  success: "green",
  highlight: "bold cyan",
  info: "blue",
  debug: "magenta",
});

export function toWinstonLevel(level: LogLevel): EventLevelName {
  switch (level) {
    case "CRITICAL":
      return "critical";
    case "ERROR":
      return "error";
    case "WARNING":
      return "warning";
    case "SUCCESS":
      return "success";
    case "HIGHLIGHT":
      return "highlight";
    case "INFO":
      return "info";
  }
}
