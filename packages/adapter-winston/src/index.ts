export { EVENT_LEVELS, toWinstonLevel, type EventLevelName } from "./levels.js";
export { makeWinstonEventSink, type WinstonEventSinkOptions } from "./eventSink.js";
export { VdiagWinstonTransport, type VdiagWinstonTransportOptions } from "./transport.js";
export { consoleEventSink, createConsoleLogger, type ConsoleLoggerOptions } from "./console.js";
