import Transport from "winston-transport";
import type winston from "winston";
import type { Analyzer, Phase } from "@vdiag/core";

export interface VdiagWinstonTransportOptions extends Transport.TransportStreamOptions {
  phase?: Phase; // default: "main"
}

/**
 * Lets a host application's winston logger feed its lines into an analyzer
 * phase, e.g. a build wrapper that already logs compiler output.
 */
export class VdiagWinstonTransport extends Transport {
  private analyzer: Analyzer;
  private phase: Phase;

  constructor(analyzer: Analyzer, opts: VdiagWinstonTransportOptions = {}) {
    super({ ...opts, level: opts.level ?? "info" });
    this.analyzer = analyzer;
    this.phase = opts.phase ?? "main";
  }

  override log(info: winston.Logform.TransformableInfo, next: () => void) {
    setImmediate(() => this.emit("logged", info));

    const message = typeof info.message === "string" ? info.message : JSON.stringify(info.message);
    for (const line of message.split(/\r?\n/)) this.analyzer.ingestLine(this.phase, line);

    next();
  }
}
