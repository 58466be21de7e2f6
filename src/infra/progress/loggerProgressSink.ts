import type { Logger } from "pino";
import type { ProgressEvent } from "../../core/entities/progress";
import type { ProgressSinkPort } from "../../core/ports/outboundPorts";

/**
 * Streams archive progress through the structured logger, one line per event.
 */
export class LoggerProgressSink implements ProgressSinkPort {
  constructor(private readonly log: Logger) {}

  publish(event: ProgressEvent): void {
    const fields = { symbol: event.symbol, totals: event.totals };

    switch (event.kind) {
      case "error":
        this.log.error(fields, event.message);
        return;
      case "warning":
        this.log.warn(fields, event.message);
        return;
      case "status":
      case "success":
        this.log.info({ ...fields, kind: event.kind }, event.message);
        return;
    }
  }
}
