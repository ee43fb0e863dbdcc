import type { Logger } from "./logger";
import type { TraceEvent, TraceSink } from "../ports/types";

function describe(event: TraceEvent): string {
  switch (event.tag) {
    case "E_SystemCall":
      return `system call ${event.address} -> ${event.outcome}`;
    case "E_Call":
      return event.module ? `call into ${event.module} -> ${event.outcome}` : `local call -> ${event.outcome}`;
    case "E_Goto":
      return "goto";
    case "E_RuleMatch":
      return `rule matched: ${event.pattern}`;
  }
}

/**
 * Forward trace events to a logger at trace level.
 */
export function loggingTraceSink(logger: Logger): TraceSink {
  return {
    emit(event: TraceEvent): void {
      logger.trace(describe(event), { ...event });
    },
  };
}
