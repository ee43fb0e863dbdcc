/**
 * Trace event types emitted by the VM.
 */
export type TraceEvent =
  | { tag: "E_SystemCall"; id: string; address: string; argc: number; outcome: "return" | "error"; durationMs: number }
  | { tag: "E_Call"; id: string; module?: string; params: number; argc: number; outcome: "return" | "fallthrough" | "error" }
  | { tag: "E_Goto"; id: string; params: number; argc: number }
  | { tag: "E_RuleMatch"; id: string; pattern: string; remainder: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

/**
 * Sink that keeps every event in memory, in emission order.
 */
export interface MemoryTraceSink extends TraceSink {
  readonly events: TraceEvent[];
  clear(): void;
}

export function memoryTraceSink(): MemoryTraceSink {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
    clear() {
      events.length = 0;
    },
  };
}

/**
 * Fan one event stream out to several sinks.
 */
export function compositeTraceSink(...sinks: TraceSink[]): TraceSink {
  return {
    emit(event) {
      for (const s of sinks) s.emit(event);
    },
  };
}
