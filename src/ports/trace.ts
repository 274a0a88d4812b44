import type { FailureReason } from "../outcome/failure";

/**
 * Trace event types emitted by the machine.
 */
export type TraceEvent =
  | { tag: "E_Define"; name: string; tokens: number }
  | { tag: "E_Eval"; line: string; outcome: "Done" | "Fail"; stackDepth: number; durationMs: number }
  | { tag: "E_Fault"; reason: FailureReason; message: string };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

export const nullTrace: TraceSink = {
  emit() {},
};

export interface MemoryTrace extends TraceSink {
  readonly events: TraceEvent[];
}

/**
 * Sink that keeps every event in order.
 */
export function memoryTrace(): MemoryTrace {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
  };
}

export function formatTraceEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_Define":
      return `[define] ${event.name} (${event.tokens} tokens)`;
    case "E_Eval":
      return `[eval] ${JSON.stringify(event.line)} -> ${event.outcome} depth=${event.stackDepth} ${event.durationMs}ms`;
    case "E_Fault":
      return `[fault] ${event.reason}: ${event.message}`;
  }
}

/**
 * Sink that writes one line per event, to stderr by default.
 */
export function consoleTrace(write: (line: string) => void = (line) => console.error(line)): TraceSink {
  return {
    emit(event) {
      write(formatTraceEvent(event));
    },
  };
}
