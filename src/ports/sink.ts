import type { TraceEvent, TraceSink } from "./types";

export const silentTraceSink: TraceSink = {
  emit: () => {},
};

/**
 * Trace sink writing one `[reloading]` line per event to `console.debug`.
 */
export function consoleTraceSink(log: (line: string) => void = console.debug): TraceSink {
  return {
    emit: (event) => log(`[reloading] ${describeEvent(event)}`),
  };
}

/**
 * Trace sink that keeps every event in memory.
 */
export function collectingTraceSink(events: TraceEvent[] = []): TraceSink & { events: TraceEvent[] } {
  return {
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

export function describeEvent(event: TraceEvent): string {
  switch (event.tag) {
    case "E_Reload":
      return `reloaded ${event.kind} from ${event.file} in ${event.durationMs.toFixed(1)}ms`;
    case "E_TransientRead":
      return `empty read of ${event.file}, retrying`;
    case "E_Recovery":
      return `waiting for a fix to ${event.file}${event.code ? ` (${event.code})` : ""}`;
    case "E_KeepPrevious":
      return `kept previous version of ${event.name} (${event.code})`;
    case "E_ExecutionError":
      return `${event.kind} in ${event.file} failed (attempt ${event.attempt})`;
  }
}
