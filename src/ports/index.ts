import { consoleTraceSink, silentTraceSink } from "./sink";
import { TerminalAcknowledger } from "./terminal";
import type { Acknowledger, TextStream, TraceSink } from "./types";

export type { Acknowledger, TextStream, TraceEvent, TraceSink } from "./types";
export { collectingTraceSink, consoleTraceSink, describeEvent, silentTraceSink } from "./sink";
export { TerminalAcknowledger } from "./terminal";

/**
 * Complete set of ports the reload engine talks to.
 */
export interface PortSet {
  /** Receives the fix-and-press-return instruction */
  stdout: TextStream;
  /** Receives formatted errors and notices */
  stderr: TextStream;
  acknowledger: Acknowledger;
  trace: TraceSink;
}

/**
 * Create a port set, filling anything not given from the process.
 */
export function createPortSet(ports: Partial<PortSet> = {}, options: { trace?: boolean } = {}): PortSet {
  return {
    stdout: ports.stdout ?? process.stdout,
    stderr: ports.stderr ?? process.stderr,
    acknowledger: ports.acknowledger ?? new TerminalAcknowledger(),
    trace: ports.trace ?? (options.trace ? consoleTraceSink() : silentTraceSink),
  };
}
