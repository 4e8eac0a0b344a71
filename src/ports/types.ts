import type { FragmentKind } from "../outcome/errors";

/**
 * Trace event types emitted by the reload engine.
 */
export type TraceEvent =
  | { tag: "E_Reload"; kind: FragmentKind; file: string; identity?: string; durationMs: number }
  | { tag: "E_TransientRead"; file: string }
  | { tag: "E_Recovery"; file: string; code?: string }
  | { tag: "E_KeepPrevious"; file: string; name: string; code: string }
  | { tag: "E_ExecutionError"; kind: FragmentKind; file: string; attempt: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}

/**
 * Minimal writable text stream (process.stdout, process.stderr or a test buffer).
 */
export interface TextStream {
  write(chunk: string): unknown;
}

/**
 * Acknowledger port.
 * Blocks the calling thread until the operator confirms the file was fixed.
 */
export interface Acknowledger {
  /**
   * @param file - the source file the operator is asked to edit
   */
  waitForAcknowledgment(file: string): void;
}
