// src/core/recovery/prompt.ts
// Recovery Prompt: report, wait for the operator, let the caller retry.

import { ExecutionError, RecoveryUnavailableError, ReloadingError } from "../../outcome/errors";
import type { Acknowledger, TextStream, TraceSink } from "../../ports/types";
import { TRANSIENT_UNIT } from "../compile/unit";
import type { RecoveryHandler } from "../source/tree";

export type RecoveryState = "idle" | "awaiting-fix" | "retrying";

export type RecoveryPorts = {
  stdout: TextStream;
  stderr: TextStream;
  acknowledger: Acknowledger;
  trace: TraceSink;
};

function describe(error: unknown): string {
  if (error instanceof ExecutionError) return describe(error.cause);
  // Engine errors already name the real file and line; their stack is ours, not the user's.
  if (error instanceof ReloadingError) return `${error.name}: ${error.message}`;
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`;
  return `Uncaught ${String(error)}`;
}

/**
 * Render an error for the operator, naming the real file wherever the
 * transient compilation unit shows up.
 */
export function formatError(error: unknown, file: string): string {
  return describe(error).split(TRANSIENT_UNIT).join(file);
}

export class RecoveryPrompt implements RecoveryHandler {
  private current: RecoveryState = "idle";

  constructor(private readonly ports: RecoveryPorts) {}

  get state(): RecoveryState {
    return this.current;
  }

  /**
   * idle | retrying -> awaiting-fix -> retrying. Blocks until acknowledged.
   */
  handle(error: unknown, file: string): void {
    this.current = "awaiting-fix";
    this.ports.trace.emit({
      tag: "E_Recovery",
      file,
      code: error instanceof ReloadingError ? error.code : undefined,
    });
    this.ports.stderr.write(formatError(error, file) + "\n");
    this.ports.stdout.write(`Edit ${file} and press return to continue\n`);
    this.ports.acknowledger.waitForAcknowledgment(file);
    this.current = "retrying";
  }

  /**
   * Like `handle`, for errors raised by reloaded code. Nobody can answer once
   * stdin is closed; that counts as an acknowledgment so the caller goes on.
   */
  report(error: ExecutionError, file: string): void {
    try {
      this.handle(error, file);
    } catch (e) {
      if (!(e instanceof RecoveryUnavailableError)) throw e;
      this.current = "retrying";
    }
  }

  /** Report without blocking. */
  notice(message: string): void {
    this.ports.stderr.write(message + "\n");
  }

  /** A reload went through; back to idle. */
  settle(): void {
    this.current = "idle";
  }
}
