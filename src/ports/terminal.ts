import * as fs from "fs";
import { RecoveryUnavailableError } from "../outcome/errors";
import type { Acknowledger } from "./types";

const NEWLINE = 0x0a;
const RETRY_MS = 20;

function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Acknowledger reading a line from a file descriptor (stdin by default).
 * Blocks the whole thread; there is nothing else to run until the file is fixed.
 */
export class TerminalAcknowledger implements Acknowledger {
  constructor(private readonly fd = 0) {}

  waitForAcknowledgment(file: string): void {
    const byte = Buffer.alloc(1);
    for (;;) {
      let read: number;
      try {
        read = fs.readSync(this.fd, byte, 0, 1, null);
      } catch (e) {
        // Non-blocking stdin (pipes under some shells) has nothing yet.
        if (isErrno(e, "EAGAIN")) {
          sleepSync(RETRY_MS);
          continue;
        }
        if (isErrno(e, "EOF")) {
          throw new RecoveryUnavailableError(file);
        }
        throw e;
      }
      if (read === 0) {
        throw new RecoveryUnavailableError(file);
      }
      if (byte[0] === NEWLINE) return;
    }
  }
}
