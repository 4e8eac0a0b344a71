// test/helpers.ts
// Fixture files and in-memory ports for reload engine tests

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { collectingTraceSink, type Acknowledger, type PortSet, type TraceEvent } from "../src/ports";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "reloading-test-"));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write `lines` to `dir/name` and return the absolute path.
 */
export function writeFixture(dir: string, name: string, lines: string[]): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, lines.join("\n"));
  return file;
}

export function rewrite(file: string, lines: string[]): void {
  fs.writeFileSync(file, lines.join("\n"));
}

export class StringStream {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }
}

export type TestPorts = PortSet & {
  stdout: StringStream;
  stderr: StringStream;
  events: TraceEvent[];
  /** File passed to each acknowledgment, in order */
  acknowledgments: string[];
};

/**
 * Ports writing to memory. `onAcknowledge` plays the operator; without one
 * any prompt fails the test instead of blocking on stdin.
 */
export function testPorts(onAcknowledge?: (file: string, count: number) => void): TestPorts {
  const trace = collectingTraceSink();
  const acknowledgments: string[] = [];
  const acknowledger: Acknowledger = {
    waitForAcknowledgment(file) {
      acknowledgments.push(file);
      if (!onAcknowledge) throw new Error(`unexpected prompt for ${file}`);
      onAcknowledge(file, acknowledgments.length);
    },
  };

  return {
    stdout: new StringStream(),
    stderr: new StringStream(),
    acknowledger,
    trace,
    events: trace.events,
    acknowledgments,
  };
}
