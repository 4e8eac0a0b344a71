// test/reloading.spec.ts
// Entry point: dispatch on the first argument, options and error messages

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { reloading } from "../src/reloading";
import { DEFAULT_CONFIG } from "../src/core/config";
import { ReloadConfigError } from "../src/outcome/errors";
import { makeTempDir, removeTempDir, rewrite, testPorts, writeFixture } from "./helpers";

const config = DEFAULT_CONFIG;

describe("reloading", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  describe("loops", () => {
    it("reloads the body of a loop over an iterable", () => {
      const file = writeFixture(dir, "sum.ts", [
        "const state = { total: 0 };",
        "for (const i of reloading([1, 2, 3, 4, 5])) {",
        "  state.total += i;",
        "}",
      ]);
      const state = { total: 0 };

      const loop = reloading([1, 2, 3, 4, 5], { file, line: 2, scope: { state }, ports: testPorts(), config });

      expect([...loop]).toEqual([]);
      expect(state.total).toBe(15);
    });

    it("loops forever over 0, 1, 2, ...", () => {
      const file = writeFixture(dir, "forever.ts", [
        "for (const i of reloading({ forever: true })) {",
        '  seen.push(i); if (i === 3) throw new Error("enough");',
        "}",
      ]);
      const seen: number[] = [];
      const ports = testPorts(() => {
        throw new Error("operator stopped");
      });

      const loop = reloading({ forever: true, file, line: 1, scope: { seen }, ports, config });

      expect(() => [...loop]).toThrow("operator stopped");
      expect(seen).toEqual([0, 1, 2, 3]);
    });

    it("reads the marker from the options", () => {
      const file = writeFixture(dir, "live.js", ["for (const c of live('ab')) {", "  out.push(c.toUpperCase());", "}"]);
      const out: string[] = [];

      const loop = reloading("ab", { file, line: 1, marker: "live", scope: { out }, ports: testPorts(), config });

      expect([...loop]).toEqual([]);
      expect(out).toEqual(["A", "B"]);
    });

    it("needs a line when the file is given", () => {
      const file = writeFixture(dir, "noline.ts", ["for (const i of reloading([1])) {}"]);
      expect(() => reloading([1], { file, config })).toThrow(
        "Invalid reloading options: `line` is required together with `file` for loops"
      );
    });
  });

  describe("functions", () => {
    it("wraps a function found on its line and keeps its arity", () => {
      const file = writeFixture(dir, "double.ts", [
        "const double = reloading(function double(x: number, y: number) {",
        "  return (x + y) * 2;",
        "});",
      ]);
      const double = reloading(
        function double(x: number, y: number) {
          return x + y;
        },
        { file, line: 1, ports: testPorts(), config }
      );

      expect(double.length).toBe(2);
      expect(double(1, 2)).toBe(6);

      rewrite(file, [
        "const double = reloading(function double(x: number, y: number) {",
        "  return (x + y) * 3;",
        "});",
      ]);
      expect(double(1, 2)).toBe(9);
    });

    it("takes options first and the function second", () => {
      const file = writeFixture(dir, "tick.ts", [
        "const tick = reloading({ every: 2 })(function tick() {",
        "  return state.version;",
        "});",
      ]);
      const state = { version: "one" };
      const tick = reloading({ file, line: 1, every: 2, scope: { state }, ports: testPorts(), config })(function tick() {
        return "original";
      });

      expect(tick()).toBe("one");
      rewrite(file, ["const tick = reloading({ every: 2 })(function tick() {", '  return "two";', "});"]);
      expect(tick()).toBe("one");
      expect(tick()).toBe("two");
    });
  });

  describe("configuration warnings", () => {
    it("reports a very high reload interval without failing", () => {
      const file = writeFixture(dir, "slow.ts", ["const slow = reloading(function slow() {", "  return 1;", "});"]);
      const ports = testPorts();

      const slow = reloading(
        function slow() {
          return 0;
        },
        { file, line: 1, every: 5000, ports, config }
      );

      expect(ports.stderr.text).toBe("Warning: every is very high, edits may take a long time to show up\n");
      expect(slow()).toBe(1);
    });
  });

  describe("misuse", () => {
    it("refuses to iterate over the decorator form", () => {
      const decorator = reloading({ config });
      expect(() => [...decorator]).toThrow("Nothing to iterate over. Please pass an iterable to reloading.");
    });

    it("refuses to decorate anything but a function", () => {
      const decorator = reloading({ config });
      expect(() => Reflect.apply(decorator, undefined, [42])).toThrow(
        "reloading was used as a decorator but received a number instead of a function."
      );
    });

    it("refuses values that are neither iterable, function nor options", () => {
      expect(() => Reflect.apply(reloading, undefined, [42, { config }])).toThrow(
        "reloading expects an iterable, a function or an options object, got a number."
      );
      expect(() => Reflect.apply(reloading, undefined, [null, { config }])).toThrow(
        "reloading expects an iterable, a function or an options object, got null."
      );
    });

    it("validates the options", () => {
      const file = writeFixture(dir, "invalid.ts", ["for (const i of reloading([1])) {}"]);
      try {
        reloading([1], { file, line: 1, every: 0, config });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ReloadConfigError);
        if (e instanceof ReloadConfigError) {
          expect(e.code).toBe("R0303");
          expect(e.message).toBe("Invalid reloading options: every must be a positive integer");
        }
      }
    });
  });
});
