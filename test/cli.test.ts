/**
 * Tests for argument parsing and the run/check commands.
 */
import { describe, it, expect } from "vitest";

import { BufferHost, MemorySourceReader } from "../src/index";
import { VERSION, parseArgs, runCommand } from "../src/cli";
import type { CliIO } from "../src/cli";

const FILES: Record<string, string> = {
  "/project/hello.giu": 'println("hello");',
  "/project/bad.giu": "missing;",
  "/project/broken.giu": "let x = ;",
  "/project/loud.giu": 'println("side effect");',
};

function setup(): { io: CliIO; out: string[]; err: string[]; host: BufferHost } {
  const out: string[] = [];
  const err: string[] = [];
  const host = new BufferHost();
  const io: CliIO = {
    out: line => out.push(line),
    err: line => err.push(line),
    interpreter: { host, reader: new MemorySourceReader(FILES), baseDir: "/project" },
  };
  return { io, out, err, host };
}

describe("CLI Tests", () => {
  describe("parseArgs", () => {
    it("parses commands", () => {
      expect(parseArgs([])).toEqual({ kind: "repl" });
      expect(parseArgs(["-h"])).toEqual({ kind: "help" });
      expect(parseArgs(["--version"])).toEqual({ kind: "version" });
      expect(parseArgs(["run", "a.giu"])).toEqual({ kind: "run", file: "a.giu" });
      expect(parseArgs(["check", "a.giu"])).toEqual({ kind: "check", file: "a.giu" });
      expect(parseArgs(["a.giu"])).toEqual({ kind: "run", file: "a.giu" });
    });

    it("reports usage errors", () => {
      expect(parseArgs(["run"])).toBe("'run' requires a file path");
      expect(parseArgs(["a.giu", "b.giu"])).toBe("Multiple input files not supported");
      expect(parseArgs(["--bogus"])).toBe("Unknown option: --bogus");
    });
  });

  describe("runCommand", () => {
    it("prints the version", () => {
      const { io, out } = setup();
      expect(runCommand({ kind: "version" }, io)).toBe(0);
      expect(out).toEqual([`giu ${VERSION}`]);
    });

    it("prints help", () => {
      const { io, out } = setup();
      expect(runCommand({ kind: "help" }, io)).toBe(0);
      expect(out[0].split("\n")[0]).toBe("Giu interpreter");
    });

    it("runs a program", () => {
      const { io, host, err } = setup();
      expect(runCommand({ kind: "run", file: "hello.giu" }, io)).toBe(0);
      expect(host.output).toBe("hello\n");
      expect(err).toEqual([]);
    });

    it("fails on runtime errors", () => {
      const { io, err } = setup();
      expect(runCommand({ kind: "run", file: "bad.giu" }, io)).toBe(1);
      expect(err).toEqual(["bad.giu: Runtime error: Undefined variable: 'missing'"]);
    });

    it("fails on missing files", () => {
      const { io, err } = setup();
      expect(runCommand({ kind: "run", file: "nope.giu" }, io)).toBe(1);
      expect(err).toEqual(["nope.giu: Runtime error: Module 'nope.giu' not found (looked for /project/nope.giu)"]);
    });

    it("checks syntax without running", () => {
      const { io, out, host } = setup();
      expect(runCommand({ kind: "check", file: "loud.giu" }, io)).toBe(0);
      expect(out).toEqual(["No errors found"]);
      expect(host.output).toBe("");
    });

    it("reports syntax errors from check", () => {
      const { io, err } = setup();
      expect(runCommand({ kind: "check", file: "broken.giu" }, io)).toBe(1);
      expect(err).toEqual(["broken.giu: Parse error: Expected expression at line 1, column 9. Got ';'"]);
    });
  });
});
