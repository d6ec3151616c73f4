#!/usr/bin/env node
/**
 * Command-line entry point for the Giu interpreter.
 *
 * Usage:
 *   giu                   Start the REPL
 *   giu run <file>        Run a program
 *   giu check <file>      Lex and parse a program without running it
 *   giu <file>            Same as `giu run <file>`
 *
 * Options:
 *   -h, --help            Show help
 *   -v, --version         Show version
 */

import color from "cli-color";
import { createInterpreter, InterpreterOptions } from "./interpreter";
import { describeError } from "./errors";
import { main as startRepl } from "./repl";

export const VERSION = "0.1.0";

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "repl" }
  | { kind: "run"; file: string }
  | { kind: "check"; file: string };

export interface CliIO {
  /** Line printer for CLI messages (default: console.log) */
  out: (line: string) => void;
  /** Line printer for diagnostics (default: console.error) */
  err: (line: string) => void;
  /** Passed through to the interpreter; tests supply an in-memory host and reader */
  interpreter?: InterpreterOptions;
}

const HELP = `Giu interpreter

Usage:
  giu                   Start the interactive REPL
  giu run <file>        Run a program
  giu check <file>      Check a program for syntax errors
  giu <file>            Run a program

Options:
  -h, --help            Show this help
  -v, --version         Show version

Examples:
  giu run main.giu
  giu check lib/math.giu`;

export function parseArgs(args: string[]): CliCommand | string {
  const positional: string[] = [];

  for (const arg of args) {
    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    } else if (arg === "-v" || arg === "--version") {
      return { kind: "version" };
    } else if (arg.startsWith("-")) {
      return `Unknown option: ${arg}`;
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) {
    return { kind: "repl" };
  }

  const [first, ...rest] = positional;
  if (first === "run" || first === "check") {
    if (rest.length === 0) return `'${first}' requires a file path`;
    if (rest.length > 1) return "Multiple input files not supported";
    return { kind: first, file: rest[0] };
  }

  if (rest.length > 0) return "Multiple input files not supported";
  return { kind: "run", file: first };
}

/**
 * Execute a non-REPL command and return the process exit code.
 */
export function runCommand(command: Exclude<CliCommand, { kind: "repl" }>, io: CliIO): number {
  switch (command.kind) {
    case "help":
      io.out(HELP);
      return 0;

    case "version":
      io.out(`giu ${VERSION}`);
      return 0;

    case "check": {
      const interpreter = createInterpreter(io.interpreter);
      try {
        interpreter.checkFile(command.file);
      } catch (err) {
        io.err(`${command.file}: ${describeError(err)}`);
        return 1;
      }
      io.out("No errors found");
      return 0;
    }

    case "run": {
      const interpreter = createInterpreter(io.interpreter);
      try {
        interpreter.runFile(command.file);
      } catch (err) {
        io.err(`${command.file}: ${describeError(err)}`);
        return 1;
      }
      return 0;
    }
  }
}

function main(): void {
  const command = parseArgs(process.argv.slice(2));

  if (typeof command === "string") {
    console.error(color.red(`Error: ${command}`));
    console.error(HELP);
    process.exit(1);
  }

  if (command.kind === "repl") {
    startRepl();
    return;
  }

  process.exitCode = runCommand(command, {
    out: line => console.log(line),
    err: line => console.error(color.red(line)),
  });
}

// Run if executed directly
if (require.main === module) {
  main();
}
