#!/usr/bin/env node
/**
 * REPL - Read-Eval-Print Loop for Giu.
 *
 * Each line is one statement or expression, run against a top-level scope
 * that persists between lines.
 */

import * as readline from "readline";
import color from "cli-color";
import { parse } from "./parser";
import { Interpreter, createInterpreter } from "./interpreter";
import { valueToString } from "./value";
import { describeError } from "./errors";

// ============================================================================
// REPL Mode
// ============================================================================

type ReplMode = "eval" | "ast";

export type ReplStatus = "continue" | "exit";

export interface ReplOptions {
  interpreter?: Interpreter;
  /** Line printer for results, errors and command output (default: console.log) */
  print?: (line: string) => void;
  /** Line printer for error reports (default: `print`) */
  printError?: (line: string) => void;
}

// ============================================================================
// REPL
// ============================================================================

export class Repl {
  readonly interpreter: Interpreter;
  mode: ReplMode = "eval";
  private readonly print: (line: string) => void;
  private readonly printError: (line: string) => void;

  private readonly commands: Record<string, { description: string; handler: (args: string) => ReplStatus }> = {
    help: {
      description: "Show this help message",
      handler: () => {
        this.showHelp();
        return "continue";
      },
    },
    ast: {
      description: "Toggle showing the parsed AST instead of evaluating",
      handler: () => {
        this.mode = this.mode === "ast" ? "eval" : "ast";
        this.print(`Mode set to: ${this.mode}`);
        return "continue";
      },
    },
    exit: {
      description: "Exit the REPL",
      handler: () => "exit",
    },
  };

  constructor(options: ReplOptions = {}) {
    this.interpreter = options.interpreter ?? createInterpreter();
    this.print = options.print ?? (line => console.log(line));
    this.printError = options.printError ?? this.print;
  }

  processInput(input: string): ReplStatus {
    const trimmed = input.trim();

    // Empty input
    if (!trimmed) return "continue";

    if (trimmed === "exit" || trimmed === "quit") return "exit";

    // Command
    if (trimmed.startsWith(":")) {
      const spaceIdx = trimmed.indexOf(" ");
      const cmdName = spaceIdx > 0 ? trimmed.slice(1, spaceIdx) : trimmed.slice(1);
      const cmdArgs = spaceIdx > 0 ? trimmed.slice(spaceIdx + 1) : "";

      const cmd = this.commands[cmdName];
      if (cmd) {
        return cmd.handler(cmdArgs);
      }
      this.printError(`Unknown command: :${cmdName}. Type :help for available commands.`);
      return "continue";
    }

    try {
      if (this.mode === "ast") {
        this.print(JSON.stringify(parse(trimmed), bigintReplacer, 2));
      } else {
        const value = this.interpreter.run(trimmed);
        if (value.tag !== "null") {
          this.print(valueToString(value));
        }
      }
    } catch (e) {
      this.printError(describeError(e));
    }
    return "continue";
  }

  private showHelp(): void {
    this.print("Commands:");
    for (const [name, { description }] of Object.entries(this.commands)) {
      this.print(`  :${name.padEnd(12)} ${description}`);
    }
    this.print("  exit, quit    Leave the REPL");
    this.print("");
    this.print("Examples:");
    this.print("  let x = 5;");
    this.print("  x * 2 + 1");
    this.print("  fn add(a, b) { a + b }");
    this.print("  println(\"Hello, \", \"World!\");");
  }
}

/**
 * JSON cannot encode bigint; integer literals print as numbers when safe and
 * as strings otherwise.
 */
function bigintReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  return value;
}

// ============================================================================
// Main
// ============================================================================

export function main(interpreter?: Interpreter): void {
  console.log(color.bold("Giu REPL"));
  console.log(color.cyan("Type :help for available commands, :exit to quit\n"));

  const repl = new Repl({ interpreter, printError: line => console.log(color.red(line)) });

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  rl.prompt();

  rl.on("line", (line: string) => {
    if (repl.processInput(line) === "exit") {
      rl.close();
      return;
    }
    rl.prompt();
  });

  rl.on("close", () => {
    console.log("\nGoodbye!");
    process.exit(0);
  });
}

// Run if executed directly
if (require.main === module) {
  main();
}
