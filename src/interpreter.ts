/**
 * Interpreter context.
 *
 * Owns everything one run needs: the builtin registry, the root environment
 * holding the builtins, the top-level scope for user code, the module loader
 * and the host. Separate interpreters share nothing.
 */

import * as path from "path";
import type { Program } from "./ast";
import { Env } from "./env";
import { Value } from "./value";
import { parse } from "./parser";
import { Completion, evaluateProgram } from "./evaluate";
import { BuiltinRegistry } from "./builtin-registry";
import { registerBuiltins } from "./builtins";
import { registerMethods } from "./methods";
import { registerStdModules } from "./stdlib";
import { ModuleLoader, SourceReader, FileSourceReader } from "./modules";
import { Host, ProcessHost } from "./host";
import { RuntimeError, invalidOperation, moduleNotFound } from "./errors";

export interface InterpreterOptions {
  /** Where program output goes and `input()` reads from (default: process streams) */
  host?: Host;
  /** Directory that imports resolve against for code without a file (default: cwd) */
  baseDir?: string;
  /** How module and script files are read (default: the filesystem) */
  reader?: SourceReader;
}

/**
 * Registry with every builtin function, method and native module.
 */
export function createRegistry(): BuiltinRegistry {
  const registry = new BuiltinRegistry();
  registerBuiltins(registry);
  registerMethods(registry);
  registerStdModules(registry);
  return registry;
}

export class Interpreter {
  readonly registry: BuiltinRegistry;
  readonly host: Host;
  readonly loader: ModuleLoader;
  /** Builtins live here; modules and user code run in child scopes */
  readonly root: Env;
  /** Top-level scope of code run through `run`; persists across calls */
  readonly globals: Env;
  readonly baseDir: string;

  constructor(options: InterpreterOptions = {}) {
    this.registry = createRegistry();
    this.host = options.host ?? new ProcessHost();
    this.baseDir = path.resolve(options.baseDir ?? process.cwd());
    this.root = new Env();
    this.registry.install(this.root);
    this.globals = this.root.child();
    this.loader = new ModuleLoader({
      reader: options.reader ?? new FileSourceReader(),
      registry: this.registry,
      host: this.host,
      root: this.root,
    });
  }

  /**
   * Lex and parse without evaluating.
   * Throws LexerError or ParseError.
   */
  check(source: string): Program {
    return parse(source);
  }

  /**
   * Run source text in the persistent top-level scope and return the value
   * of its last statement.
   * Throws LexerError, ParseError or RuntimeError.
   */
  run(source: string): Value {
    const program = parse(source);
    return this.unwrap(() => evaluateProgram(program, this.globals, this.loader.context(this.baseDir)));
  }

  /**
   * Run a script file. Its imports resolve against its own directory, and
   * importing the script from one of its modules is a cycle.
   */
  runFile(filePath: string): Value {
    const resolved = path.resolve(this.baseDir, filePath);
    const canonical = this.loader.canonicalize(resolved);
    if (canonical === undefined) {
      throw moduleNotFound(filePath, resolved);
    }
    const program = parse(this.loader.read(canonical));
    const ctx = this.loader.context(path.dirname(canonical));
    return this.unwrap(() => this.loader.runEntry(canonical, () => evaluateProgram(program, this.globals, ctx)));
  }

  /**
   * Read and parse a script file without running it.
   */
  checkFile(filePath: string): Program {
    const resolved = path.resolve(this.baseDir, filePath);
    const canonical = this.loader.canonicalize(resolved);
    if (canonical === undefined) {
      throw moduleNotFound(filePath, resolved);
    }
    return parse(this.loader.read(canonical));
  }

  private unwrap(run: () => Completion): Value {
    let result: Completion;
    try {
      result = run();
    } catch (err) {
      // Host limits: call stack depth, BigInt size, string length
      if (err instanceof RangeError) {
        throw invalidOperation(
          err.message.includes("call stack") ? "Stack overflow: recursion too deep" : err.message
        );
      }
      throw err;
    }
    if (result.kind === "error") throw result.error;
    if (result.kind === "value") return result.value;
    // evaluateProgram only yields value or error completions
    throw new RuntimeError("InvalidOperation", `Unexpected '${result.kind}' at top level`);
  }
}

export function createInterpreter(options: InterpreterOptions = {}): Interpreter {
  return new Interpreter(options);
}
