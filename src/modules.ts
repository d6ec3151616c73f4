/**
 * Module loading.
 *
 * A module is identified by its canonical path. It is evaluated once, in a
 * fresh scope whose parent is the root environment, and its top-level
 * bindings become its exports. Native modules (`std.math`, `std.string`)
 * come from the builtin registry and never touch the filesystem.
 */

import * as fs from "fs";
import * as path from "path";
import type { Env } from "./env";
import type { Host } from "./host";
import type { BuiltinRegistry } from "./builtin-registry";
import type { ModuleSource, Program } from "./ast";
import { Value, ModuleValue, moduleVal } from "./value";
import { RuntimeError, importCycle, invalidOperation, moduleNotFound } from "./errors";
import { LexerError } from "./lexer";
import { ParseError, parse } from "./parser";
import { Completion, EvalContext, ModuleImporter, evaluateProgram } from "./evaluate";

export const SOURCE_EXTENSION = ".giu";

// ============================================================================
// Source Readers
// ============================================================================

export interface SourceReader {
  /**
   * Absolute, normalized identity of a path, or undefined when nothing
   * readable exists there.
   */
  canonicalize(filePath: string): string | undefined;
  /** Read a canonical path; throws if it cannot be read */
  read(canonicalPath: string): string;
}

export class FileSourceReader implements SourceReader {
  canonicalize(filePath: string): string | undefined {
    try {
      const real = fs.realpathSync(filePath);
      return fs.statSync(real).isFile() ? real : undefined;
    } catch (err) {
      if (isMissingFileError(err)) return undefined;
      throw err;
    }
  }

  read(canonicalPath: string): string {
    return fs.readFileSync(canonicalPath, "utf8");
  }
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/**
 * Source reader over a fixed set of files, keyed by absolute path.
 */
export class MemorySourceReader implements SourceReader {
  private readonly files: Map<string, string> = new Map();
  /** Paths read so far, in order */
  readonly reads: string[] = [];

  constructor(files: Record<string, string> = {}) {
    for (const [filePath, source] of Object.entries(files)) {
      this.files.set(path.resolve(filePath), source);
    }
  }

  canonicalize(filePath: string): string | undefined {
    const resolved = path.resolve(filePath);
    return this.files.has(resolved) ? resolved : undefined;
  }

  read(canonicalPath: string): string {
    const source = this.files.get(canonicalPath);
    if (source === undefined) {
      throw new Error(`No such file: ${canonicalPath}`);
    }
    this.reads.push(canonicalPath);
    return source;
  }
}

// ============================================================================
// Module Loader
// ============================================================================

export interface ModuleLoaderOptions {
  reader: SourceReader;
  registry: BuiltinRegistry;
  host: Host;
  /** Parent scope of every module's top-level scope */
  root: Env;
}

export class ModuleLoader implements ModuleImporter {
  private readonly reader: SourceReader;
  private readonly registry: BuiltinRegistry;
  private readonly host: Host;
  private readonly root: Env;

  private readonly cache: Map<string, ModuleValue> = new Map();
  /** Canonical paths currently being evaluated, outermost first */
  private readonly loading: string[] = [];

  constructor(options: ModuleLoaderOptions) {
    this.reader = options.reader;
    this.registry = options.registry;
    this.host = options.host;
    this.root = options.root;
  }

  /**
   * Evaluation context for code whose imports resolve against `dir`.
   */
  context(dir: string): EvalContext {
    return { registry: this.registry, host: this.host, modules: this, dir };
  }

  canonicalize(filePath: string): string | undefined {
    return this.reader.canonicalize(filePath);
  }

  read(canonicalPath: string): string {
    return this.reader.read(canonicalPath);
  }

  /**
   * Run an entry-point program while its path counts as in progress, so an
   * import chain leading back to it is reported as a cycle.
   */
  runEntry(canonicalPath: string, run: () => Completion): Completion {
    this.loading.push(canonicalPath);
    try {
      return run();
    } finally {
      this.loading.pop();
    }
  }

  isCached(canonicalPath: string): boolean {
    return this.cache.has(canonicalPath);
  }

  load(source: ModuleSource, fromDir: string): ModuleValue | RuntimeError {
    if (source.kind === "dotted") {
      const dotted = source.segments.join(".");
      const exports = this.registry.moduleExports(dotted);
      if (exports !== undefined) {
        return this.loadNative(dotted, exports);
      }
      const relative = source.segments.join("/") + SOURCE_EXTENSION;
      return this.loadFile(dotted, relative, fromDir, source.segments[source.segments.length - 1]);
    }

    const relative = path.extname(source.path) === "" ? source.path + SOURCE_EXTENSION : source.path;
    return this.loadFile(source.path, relative, fromDir, path.basename(relative, path.extname(relative)));
  }

  private loadNative(name: string, exports: Map<string, Value>): ModuleValue {
    const key = `native:${name}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;
    const module = moduleVal(name, exports);
    this.cache.set(key, module);
    return module;
  }

  private loadFile(specifier: string, relative: string, fromDir: string, name: string): ModuleValue | RuntimeError {
    const resolved = path.resolve(fromDir, relative);
    const canonical = this.reader.canonicalize(resolved);
    if (canonical === undefined) {
      return moduleNotFound(specifier, resolved);
    }

    const cached = this.cache.get(canonical);
    if (cached !== undefined) return cached;

    const cycleStart = this.loading.indexOf(canonical);
    if (cycleStart !== -1) {
      return importCycle([...this.loading.slice(cycleStart), canonical]);
    }

    let text: string;
    try {
      text = this.reader.read(canonical);
    } catch (err) {
      if (err instanceof Error) return moduleNotFound(specifier, canonical);
      throw err;
    }

    const program = parseModule(specifier, text);
    if (program instanceof RuntimeError) return program;

    const env = this.root.child();
    const result = this.runEntry(canonical, () => evaluateProgram(program, env, this.context(path.dirname(canonical))));
    if (result.kind === "error") return result.error;

    const module = moduleVal(name, new Map(env.entries()));
    this.cache.set(canonical, module);
    return module;
  }
}

function parseModule(specifier: string, text: string): Program | RuntimeError {
  try {
    return parse(text);
  } catch (err) {
    if (err instanceof LexerError || err instanceof ParseError) {
      return invalidOperation(`Failed to load module '${specifier}': ${err.message}`);
    }
    throw err;
  }
}
