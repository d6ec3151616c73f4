/**
 * Builtin Registry
 *
 * Holds the native functions bound in the root environment, the native
 * methods available on built-in value kinds, and the native modules that
 * `import` resolves without touching the filesystem.
 *
 * A registry is built per interpreter; nothing here is global.
 */

import type { Env } from "./env";
import type { Host } from "./host";
import { Value, BuiltinValue, IntegerValue, StringValue, ArrayValue, HashValue, builtinVal, isInteger, typeName } from "./value";
import { RuntimeError, typeMismatch, wrongArgumentCount } from "./errors";

// ============================================================================
// Builtin Definition Interface
// ============================================================================

export interface BuiltinContext {
  host: Host;
}

/**
 * Native implementation. For methods, `args[0]` is the receiver.
 */
export type BuiltinImpl = (args: Value[], ctx: BuiltinContext) => Value | RuntimeError;

export interface BuiltinDef {
  name: string;
  /** Argument counts, not counting a method's receiver */
  minArgs: number;
  maxArgs: number;
  impl: BuiltinImpl;
}

/** Value kinds that carry built-in methods */
export type MethodKind = "integer" | "string" | "array" | "hash";

export function methodKind(value: Value): MethodKind | undefined {
  if (isInteger(value)) return "integer";
  switch (value.tag) {
    case "string":
    case "array":
    case "hash":
      return value.tag;
    default:
      return undefined;
  }
}

interface MethodReceivers {
  integer: IntegerValue;
  string: StringValue;
  array: ArrayValue;
  hash: HashValue;
}

export type MethodImpl<K extends MethodKind> = (
  receiver: MethodReceivers[K],
  args: Value[],
  ctx: BuiltinContext
) => Value | RuntimeError;

// ============================================================================
// Builtin Registry
// ============================================================================

export class BuiltinRegistry {
  private readonly functions: Map<string, BuiltinDef> = new Map();
  private readonly methods: Map<MethodKind, Map<string, BuiltinDef>> = new Map();
  private readonly modules: Map<string, Map<string, BuiltinDef>> = new Map();

  register(def: BuiltinDef): void {
    this.functions.set(def.name, def);
  }

  get(name: string): BuiltinDef | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys());
  }

  /**
   * Register a method for one receiver kind. The receiver is checked before
   * the implementation runs.
   */
  registerMethod<K extends MethodKind>(
    kind: K,
    name: string,
    minArgs: number,
    maxArgs: number,
    impl: MethodImpl<K>
  ): void {
    let table = this.methods.get(kind);
    if (table === undefined) {
      table = new Map();
      this.methods.set(kind, table);
    }
    table.set(name, {
      name,
      minArgs,
      maxArgs,
      impl: (args, ctx) => {
        const [receiver, ...rest] = args;
        const narrowed = narrowReceiver(kind, receiver);
        if (narrowed === undefined) {
          return typeMismatch(kind, receiver === undefined ? "nothing" : typeName(receiver), `method '${name}'`);
        }
        return impl(narrowed, rest, ctx);
      },
    });
  }

  /**
   * Look up a built-in method for a value, bound to that value.
   */
  lookupMethod(receiver: Value, name: string): BuiltinValue | undefined {
    const kind = methodKind(receiver);
    if (kind === undefined) return undefined;
    const def = this.methods.get(kind)?.get(name);
    return def === undefined ? undefined : builtinVal(def, receiver);
  }

  methodNames(kind: MethodKind): string[] {
    return Array.from(this.methods.get(kind)?.keys() ?? []);
  }

  registerModule(name: string, defs: BuiltinDef[]): void {
    this.modules.set(name, new Map(defs.map(def => [def.name, def])));
  }

  /**
   * Exports of a native module as fresh builtin values.
   */
  moduleExports(name: string): Map<string, Value> | undefined {
    const defs = this.modules.get(name);
    if (defs === undefined) return undefined;
    const exports = new Map<string, Value>();
    for (const [exportName, def] of defs) {
      exports.set(exportName, builtinVal(def));
    }
    return exports;
  }

  /**
   * Bind every registered function in the given environment.
   */
  install(env: Env): void {
    for (const def of this.functions.values()) {
      env.define(def.name, builtinVal(def));
    }
  }
}

function narrowReceiver<K extends MethodKind>(kind: K, receiver: Value | undefined): MethodReceivers[K] | undefined;
function narrowReceiver(kind: MethodKind, receiver: Value | undefined): MethodReceivers[MethodKind] | undefined {
  if (receiver === undefined || methodKind(receiver) !== kind) return undefined;
  if (isInteger(receiver)) return receiver;
  switch (receiver.tag) {
    case "string":
    case "array":
    case "hash":
      return receiver;
    default:
      return undefined;
  }
}

// ============================================================================
// Invocation
// ============================================================================

export function checkArity(def: BuiltinDef, got: number): RuntimeError | undefined {
  if (got < def.minArgs || got > def.maxArgs) {
    return wrongArgumentCount(def.name, def.minArgs, def.maxArgs, got);
  }
  return undefined;
}

/**
 * Call a builtin value, prepending its bound receiver if it has one.
 */
export function invokeBuiltin(fn: BuiltinValue, args: Value[], ctx: BuiltinContext): Value | RuntimeError {
  const arityError = checkArity(fn.def, args.length);
  if (arityError !== undefined) return arityError;
  return fn.def.impl(fn.receiver === undefined ? args : [fn.receiver, ...args], ctx);
}
