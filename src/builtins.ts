/**
 * Built-in functions bound in the root environment.
 *
 * Every builtin returns either a value or a RuntimeError; argument counts are
 * checked by the registry before the implementation runs.
 */

import {
  Value,
  IntegerValue,
  StringValue,
  ArrayValue,
  HashValue,
  InstanceValue,
  nullVal,
  boolVal,
  intVal,
  stringVal,
  arrayVal,
  hashKey,
  isHashable,
  isInteger,
  typeName,
  valueToString,
  valuesEqual,
} from "./value";
import { BuiltinDef, BuiltinImpl, BuiltinRegistry } from "./builtin-registry";
import { fieldNames, setField, structName } from "./structs";
import {
  RuntimeError,
  typeMismatch,
  indexOutOfBounds,
  invalidOperation,
  undefinedField,
} from "./errors";

// ============================================================================
// Argument Helpers
// ============================================================================

export function expectInteger(value: Value, fn: string, position: number): IntegerValue | RuntimeError {
  return isInteger(value) ? value : typeMismatch("Integer", typeName(value), argContext(fn, position));
}

export function expectString(value: Value, fn: string, position: number): StringValue | RuntimeError {
  return value.tag === "string" ? value : typeMismatch("String", typeName(value), argContext(fn, position));
}

export function expectArray(value: Value, fn: string, position: number): ArrayValue | RuntimeError {
  return value.tag === "array" ? value : typeMismatch("Array", typeName(value), argContext(fn, position));
}

export function expectHash(value: Value, fn: string, position: number): HashValue | RuntimeError {
  return value.tag === "hash" ? value : typeMismatch("HashMap", typeName(value), argContext(fn, position));
}

function expectInstance(value: Value, fn: string, position: number): InstanceValue | RuntimeError {
  return value.tag === "instance" ? value : typeMismatch("struct instance", typeName(value), argContext(fn, position));
}

function argContext(fn: string, position: number): string {
  return `argument ${position} of ${fn}()`;
}

/**
 * Convert an integer argument to a JS index, failing when it is negative or
 * past `limit`.
 */
export function expectIndex(
  value: Value,
  fn: string,
  position: number,
  limit: number,
  receiver: "array" | "string"
): number | RuntimeError {
  const n = expectInteger(value, fn, position);
  if (n instanceof RuntimeError) return n;
  if (n.value < 0n || n.value > BigInt(limit)) {
    return indexOutOfBounds(n.value, limit, receiver);
  }
  return Number(n.value);
}

// ============================================================================
// Shared Operations
// ============================================================================

/** Length in characters (code points), not UTF-16 units */
export function charLength(s: string): number {
  return Array.from(s).length;
}

export function lengthOf(value: Value, fn: string): IntegerValue | RuntimeError {
  switch (value.tag) {
    case "string":
      return intVal(charLength(value.value));
    case "array":
      return intVal(value.elements.length);
    case "hash":
      return intVal(value.entries.size);
    default:
      return typeMismatch("String, Array or HashMap", typeName(value), argContext(fn, 1));
  }
}

export function containsValue(collection: Value, item: Value, fn: string): Value | RuntimeError {
  switch (collection.tag) {
    case "string": {
      const needle = expectString(item, fn, 2);
      if (needle instanceof RuntimeError) return needle;
      return boolVal(collection.value.includes(needle.value));
    }
    case "array":
      return boolVal(collection.elements.some(el => valuesEqual(el, item)));
    case "hash":
      return boolVal(isHashable(item) && collection.entries.has(hashKey(item)));
    default:
      return typeMismatch("String, Array or HashMap", typeName(collection), argContext(fn, 1));
  }
}

export function splitString(s: string, delimiter: string): Value {
  const parts = delimiter === "" ? Array.from(s) : s.split(delimiter);
  return arrayVal(parts.map(stringVal));
}

export function headOf(arr: ArrayValue, fn: string): Value | RuntimeError {
  if (arr.elements.length === 0) return invalidOperation(`${fn}() of an empty array`);
  return arr.elements[0];
}

export function tailOf(arr: ArrayValue, fn: string): Value | RuntimeError {
  if (arr.elements.length === 0) return invalidOperation(`${fn}() of an empty array`);
  return arrayVal(arr.elements.slice(1));
}

export function power(base: IntegerValue, exponent: IntegerValue): Value | RuntimeError {
  if (exponent.value < 0n) {
    return invalidOperation(`pow() exponent must be non-negative, got ${exponent.value}`);
  }
  return intVal(base.value ** exponent.value);
}

export function absolute(n: IntegerValue): IntegerValue {
  return intVal(n.value < 0n ? -n.value : n.value);
}

/**
 * Parse a decimal integer, with optional sign and surrounding whitespace.
 */
export function parseInteger(text: string): IntegerValue | RuntimeError {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return invalidOperation(`Cannot convert "${text}" to an integer`);
  }
  return intVal(BigInt(trimmed));
}

// ============================================================================
// Definitions
// ============================================================================

function def(name: string, minArgs: number, maxArgs: number, impl: BuiltinImpl): BuiltinDef {
  return { name, minArgs, maxArgs, impl };
}

/**
 * Builtin over two Integer arguments.
 */
function intBinary(name: string, op: (a: IntegerValue, b: IntegerValue) => Value | RuntimeError): BuiltinDef {
  return def(name, 2, 2, ([x, y]) => {
    const a = expectInteger(x, name, 1);
    if (a instanceof RuntimeError) return a;
    const b = expectInteger(y, name, 2);
    if (b instanceof RuntimeError) return b;
    return op(a, b);
  });
}

export const minOf = (a: IntegerValue, b: IntegerValue): IntegerValue => (a.value <= b.value ? a : b);
export const maxOf = (a: IntegerValue, b: IntegerValue): IntegerValue => (a.value >= b.value ? a : b);

export const BUILTINS: BuiltinDef[] = [
  // I/O
  def("print", 1, Infinity, (args, ctx) => {
    ctx.host.write(args.map(valueToString).join(""));
    return nullVal;
  }),

  def("println", 0, Infinity, (args, ctx) => {
    ctx.host.write(args.map(valueToString).join("") + "\n");
    return nullVal;
  }),

  def("input", 0, 1, (args, ctx) => {
    if (args.length === 1) {
      ctx.host.write(valueToString(args[0]));
    }
    const line = ctx.host.readLine();
    return line === null ? nullVal : stringVal(line);
  }),

  // Core
  def("type", 1, 1, ([v]) => stringVal(typeName(v))),

  def("str", 1, 1, ([v]) => stringVal(valueToString(v))),

  def("int", 1, 1, ([v]) => {
    if (isInteger(v)) return v;
    if (v.tag === "string") return parseInteger(v.value);
    return typeMismatch("Integer or String", typeName(v), argContext("int", 1));
  }),

  def("len", 1, 1, ([v]) => lengthOf(v, "len")),

  def("is_empty", 1, 1, ([v]) => {
    const n = lengthOf(v, "is_empty");
    if (n instanceof RuntimeError) return n;
    return boolVal(n.value === 0n);
  }),

  def("contains", 2, 2, ([collection, item]) => containsValue(collection, item, "contains")),

  def("slice", 2, 3, args => {
    const [target, startArg] = args;
    const endArg: Value | undefined = args[2];
    let length: number;
    if (target.tag === "array") {
      length = target.elements.length;
    } else if (target.tag === "string") {
      length = charLength(target.value);
    } else {
      return typeMismatch("Array or String", typeName(target), argContext("slice", 1));
    }

    const start = expectIndex(startArg, "slice", 2, length, target.tag);
    if (start instanceof RuntimeError) return start;
    const end = endArg === undefined ? length : expectIndex(endArg, "slice", 3, length, target.tag);
    if (end instanceof RuntimeError) return end;
    if (start > end) {
      return invalidOperation(`slice() start ${start} is greater than end ${end}`);
    }

    return target.tag === "array"
      ? arrayVal(target.elements.slice(start, end))
      : stringVal(Array.from(target.value).slice(start, end).join(""));
  }),

  // Strings
  def("split", 2, 2, ([s, d]) => {
    const str = expectString(s, "split", 1);
    if (str instanceof RuntimeError) return str;
    const delimiter = expectString(d, "split", 2);
    if (delimiter instanceof RuntimeError) return delimiter;
    return splitString(str.value, delimiter.value);
  }),

  def("replace", 3, 3, ([s, f, t]) => {
    const str = expectString(s, "replace", 1);
    if (str instanceof RuntimeError) return str;
    const from = expectString(f, "replace", 2);
    if (from instanceof RuntimeError) return from;
    const to = expectString(t, "replace", 3);
    if (to instanceof RuntimeError) return to;
    return stringVal(str.value.split(from.value).join(to.value));
  }),

  def("trim", 1, 1, ([s]) => {
    const str = expectString(s, "trim", 1);
    if (str instanceof RuntimeError) return str;
    return stringVal(str.value.trim());
  }),

  // Arrays
  def("head", 1, 1, ([a]) => {
    const arr = expectArray(a, "head", 1);
    if (arr instanceof RuntimeError) return arr;
    return headOf(arr, "head");
  }),

  def("tail", 1, 1, ([a]) => {
    const arr = expectArray(a, "tail", 1);
    if (arr instanceof RuntimeError) return arr;
    return tailOf(arr, "tail");
  }),

  def("cons", 2, 2, ([item, a]) => {
    const arr = expectArray(a, "cons", 2);
    if (arr instanceof RuntimeError) return arr;
    return arrayVal([item, ...arr.elements]);
  }),

  def("push", 2, 2, ([a, item]) => {
    const arr = expectArray(a, "push", 1);
    if (arr instanceof RuntimeError) return arr;
    arr.elements.push(item);
    return arr;
  }),

  // Integers
  intBinary("pow", power),
  def("abs", 1, 1, ([v]) => {
    const n = expectInteger(v, "abs", 1);
    if (n instanceof RuntimeError) return n;
    return absolute(n);
  }),
  intBinary("min", minOf),
  intBinary("max", maxOf),

  // Hash maps
  def("keys", 1, 1, ([h]) => {
    const hash = expectHash(h, "keys", 1);
    if (hash instanceof RuntimeError) return hash;
    return arrayVal(Array.from(hash.entries.values(), e => e.key));
  }),

  def("values", 1, 1, ([h]) => {
    const hash = expectHash(h, "values", 1);
    if (hash instanceof RuntimeError) return hash;
    return arrayVal(Array.from(hash.entries.values(), e => e.value));
  }),

  def("clear", 1, 1, ([h]) => {
    const hash = expectHash(h, "clear", 1);
    if (hash instanceof RuntimeError) return hash;
    hash.entries.clear();
    return hash;
  }),

  // Struct reflection
  def("fields", 1, 1, ([v]) => {
    const names = fieldNames(v);
    if (names instanceof RuntimeError) return names;
    return arrayVal(names.map(stringVal));
  }),

  def("name", 1, 1, ([v]) => {
    const name = structName(v);
    if (name instanceof RuntimeError) return name;
    return stringVal(name);
  }),

  def("get_field", 2, 2, ([v, f]) => {
    const instance = expectInstance(v, "get_field", 1);
    if (instance instanceof RuntimeError) return instance;
    const field = expectString(f, "get_field", 2);
    if (field instanceof RuntimeError) return field;
    return instance.fields.get(field.value) ?? undefinedField(`Struct ${instance.def.name}`, field.value);
  }),

  def("set_field", 3, 3, ([v, f, value]) => {
    const instance = expectInstance(v, "set_field", 1);
    if (instance instanceof RuntimeError) return instance;
    const field = expectString(f, "set_field", 2);
    if (field instanceof RuntimeError) return field;
    const err = setField(instance, field.value, value);
    return err ?? instance;
  }),
];

export function registerBuiltins(registry: BuiltinRegistry): void {
  for (const builtin of BUILTINS) {
    registry.register(builtin);
  }
}
