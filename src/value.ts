/**
 * Runtime values for the interpreter.
 *
 * Arrays, hash maps and struct instances are reference values: every handle
 * shares the same underlying storage, so mutation through one alias is
 * visible through all of them.
 */

import type { Block } from "./ast";
import type { Env } from "./env";
import type { BuiltinDef } from "./builtin-registry";

// ============================================================================
// Value Types
// ============================================================================

export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | BigIntValue
  | StringValue
  | ArrayValue
  | HashValue
  | FunctionValue
  | BuiltinValue
  | StructDefValue
  | InstanceValue
  | ModuleValue;

export interface NullValue {
  tag: "null";
}

export interface BoolValue {
  tag: "bool";
  value: boolean;
}

/** Integer within the signed 64-bit range */
export interface IntValue {
  tag: "int";
  value: bigint;
}

/** Integer outside the signed 64-bit range */
export interface BigIntValue {
  tag: "bigint";
  value: bigint;
}

export interface StringValue {
  tag: "string";
  value: string;
}

export interface ArrayValue {
  tag: "array";
  elements: Value[];
}

export interface HashEntry {
  key: HashableValue;
  value: Value;
}

export interface HashValue {
  tag: "hash";
  /** Keyed by hashKey(entry.key); insertion ordered */
  entries: Map<string, HashEntry>;
}

export interface FunctionValue {
  tag: "function";
  name?: string;
  params: string[];
  body: Block;
  env: Env;
  /** Directory of the module that defined the function */
  dir: string;
  /** Set when the function was looked up as a method on an instance */
  self?: InstanceValue;
}

export interface BuiltinValue {
  tag: "builtin";
  def: BuiltinDef;
  /** Receiver for built-in methods looked up on a value (`xs.push`) */
  receiver?: Value;
}

export interface StructDefValue {
  tag: "struct";
  name: string;
  /** Field defaults in declaration order */
  fields: Map<string, Value>;
  methods: Map<string, FunctionValue>;
}

export interface InstanceValue {
  tag: "instance";
  def: StructDefValue;
  fields: Map<string, Value>;
}

export interface ModuleValue {
  tag: "module";
  name: string;
  exports: Map<string, Value>;
}

export type IntegerValue = IntValue | BigIntValue;
export type HashableValue = BoolValue | IntValue | BigIntValue | StringValue;

// ============================================================================
// Constructors
// ============================================================================

export const nullVal: NullValue = { tag: "null" };
export const trueVal: BoolValue = { tag: "bool", value: true };
export const falseVal: BoolValue = { tag: "bool", value: false };

export const boolVal = (value: boolean): BoolValue => (value ? trueVal : falseVal);
export const stringVal = (value: string): StringValue => ({ tag: "string", value });
export const arrayVal = (elements: Value[]): ArrayValue => ({ tag: "array", elements });

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

/**
 * Build an integer value, choosing the 64-bit or arbitrary-precision
 * representation by magnitude.
 */
export function intVal(value: bigint | number): IntegerValue {
  const n = BigInt(value);
  return n < I64_MIN || n > I64_MAX ? { tag: "bigint", value: n } : { tag: "int", value: n };
}

export function hashVal(entries: [HashableValue, Value][] = []): HashValue {
  const map = new Map<string, HashEntry>();
  for (const [key, value] of entries) {
    map.set(hashKey(key), { key, value });
  }
  return { tag: "hash", entries: map };
}

export const builtinVal = (def: BuiltinDef, receiver?: Value): BuiltinValue =>
  receiver === undefined ? { tag: "builtin", def } : { tag: "builtin", def, receiver };

export const moduleVal = (name: string, exports: Map<string, Value>): ModuleValue => ({
  tag: "module",
  name,
  exports,
});

// ============================================================================
// Predicates
// ============================================================================

export function isInteger(value: Value): value is IntegerValue {
  return value.tag === "int" || value.tag === "bigint";
}

export function isHashable(value: Value): value is HashableValue {
  return value.tag === "bool" || value.tag === "string" || isInteger(value);
}

/**
 * Identity used for hash-map storage. Integer and big-integer keys share a
 * namespace since one number only ever has one representation.
 */
export function hashKey(key: HashableValue): string {
  switch (key.tag) {
    case "bool":
      return `b:${key.value}`;
    case "int":
    case "bigint":
      return `i:${key.value}`;
    case "string":
      return `s:${key.value}`;
  }
}

// ============================================================================
// Type Names
// ============================================================================

export function typeName(value: Value): string {
  switch (value.tag) {
    case "null":
      return "Null";
    case "bool":
      return "Boolean";
    case "int":
      return "Integer";
    case "bigint":
      return "BigInteger";
    case "string":
      return "String";
    case "array":
      return "Array";
    case "hash":
      return "HashMap";
    case "function":
      return "Function";
    case "builtin":
      return "Builtin";
    case "struct":
      return "Struct";
    case "instance":
      return value.def.name;
    case "module":
      return "Module";
  }
}

// ============================================================================
// Display
// ============================================================================

/**
 * Textual form used by print, println, str and the REPL. Strings print their
 * contents without quotes, also inside collections.
 */
export function valueToString(value: Value): string {
  switch (value.tag) {
    case "null":
      return "null";

    case "bool":
      return value.value ? "true" : "false";

    case "int":
    case "bigint":
      return value.value.toString();

    case "string":
      return value.value;

    case "array":
      return `[${value.elements.map(valueToString).join(", ")}]`;

    case "hash": {
      const entries: string[] = [];
      for (const { key, value: v } of value.entries.values()) {
        entries.push(`${valueToString(key)} : ${valueToString(v)}`);
      }
      return `{${entries.join(", ")}}`;
    }

    case "function":
      return "[function]";

    case "builtin":
      return `[built-in function: ${value.def.name}]`;

    case "struct":
      return `[struct ${value.name}]`;

    case "instance": {
      const fields: string[] = [];
      for (const [name, v] of value.fields) {
        fields.push(`${name}: ${valueToString(v)}`);
      }
      return fields.length === 0 ? `${value.def.name} {}` : `${value.def.name} { ${fields.join(", ")} }`;
    }

    case "module":
      return `[module ${value.name}]`;
  }
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality for `==`. Collections compare element-wise; instances,
 * functions, struct definitions and modules compare by identity.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.tag) {
    case "null":
      return b.tag === "null";

    case "bool":
    case "int":
    case "bigint":
    case "string":
      return b.tag === a.tag && b.value === a.value;

    case "array":
      return (
        b.tag === "array" &&
        a.elements.length === b.elements.length &&
        a.elements.every((el, i) => valuesEqual(el, b.elements[i]))
      );

    case "hash": {
      if (b.tag !== "hash" || a.entries.size !== b.entries.size) return false;
      for (const [k, entry] of a.entries) {
        const other = b.entries.get(k);
        if (other === undefined || !valuesEqual(entry.value, other.value)) return false;
      }
      return true;
    }

    case "builtin":
      return b.tag === "builtin" && a.def.name === b.def.name;

    case "function":
      // Each member lookup binds a fresh copy; same method on the same receiver is equal
      if (a === b) return true;
      return (
        b.tag === "function" &&
        a.self !== undefined &&
        a.self === b.self &&
        a.body === b.body &&
        a.env === b.env
      );

    case "struct":
    case "instance":
    case "module":
      return a === b;
  }
}
