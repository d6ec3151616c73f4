/**
 * Built-in methods on integers, strings, arrays and hash maps.
 *
 * `xs.push(4)` looks up `push` in the array table and calls it with `xs` as
 * the receiver. Method names are per kind, so `len` on a string and `len` on
 * an array are separate entries.
 */

import { BuiltinRegistry } from "./builtin-registry";
import {
  Value,
  nullVal,
  boolVal,
  intVal,
  stringVal,
  arrayVal,
  hashKey,
  isHashable,
  typeName,
  valueToString,
} from "./value";
import {
  expectInteger,
  expectString,
  charLength,
  containsValue,
  splitString,
  headOf,
  tailOf,
  power,
  absolute,
  parseInteger,
  minOf,
  maxOf,
} from "./builtins";
import { RuntimeError, typeMismatch, missingKey, invalidOperation } from "./errors";

function keyMismatch(value: Value, method: string): RuntimeError {
  return typeMismatch("hashable key (Boolean, Integer or String)", typeName(value), `${method}()`);
}

export function registerMethods(registry: BuiltinRegistry): void {
  // ==========================================================================
  // Integer
  // ==========================================================================

  registry.registerMethod("integer", "to_string", 0, 0, n => stringVal(n.value.toString()));

  registry.registerMethod("integer", "pow", 1, 1, (n, [e]) => {
    const exp = expectInteger(e, "pow", 1);
    if (exp instanceof RuntimeError) return exp;
    return power(n, exp);
  });

  registry.registerMethod("integer", "abs", 0, 0, n => absolute(n));

  registry.registerMethod("integer", "min", 1, 1, (n, [o]) => {
    const other = expectInteger(o, "min", 1);
    if (other instanceof RuntimeError) return other;
    return minOf(n, other);
  });

  registry.registerMethod("integer", "max", 1, 1, (n, [o]) => {
    const other = expectInteger(o, "max", 1);
    if (other instanceof RuntimeError) return other;
    return maxOf(n, other);
  });

  // ==========================================================================
  // String
  // ==========================================================================

  registry.registerMethod("string", "len", 0, 0, s => intVal(charLength(s.value)));
  registry.registerMethod("string", "is_empty", 0, 0, s => boolVal(s.value === ""));
  registry.registerMethod("string", "to_int", 0, 0, s => parseInteger(s.value));
  registry.registerMethod("string", "trim", 0, 0, s => stringVal(s.value.trim()));
  registry.registerMethod("string", "upper", 0, 0, s => stringVal(s.value.toUpperCase()));
  registry.registerMethod("string", "lower", 0, 0, s => stringVal(s.value.toLowerCase()));

  registry.registerMethod("string", "starts_with", 1, 1, (s, [p]) => {
    const prefix = expectString(p, "starts_with", 1);
    if (prefix instanceof RuntimeError) return prefix;
    return boolVal(s.value.startsWith(prefix.value));
  });

  registry.registerMethod("string", "ends_with", 1, 1, (s, [p]) => {
    const suffix = expectString(p, "ends_with", 1);
    if (suffix instanceof RuntimeError) return suffix;
    return boolVal(s.value.endsWith(suffix.value));
  });

  registry.registerMethod("string", "contains", 1, 1, (s, [needle]) => containsValue(s, needle, "contains"));

  registry.registerMethod("string", "replace", 2, 2, (s, [f, t]) => {
    const from = expectString(f, "replace", 1);
    if (from instanceof RuntimeError) return from;
    const to = expectString(t, "replace", 2);
    if (to instanceof RuntimeError) return to;
    return stringVal(s.value.split(from.value).join(to.value));
  });

  registry.registerMethod("string", "split", 1, 1, (s, [d]) => {
    const delimiter = expectString(d, "split", 1);
    if (delimiter instanceof RuntimeError) return delimiter;
    return splitString(s.value, delimiter.value);
  });

  // ==========================================================================
  // Array
  // ==========================================================================

  registry.registerMethod("array", "len", 0, 0, a => intVal(a.elements.length));
  registry.registerMethod("array", "is_empty", 0, 0, a => boolVal(a.elements.length === 0));
  registry.registerMethod("array", "head", 0, 0, a => headOf(a, "head"));
  registry.registerMethod("array", "tail", 0, 0, a => tailOf(a, "tail"));
  registry.registerMethod("array", "contains", 1, 1, (a, [item]) => containsValue(a, item, "contains"));

  registry.registerMethod("array", "push", 1, 1, (a, [item]) => {
    a.elements.push(item);
    return a;
  });

  registry.registerMethod("array", "pop", 0, 0, a => {
    const last = a.elements.pop();
    return last ?? invalidOperation("pop() of an empty array");
  });

  // ==========================================================================
  // HashMap
  // ==========================================================================

  registry.registerMethod("hash", "len", 0, 0, h => intVal(h.entries.size));
  registry.registerMethod("hash", "is_empty", 0, 0, h => boolVal(h.entries.size === 0));
  registry.registerMethod("hash", "keys", 0, 0, h => arrayVal(Array.from(h.entries.values(), e => e.key)));
  registry.registerMethod("hash", "values", 0, 0, h => arrayVal(Array.from(h.entries.values(), e => e.value)));

  registry.registerMethod("hash", "get", 1, 2, (h, args) => {
    const k = args[0];
    const fallback: Value | undefined = args[1];
    if (!isHashable(k)) return keyMismatch(k, "get");
    const entry = h.entries.get(hashKey(k));
    if (entry !== undefined) return entry.value;
    // With a default, a missing key is not an error
    return fallback ?? missingKey(valueToString(k));
  });

  registry.registerMethod("hash", "set", 2, 2, (h, [k, value]) => {
    if (!isHashable(k)) return keyMismatch(k, "set");
    h.entries.set(hashKey(k), { key: k, value });
    return h;
  });

  registry.registerMethod("hash", "has", 1, 1, (h, [k]) => boolVal(isHashable(k) && h.entries.has(hashKey(k))));

  registry.registerMethod("hash", "remove", 1, 1, (h, [k]) => {
    if (!isHashable(k)) return keyMismatch(k, "remove");
    const key = hashKey(k);
    const entry = h.entries.get(key);
    if (entry === undefined) return nullVal;
    h.entries.delete(key);
    return entry.value;
  });

  registry.registerMethod("hash", "clear", 0, 0, h => {
    h.entries.clear();
    return h;
  });
}
