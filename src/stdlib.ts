/**
 * Native standard modules: `std.math` and `std.string`.
 */

import { BuiltinDef, BuiltinRegistry } from "./builtin-registry";
import { IntegerValue, intVal, stringVal, valueToString } from "./value";
import { expectArray, expectInteger, expectString, power, absolute, minOf, maxOf } from "./builtins";
import { RuntimeError, invalidOperation } from "./errors";

// ============================================================================
// std.math
// ============================================================================

export const MATH_MODULE: BuiltinDef[] = [
  {
    name: "abs",
    minArgs: 1,
    maxArgs: 1,
    impl: ([v]) => {
      const n = expectInteger(v, "abs", 1);
      return n instanceof RuntimeError ? n : absolute(n);
    },
  },
  {
    name: "min",
    minArgs: 1,
    maxArgs: Infinity,
    impl: args => {
      let best: IntegerValue | undefined;
      for (let i = 0; i < args.length; i++) {
        const n = expectInteger(args[i], "min", i + 1);
        if (n instanceof RuntimeError) return n;
        best = best === undefined ? n : minOf(best, n);
      }
      return best ?? invalidOperation("min() of no values");
    },
  },
  {
    name: "max",
    minArgs: 1,
    maxArgs: Infinity,
    impl: args => {
      let best: IntegerValue | undefined;
      for (let i = 0; i < args.length; i++) {
        const n = expectInteger(args[i], "max", i + 1);
        if (n instanceof RuntimeError) return n;
        best = best === undefined ? n : maxOf(best, n);
      }
      return best ?? invalidOperation("max() of no values");
    },
  },
  {
    name: "clamp",
    minArgs: 3,
    maxArgs: 3,
    impl: ([v, lo, hi]) => {
      const n = expectInteger(v, "clamp", 1);
      if (n instanceof RuntimeError) return n;
      const low = expectInteger(lo, "clamp", 2);
      if (low instanceof RuntimeError) return low;
      const high = expectInteger(hi, "clamp", 3);
      if (high instanceof RuntimeError) return high;
      if (low.value > high.value) {
        return invalidOperation(`clamp() lower bound ${low.value} is greater than upper bound ${high.value}`);
      }
      return minOf(maxOf(n, low), high);
    },
  },
  {
    name: "pow",
    minArgs: 2,
    maxArgs: 2,
    impl: ([b, e]) => {
      const base = expectInteger(b, "pow", 1);
      if (base instanceof RuntimeError) return base;
      const exp = expectInteger(e, "pow", 2);
      if (exp instanceof RuntimeError) return exp;
      return power(base, exp);
    },
  },
  {
    // random(lo, hi): uniform integer in [lo, hi]
    name: "random",
    minArgs: 2,
    maxArgs: 2,
    impl: ([lo, hi]) => {
      const low = expectInteger(lo, "random", 1);
      if (low instanceof RuntimeError) return low;
      const high = expectInteger(hi, "random", 2);
      if (high instanceof RuntimeError) return high;
      if (low.value > high.value) {
        return invalidOperation(`random() lower bound ${low.value} is greater than upper bound ${high.value}`);
      }
      const span = high.value - low.value + 1n;
      const offset = BigInt(Math.floor(Math.random() * Number(span)));
      // Float rounding on very wide spans can land one past the end
      return intVal(low.value + (offset < span ? offset : span - 1n));
    },
  },
];

// ============================================================================
// std.string
// ============================================================================

export const STRING_MODULE: BuiltinDef[] = [
  {
    name: "join",
    minArgs: 1,
    maxArgs: 2,
    impl: args => {
      const arr = expectArray(args[0], "join", 1);
      if (arr instanceof RuntimeError) return arr;
      let separator = "";
      if (args.length > 1) {
        const sep = expectString(args[1], "join", 2);
        if (sep instanceof RuntimeError) return sep;
        separator = sep.value;
      }
      return stringVal(arr.elements.map(valueToString).join(separator));
    },
  },
  {
    name: "reverse",
    minArgs: 1,
    maxArgs: 1,
    impl: ([s]) => {
      const str = expectString(s, "reverse", 1);
      if (str instanceof RuntimeError) return str;
      return stringVal(Array.from(str.value).reverse().join(""));
    },
  },
  {
    name: "repeat",
    minArgs: 2,
    maxArgs: 2,
    impl: ([s, n]) => {
      const str = expectString(s, "repeat", 1);
      if (str instanceof RuntimeError) return str;
      const count = expectInteger(n, "repeat", 2);
      if (count instanceof RuntimeError) return count;
      if (count.value < 0n) {
        return invalidOperation(`repeat() count must be non-negative, got ${count.value}`);
      }
      return stringVal(str.value.repeat(Number(count.value)));
    },
  },
];

export function registerStdModules(registry: BuiltinRegistry): void {
  registry.registerModule("std.math", MATH_MODULE);
  registry.registerModule("std.string", STRING_MODULE);
}
