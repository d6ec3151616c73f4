/**
 * Tests for arithmetic, comparison and equality.
 */
import { describe, it, expect } from "vitest";

import {
  applyBinary,
  applyUnary,
  arrayVal,
  boolVal,
  hashVal,
  intVal,
  nullVal,
  stringVal,
  RuntimeError,
  I64_MAX,
  I64_MIN,
} from "../src/index";

function errorOf(result: unknown): RuntimeError {
  if (result instanceof RuntimeError) return result;
  throw new Error(`expected a RuntimeError, got ${String(result)}`);
}

describe("Operator Tests", () => {
  describe("integer arithmetic", () => {
    it("computes the basic operations", () => {
      expect(applyBinary("+", intVal(2), intVal(3))).toEqual(intVal(5));
      expect(applyBinary("-", intVal(2), intVal(3))).toEqual(intVal(-1));
      expect(applyBinary("*", intVal(4), intVal(3))).toEqual(intVal(12));
    });

    it("truncates division and remainder toward zero", () => {
      expect(applyBinary("/", intVal(7), intVal(2))).toEqual(intVal(3));
      expect(applyBinary("/", intVal(-7), intVal(2))).toEqual(intVal(-3));
      expect(applyBinary("%", intVal(-7), intVal(2))).toEqual(intVal(-1));
      expect(applyBinary("%", intVal(7), intVal(-2))).toEqual(intVal(1));
    });

    it("reports division and modulo by zero", () => {
      const div = errorOf(applyBinary("/", intVal(1), intVal(0)));
      expect(div.kind).toBe("DivisionByZero");
      expect(div.message).toBe("Division by zero");
      expect(errorOf(applyBinary("%", intVal(1), intVal(0))).message).toBe("Modulo by zero");
    });

    it("promotes past the 64-bit range", () => {
      expect(applyBinary("+", intVal(I64_MAX), intVal(1))).toEqual({ tag: "bigint", value: I64_MAX + 1n });
      expect(applyBinary("-", intVal(I64_MIN), intVal(1))).toEqual({ tag: "bigint", value: I64_MIN - 1n });
      expect(applyBinary("*", intVal(2n ** 62n), intVal(4))).toEqual({ tag: "bigint", value: 2n ** 64n });
    });

    it("demotes back into the 64-bit range", () => {
      const big = intVal(I64_MAX + 10n);
      expect(big.tag).toBe("bigint");
      expect(applyBinary("-", big, intVal(10))).toEqual({ tag: "int", value: I64_MAX });
    });

    it("negates the most negative integer into a big integer", () => {
      expect(applyUnary("-", intVal(I64_MIN))).toEqual({ tag: "bigint", value: I64_MAX + 1n });
    });
  });

  describe("strings", () => {
    it("concatenates with +", () => {
      expect(applyBinary("+", stringVal("foo"), stringVal("bar"))).toEqual(stringVal("foobar"));
    });

    it("does not coerce mixed operands", () => {
      const err = errorOf(applyBinary("+", intVal(1), stringVal("a")));
      expect(err.kind).toBe("TypeMismatch");
      expect(err.message).toBe("Type mismatch in '+': expected Integer or String operands, got Integer and String");
      expect(errorOf(applyBinary("*", stringVal("a"), intVal(3))).message).toBe(
        "Type mismatch in '*': expected Integer operands, got String and Integer"
      );
    });
  });

  describe("comparison", () => {
    it("orders integers across representations", () => {
      expect(applyBinary("<", intVal(1), intVal(I64_MAX + 1n))).toEqual(boolVal(true));
      expect(applyBinary(">=", intVal(3), intVal(3))).toEqual(boolVal(true));
      expect(applyBinary(">", intVal(2), intVal(3))).toEqual(boolVal(false));
    });

    it("orders strings lexicographically", () => {
      expect(applyBinary("<", stringVal("apple"), stringVal("banana"))).toEqual(boolVal(true));
      expect(applyBinary("<=", stringVal("b"), stringVal("a"))).toEqual(boolVal(false));
    });

    it("rejects mixed comparisons", () => {
      expect(errorOf(applyBinary("<", intVal(1), stringVal("2"))).message).toBe(
        "Type mismatch in '<': expected two Integers or two Strings, got Integer and String"
      );
    });
  });

  describe("equality", () => {
    it("compares scalars by value", () => {
      expect(applyBinary("==", intVal(1), intVal(1))).toEqual(boolVal(true));
      expect(applyBinary("==", intVal(1), stringVal("1"))).toEqual(boolVal(false));
      expect(applyBinary("==", nullVal, nullVal)).toEqual(boolVal(true));
      expect(applyBinary("!=", boolVal(true), boolVal(false))).toEqual(boolVal(true));
    });

    it("compares collections structurally", () => {
      const a = arrayVal([intVal(1), arrayVal([stringVal("x")])]);
      const b = arrayVal([intVal(1), arrayVal([stringVal("x")])]);
      expect(applyBinary("==", a, b)).toEqual(boolVal(true));
      expect(applyBinary("==", arrayVal([intVal(1)]), arrayVal([intVal(1), intVal(2)]))).toEqual(boolVal(false));

      const h1 = hashVal([
        [stringVal("a"), intVal(1)],
        [intVal(2), boolVal(true)],
      ]);
      const h2 = hashVal([
        [intVal(2), boolVal(true)],
        [stringVal("a"), intVal(1)],
      ]);
      expect(applyBinary("==", h1, h2)).toEqual(boolVal(true));
    });
  });

  describe("unary", () => {
    it("negates booleans and integers", () => {
      expect(applyUnary("!", boolVal(false))).toEqual(boolVal(true));
      expect(applyUnary("-", intVal(5))).toEqual(intVal(-5));
    });

    it("has no implicit truthiness", () => {
      expect(errorOf(applyUnary("!", intVal(0))).message).toBe("Type mismatch in '!': expected Boolean, got Integer");
      expect(errorOf(applyUnary("-", stringVal("a"))).message).toBe(
        "Type mismatch in unary '-': expected Integer, got String"
      );
    });
  });
});
