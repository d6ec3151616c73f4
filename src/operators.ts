/**
 * Operator semantics for the strict (non-short-circuit) binary operators and
 * the unary operators.
 *
 * Integer arithmetic is exact: results that fit in 64 bits are Integer,
 * everything else is BigInteger.
 */

import type { BinOp, UnaryOp } from "./ast";
import {
  Value,
  IntegerValue,
  intVal,
  boolVal,
  stringVal,
  isInteger,
  valuesEqual,
  typeName,
} from "./value";
import { RuntimeError, divisionByZero, typeMismatch } from "./errors";

export type StrictBinOp = Exclude<BinOp, "&&" | "||">;

// ============================================================================
// Binary Operators
// ============================================================================

export function applyBinary(op: StrictBinOp, left: Value, right: Value): Value | RuntimeError {
  switch (op) {
    case "==":
      return boolVal(valuesEqual(left, right));
    case "!=":
      return boolVal(!valuesEqual(left, right));

    case "<":
    case ">":
    case "<=":
    case ">=":
      return compare(op, left, right);

    case "+":
      if (left.tag === "string" && right.tag === "string") {
        return stringVal(left.value + right.value);
      }
      return arithmetic(op, left, right);

    case "-":
    case "*":
    case "/":
    case "%":
      return arithmetic(op, left, right);
  }
}

function arithmetic(op: "+" | "-" | "*" | "/" | "%", left: Value, right: Value): Value | RuntimeError {
  if (!isInteger(left) || !isInteger(right)) {
    const expected = op === "+" ? "Integer or String operands" : "Integer operands";
    return typeMismatch(expected, `${typeName(left)} and ${typeName(right)}`, `'${op}'`);
  }
  return integerArithmetic(op, left, right);
}

/**
 * BigInt division and remainder truncate toward zero, and the remainder
 * takes the sign of the dividend.
 */
export function integerArithmetic(
  op: "+" | "-" | "*" | "/" | "%",
  left: IntegerValue,
  right: IntegerValue
): IntegerValue | RuntimeError {
  const a = left.value;
  const b = right.value;
  switch (op) {
    case "+":
      return intVal(a + b);
    case "-":
      return intVal(a - b);
    case "*":
      return intVal(a * b);
    case "/":
      if (b === 0n) return divisionByZero("/");
      return intVal(a / b);
    case "%":
      if (b === 0n) return divisionByZero("%");
      return intVal(a % b);
  }
}

function compare(op: "<" | ">" | "<=" | ">=", left: Value, right: Value): Value | RuntimeError {
  let a: bigint | string;
  let b: bigint | string;

  if (isInteger(left) && isInteger(right)) {
    a = left.value;
    b = right.value;
  } else if (left.tag === "string" && right.tag === "string") {
    a = left.value;
    b = right.value;
  } else {
    return typeMismatch(
      "two Integers or two Strings",
      `${typeName(left)} and ${typeName(right)}`,
      `'${op}'`
    );
  }

  switch (op) {
    case "<":
      return boolVal(a < b);
    case ">":
      return boolVal(a > b);
    case "<=":
      return boolVal(a <= b);
    case ">=":
      return boolVal(a >= b);
  }
}

// ============================================================================
// Unary Operators
// ============================================================================

export function applyUnary(op: UnaryOp, operand: Value): Value | RuntimeError {
  switch (op) {
    case "!":
      if (operand.tag !== "bool") {
        return typeMismatch("Boolean", typeName(operand), "'!'");
      }
      return boolVal(!operand.value);

    case "-":
      if (!isInteger(operand)) {
        return typeMismatch("Integer", typeName(operand), "unary '-'");
      }
      return intVal(-operand.value);

    case "+":
      if (!isInteger(operand)) {
        return typeMismatch("Integer", typeName(operand), "unary '+'");
      }
      return operand;
  }
}
