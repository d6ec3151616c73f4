/**
 * Runtime errors raised by the evaluator.
 *
 * Lexer and parser errors live next to the lexer and parser; everything that
 * can go wrong while a program runs is a RuntimeError with a kind.
 */

import { LexerError } from "./lexer";
import { ParseError } from "./parser";

export type RuntimeErrorKind =
  | "UndefinedVariable"
  | "UndefinedField"
  | "TypeMismatch"
  | "DivisionByZero"
  | "IndexOutOfBounds"
  | "MissingKey"
  | "WrongArgumentCount"
  | "ImportCycle"
  | "ModuleNotFound"
  | "InvalidOperation";

export class RuntimeError extends Error {
  constructor(
    public readonly kind: RuntimeErrorKind,
    message: string
  ) {
    super(message);
    this.name = "RuntimeError";
  }
}

// ============================================================================
// Constructors
// ============================================================================

export const undefinedVariable = (name: string): RuntimeError =>
  new RuntimeError("UndefinedVariable", `Undefined variable: '${name}'`);

export const undefinedField = (owner: string, field: string): RuntimeError =>
  new RuntimeError("UndefinedField", `${owner} has no field or method '${field}'`);

export const typeMismatch = (expected: string, got: string, context?: string): RuntimeError =>
  new RuntimeError(
    "TypeMismatch",
    context
      ? `Type mismatch in ${context}: expected ${expected}, got ${got}`
      : `Type mismatch: expected ${expected}, got ${got}`
  );

export const divisionByZero = (op: "/" | "%"): RuntimeError =>
  new RuntimeError("DivisionByZero", op === "/" ? "Division by zero" : "Modulo by zero");

export const indexOutOfBounds = (index: bigint, length: number, receiver: "array" | "string"): RuntimeError =>
  new RuntimeError("IndexOutOfBounds", `Index ${index} out of bounds for ${receiver} of length ${length}`);

export const missingKey = (key: string): RuntimeError =>
  new RuntimeError("MissingKey", `Key not found: ${key}`);

export function wrongArgumentCount(name: string, min: number, max: number, got: number): RuntimeError {
  const expected =
    min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
  const plural = (max === Infinity ? min : max) === 1 ? "" : "s";
  return new RuntimeError("WrongArgumentCount", `${name}() expects ${expected} argument${plural}, got ${got}`);
}

export const importCycle = (chain: string[]): RuntimeError =>
  new RuntimeError("ImportCycle", `Import cycle detected: ${chain.join(" -> ")}`);

export const moduleNotFound = (specifier: string, resolved: string): RuntimeError =>
  new RuntimeError("ModuleNotFound", `Module '${specifier}' not found (looked for ${resolved})`);

export const invalidOperation = (message: string): RuntimeError =>
  new RuntimeError("InvalidOperation", message);

// ============================================================================
// Reporting
// ============================================================================

/**
 * One-line, labelled description of anything the interpreter can throw.
 */
export function describeError(error: unknown): string {
  if (error instanceof LexerError) {
    return `Lexer error: ${error.message}`;
  }

  if (error instanceof ParseError) {
    return `Parse error: ${error.message}`;
  }

  if (error instanceof RuntimeError) {
    return `Runtime error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}
