/**
 * Tree-walking evaluator.
 *
 * Every statement and expression evaluates to a Completion. Control flow
 * (break, continue, return) and runtime errors travel as ordinary return
 * values; nothing in here throws for language-level events.
 */

import type {
  Expr,
  Stmt,
  Block,
  Program,
  FnExpr,
  IfExpr,
  ForStmt,
  ImportStmt,
  StructDecl,
  AssignExpr,
  LiteralValue,
  ModuleSource,
} from "./ast";
import {
  Value,
  FunctionValue,
  ModuleValue,
  HashEntry,
  nullVal,
  intVal,
  stringVal,
  boolVal,
  arrayVal,
  hashKey,
  isHashable,
  typeName,
  valueToString,
} from "./value";
import { Env } from "./env";
import { applyBinary, applyUnary } from "./operators";
import { defineStruct, instantiate, getMember, getStaticMember, setField } from "./structs";
import { BuiltinRegistry, invokeBuiltin } from "./builtin-registry";
import type { Host } from "./host";
import {
  RuntimeError,
  typeMismatch,
  undefinedField,
  indexOutOfBounds,
  missingKey,
  wrongArgumentCount,
  invalidOperation,
} from "./errors";

// ============================================================================
// Completion
// ============================================================================

export type Completion =
  | { kind: "value"; value: Value }
  | { kind: "break" }
  | { kind: "continue" }
  | { kind: "return"; value: Value }
  | { kind: "error"; error: RuntimeError };

export const ok = (value: Value): Completion => ({ kind: "value", value });
export const fail = (error: RuntimeError): Completion => ({ kind: "error", error });

const BREAK: Completion = { kind: "break" };
const CONTINUE: Completion = { kind: "continue" };
const NULL: Completion = ok(nullVal);

function fromResult(result: Value | RuntimeError): Completion {
  return result instanceof RuntimeError ? fail(result) : ok(result);
}

// ============================================================================
// Evaluation Context
// ============================================================================

export interface ModuleImporter {
  /** Resolve, load (once) and return a module, relative to `fromDir` */
  load(source: ModuleSource, fromDir: string): ModuleValue | RuntimeError;
}

export interface EvalContext {
  registry: BuiltinRegistry;
  host: Host;
  modules: ModuleImporter;
  /** Directory of the module being evaluated; imports resolve against it */
  dir: string;
}

// ============================================================================
// Programs & Blocks
// ============================================================================

/**
 * Run top-level statements directly in `env`. A top-level `return` ends the
 * program with its value; the result is otherwise the last statement's value.
 */
export function evaluateProgram(program: Program, env: Env, ctx: EvalContext): Completion {
  const result = evalStatements(program, env, ctx);
  switch (result.kind) {
    case "value":
    case "error":
      return result;
    case "return":
      return ok(result.value);
    case "break":
    case "continue":
      return fail(invalidOperation(`'${result.kind}' outside of a loop`));
  }
}

function evalStatements(stmts: Stmt[], env: Env, ctx: EvalContext): Completion {
  let last: Completion = NULL;
  for (const stmt of stmts) {
    last = execute(stmt, env, ctx);
    if (last.kind !== "value") return last;
  }
  return last;
}

export function evalBlock(block: Block, env: Env, ctx: EvalContext): Completion {
  return evalStatements(block.body, env.child(), ctx);
}

// ============================================================================
// Statements
// ============================================================================

export function execute(stmt: Stmt, env: Env, ctx: EvalContext): Completion {
  switch (stmt.tag) {
    case "let": {
      const value = evaluate(stmt.value, env, ctx);
      if (value.kind !== "value") return value;
      env.define(stmt.name, nameFunction(stmt.value, value.value, stmt.name));
      return NULL;
    }

    case "exprStmt":
      return evaluate(stmt.expr, env, ctx);

    case "return": {
      if (stmt.value === null) return { kind: "return", value: nullVal };
      const value = evaluate(stmt.value, env, ctx);
      if (value.kind !== "value") return value;
      return { kind: "return", value: value.value };
    }

    case "break":
      return BREAK;

    case "continue":
      return CONTINUE;

    case "while":
      while (true) {
        const cond = evalCondition(stmt.cond, env, ctx, "while condition");
        if (cond.kind !== "value") return cond;
        if (cond.value.tag === "bool" && !cond.value.value) break;

        const body = evalBlock(stmt.body, env, ctx);
        if (body.kind === "break") break;
        if (body.kind === "return" || body.kind === "error") return body;
      }
      return NULL;

    case "for":
      return execFor(stmt, env, ctx);

    case "import":
      return execImport(stmt, env, ctx);

    case "struct":
      return execStruct(stmt, env, ctx);
  }
}

/**
 * `let f = fn(...) {...}` names the function after its binding.
 */
function nameFunction(expr: Expr, value: Value, name: string): Value {
  if (expr.tag === "fn" && value.tag === "function" && value.name === undefined) {
    return { ...value, name };
  }
  return value;
}

/**
 * Evaluate a condition that must produce a Boolean.
 */
function evalCondition(expr: Expr, env: Env, ctx: EvalContext, context: string): Completion {
  const result = evaluate(expr, env, ctx);
  if (result.kind !== "value") return result;
  if (result.value.tag !== "bool") {
    return fail(typeMismatch("Boolean", typeName(result.value), context));
  }
  return result;
}

function execFor(stmt: ForStmt, env: Env, ctx: EvalContext): Completion {
  const clause = stmt.clause;

  if (clause.kind === "in") {
    const iterable = evaluate(clause.iterable, env, ctx);
    if (iterable.kind !== "value") return iterable;
    const source = iterable.value;

    let next: (i: number) => Value | undefined;
    switch (source.tag) {
      case "array":
        // Length is re-read each step, so pushes during the loop are visited
        next = i => source.elements[i];
        break;
      case "string": {
        const chars = Array.from(source.value);
        next = i => (i < chars.length ? stringVal(chars[i]) : undefined);
        break;
      }
      case "hash": {
        const keys = Array.from(source.entries.values(), e => e.key);
        next = i => keys[i];
        break;
      }
      default:
        return fail(typeMismatch("Array, String or HashMap", typeName(source), "for-in loop"));
    }

    for (let i = 0; ; i++) {
      const item = next(i);
      if (item === undefined) break;
      const loopEnv = env.child();
      loopEnv.define(clause.name, item);
      const body = evalBlock(stmt.body, loopEnv, ctx);
      if (body.kind === "break") break;
      if (body.kind === "return" || body.kind === "error") return body;
    }
    return NULL;
  }

  const loopEnv = env.child();
  if (clause.init !== null) {
    const init = clause.init.tag === "let" ? execute(clause.init, loopEnv, ctx) : evaluate(clause.init, loopEnv, ctx);
    if (init.kind !== "value") return init;
  }

  while (true) {
    if (clause.cond !== null) {
      const cond = evalCondition(clause.cond, loopEnv, ctx, "for-loop condition");
      if (cond.kind !== "value") return cond;
      if (cond.value.tag === "bool" && !cond.value.value) break;
    }

    const body = evalBlock(stmt.body, loopEnv, ctx);
    if (body.kind === "break") break;
    if (body.kind === "return" || body.kind === "error") return body;

    if (clause.update !== null) {
      const update = evaluate(clause.update, loopEnv, ctx);
      if (update.kind !== "value") return update;
    }
  }
  return NULL;
}

function execImport(stmt: ImportStmt, env: Env, ctx: EvalContext): Completion {
  const module = ctx.modules.load(stmt.source, ctx.dir);
  if (module instanceof RuntimeError) return fail(module);

  if (stmt.names !== null) {
    for (const name of stmt.names) {
      const value = module.exports.get(name);
      if (value === undefined) return fail(undefinedField(`Module ${module.name}`, name));
      env.define(name, value);
    }
    return NULL;
  }

  if (stmt.source.kind === "dotted") {
    const segments = stmt.source.segments;
    env.define(segments[segments.length - 1], module);
  } else {
    for (const [name, value] of module.exports) {
      env.define(name, value);
    }
  }
  return NULL;
}

function execStruct(stmt: StructDecl, env: Env, ctx: EvalContext): Completion {
  const fields = new Map<string, Value>();
  for (const field of stmt.fields) {
    const value = evaluate(field.value, env, ctx);
    if (value.kind !== "value") return value;
    fields.set(field.name, value.value);
  }

  const methods = new Map<string, FunctionValue>();
  for (const method of stmt.methods) {
    methods.set(method.name, makeFunction(method.fn, env, ctx.dir));
  }

  env.define(stmt.name, defineStruct(stmt.name, fields, methods));
  return NULL;
}

// ============================================================================
// Expressions
// ============================================================================

export function evaluate(expr: Expr, env: Env, ctx: EvalContext): Completion {
  switch (expr.tag) {
    case "literal":
      return ok(literalValue(expr.value));

    case "ident":
      return fromResult(env.get(expr.name));

    case "this":
      if (!env.has("this")) {
        return fail(invalidOperation("'this' is only available inside a method"));
      }
      return fromResult(env.get("this"));

    case "binary": {
      if (expr.op === "&&" || expr.op === "||") {
        const context = `'${expr.op}'`;
        const left = evalCondition(expr.left, env, ctx, context);
        if (left.kind !== "value") return left;
        // `false && x` and `true || x` never evaluate x
        if (left.value.tag === "bool" && left.value.value === (expr.op === "||")) return left;
        return evalCondition(expr.right, env, ctx, context);
      }
      const left = evaluate(expr.left, env, ctx);
      if (left.kind !== "value") return left;
      const right = evaluate(expr.right, env, ctx);
      if (right.kind !== "value") return right;
      return fromResult(applyBinary(expr.op, left.value, right.value));
    }

    case "unary": {
      const operand = evaluate(expr.operand, env, ctx);
      if (operand.kind !== "value") return operand;
      return fromResult(applyUnary(expr.op, operand.value));
    }

    case "call": {
      const callee = evaluate(expr.callee, env, ctx);
      if (callee.kind !== "value") return callee;
      const args: Value[] = [];
      for (const argExpr of expr.args) {
        const arg = evaluate(argExpr, env, ctx);
        if (arg.kind !== "value") return arg;
        args.push(arg.value);
      }
      return callValue(callee.value, args, ctx);
    }

    case "index": {
      const object = evaluate(expr.object, env, ctx);
      if (object.kind !== "value") return object;
      const index = evaluate(expr.index, env, ctx);
      if (index.kind !== "value") return index;
      return fromResult(indexValue(object.value, index.value));
    }

    case "member": {
      const object = evaluate(expr.object, env, ctx);
      if (object.kind !== "value") return object;
      return fromResult(memberValue(object.value, expr.name, ctx));
    }

    case "array": {
      const elements: Value[] = [];
      for (const el of expr.elements) {
        const value = evaluate(el, env, ctx);
        if (value.kind !== "value") return value;
        elements.push(value.value);
      }
      return ok(arrayVal(elements));
    }

    case "hash": {
      const entries = new Map<string, HashEntry>();
      for (const entry of expr.entries) {
        const key = evaluate(entry.key, env, ctx);
        if (key.kind !== "value") return key;
        if (!isHashable(key.value)) {
          return fail(typeMismatch("hashable key (Boolean, Integer or String)", typeName(key.value), "map literal"));
        }
        const value = evaluate(entry.value, env, ctx);
        if (value.kind !== "value") return value;
        entries.set(hashKey(key.value), { key: key.value, value: value.value });
      }
      return ok({ tag: "hash", entries });
    }

    case "structLit": {
      const def = env.get(expr.name);
      if (def instanceof RuntimeError) return fail(def);
      const inits: [string, Value][] = [];
      for (const field of expr.fields) {
        const value = evaluate(field.value, env, ctx);
        if (value.kind !== "value") return value;
        inits.push([field.name, value.value]);
      }
      return fromResult(instantiate(def, expr.name, inits));
    }

    case "fn":
      return ok(makeFunction(expr, env, ctx.dir));

    case "if":
      return evalIf(expr, env, ctx);

    case "assign":
      return evalAssign(expr, env, ctx);
  }
}

function literalValue(lit: LiteralValue): Value {
  switch (lit.kind) {
    case "int":
      return intVal(lit.value);
    case "string":
      return stringVal(lit.value);
    case "bool":
      return boolVal(lit.value);
    case "null":
      return nullVal;
  }
}

function makeFunction(expr: FnExpr, env: Env, dir: string): FunctionValue {
  const fn: FunctionValue = { tag: "function", params: expr.params, body: expr.body, env, dir };
  if (expr.name !== undefined) fn.name = expr.name;
  return fn;
}

function evalIf(expr: IfExpr, env: Env, ctx: EvalContext): Completion {
  const cond = evalCondition(expr.cond, env, ctx, "if condition");
  if (cond.kind !== "value") return cond;

  if (cond.value.tag === "bool" && cond.value.value) {
    return evalBlock(expr.then, env, ctx);
  }
  if (expr.else === null) return NULL;
  return expr.else.tag === "block" ? evalBlock(expr.else, env, ctx) : evalIf(expr.else, env, ctx);
}

function evalAssign(expr: AssignExpr, env: Env, ctx: EvalContext): Completion {
  const target = expr.target;

  switch (target.tag) {
    case "ident": {
      const value = evaluate(expr.value, env, ctx);
      if (value.kind !== "value") return value;
      const err = env.set(target.name, value.value);
      return err === undefined ? value : fail(err);
    }

    case "index": {
      const object = evaluate(target.object, env, ctx);
      if (object.kind !== "value") return object;
      const index = evaluate(target.index, env, ctx);
      if (index.kind !== "value") return index;
      const value = evaluate(expr.value, env, ctx);
      if (value.kind !== "value") return value;
      const err = assignIndex(object.value, index.value, value.value);
      return err === undefined ? value : fail(err);
    }

    case "member": {
      const object = evaluate(target.object, env, ctx);
      if (object.kind !== "value") return object;
      const value = evaluate(expr.value, env, ctx);
      if (value.kind !== "value") return value;
      if (object.value.tag !== "instance") {
        return fail(typeMismatch("struct instance", typeName(object.value), `assignment to '.${target.name}'`));
      }
      const err = setField(object.value, target.name, value.value);
      return err === undefined ? value : fail(err);
    }
  }
}

// ============================================================================
// Indexing & Members
// ============================================================================

function position(index: Value, length: number, receiver: "array" | "string"): number | RuntimeError {
  if (index.tag !== "int" && index.tag !== "bigint") {
    return typeMismatch("Integer", typeName(index), `${receiver} index`);
  }
  if (index.value < 0n || index.value >= BigInt(length)) {
    return indexOutOfBounds(index.value, length, receiver);
  }
  return Number(index.value);
}

export function indexValue(object: Value, index: Value): Value | RuntimeError {
  switch (object.tag) {
    case "array": {
      const pos = position(index, object.elements.length, "array");
      if (pos instanceof RuntimeError) return pos;
      return object.elements[pos];
    }

    case "string": {
      const chars = Array.from(object.value);
      const pos = position(index, chars.length, "string");
      if (pos instanceof RuntimeError) return pos;
      return stringVal(chars[pos]);
    }

    case "hash": {
      if (!isHashable(index)) {
        return typeMismatch("hashable key (Boolean, Integer or String)", typeName(index), "map index");
      }
      const entry = object.entries.get(hashKey(index));
      if (entry === undefined) return missingKey(valueToString(index));
      return entry.value;
    }

    default:
      return typeMismatch("Array, String or HashMap", typeName(object), "index expression");
  }
}

function assignIndex(object: Value, index: Value, value: Value): RuntimeError | undefined {
  switch (object.tag) {
    case "array": {
      const pos = position(index, object.elements.length, "array");
      if (pos instanceof RuntimeError) return pos;
      object.elements[pos] = value;
      return undefined;
    }

    case "hash":
      if (!isHashable(index)) {
        return typeMismatch("hashable key (Boolean, Integer or String)", typeName(index), "map index");
      }
      object.entries.set(hashKey(index), { key: index, value });
      return undefined;

    default:
      return typeMismatch("Array or HashMap", typeName(object), "index assignment");
  }
}

export function memberValue(object: Value, name: string, ctx: EvalContext): Value | RuntimeError {
  switch (object.tag) {
    case "instance":
      return getMember(object, name);

    case "struct":
      return getStaticMember(object, name);

    case "module": {
      const value = object.exports.get(name);
      return value ?? undefinedField(`Module ${object.name}`, name);
    }

    default:
      return ctx.registry.lookupMethod(object, name) ?? undefinedField(typeName(object), name);
  }
}

// ============================================================================
// Calls
// ============================================================================

/**
 * Call a function or builtin with already-evaluated arguments.
 */
export function callValue(callee: Value, args: Value[], ctx: EvalContext): Completion {
  switch (callee.tag) {
    case "function":
      return callFunction(callee, args, ctx);

    case "builtin":
      return fromResult(invokeBuiltin(callee, args, { host: ctx.host }));

    default:
      return fail(typeMismatch("Function", typeName(callee), "call"));
  }
}

function callFunction(fn: FunctionValue, args: Value[], ctx: EvalContext): Completion {
  if (args.length !== fn.params.length) {
    const count = fn.params.length;
    return fail(wrongArgumentCount(fn.name ?? "function", count, count, args.length));
  }

  const callEnv = fn.env.child();
  if (fn.self !== undefined) {
    callEnv.define("this", fn.self);
  }
  fn.params.forEach((param, i) => callEnv.define(param, args[i]));

  // Imports inside the body resolve against the defining module
  const result = evalStatements(fn.body.body, callEnv, { ...ctx, dir: fn.dir });
  switch (result.kind) {
    case "value":
    case "error":
      return result;
    case "return":
      return ok(result.value);
    case "break":
    case "continue":
      return fail(invalidOperation(`'${result.kind}' outside of a loop`));
  }
}
