/**
 * Giu: a dynamically-typed, tree-walking interpreted language.
 */

// Lexer
export { Lexer, LexerError, tokenize, tokenText, tokenCategory, quoteString } from "./lexer";
export type { Token, TokenType, TokenCategory } from "./lexer";

// Parser & AST
export { Parser, ParseError, parse, parseExpression } from "./parser";
export { exprToString, stmtToString, blockToString, programToString } from "./ast";
export type {
  Expr,
  Stmt,
  Block,
  Program,
  BinOp,
  UnaryOp,
  LiteralValue,
  FnExpr,
  IfExpr,
  ForClause,
  ModuleSource,
  ImportStmt,
  StructDecl,
} from "./ast";

// Values
export {
  nullVal,
  boolVal,
  intVal,
  stringVal,
  arrayVal,
  hashVal,
  hashKey,
  isInteger,
  isHashable,
  typeName,
  valueToString,
  valuesEqual,
  I64_MIN,
  I64_MAX,
} from "./value";
export type {
  Value,
  NullValue,
  BoolValue,
  IntValue,
  BigIntValue,
  IntegerValue,
  StringValue,
  ArrayValue,
  HashValue,
  HashableValue,
  FunctionValue,
  BuiltinValue,
  StructDefValue,
  InstanceValue,
  ModuleValue,
} from "./value";

// Environment
export { Env } from "./env";

// Errors
export {
  RuntimeError,
  describeError,
  undefinedVariable,
  undefinedField,
  typeMismatch,
  divisionByZero,
  indexOutOfBounds,
  missingKey,
  wrongArgumentCount,
  importCycle,
  moduleNotFound,
  invalidOperation,
} from "./errors";
export type { RuntimeErrorKind } from "./errors";

// Evaluation
export { evaluate, execute, evaluateProgram, callValue, ok, fail } from "./evaluate";
export type { Completion, EvalContext, ModuleImporter } from "./evaluate";
export { applyBinary, applyUnary, integerArithmetic } from "./operators";

// Structs
export { instantiate, getMember, setField, fieldNames, structName } from "./structs";

// Builtins
export { BuiltinRegistry, invokeBuiltin, checkArity, methodKind } from "./builtin-registry";
export type { BuiltinDef, BuiltinImpl, BuiltinContext, MethodKind } from "./builtin-registry";
export { BUILTINS, registerBuiltins } from "./builtins";
export { registerMethods } from "./methods";
export { MATH_MODULE, STRING_MODULE, registerStdModules } from "./stdlib";

// Modules
export { ModuleLoader, FileSourceReader, MemorySourceReader, SOURCE_EXTENSION } from "./modules";
export type { SourceReader, ModuleLoaderOptions } from "./modules";

// Host & interpreter
export { ProcessHost, BufferHost } from "./host";
export type { Host } from "./host";
export { Interpreter, createInterpreter, createRegistry } from "./interpreter";
export type { InterpreterOptions } from "./interpreter";
