/**
 * arith-jit - Compile arithmetic expression trees into callable functions
 *
 * Trees are built programmatically, bound to an ordered set of named
 * parameters, and lowered through a pluggable backend (JavaScript source,
 * a register tape VM, or WebAssembly).
 */

// Core API
export { compileExpression, compileAndRun, CompiledExpression, resolveBackend } from './jit/Compiler.js';
export type { CompileOptions } from './jit/Compiler.js';
export { BindingSet } from './jit/Bindings.js';
export type { ArgumentValues } from './jit/Bindings.js';
export { ExpressionCodeGen, generateFunction } from './jit/CodeGen.js';
export { evaluate } from './jit/Evaluate.js';

// AST
export type {
  Expression,
  ExpressionVisitor,
  NumberLiteral,
  Identifier,
  UnaryOp,
  BinaryOp
} from './jit/AST.js';
export { visitExpression } from './jit/AST.js';
export * from './jit/Builders.js';
export {
  UNARY_OPERATORS,
  BINARY_OPERATORS,
  isUnaryOperator,
  isBinaryOperator,
  applyUnary,
  applyBinary
} from './jit/Operators.js';
export type { UnaryOperator, BinaryOperator } from './jit/Operators.js';
export {
  collectIdentifiers,
  serializeExpression,
  countNodes,
  expressionDepth,
  formatLiteral
} from './jit/ExpressionUtils.js';
export { decodeExpression, readExpression, writeExpression } from './jit/ExpressionCodec.js';

// Backends
export type { Backend, FunctionBuilder, CompiledFunction, ValueHandle } from './jit/Backend.js';
export {
  BACKEND_NAMES,
  createBackend,
  isBackendName,
  FunctionBuilderBase,
  JsBackend,
  TapeBackend,
  WasmBackend
} from './jit/backends/index.js';
export type { BackendName } from './jit/backends/index.js';

// Errors
export {
  UnboundIdentifierError,
  BackendError,
  ArityMismatchError,
  MissingArgumentError,
  ExpressionFormatError,
  formatError
} from './jit/Errors.js';
