/**
 * Backend contract for code generation
 *
 * A backend turns a sequence of emitted instructions into a callable function.
 * Every parameter and the result are double precision. Value handles are
 * opaque to the code generator; a backend only accepts handles it handed out
 * for the same function.
 */

import { BinaryOperator, UnaryOperator } from './Operators.js';

export type ValueHandle = number;

export interface Backend {
  readonly name: string;
  declareFunction(parameterCount: number): FunctionBuilder;
}

export interface FunctionBuilder {
  readonly parameterCount: number;
  emitConstant(value: number): ValueHandle;
  emitParamRead(index: number): ValueHandle;
  emitBinary(op: BinaryOperator, left: ValueHandle, right: ValueHandle): ValueHandle;
  emitUnary(op: UnaryOperator, operand: ValueHandle): ValueHandle;
  emitReturn(value: ValueHandle): void;
  /** Finalize the function; fails unless a return was emitted */
  compile(): CompiledFunction;
  /** Release instruction-building state; the builder is unusable afterwards */
  dispose(): void;
}

export interface CompiledFunction {
  readonly arity: number;
  /** Arguments must already match `arity` and binding order */
  invoke(args: readonly number[]): number;
  /** Human-readable listing of the compiled instructions */
  disassemble(): string;
}
