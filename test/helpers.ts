/**
 * Test helper utilities shared by the spec files
 */

import { Backend, CompiledFunction, FunctionBuilder, ValueHandle } from '../src/jit/Backend.js';
import { Expression } from '../src/jit/AST.js';
import { binary, ident, num, unary } from '../src/jit/Builders.js';
import { BINARY_OPERATORS, BinaryOperator, UNARY_OPERATORS, UnaryOperator } from '../src/jit/Operators.js';
import { FunctionBuilderBase } from '../src/jit/backends/FunctionBuilderBase.js';
import { BACKEND_NAMES, BackendName } from '../src/jit/backends/index.js';

export const ALL_BACKENDS: readonly BackendName[] = BACKEND_NAMES;

/**
 * Backend that records every emitted instruction as a line of text
 *
 * @example
 * const backend = new RecordingBackend();
 * compileExpression(num(1), BindingSet.of(), { backend });
 * backend.log; // ['const 1 -> 0', 'return 0']
 */
export class RecordingBackend implements Backend {
  readonly name = 'recording';
  readonly log: string[] = [];
  readonly builders: RecordingBuilder[] = [];

  /**
   * @param compileFailure - thrown from every `compile` once a return was emitted
   */
  constructor(
    private readonly invoke: (args: readonly number[]) => number = () => 0,
    private readonly compileFailure?: Error
  ) {}

  declareFunction(parameterCount: number): FunctionBuilder {
    this.log.push(`declare ${parameterCount}`);
    const builder = new RecordingBuilder(this.name, parameterCount, this.log, this.invoke, this.compileFailure);
    this.builders.push(builder);
    return builder;
  }
}

export class RecordingBuilder extends FunctionBuilderBase {
  releaseCount = 0;
  finishCount = 0;

  constructor(
    backendName: string,
    parameterCount: number,
    private readonly log: string[],
    private readonly invoke: (args: readonly number[]) => number,
    private readonly compileFailure?: Error
  ) {
    super(backendName, parameterCount);
  }

  protected buildConstant(value: number, result: ValueHandle): ValueHandle {
    this.log.push(`const ${value} -> ${result}`);
    return result;
  }

  protected buildParamRead(index: number, result: ValueHandle): ValueHandle {
    this.log.push(`param ${index} -> ${result}`);
    return result;
  }

  protected buildBinary(op: BinaryOperator, left: ValueHandle, right: ValueHandle, result: ValueHandle): ValueHandle {
    this.log.push(`${left} ${op} ${right} -> ${result}`);
    return result;
  }

  protected buildUnary(op: UnaryOperator, operand: ValueHandle, result: ValueHandle): ValueHandle {
    this.log.push(`${op} ${operand} -> ${result}`);
    return result;
  }

  protected buildReturn(value: ValueHandle): void {
    this.log.push(`return ${value}`);
  }

  protected finish(): CompiledFunction {
    this.finishCount++;
    if (this.compileFailure) {
      throw this.compileFailure;
    }
    const arity = this.parameterCount;
    const listing = this.log.join('\n');
    return {
      arity,
      invoke: this.invoke,
      disassemble: () => listing
    };
  }

  protected release(): void {
    this.releaseCount++;
  }
}

/**
 * Deterministic PRNG (mulberry32) so generated trees are reproducible
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

/**
 * Random expression tree of at most `depth` levels
 *
 * @param names - identifiers to draw from; empty for constant-only trees
 */
export function randomExpression(random: () => number, depth: number, names: readonly string[]): Expression {
  if (depth <= 1 || random() < 0.2) {
    if (names.length > 0 && random() < 0.5) {
      return ident(pick(random, names));
    }
    return num(Math.round((random() * 20 - 10) * 100) / 100);
  }

  if (random() < 0.3) {
    return unary(pick(random, UNARY_OPERATORS), randomExpression(random, depth - 1, names));
  }

  return binary(
    pick(random, BINARY_OPERATORS),
    randomExpression(random, depth - 1, names),
    randomExpression(random, depth - 1, names)
  );
}
