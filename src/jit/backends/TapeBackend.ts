/**
 * Register tape backend.
 * Records one instruction per value into a flat tape and runs it on a small
 * virtual machine; value handle N is register N.
 */

import { Backend, CompiledFunction, FunctionBuilder, ValueHandle } from '../Backend.js';
import { formatLiteral } from '../ExpressionUtils.js';
import { applyBinary, applyUnary, BinaryOperator, UnaryOperator } from '../Operators.js';
import { FunctionBuilderBase } from './FunctionBuilderBase.js';

export type TapeInstruction =
  | { op: 'const'; dst: number; value: number }
  | { op: 'param'; dst: number; index: number }
  | { op: 'unary'; dst: number; fn: UnaryOperator; src: number }
  | { op: 'binary'; dst: number; fn: BinaryOperator; left: number; right: number };

export class TapeBackend implements Backend {
  readonly name = 'tape';

  declareFunction(parameterCount: number): FunctionBuilder {
    return new TapeFunctionBuilder(this.name, parameterCount);
  }
}

class TapeFunctionBuilder extends FunctionBuilderBase {
  private tape: TapeInstruction[] = [];
  private result: number = -1;

  protected buildConstant(value: number, dst: ValueHandle): ValueHandle {
    this.tape.push({ op: 'const', dst, value });
    return dst;
  }

  protected buildParamRead(index: number, dst: ValueHandle): ValueHandle {
    this.tape.push({ op: 'param', dst, index });
    return dst;
  }

  protected buildBinary(fn: BinaryOperator, left: ValueHandle, right: ValueHandle, dst: ValueHandle): ValueHandle {
    this.tape.push({ op: 'binary', dst, fn, left, right });
    return dst;
  }

  protected buildUnary(fn: UnaryOperator, src: ValueHandle, dst: ValueHandle): ValueHandle {
    this.tape.push({ op: 'unary', dst, fn, src });
    return dst;
  }

  protected buildReturn(value: ValueHandle): void {
    this.result = value;
  }

  protected finish(): CompiledFunction {
    return new TapeFunction(this.parameterCount, [...this.tape], this.valueCount, this.result);
  }

  protected release(): void {
    this.tape = [];
  }
}

export class TapeFunction implements CompiledFunction {
  constructor(
    readonly arity: number,
    private readonly tape: readonly TapeInstruction[],
    private readonly registerCount: number,
    private readonly result: number
  ) {}

  invoke(args: readonly number[]): number {
    const registers = new Float64Array(this.registerCount);

    for (const insn of this.tape) {
      switch (insn.op) {
        case 'const':
          registers[insn.dst] = insn.value;
          break;
        case 'param':
          registers[insn.dst] = args[insn.index];
          break;
        case 'unary':
          registers[insn.dst] = applyUnary(insn.fn, registers[insn.src]);
          break;
        case 'binary':
          registers[insn.dst] = applyBinary(insn.fn, registers[insn.left], registers[insn.right]);
          break;
      }
    }

    return registers[this.result];
  }

  disassemble(): string {
    const lines = this.tape.map(insn => {
      switch (insn.op) {
        case 'const':
          return `r${insn.dst} = const ${formatLiteral(insn.value)}`;
        case 'param':
          return `r${insn.dst} = param ${insn.index}`;
        case 'unary':
          return `r${insn.dst} = ${insn.fn} r${insn.src}`;
        case 'binary':
          return `r${insn.dst} = r${insn.left} ${insn.fn} r${insn.right}`;
      }
    });
    lines.push(`return r${this.result}`);
    return lines.join('\n');
  }
}
