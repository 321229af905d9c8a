/**
 * JavaScript source backend.
 * Emits one `const` declaration per value and compiles the body with the
 * `Function` constructor.
 */

import { Backend, CompiledFunction, FunctionBuilder, ValueHandle } from '../Backend.js';
import { BackendError } from '../Errors.js';
import { formatLiteral } from '../ExpressionUtils.js';
import { BinaryOperator, mathFunctionName, UnaryOperator } from '../Operators.js';
import { FunctionBuilderBase } from './FunctionBuilderBase.js';

export class JsBackend implements Backend {
  readonly name = 'js';

  declareFunction(parameterCount: number): FunctionBuilder {
    return new JsFunctionBuilder(this.name, parameterCount);
  }
}

class JsFunctionBuilder extends FunctionBuilderBase {
  private lines: string[] = [];

  protected buildConstant(value: number, result: ValueHandle): ValueHandle {
    this.lines.push(`const ${local(result)} = ${formatLiteral(value)};`);
    return result;
  }

  protected buildParamRead(index: number, result: ValueHandle): ValueHandle {
    this.lines.push(`const ${local(result)} = ${param(index)};`);
    return result;
  }

  protected buildBinary(op: BinaryOperator, left: ValueHandle, right: ValueHandle, result: ValueHandle): ValueHandle {
    this.lines.push(`const ${local(result)} = ${local(left)} ${op} ${local(right)};`);
    return result;
  }

  protected buildUnary(op: UnaryOperator, operand: ValueHandle, result: ValueHandle): ValueHandle {
    this.lines.push(`const ${local(result)} = ${mathFunctionName(op)}(${local(operand)});`);
    return result;
  }

  protected buildReturn(value: ValueHandle): void {
    this.lines.push(`return ${local(value)};`);
  }

  protected finish(): CompiledFunction {
    const params = Array.from({ length: this.parameterCount }, (_, i) => param(i));
    const body = this.lines.join('\n');

    let fn: Function;
    try {
      fn = new Function(...params, `"use strict";\n${body}`);
    } catch (err) {
      throw new BackendError(
        err instanceof Error ? err.message : String(err),
        this.backendName,
        'compile',
        { cause: err }
      );
    }

    return new JsFunction(this.backendName, this.parameterCount, params, body, fn);
  }

  protected release(): void {
    this.lines = [];
  }
}

class JsFunction implements CompiledFunction {
  constructor(
    private readonly backendName: string,
    readonly arity: number,
    private readonly params: readonly string[],
    private readonly body: string,
    private readonly fn: Function
  ) {}

  invoke(args: readonly number[]): number {
    const result: unknown = this.fn(...args);
    if (typeof result !== 'number') {
      throw new BackendError(`function returned ${typeof result}`, this.backendName, 'invoke');
    }
    return result;
  }

  disassemble(): string {
    return `function (${this.params.join(', ')}) {\n${indent(this.body)}\n}`;
  }
}

function local(handle: ValueHandle): string {
  return `v${handle}`;
}

function param(index: number): string {
  return `p${index}`;
}

function indent(code: string): string {
  return code.split('\n').map(line => `  ${line}`).join('\n');
}
