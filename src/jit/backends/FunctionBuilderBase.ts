/**
 * FunctionBuilderBase - Abstract base class for backend function builders
 *
 * Owns the builder state machine (open -> returned -> disposed) and handle
 * validation, so concrete backends only implement the instruction encoding:
 *
 *   class MyBuilder extends FunctionBuilderBase {
 *     protected buildConstant(value: number, result: ValueHandle): ValueHandle { ... }
 *     ...
 *   }
 */

import { CompiledFunction, FunctionBuilder, ValueHandle } from '../Backend.js';
import { BackendError } from '../Errors.js';
import { BinaryOperator, UnaryOperator } from '../Operators.js';

type BuilderState = 'open' | 'returned' | 'disposed';

export abstract class FunctionBuilderBase implements FunctionBuilder {
  private state: BuilderState = 'open';
  private handleCount = 0;

  constructor(
    protected readonly backendName: string,
    readonly parameterCount: number
  ) {
    if (!Number.isInteger(parameterCount) || parameterCount < 0) {
      throw new BackendError(`invalid parameter count ${parameterCount}`, backendName, 'declareFunction');
    }
  }

  emitConstant(value: number): ValueHandle {
    this.assertOpen('emitConstant');
    return this.buildConstant(value, this.nextHandle());
  }

  emitParamRead(index: number): ValueHandle {
    this.assertOpen('emitParamRead');
    if (!Number.isInteger(index) || index < 0 || index >= this.parameterCount) {
      throw new BackendError(
        `parameter index ${index} out of range (function has ${this.parameterCount})`,
        this.backendName,
        'emitParamRead'
      );
    }
    return this.buildParamRead(index, this.nextHandle());
  }

  emitBinary(op: BinaryOperator, left: ValueHandle, right: ValueHandle): ValueHandle {
    this.assertOpen('emitBinary');
    this.assertHandle(left, 'emitBinary');
    this.assertHandle(right, 'emitBinary');
    return this.buildBinary(op, left, right, this.nextHandle());
  }

  emitUnary(op: UnaryOperator, operand: ValueHandle): ValueHandle {
    this.assertOpen('emitUnary');
    this.assertHandle(operand, 'emitUnary');
    return this.buildUnary(op, operand, this.nextHandle());
  }

  emitReturn(value: ValueHandle): void {
    this.assertOpen('emitReturn');
    this.assertHandle(value, 'emitReturn');
    this.buildReturn(value);
    this.state = 'returned';
  }

  compile(): CompiledFunction {
    if (this.state === 'disposed') {
      throw new BackendError('builder has been disposed', this.backendName, 'compile');
    }
    if (this.state !== 'returned') {
      throw new BackendError('no return value emitted', this.backendName, 'compile');
    }
    return this.finish();
  }

  dispose(): void {
    if (this.state === 'disposed') return;
    this.state = 'disposed';
    this.release();
  }

  get isDisposed(): boolean {
    return this.state === 'disposed';
  }

  /** Number of values produced so far */
  get valueCount(): number {
    return this.handleCount;
  }

  protected abstract buildConstant(value: number, result: ValueHandle): ValueHandle;
  protected abstract buildParamRead(index: number, result: ValueHandle): ValueHandle;
  protected abstract buildBinary(op: BinaryOperator, left: ValueHandle, right: ValueHandle, result: ValueHandle): ValueHandle;
  protected abstract buildUnary(op: UnaryOperator, operand: ValueHandle, result: ValueHandle): ValueHandle;
  protected abstract buildReturn(value: ValueHandle): void;
  protected abstract finish(): CompiledFunction;
  protected abstract release(): void;

  private nextHandle(): ValueHandle {
    return this.handleCount++;
  }

  private assertOpen(operation: string): void {
    if (this.state === 'disposed') {
      throw new BackendError('builder has been disposed', this.backendName, operation);
    }
    if (this.state === 'returned') {
      throw new BackendError('function already returned', this.backendName, operation);
    }
  }

  private assertHandle(handle: ValueHandle, operation: string): void {
    if (!Number.isInteger(handle) || handle < 0 || handle >= this.handleCount) {
      throw new BackendError(`unknown value handle ${handle}`, this.backendName, operation);
    }
  }
}
