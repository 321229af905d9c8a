/**
 * Code generation for expression trees
 *
 * A single post-order walk emits exactly one backend instruction per node and
 * threads the resulting value handle back to the parent. The root's handle
 * becomes the function's return value.
 */

import { BinaryOp, Expression, Identifier, NumberLiteral, UnaryOp } from './AST.js';
import { FunctionBuilder, ValueHandle } from './Backend.js';
import { BindingSet } from './Bindings.js';

/**
 * Code generator for expressions
 */
export class ExpressionCodeGen {
  constructor(
    private readonly builder: FunctionBuilder,
    private readonly bindings: BindingSet
  ) {}

  /**
   * Generate code for an expression, returning its value handle
   */
  generate(expr: Expression): ValueHandle {
    switch (expr.kind) {
      case 'number':
        return this.genNumber(expr);
      case 'identifier':
        return this.genIdentifier(expr);
      case 'unary':
        return this.genUnary(expr);
      case 'binary':
        return this.genBinary(expr);
    }
  }

  private genNumber(expr: NumberLiteral): ValueHandle {
    return this.builder.emitConstant(expr.value);
  }

  private genIdentifier(expr: Identifier): ValueHandle {
    // Resolved on every visit; throws UnboundIdentifierError
    const index = this.bindings.indexOf(expr.name);
    return this.builder.emitParamRead(index);
  }

  private genUnary(expr: UnaryOp): ValueHandle {
    const operand = this.generate(expr.operand);
    return this.builder.emitUnary(expr.operator, operand);
  }

  private genBinary(expr: BinaryOp): ValueHandle {
    const left = this.generate(expr.left);
    const right = this.generate(expr.right);
    return this.builder.emitBinary(expr.operator, left, right);
  }
}

/**
 * Emit the whole function body for `expr`, ending with its return
 */
export function generateFunction(
  expr: Expression,
  bindings: BindingSet,
  builder: FunctionBuilder
): ValueHandle {
  if (builder.parameterCount !== bindings.size) {
    throw new Error(
      `Function declares ${builder.parameterCount} parameters but bindings ${bindings} have ${bindings.size}`
    );
  }

  const result = new ExpressionCodeGen(builder, bindings).generate(expr);
  builder.emitReturn(result);
  return result;
}
