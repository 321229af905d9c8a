/**
 * AST nodes for arithmetic expressions
 * A closed set of four node kinds forming an immutable tree
 */

import { BinaryOperator, UnaryOperator } from './Operators.js';

/**
 * Expression types
 */
export type Expression =
  | NumberLiteral
  | Identifier
  | UnaryOp
  | BinaryOp;

/**
 * Number literal (double precision)
 */
export interface NumberLiteral {
  readonly kind: 'number';
  readonly value: number;
}

/**
 * Reference to a named input, resolved against a binding set at compile time
 */
export interface Identifier {
  readonly kind: 'identifier';
  readonly name: string;
}

/**
 * Unary function application (e.g., sqrt(x), cos(y))
 */
export interface UnaryOp {
  readonly kind: 'unary';
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

/**
 * Binary operation, evaluated left then right
 */
export interface BinaryOp {
  readonly kind: 'binary';
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

/**
 * Visitor pattern for AST traversal
 */
export interface ExpressionVisitor<T> {
  visitNumber(node: NumberLiteral): T;
  visitIdentifier(node: Identifier): T;
  visitUnary(node: UnaryOp): T;
  visitBinary(node: BinaryOp): T;
}

/**
 * Helper to visit any expression node
 */
export function visitExpression<T>(visitor: ExpressionVisitor<T>, expr: Expression): T {
  switch (expr.kind) {
    case 'number':
      return visitor.visitNumber(expr);
    case 'identifier':
      return visitor.visitIdentifier(expr);
    case 'unary':
      return visitor.visitUnary(expr);
    case 'binary':
      return visitor.visitBinary(expr);
  }
}
