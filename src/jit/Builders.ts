/**
 * Construction helpers for expression trees
 *
 * Nodes are frozen on construction. Nothing is validated beyond the types:
 * an identifier that no binding set contains is legal to build and only
 * fails when the tree is compiled.
 *
 * Usage:
 *   const expr = add(mul(num(1), num(2)), mul(ident('y'), ident('x')));
 */

import { BinaryOp, Expression, Identifier, NumberLiteral, UnaryOp } from './AST.js';
import { BinaryOperator, UnaryOperator } from './Operators.js';

export function num(value: number): NumberLiteral {
  return Object.freeze({ kind: 'number', value });
}

export function ident(name: string): Identifier {
  return Object.freeze({ kind: 'identifier', name });
}

export function unary(operator: UnaryOperator, operand: Expression): UnaryOp {
  return Object.freeze({ kind: 'unary', operator, operand });
}

export function binary(operator: BinaryOperator, left: Expression, right: Expression): BinaryOp {
  return Object.freeze({ kind: 'binary', operator, left, right });
}

export const add = (left: Expression, right: Expression): BinaryOp => binary('+', left, right);
export const sub = (left: Expression, right: Expression): BinaryOp => binary('-', left, right);
export const mul = (left: Expression, right: Expression): BinaryOp => binary('*', left, right);
export const div = (left: Expression, right: Expression): BinaryOp => binary('/', left, right);

export const acos = (operand: Expression): UnaryOp => unary('acos', operand);
export const asin = (operand: Expression): UnaryOp => unary('asin', operand);
export const atan = (operand: Expression): UnaryOp => unary('atan', operand);
export const cos = (operand: Expression): UnaryOp => unary('cos', operand);
export const cosh = (operand: Expression): UnaryOp => unary('cosh', operand);
export const exp = (operand: Expression): UnaryOp => unary('exp', operand);
export const log10 = (operand: Expression): UnaryOp => unary('log10', operand);
export const sin = (operand: Expression): UnaryOp => unary('sin', operand);
export const sinh = (operand: Expression): UnaryOp => unary('sinh', operand);
export const sqrt = (operand: Expression): UnaryOp => unary('sqrt', operand);
export const tan = (operand: Expression): UnaryOp => unary('tan', operand);
export const tanh = (operand: Expression): UnaryOp => unary('tanh', operand);
