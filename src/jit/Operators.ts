/**
 * Operator sets for arithmetic expressions
 * Defines the closed set of unary functions and binary operators,
 * together with their IEEE-754 double semantics.
 */

/**
 * Unary functions, in the order backends enumerate them
 */
export const UNARY_OPERATORS = [
  'acos', 'asin', 'atan',
  'cos', 'cosh', 'exp',
  'log10', 'sin', 'sinh',
  'sqrt', 'tan', 'tanh'
] as const;

export type UnaryOperator = typeof UNARY_OPERATORS[number];

export const BINARY_OPERATORS = ['+', '-', '*', '/'] as const;

export type BinaryOperator = typeof BINARY_OPERATORS[number];

const unaryImplementations: Record<UnaryOperator, (x: number) => number> = {
  acos: Math.acos,
  asin: Math.asin,
  atan: Math.atan,
  cos: Math.cos,
  cosh: Math.cosh,
  exp: Math.exp,
  log10: Math.log10,
  sin: Math.sin,
  sinh: Math.sinh,
  sqrt: Math.sqrt,
  tan: Math.tan,
  tanh: Math.tanh
};

export function isUnaryOperator(value: unknown): value is UnaryOperator {
  return UNARY_OPERATORS.some(op => op === value);
}

export function isBinaryOperator(value: unknown): value is BinaryOperator {
  return BINARY_OPERATORS.some(op => op === value);
}

export function applyUnary(op: UnaryOperator, x: number): number {
  return unaryImplementations[op](x);
}

export function applyBinary(op: BinaryOperator, left: number, right: number): number {
  switch (op) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      return left / right;
  }
}

/**
 * Name of the host `Math` member implementing a unary function
 */
export function mathFunctionName(op: UnaryOperator): string {
  return `Math.${op}`;
}
