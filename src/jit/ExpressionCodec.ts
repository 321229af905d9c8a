/**
 * JSON form of expression trees.
 * The JSON shape mirrors the AST: `{ "kind": "binary", "operator": "+", "left": ..., "right": ... }`.
 * NaN, the infinities and -0 are written as strings in a number node's `value`.
 */

import { Expression } from './AST.js';
import { binary, ident, num, unary } from './Builders.js';
import { ExpressionFormatError } from './Errors.js';
import { BINARY_OPERATORS, isBinaryOperator, isUnaryOperator, UNARY_OPERATORS } from './Operators.js';

/**
 * Validate a plain JSON value and build frozen nodes from it
 */
export function decodeExpression(json: unknown, path: string = '$'): Expression {
  if (!isRecord(json)) {
    throw new ExpressionFormatError('expected an object', path);
  }

  switch (json.kind) {
    case 'number':
      return num(readNumber(json.value, `${path}.value`));

    case 'identifier': {
      if (typeof json.name !== 'string' || json.name.length === 0) {
        throw new ExpressionFormatError('expected a non-empty string', `${path}.name`);
      }
      return ident(json.name);
    }

    case 'unary': {
      if (!isUnaryOperator(json.operator)) {
        throw new ExpressionFormatError(
          `unknown unary operator ${JSON.stringify(json.operator)} (expected one of ${UNARY_OPERATORS.join(', ')})`,
          `${path}.operator`
        );
      }
      return unary(json.operator, decodeExpression(json.operand, `${path}.operand`));
    }

    case 'binary': {
      if (!isBinaryOperator(json.operator)) {
        throw new ExpressionFormatError(
          `unknown binary operator ${JSON.stringify(json.operator)} (expected one of ${BINARY_OPERATORS.join(' ')})`,
          `${path}.operator`
        );
      }
      const left = decodeExpression(json.left, `${path}.left`);
      const right = decodeExpression(json.right, `${path}.right`);
      return binary(json.operator, left, right);
    }

    default:
      throw new ExpressionFormatError(`unknown node kind ${JSON.stringify(json.kind)}`, `${path}.kind`);
  }
}

/**
 * Parse JSON text into an expression
 */
export function readExpression(text: string): Expression {
  let json: unknown;
  try {
    json = JSON.parse(text, reviveNonFinite);
  } catch (err) {
    throw new ExpressionFormatError(err instanceof Error ? err.message : String(err), '$');
  }
  return decodeExpression(json);
}

/**
 * Serialize an expression to JSON text
 */
export function writeExpression(expr: Expression, space?: number): string {
  return JSON.stringify(expr, replaceNonFinite, space);
}

function readNumber(value: unknown, path: string): number {
  if (typeof value !== 'number') {
    throw new ExpressionFormatError('expected a number', path);
  }
  return value;
}

// Values JSON has no literal for
const SPECIAL_NUMBERS = new Map<string, number>([
  ['NaN', NaN],
  ['Infinity', Infinity],
  ['-Infinity', -Infinity],
  ['-0', -0]
]);

function replaceNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && (!Number.isFinite(value) || Object.is(value, -0))) {
    return Object.is(value, -0) ? '-0' : String(value);
  }
  return value;
}

function reviveNonFinite(key: string, value: unknown): unknown {
  if (key === 'value' && typeof value === 'string') {
    return SPECIAL_NUMBERS.get(value) ?? value;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
