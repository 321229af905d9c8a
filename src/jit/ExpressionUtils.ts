/**
 * Shared utility functions for expression inspection
 */

import { Expression } from './AST.js';

/**
 * Distinct identifier names in first-appearance order (left to right, depth first)
 */
export function collectIdentifiers(expr: Expression): string[] {
  const seen = new Set<string>();
  const out: string[] = [];

  const visit = (node: Expression): void => {
    switch (node.kind) {
      case 'number':
        return;
      case 'identifier':
        if (!seen.has(node.name)) {
          seen.add(node.name);
          out.push(node.name);
        }
        return;
      case 'unary':
        visit(node.operand);
        return;
      case 'binary':
        visit(node.left);
        visit(node.right);
        return;
    }
  };

  visit(expr);
  return out;
}

/**
 * Serialize an expression to fully parenthesized infix text
 */
export function serializeExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'number':
      return formatLiteral(expr.value);
    case 'identifier':
      return expr.name;
    case 'unary':
      return `${expr.operator}(${serializeExpression(expr.operand)})`;
    case 'binary':
      return `(${serializeExpression(expr.left)} ${expr.operator} ${serializeExpression(expr.right)})`;
  }
}

/**
 * Source literal that evaluates to exactly `value`
 */
export function formatLiteral(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

export function countNodes(expr: Expression): number {
  switch (expr.kind) {
    case 'number':
    case 'identifier':
      return 1;
    case 'unary':
      return 1 + countNodes(expr.operand);
    case 'binary':
      return 1 + countNodes(expr.left) + countNodes(expr.right);
  }
}

/**
 * Height of the tree; a single leaf has depth 1
 */
export function expressionDepth(expr: Expression): number {
  switch (expr.kind) {
    case 'number':
    case 'identifier':
      return 1;
    case 'unary':
      return 1 + expressionDepth(expr.operand);
    case 'binary':
      return 1 + Math.max(expressionDepth(expr.left), expressionDepth(expr.right));
  }
}
