/**
 * Reference interpreter: walks the tree with IEEE-754 double arithmetic.
 * Serves as the oracle compiled functions are checked against.
 */

import { Expression } from './AST.js';
import { ArgumentValues, toArgumentMap } from './Bindings.js';
import { UnboundIdentifierError } from './Errors.js';
import { applyBinary, applyUnary } from './Operators.js';

export function evaluate(expr: Expression, env: ArgumentValues = new Map()): number {
  const lookup = toArgumentMap(env);

  const walk = (node: Expression): number => {
    switch (node.kind) {
      case 'number':
        return node.value;
      case 'identifier': {
        const value = lookup.get(node.name);
        if (value === undefined) {
          throw new UnboundIdentifierError(node.name, [...lookup.keys()]);
        }
        return value;
      }
      case 'unary':
        return applyUnary(node.operator, walk(node.operand));
      case 'binary': {
        const left = walk(node.left);
        const right = walk(node.right);
        return applyBinary(node.operator, left, right);
      }
    }
  };

  return walk(expr);
}
