/**
 * The same tree compiled against two parameter orders gives the same answer
 * as long as the arguments follow the binding set they were compiled with.
 */

import { BindingSet, compileExpression, ident, sub, UnboundIdentifierError } from '../src/index.js';

const expr = sub(ident('x'), ident('y'));

const xy = compileExpression(expr, BindingSet.of('x', 'y'));
const yx = compileExpression(expr, BindingSet.of('y', 'x'));

console.log(`[x, y] with [5, 2]: ${xy.call([5, 2])}`);
console.log(`[y, x] with [2, 5]: ${yx.call([2, 5])}`);
console.log(`named { x: 5, y: 2 }: ${yx.callWith({ x: 5, y: 2 })}`);

try {
  compileExpression(sub(ident('x'), ident('z')), BindingSet.of('x', 'y'));
} catch (err) {
  if (err instanceof UnboundIdentifierError) {
    console.log(`Rejected: ${err.message}`);
  } else {
    throw err;
  }
}
