/**
 * Build (1 * 2) + (y * x), compile it on every backend and call it with x=3, y=5
 */

import { add, BACKEND_NAMES, BindingSet, compileExpression, ident, mul, num, serializeExpression } from '../src/index.js';

const expr = add(mul(num(1), num(2)), mul(ident('y'), ident('x')));
const bindings = BindingSet.of('x', 'y');

console.log(`Expression: ${serializeExpression(expr)}`);
console.log(`Bindings:   ${bindings}`);
console.log();

for (const backend of BACKEND_NAMES) {
  const compiled = compileExpression(expr, bindings, { backend });
  console.log(`[${backend}] Result: ${compiled.call([3, 5])}`);
}

console.log();
console.log('Tape listing:');
console.log(compileExpression(expr, bindings, { backend: 'tape' }).disassemble());
