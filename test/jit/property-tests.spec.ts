import { describe, it, expect } from 'vitest';
import { Expression } from '../../src/jit/AST.js';
import { BindingSet } from '../../src/jit/Bindings.js';
import { div, ident, num, sub } from '../../src/jit/Builders.js';
import { compileAndRun, compileExpression } from '../../src/jit/Compiler.js';
import { evaluate } from '../../src/jit/Evaluate.js';
import { ALL_BACKENDS, createRandom, randomExpression } from '../helpers.js';

const SEEDS = Array.from({ length: 40 }, (_, i) => i + 1);

describe.each(ALL_BACKENDS)('Property Tests (%s backend)', backend => {
  it('should match the reference interpreter on constant-only trees', () => {
    for (const seed of SEEDS) {
      const random = createRandom(seed);
      const expr = randomExpression(random, 6, []);
      const expected = evaluate(expr);

      expect(compileAndRun(expr, BindingSet.of(), [], { backend })).toBe(expected);
      // Binding contents do not matter when no identifier reads them
      expect(compileAndRun(expr, BindingSet.of('x', 'y'), [1, 2], { backend })).toBe(expected);
    }
  });

  it('should depend on name-to-value mapping, not parameter positions', () => {
    const values = { a: 1.5, b: -0.75, c: 3 };
    const orders = [['a', 'b', 'c'], ['c', 'a', 'b'], ['b', 'c', 'a']];

    for (const seed of SEEDS) {
      const random = createRandom(seed * 7919);
      const expr = randomExpression(random, 5, ['a', 'b', 'c']);
      const expected = evaluate(expr, values);

      for (const order of orders) {
        const compiled = compileExpression(expr, BindingSet.from(order), { backend });
        expect(compiled.callWith(values)).toBe(expected);
      }
    }
  });

  it('should change the result when operands of - and / are swapped', () => {
    const pairs: Array<[number, number]> = [[5, 2], [-1, 4], [0.5, 8]];
    const bindings = BindingSet.of('a', 'b');

    for (const [a, b] of pairs) {
      const forward = compileAndRun(sub(ident('a'), ident('b')), bindings, [a, b], { backend });
      const swapped = compileAndRun(sub(ident('b'), ident('a')), bindings, [a, b], { backend });
      expect(forward).toBe(a - b);
      expect(swapped).not.toBe(forward);

      const quotient = compileAndRun(div(ident('a'), ident('b')), bindings, [a, b], { backend });
      const inverse = compileAndRun(div(ident('b'), ident('a')), bindings, [a, b], { backend });
      expect(quotient).toBe(a / b);
      expect(inverse).not.toBe(quotient);
    }
  });

  it('should be idempotent across calls', () => {
    for (const seed of SEEDS.slice(0, 10)) {
      const random = createRandom(seed);
      const expr = randomExpression(random, 6, ['x', 'y']);
      const compiled = compileExpression(expr, BindingSet.of('x', 'y'), { backend });

      const first = compiled.call([0.3, 1.7]);
      const second = compiled.call([0.3, 1.7]);
      expect(Object.is(first, second)).toBe(true);
    }
  });

  it('should handle deeply unbalanced trees', () => {
    let expr: Expression = ident('x');
    for (let i = 0; i < 500; i++) {
      expr = sub(expr, num(1));
    }
    expect(compileAndRun(expr, BindingSet.of('x'), [1000], { backend })).toBe(500);
  });
});
