import { describe, it, expect } from 'vitest';
import { ExpressionVisitor, visitExpression } from '../../src/jit/AST.js';
import { add, binary, cos, div, ident, mul, num, sqrt, sub, unary } from '../../src/jit/Builders.js';
import {
  collectIdentifiers,
  countNodes,
  expressionDepth,
  serializeExpression
} from '../../src/jit/ExpressionUtils.js';

const scenario = () => add(mul(num(1), num(2)), mul(ident('y'), ident('x')));

describe('Expression nodes', () => {
  describe('Builders', () => {
    it('should build number literals', () => {
      expect(num(42)).toEqual({ kind: 'number', value: 42 });
    });

    it('should build identifiers', () => {
      expect(ident('x')).toEqual({ kind: 'identifier', name: 'x' });
    });

    it('should build unary operations', () => {
      const node = sqrt(ident('x'));
      expect(node.kind).toBe('unary');
      expect(node.operator).toBe('sqrt');
      expect(node.operand).toEqual({ kind: 'identifier', name: 'x' });
    });

    it('should build binary operations with left and right in order', () => {
      const node = sub(num(5), num(2));
      expect(node.operator).toBe('-');
      expect(node.left).toEqual({ kind: 'number', value: 5 });
      expect(node.right).toEqual({ kind: 'number', value: 2 });
    });

    it('should map shorthands onto operators', () => {
      expect(add(num(1), num(2)).operator).toBe('+');
      expect(mul(num(1), num(2)).operator).toBe('*');
      expect(div(num(1), num(2)).operator).toBe('/');
      expect(cos(num(0))).toEqual(unary('cos', num(0)));
      expect(binary('-', num(1), num(2))).toEqual(sub(num(1), num(2)));
    });

    it('should freeze every node', () => {
      const tree = scenario();
      expect(Object.isFrozen(tree)).toBe(true);
      expect(Object.isFrozen(tree.left)).toBe(true);
      expect(Object.isFrozen(num(1))).toBe(true);
      expect(Object.isFrozen(ident('x'))).toBe(true);
      expect(Object.isFrozen(sqrt(num(1)))).toBe(true);
    });

    it('should allow identifiers that nothing binds', () => {
      expect(() => ident('unbound')).not.toThrow();
    });
  });

  describe('visitExpression', () => {
    it('should dispatch on node kind', () => {
      const visitor: ExpressionVisitor<string> = {
        visitNumber: node => `number:${node.value}`,
        visitIdentifier: node => `identifier:${node.name}`,
        visitUnary: node => `unary:${node.operator}`,
        visitBinary: node => `binary:${node.operator}`
      };

      expect(visitExpression(visitor, num(3))).toBe('number:3');
      expect(visitExpression(visitor, ident('q'))).toBe('identifier:q');
      expect(visitExpression(visitor, sqrt(num(3)))).toBe('unary:sqrt');
      expect(visitExpression(visitor, scenario())).toBe('binary:+');
    });
  });

  describe('serializeExpression', () => {
    it('should fully parenthesize binary operations', () => {
      expect(serializeExpression(scenario())).toBe('((1 * 2) + (y * x))');
    });

    it('should write unary operations as calls', () => {
      expect(serializeExpression(sqrt(ident('x')))).toBe('sqrt(x)');
      expect(serializeExpression(cos(sub(ident('a'), num(1))))).toBe('cos((a - 1))');
    });

    it('should keep the sign of negative zero', () => {
      expect(serializeExpression(num(-0))).toBe('-0');
      expect(serializeExpression(num(-2.5))).toBe('-2.5');
    });
  });

  describe('collectIdentifiers', () => {
    it('should list names in first-appearance order without duplicates', () => {
      const expr = add(mul(ident('y'), ident('x')), sub(ident('x'), ident('z')));
      expect(collectIdentifiers(expr)).toEqual(['y', 'x', 'z']);
    });

    it('should return nothing for constant trees', () => {
      expect(collectIdentifiers(mul(num(1), sqrt(num(4))))).toEqual([]);
    });
  });

  describe('countNodes and expressionDepth', () => {
    it('should count every node once', () => {
      expect(countNodes(scenario())).toBe(7);
      expect(countNodes(sqrt(ident('x')))).toBe(2);
      expect(countNodes(num(1))).toBe(1);
    });

    it('should measure tree height', () => {
      expect(expressionDepth(num(1))).toBe(1);
      expect(expressionDepth(scenario())).toBe(3);
      expect(expressionDepth(add(num(1), sqrt(sqrt(ident('x')))))).toBe(4);
    });
  });
});
