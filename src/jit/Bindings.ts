/**
 * Binding sets map identifier names onto positional parameters.
 *
 * One ordered collection decides the parameter count of the compiled function,
 * the parameter each identifier reads during code generation, and the position
 * of each value in the argument vector at call time.
 */

import { Expression } from './AST.js';
import { collectIdentifiers } from './ExpressionUtils.js';
import { MissingArgumentError, UnboundIdentifierError } from './Errors.js';

export type ArgumentValues = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

export class BindingSet {
  private readonly order: readonly string[];
  private readonly indices: ReadonlyMap<string, number>;

  private constructor(names: Iterable<string>) {
    const order: string[] = [];
    const indices = new Map<string, number>();
    for (const name of names) {
      if (indices.has(name)) continue;
      indices.set(name, order.length);
      order.push(name);
    }
    this.order = Object.freeze(order);
    this.indices = indices;
  }

  /**
   * Build a binding set; duplicates keep their first position
   */
  static from(names: Iterable<string>): BindingSet {
    return new BindingSet(names);
  }

  static of(...names: string[]): BindingSet {
    return new BindingSet(names);
  }

  /**
   * Bind every identifier of an expression in first-appearance order
   */
  static fromExpression(expr: Expression): BindingSet {
    return new BindingSet(collectIdentifiers(expr));
  }

  get size(): number {
    return this.order.length;
  }

  get names(): readonly string[] {
    return this.order;
  }

  has(name: string): boolean {
    return this.indices.has(name);
  }

  /**
   * Zero-based parameter index of a name
   */
  indexOf(name: string): number {
    const index = this.indices.get(name);
    if (index === undefined) {
      throw new UnboundIdentifierError(name, this.order);
    }
    return index;
  }

  /**
   * Order named values into the positional argument vector
   */
  arrange(values: ArgumentValues): number[] {
    const lookup = toArgumentMap(values);

    for (const name of lookup.keys()) {
      if (!this.indices.has(name)) {
        throw new UnboundIdentifierError(name, this.order);
      }
    }

    return this.order.map(name => {
      const value = lookup.get(name);
      if (value === undefined) {
        throw new MissingArgumentError(name);
      }
      return value;
    });
  }

  toString(): string {
    return `[${this.order.join(', ')}]`;
  }
}

export function toArgumentMap(values: ArgumentValues): ReadonlyMap<string, number> {
  if (values instanceof Map) {
    return values;
  }
  return new Map(Object.entries(values));
}
