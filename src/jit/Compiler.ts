/**
 * Compile-and-run driver
 *
 * Sequences one compilation: declare a function with one f64 parameter per
 * binding, generate its body, compile. The builder is disposed on every exit
 * path, including an unbound identifier found halfway through the walk.
 */

import { Expression } from './AST.js';
import { Backend, CompiledFunction } from './Backend.js';
import { ArgumentValues, BindingSet } from './Bindings.js';
import { generateFunction } from './CodeGen.js';
import { ArityMismatchError } from './Errors.js';
import { countNodes, serializeExpression } from './ExpressionUtils.js';
import { BackendName, createBackend } from './backends/index.js';

/**
 * Compilation options
 */
export interface CompileOptions {
  backend?: BackendName | Backend;  // Default: 'js'
  logger?: (message: string) => void;  // One line per lifecycle step
}

/**
 * A compiled expression bound to the binding set it was generated against
 */
export class CompiledExpression {
  constructor(
    readonly expression: Expression,
    readonly bindings: BindingSet,
    readonly backend: string,
    private readonly fn: CompiledFunction
  ) {}

  get arity(): number {
    return this.bindings.size;
  }

  /**
   * Call with positional arguments in binding order
   */
  call(args: readonly number[]): number {
    if (args.length !== this.bindings.size) {
      throw new ArityMismatchError(this.bindings.size, args.length);
    }
    return this.fn.invoke(args);
  }

  /**
   * Call with named arguments, ordered through the binding set
   */
  callWith(values: ArgumentValues): number {
    return this.call(this.bindings.arrange(values));
  }

  disassemble(): string {
    return this.fn.disassemble();
  }
}

export function resolveBackend(backend: BackendName | Backend = 'js'): Backend {
  return typeof backend === 'string' ? createBackend(backend) : backend;
}

/**
 * Compile an expression; bindings default to first-appearance order
 */
export function compileExpression(
  expr: Expression,
  bindings: BindingSet = BindingSet.fromExpression(expr),
  options: CompileOptions = {}
): CompiledExpression {
  const backend = resolveBackend(options.backend);
  const log = options.logger;

  log?.(`declare ${backend.name} function with ${bindings.size} parameter(s) ${bindings}`);
  const builder = backend.declareFunction(bindings.size);

  try {
    // Two extra walks of the tree
    if (log) {
      log(`generate ${countNodes(expr)} node(s): ${serializeExpression(expr)}`);
    }
    generateFunction(expr, bindings, builder);

    log?.('compile');
    const fn = builder.compile();
    return new CompiledExpression(expr, bindings, backend.name, fn);
  } finally {
    builder.dispose();
  }
}

/**
 * One compile-and-call cycle
 */
export function compileAndRun(
  expr: Expression,
  bindings: BindingSet,
  args: readonly number[],
  options: CompileOptions = {}
): number {
  return compileExpression(expr, bindings, options).call(args);
}
