export class UnboundIdentifierError extends Error {
  constructor(
    public identifier: string,
    public bindings: readonly string[]
  ) {
    super(`Unbound identifier '${identifier}' (bindings: [${bindings.join(', ')}])`);
    this.name = 'UnboundIdentifierError';
  }
}

export class BackendError extends Error {
  constructor(
    message: string,
    public backend: string,
    public operation?: string,
    options?: { cause?: unknown }
  ) {
    const operationInfo = operation ? ` during ${operation}` : '';
    super(`Backend error in '${backend}'${operationInfo}: ${message}`, options);
    this.name = 'BackendError';
  }
}

export class ArityMismatchError extends Error {
  constructor(
    public expected: number,
    public actual: number
  ) {
    super(`Arity mismatch: expected ${expected} argument${expected === 1 ? '' : 's'}, got ${actual}`);
    this.name = 'ArityMismatchError';
  }
}

export class MissingArgumentError extends Error {
  constructor(public identifier: string) {
    super(`Missing argument for '${identifier}'`);
    this.name = 'MissingArgumentError';
  }
}

export class ExpressionFormatError extends Error {
  constructor(
    message: string,
    public path: string
  ) {
    super(`Invalid expression at '${path}': ${message}`);
    this.name = 'ExpressionFormatError';
  }
}

/**
 * Format an error for terminal output
 */
export function formatError(error: unknown, verbose: boolean = false): string {
  if (!(error instanceof Error)) {
    return `Error: ${String(error)}`;
  }

  let output = `Error: ${error.message}`;

  if (error instanceof UnboundIdentifierError) {
    output += `\n\n💡 Tip: pass a value for '${error.identifier}' (e.g. ${error.identifier}=1)` +
      ` or add it to --order.`;
  } else if (error instanceof ArityMismatchError) {
    output += `\n\n💡 Tip: every bound identifier needs exactly one value.`;
  }

  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}
