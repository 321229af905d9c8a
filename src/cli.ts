#!/usr/bin/env node

import { readFileSync } from 'fs';
import { BindingSet } from './jit/Bindings.js';
import { compileExpression } from './jit/Compiler.js';
import type { CompileOptions } from './jit/Compiler.js';
import { formatError } from './jit/Errors.js';
import { evaluate } from './jit/Evaluate.js';
import { readExpression } from './jit/ExpressionCodec.js';
import { serializeExpression } from './jit/ExpressionUtils.js';
import { BACKEND_NAMES, isBackendName } from './jit/backends/index.js';

function printUsage() {
  console.log(`
arith-jit - Compile and run arithmetic expression trees

Usage:
  arith-jit <tree.json> [name=value ...] [options]

Options:
  --backend <name>      Backend: js (default), tape, wasm
  --order <a,b,...>     Parameter order (default: first appearance in the tree)
  --listing             Print the compiled instructions
  --check               Compare the result with the reference interpreter
  --verbose             Log compilation steps and show stack traces
  --help, -h            Show this help message

Examples:
  arith-jit scenario.json x=3 y=5
  arith-jit scenario.json x=3 y=5 --backend wasm --listing
  arith-jit scenario.json y=5 x=3 --order y,x

Input File Format (.json):
  { "kind": "binary", "operator": "+",
    "left":  { "kind": "number", "value": 2 },
    "right": { "kind": "unary", "operator": "sqrt",
               "operand": { "kind": "identifier", "name": "x" } } }

  Unary operators: acos asin atan cos cosh exp log10 sin sinh sqrt tan tanh
  Binary operators: + - * /
  `.trim());
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const inputFile = args[0];

  if (!inputFile.endsWith('.json')) {
    fail('Input file must have .json extension');
  }

  const options: CompileOptions = { backend: 'js' };
  const values = new Map<string, number>();
  let order: string[] | undefined;
  let listing = false;
  let check = false;
  let verbose = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--backend') {
      if (i + 1 >= args.length) {
        fail('Missing value for --backend');
      }
      const backend = args[++i];
      if (!isBackendName(backend)) {
        fail(`Invalid backend "${backend}". Must be: ${BACKEND_NAMES.join(', ')}`);
      }
      options.backend = backend;
    } else if (arg === '--order') {
      if (i + 1 >= args.length) {
        fail('Missing value for --order');
      }
      order = args[++i].split(',').map(name => name.trim()).filter(name => name.length > 0);
    } else if (arg === '--listing') {
      listing = true;
    } else if (arg === '--check') {
      check = true;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (!arg.startsWith('--') && arg.includes('=')) {
      const [name, raw] = splitAssignment(arg);
      const value = Number(raw);
      if (raw.trim() === '' || (Number.isNaN(value) && raw.trim() !== 'NaN')) {
        fail(`Invalid value for "${name}": "${raw}"`);
      }
      values.set(name, value);
    } else {
      console.error(`Error: Unknown option "${arg}"`);
      printUsage();
      process.exit(1);
    }
  }

  if (verbose) {
    options.logger = message => console.error(`[arith-jit] ${message}`);
  }

  let input: string;
  try {
    input = readFileSync(inputFile, 'utf-8');
  } catch (err) {
    console.error(`Error: Could not read file "${inputFile}"`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    process.exit(1);
  }

  try {
    const expr = readExpression(input);
    const bindings = order ? BindingSet.from(order) : BindingSet.fromExpression(expr);
    const compiled = compileExpression(expr, bindings, options);

    console.log(`Expression: ${serializeExpression(expr)}`);
    console.log(`Bindings: ${bindings}`);

    if (listing) {
      console.log(`\n${compiled.disassemble()}\n`);
    }

    const result = compiled.callWith(values);
    console.log(`Result: ${result}`);

    if (check) {
      const expected = evaluate(expr, values);
      if (!Object.is(expected, result)) {
        fail(`Result differs from reference interpreter (${expected})`);
      }
      console.log('Check: matches reference interpreter');
    }
  } catch (err) {
    console.error(formatError(err, verbose));
    process.exit(1);
  }
}

function splitAssignment(arg: string): [string, string] {
  const at = arg.indexOf('=');
  return [arg.slice(0, at), arg.slice(at + 1)];
}

main();
