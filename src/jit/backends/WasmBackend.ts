/**
 * WebAssembly backend.
 *
 * Encodes a single-function module: parameters and result are f64, every
 * value lives in its own local (handle N is local `parameterCount + N`).
 * `+ - * /` and `sqrt` are native f64 instructions; the remaining unary
 * functions are imported from the host `Math` object under module "math".
 */

import { Backend, CompiledFunction, FunctionBuilder, ValueHandle } from '../Backend.js';
import { BackendError } from '../Errors.js';
import { formatLiteral } from '../ExpressionUtils.js';
import { BinaryOperator, UNARY_OPERATORS, UnaryOperator, applyUnary } from '../Operators.js';
import { FunctionBuilderBase } from './FunctionBuilderBase.js';

const MAGIC = [0x00, 0x61, 0x73, 0x6d];
const VERSION = [0x01, 0x00, 0x00, 0x00];

const Section = {
  type: 1,
  import: 2,
  function: 3,
  export: 7,
  code: 10
} as const;

const Opcode = {
  end: 0x0b,
  call: 0x10,
  localGet: 0x20,
  localSet: 0x21,
  f64Const: 0x44,
  f64Sqrt: 0x9f,
  f64Add: 0xa0,
  f64Sub: 0xa1,
  f64Mul: 0xa2,
  f64Div: 0xa3
} as const;

const F64 = 0x7c;
const FUNC_TYPE = 0x60;
const EXTERNAL_FUNCTION = 0x00;

const IMPORT_MODULE = 'math';
const EXPORT_NAME = 'evaluate';

const binaryOpcodes: Record<BinaryOperator, number> = {
  '+': Opcode.f64Add,
  '-': Opcode.f64Sub,
  '*': Opcode.f64Mul,
  '/': Opcode.f64Div
};

const binaryMnemonics: Record<BinaryOperator, string> = {
  '+': 'f64.add',
  '-': 'f64.sub',
  '*': 'f64.mul',
  '/': 'f64.div'
};

/** Unary functions without a native f64 instruction */
const IMPORTED_FUNCTIONS: readonly UnaryOperator[] = UNARY_OPERATORS.filter(op => op !== 'sqrt');

/**
 * Growable byte buffer with the LEB128 and IEEE-754 encoders the binary format needs
 */
export class ByteWriter {
  private bytes: number[] = [];

  get length(): number {
    return this.bytes.length;
  }

  byte(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  raw(values: readonly number[]): this {
    for (const value of values) this.byte(value);
    return this;
  }

  u32(value: number): this {
    let remaining = value >>> 0;
    do {
      let b = remaining & 0x7f;
      remaining >>>= 7;
      if (remaining !== 0) b |= 0x80;
      this.byte(b);
    } while (remaining !== 0);
    return this;
  }

  f64(value: number): this {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value, true);
    for (let i = 0; i < 8; i++) this.byte(view.getUint8(i));
    return this;
  }

  name(text: string): this {
    const encoded = new TextEncoder().encode(text);
    this.u32(encoded.length);
    encoded.forEach(b => this.byte(b));
    return this;
  }

  /** Length-prefixed vector of already encoded entries */
  vector(entries: readonly ByteWriter[]): this {
    this.u32(entries.length);
    for (const entry of entries) this.append(entry);
    return this;
  }

  section(id: number, content: ByteWriter): this {
    this.byte(id);
    this.u32(content.length);
    return this.append(content);
  }

  append(other: ByteWriter): this {
    return this.raw(other.bytes);
  }

  toBytes() {
    return new Uint8Array(this.bytes);
  }
}

export class WasmBackend implements Backend {
  readonly name = 'wasm';

  declareFunction(parameterCount: number): FunctionBuilder {
    return new WasmFunctionBuilder(this.name, parameterCount);
  }
}

class WasmFunctionBuilder extends FunctionBuilderBase {
  private code = new ByteWriter();
  private listing: string[] = [];

  protected buildConstant(value: number, result: ValueHandle): ValueHandle {
    this.code.byte(Opcode.f64Const).f64(value);
    this.listing.push(`f64.const ${formatLiteral(value)}`);
    return this.store(result);
  }

  protected buildParamRead(index: number, result: ValueHandle): ValueHandle {
    this.load(index);
    return this.store(result);
  }

  protected buildBinary(op: BinaryOperator, left: ValueHandle, right: ValueHandle, result: ValueHandle): ValueHandle {
    this.load(this.localOf(left));
    this.load(this.localOf(right));
    this.code.byte(binaryOpcodes[op]);
    this.listing.push(binaryMnemonics[op]);
    return this.store(result);
  }

  protected buildUnary(op: UnaryOperator, operand: ValueHandle, result: ValueHandle): ValueHandle {
    this.load(this.localOf(operand));
    if (op === 'sqrt') {
      this.code.byte(Opcode.f64Sqrt);
      this.listing.push('f64.sqrt');
    } else {
      this.code.byte(Opcode.call).u32(IMPORTED_FUNCTIONS.indexOf(op));
      this.listing.push(`call $${op}`);
    }
    return this.store(result);
  }

  protected buildReturn(value: ValueHandle): void {
    this.load(this.localOf(value));
  }

  protected finish(): CompiledFunction {
    const bytes = encodeModule(this.parameterCount, this.valueCount, this.code);
    const listing = formatListing(this.parameterCount, this.valueCount, this.listing);

    let exported: WebAssembly.ExportValue | undefined;
    try {
      const module = new WebAssembly.Module(bytes);
      const instance = new WebAssembly.Instance(module, { [IMPORT_MODULE]: hostImports() });
      exported = instance.exports[EXPORT_NAME];
    } catch (err) {
      throw new BackendError(
        err instanceof Error ? err.message : String(err),
        this.backendName,
        'compile',
        { cause: err }
      );
    }

    if (typeof exported !== 'function') {
      throw new BackendError(`module does not export '${EXPORT_NAME}'`, this.backendName, 'compile');
    }

    return new WasmFunction(this.backendName, this.parameterCount, exported, listing);
  }

  protected release(): void {
    this.code = new ByteWriter();
    this.listing = [];
  }

  private localOf(handle: ValueHandle): number {
    return this.parameterCount + handle;
  }

  private load(local: number): void {
    this.code.byte(Opcode.localGet).u32(local);
    this.listing.push(`local.get ${local}`);
  }

  private store(handle: ValueHandle): ValueHandle {
    const local = this.localOf(handle);
    this.code.byte(Opcode.localSet).u32(local);
    this.listing.push(`local.set ${local}`);
    return handle;
  }
}

class WasmFunction implements CompiledFunction {
  constructor(
    private readonly backendName: string,
    readonly arity: number,
    private readonly fn: Function,
    private readonly listing: string
  ) {}

  invoke(args: readonly number[]): number {
    const result: unknown = this.fn(...args);
    if (typeof result !== 'number') {
      throw new BackendError(`function returned ${typeof result}`, this.backendName, 'invoke');
    }
    return result;
  }

  disassemble(): string {
    return this.listing;
  }
}

function hostImports(): Record<string, (x: number) => number> {
  const imports: Record<string, (x: number) => number> = {};
  for (const op of IMPORTED_FUNCTIONS) {
    imports[op] = (x: number) => applyUnary(op, x);
  }
  return imports;
}

/**
 * Encode a module holding one exported function
 */
export function encodeModule(parameterCount: number, localCount: number, code: ByteWriter) {
  const unaryType = new ByteWriter().byte(FUNC_TYPE).u32(1).byte(F64).u32(1).byte(F64);
  const mainType = new ByteWriter().byte(FUNC_TYPE).u32(parameterCount);
  for (let i = 0; i < parameterCount; i++) mainType.byte(F64);
  mainType.u32(1).byte(F64);

  const imports = IMPORTED_FUNCTIONS.map(op =>
    new ByteWriter().name(IMPORT_MODULE).name(op).byte(EXTERNAL_FUNCTION).u32(0)
  );

  const mainIndex = IMPORTED_FUNCTIONS.length;
  const exportEntry = new ByteWriter().name(EXPORT_NAME).byte(EXTERNAL_FUNCTION).u32(mainIndex);

  const locals = localCount > 0
    ? new ByteWriter().u32(1).u32(localCount).byte(F64)
    : new ByteWriter().u32(0);
  const body = new ByteWriter().append(locals).append(code).byte(Opcode.end);
  const sizedBody = new ByteWriter().u32(body.length).append(body);

  return new ByteWriter()
    .raw(MAGIC)
    .raw(VERSION)
    .section(Section.type, new ByteWriter().vector([unaryType, mainType]))
    .section(Section.import, new ByteWriter().vector(imports))
    .section(Section.function, new ByteWriter().u32(1).u32(1))
    .section(Section.export, new ByteWriter().vector([exportEntry]))
    .section(Section.code, new ByteWriter().vector([sizedBody]))
    .toBytes();
}

function formatListing(parameterCount: number, localCount: number, instructions: readonly string[]): string {
  const params = parameterCount > 0 ? ` (param${' f64'.repeat(parameterCount)})` : '';
  const locals = localCount > 0 ? ` (local${' f64'.repeat(localCount)})` : '';
  const lines = [`(func $${EXPORT_NAME}${params} (result f64)${locals}`];
  for (const insn of instructions) lines.push(`  ${insn}`);
  lines.push(')');
  return lines.join('\n');
}
