import { Backend } from '../Backend.js';
import { JsBackend } from './JsBackend.js';
import { TapeBackend } from './TapeBackend.js';
import { WasmBackend } from './WasmBackend.js';

export { FunctionBuilderBase } from './FunctionBuilderBase.js';
export { JsBackend } from './JsBackend.js';
export { TapeBackend, TapeFunction } from './TapeBackend.js';
export type { TapeInstruction } from './TapeBackend.js';
export { WasmBackend, ByteWriter, encodeModule } from './WasmBackend.js';

export const BACKEND_NAMES = ['js', 'tape', 'wasm'] as const;

export type BackendName = typeof BACKEND_NAMES[number];

export function isBackendName(value: unknown): value is BackendName {
  return BACKEND_NAMES.some(name => name === value);
}

export function createBackend(name: BackendName): Backend {
  switch (name) {
    case 'js':
      return new JsBackend();
    case 'tape':
      return new TapeBackend();
    case 'wasm':
      return new WasmBackend();
  }
}
