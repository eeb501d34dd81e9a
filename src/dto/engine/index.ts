import type { TransferBackendKind } from '../../config/index.js';
import { CodegenEngine } from './codegen.js';
import { InterpretedEngine } from './interpreted.js';
import type { TransferEngine, TransferEngineOptions } from './types.js';

export { CodegenEngine } from './codegen.js';
export { InterpretedEngine } from './interpreted.js';
export type { DecodeOptions, DecodeOutput, TransferEngine, TransferEngineOptions } from './types.js';

export function createTransferEngine(kind: TransferBackendKind, options: TransferEngineOptions): TransferEngine {
  return kind === 'codegen' ? new CodegenEngine(options) : new InterpretedEngine(options);
}
