import type { ModelIntrospector } from '../../introspection/types.js';
import type { TransferNode } from '../transfer-types.js';

/**
 * - `domain`: nested levels become domain model values (the default).
 * - `builtins`: every level becomes a plain record keyed by field name; sets
 *   become arrays and maps records.
 * - `record`: like `domain`, except the root level stays a plain record.
 */
export type DecodeOutput = 'domain' | 'builtins' | 'record';

export interface DecodeOptions {
  /** Read source keys by field name instead of serialization name. */
  fieldNames?: boolean;
  output?: DecodeOutput;
}

/**
 * The two transfer directions over one transfer schema.
 * Implementations must produce structurally equal output for the same input.
 */
export interface TransferEngine {
  readonly kind: string;
  /** Transfer instances (or builtins) to domain values. */
  decode(source: unknown, options?: DecodeOptions): unknown;
  /** Domain values to transfer instances. Excluded fields are never read. */
  encode(source: unknown): unknown;
}

export interface TransferEngineOptions {
  root: TransferNode;
  introspector: ModelIntrospector;
}

/** Resolved form of `DecodeOptions` passed down the walk. */
export interface DecodeMode {
  readonly fieldNames: boolean;
  readonly output: DecodeOutput;
}

export function resolveDecodeMode(options: DecodeOptions = {}): DecodeMode {
  return { fieldNames: options.fieldNames ?? false, output: options.output ?? 'domain' };
}

/** Mode applied below the root level. */
export function nestedDecodeMode(mode: DecodeMode): DecodeMode {
  return mode.output === 'record' ? { fieldNames: mode.fieldNames, output: 'domain' } : mode;
}
