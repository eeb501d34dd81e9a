import { isRecord, type UnknownRecord } from '../../core/types.js';
import type { ModelIntrospector } from '../../introspection/types.js';
import { nestedOption, type NestedInfo, type TransferNode } from '../transfer-types.js';
import {
  collectionValues,
  decodeMatches,
  decodeSourceKey,
  assertUnclaimedValue,
  encodeMatches,
  mappingEntries,
  recordFromEntries,
  selectNestedOption,
} from './shared.js';
import {
  nestedDecodeMode,
  resolveDecodeMode,
  type DecodeMode,
  type DecodeOptions,
  type TransferEngine,
  type TransferEngineOptions,
} from './types.js';

type Transfer = (value: unknown) => unknown;

interface FieldStep {
  readonly source: string;
  readonly target: string;
  /** `null` when the value is copied as-is. */
  readonly transfer: Transfer | null;
}

function modeKey(mode: DecodeMode): string {
  return `${mode.fieldNames ? 'name' : 'wire'}:${mode.output}`;
}

/**
 * Compiles one closure per schema node, so a call runs without dispatching
 * on node kinds. Values needing no transfer (scalars, unions without nested
 * models) are copied directly instead of going through a closure.
 */
export class CodegenEngine implements TransferEngine {
  readonly kind = 'codegen';

  private readonly root: TransferNode;
  private readonly introspector: ModelIntrospector;
  private readonly decoders = new Map<string, Transfer>();
  private readonly decodeCache = new Map<string, WeakMap<object, Transfer>>();
  private readonly encodeCache = new WeakMap<object, Transfer>();
  private readonly encoder: Transfer;

  constructor(options: TransferEngineOptions) {
    this.root = options.root;
    this.introspector = options.introspector;
    this.encoder = this.compileEncode(this.root);
    this.decoders.set(modeKey(resolveDecodeMode()), this.compileDecode(this.root, resolveDecodeMode()));
  }

  decode(source: unknown, options?: DecodeOptions): unknown {
    const mode = resolveDecodeMode(options);
    const key = modeKey(mode);
    let decoder = this.decoders.get(key);
    if (!decoder) {
      decoder = this.compileDecode(this.root, mode);
      this.decoders.set(key, decoder);
    }
    return decoder(source);
  }

  encode(source: unknown): unknown {
    return this.encoder(source);
  }

  // ==========================================================================
  // Decode
  // ==========================================================================

  private compileDecode(node: TransferNode, mode: DecodeMode): Transfer {
    const key = modeKey(mode);
    let cache = this.decodeCache.get(key);
    if (!cache) {
      cache = new WeakMap();
      this.decodeCache.set(key, cache);
    }
    const cached = cache.get(node);
    if (cached) return cached;

    const compiled = this.buildDecode(node, mode);
    cache.set(node, compiled);
    return compiled;
  }

  private buildDecode(node: TransferNode, mode: DecodeMode): Transfer {
    const inner = nestedDecodeMode(mode);
    const keepOrigin = mode.output !== 'builtins';

    switch (node.kind) {
      case 'simple': {
        const nested = node.nested;
        return nested ? this.compileDecodeInstance(nested, mode) : (value) => value;
      }

      case 'collection': {
        const asSet = node.origin === 'set' && keepOrigin;
        const element = needsTransfer(node.inner) ? this.compileDecode(node.inner, inner) : null;
        return (value) => {
          const values = collectionValues(value);
          if (!values) return value;
          const decoded = element ? values.map(element) : [...values];
          return asSet ? new Set(decoded) : decoded;
        };
      }

      case 'mapping': {
        const asMap = node.origin === 'map' && keepOrigin;
        const decodeKey = needsTransfer(node.key) ? this.compileDecode(node.key, inner) : null;
        const decodeValue = needsTransfer(node.value) ? this.compileDecode(node.value, inner) : null;
        return (value) => {
          const entries = mappingEntries(value);
          if (!entries) return value;
          const decoded = entries.map(([key, item]): [unknown, unknown] => [
            decodeKey ? decodeKey(key) : key,
            decodeValue ? decodeValue(item) : item,
          ]);
          return asMap ? new Map(decoded) : recordFromEntries(decoded);
        };
      }

      case 'tuple': {
        const items = node.items.map((item) => (needsTransfer(item) ? this.compileDecode(item, inner) : null));
        const rest = node.rest && needsTransfer(node.rest) ? this.compileDecode(node.rest, inner) : null;
        return tupleTransfer(items, rest);
      }

      case 'union': {
        if (!node.hasNested) return (value) => value;
        const options = node.options.map(nestedOption).filter((nested) => nested !== null);
        const branches = new Map(options.map((nested) => [nested, this.compileDecodeInstance(nested, mode)]));
        return (value) => {
          const selected = selectNestedOption(options, (nested) => decodeMatches(nested, value, mode));
          const branch = selected ? branches.get(selected) : undefined;
          if (branch) return branch(value);
          assertUnclaimedValue(node.options, value);
          return value;
        };
      }
    }
  }

  private compileDecodeInstance(nested: NestedInfo, mode: DecodeMode): Transfer {
    const inner = nestedDecodeMode(mode);
    const steps: FieldStep[] = nested.fields.map((field) => ({
      source: decodeSourceKey(field, mode),
      target: field.name,
      transfer: needsTransfer(field.transferType) ? this.compileDecode(field.transferType, inner) : null,
    }));
    const introspector = this.introspector;
    const model = nested.model;
    const asDomain = mode.output === 'domain';

    return (source) => {
      if (!isRecord(source)) return source;
      const values: UnknownRecord = {};
      for (const step of steps) {
        if (!(step.source in source)) continue;
        const value = source[step.source];
        if (value === undefined) continue;
        values[step.target] = step.transfer ? step.transfer(value) : value;
      }
      return asDomain ? introspector.instantiate(model, values) : values;
    };
  }

  // ==========================================================================
  // Encode
  // ==========================================================================

  private compileEncode(node: TransferNode): Transfer {
    const cached = this.encodeCache.get(node);
    if (cached) return cached;

    const compiled = this.buildEncode(node);
    this.encodeCache.set(node, compiled);
    return compiled;
  }

  private buildEncode(node: TransferNode): Transfer {
    switch (node.kind) {
      case 'simple': {
        const nested = node.nested;
        return nested ? this.compileEncodeInstance(nested) : (value) => value;
      }

      case 'collection': {
        const element = needsTransfer(node.inner) ? this.compileEncode(node.inner) : null;
        return (value) => {
          const values = collectionValues(value);
          if (!values) return value;
          return element ? values.map(element) : [...values];
        };
      }

      case 'mapping': {
        const encodeKey = needsTransfer(node.key) ? this.compileEncode(node.key) : null;
        const encodeValue = needsTransfer(node.value) ? this.compileEncode(node.value) : null;
        return (value) => {
          const entries = mappingEntries(value);
          if (!entries) return value;
          return recordFromEntries(
            entries.map(([key, item]): [unknown, unknown] => [
              encodeKey ? encodeKey(key) : key,
              encodeValue ? encodeValue(item) : item,
            ])
          );
        };
      }

      case 'tuple': {
        const items = node.items.map((item) => (needsTransfer(item) ? this.compileEncode(item) : null));
        const rest = node.rest && needsTransfer(node.rest) ? this.compileEncode(node.rest) : null;
        return tupleTransfer(items, rest);
      }

      case 'union': {
        if (!node.hasNested) return (value) => value;
        const options = node.options.map(nestedOption).filter((nested) => nested !== null);
        const branches = new Map(options.map((nested) => [nested, this.compileEncodeInstance(nested)]));
        const introspector = this.introspector;
        return (value) => {
          const selected = selectNestedOption(options, (nested) => encodeMatches(nested, value, introspector));
          const branch = selected ? branches.get(selected) : undefined;
          if (branch) return branch(value);
          assertUnclaimedValue(node.options, value);
          return value;
        };
      }
    }
  }

  private compileEncodeInstance(nested: NestedInfo): Transfer {
    const steps: FieldStep[] = nested.fields
      .filter((field) => !field.isExcluded)
      .map((field) => ({
        source: field.name,
        target: field.serializationName,
        transfer: needsTransfer(field.transferType) ? this.compileEncode(field.transferType) : null,
      }));
    const Cls = nested.transferModel.cls;

    return (source) => {
      if (!isRecord(source)) return source;
      const values: UnknownRecord = {};
      for (const step of steps) {
        const value = source[step.source];
        if (value === undefined) continue;
        values[step.target] = step.transfer ? step.transfer(value) : value;
      }
      return new Cls(values);
    };
  }
}

/** Scalars and non-nested unions are copied as-is; everything else is rebuilt. */
function needsTransfer(node: TransferNode): boolean {
  return node.kind === 'simple' || node.kind === 'union' ? node.hasNested : true;
}

function tupleTransfer(items: ReadonlyArray<Transfer | null>, rest: Transfer | null): Transfer {
  return (value) => {
    if (!Array.isArray(value)) return value;
    return value.map((item, position) => {
      const transfer = position < items.length ? items[position] : rest;
      return transfer ? transfer(item) : item;
    });
  };
}
