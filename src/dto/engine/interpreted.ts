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

/**
 * Walks the transfer schema on every call.
 */
export class InterpretedEngine implements TransferEngine {
  readonly kind = 'interpreted';

  private readonly root: TransferNode;
  private readonly introspector: ModelIntrospector;

  constructor(options: TransferEngineOptions) {
    this.root = options.root;
    this.introspector = options.introspector;
  }

  decode(source: unknown, options?: DecodeOptions): unknown {
    return this.decodeNode(this.root, source, resolveDecodeMode(options));
  }

  encode(source: unknown): unknown {
    return this.encodeNode(this.root, source);
  }

  // ==========================================================================
  // Decode
  // ==========================================================================

  private decodeNode(node: TransferNode, value: unknown, mode: DecodeMode): unknown {
    switch (node.kind) {
      case 'simple':
        return node.nested ? this.decodeInstance(node.nested, value, mode) : value;

      case 'collection': {
        const values = collectionValues(value);
        if (!values) return value;
        const inner = nestedDecodeMode(mode);
        const decoded = values.map((item) => this.decodeNode(node.inner, item, inner));
        return node.origin === 'set' && mode.output !== 'builtins' ? new Set(decoded) : decoded;
      }

      case 'mapping': {
        const entries = mappingEntries(value);
        if (!entries) return value;
        const inner = nestedDecodeMode(mode);
        const decoded = entries.map(([key, item]): [unknown, unknown] => [
          this.decodeNode(node.key, key, inner),
          this.decodeNode(node.value, item, inner),
        ]);
        return node.origin === 'map' && mode.output !== 'builtins' ? new Map(decoded) : recordFromEntries(decoded);
      }

      case 'tuple': {
        if (!Array.isArray(value)) return value;
        const inner = nestedDecodeMode(mode);
        return value.map((item, position) => {
          const itemNode = node.items[position] ?? node.rest;
          return itemNode ? this.decodeNode(itemNode, item, inner) : item;
        });
      }

      case 'union': {
        if (!node.hasNested) return value;
        const options = node.options.map(nestedOption).filter((nested) => nested !== null);
        const selected = selectNestedOption(options, (nested) => decodeMatches(nested, value, mode));
        return selected ? this.decodeInstance(selected, value, mode) : value;
      }
    }
  }

  private decodeInstance(nested: NestedInfo, source: unknown, mode: DecodeMode): unknown {
    if (!isRecord(source)) return source;

    const inner = nestedDecodeMode(mode);
    const values: UnknownRecord = {};
    for (const field of nested.fields) {
      const key = decodeSourceKey(field, mode);
      if (!(key in source)) continue;
      const value = source[key];
      if (value === undefined) continue;
      values[field.name] = this.decodeNode(field.transferType, value, inner);
    }

    return mode.output === 'domain' ? this.introspector.instantiate(nested.model, values) : values;
  }

  // ==========================================================================
  // Encode
  // ==========================================================================

  private encodeNode(node: TransferNode, value: unknown): unknown {
    switch (node.kind) {
      case 'simple':
        return node.nested ? this.encodeInstance(node.nested, value) : value;

      case 'collection': {
        const values = collectionValues(value);
        if (!values) return value;
        return values.map((item) => this.encodeNode(node.inner, item));
      }

      case 'mapping': {
        const entries = mappingEntries(value);
        if (!entries) return value;
        return recordFromEntries(
          entries.map(([key, item]): [unknown, unknown] => [
            this.encodeNode(node.key, key),
            this.encodeNode(node.value, item),
          ])
        );
      }

      case 'tuple': {
        if (!Array.isArray(value)) return value;
        return value.map((item, position) => {
          const itemNode = node.items[position] ?? node.rest;
          return itemNode ? this.encodeNode(itemNode, item) : item;
        });
      }

      case 'union': {
        if (!node.hasNested) return value;
        const options = node.options.map(nestedOption).filter((nested) => nested !== null);
        const selected = selectNestedOption(options, (nested) => encodeMatches(nested, value, this.introspector));
        if (selected) return this.encodeInstance(selected, value);
        assertUnclaimedValue(node.options, value);
        return value;
      }
    }
  }

  private encodeInstance(nested: NestedInfo, source: unknown): unknown {
    if (!isRecord(source)) return source;

    const values: UnknownRecord = {};
    for (const field of nested.fields) {
      if (field.isExcluded) continue;
      const value = source[field.name];
      if (value === undefined) continue;
      values[field.serializationName] = this.encodeNode(field.transferType, value);
    }
    return new nested.transferModel.cls(values);
  }
}
