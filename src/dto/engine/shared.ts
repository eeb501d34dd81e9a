import { z } from 'zod';
import { TransferError } from '../../core/exceptions.js';
import { getLogger } from '../../core/logger.js';
import { isRecord, type UnknownRecord } from '../../core/types.js';
import type { ModelIntrospector } from '../../introspection/types.js';
import { nestedOption, type NestedInfo, type TransferFieldDefinition, type TransferNode } from '../transfer-types.js';
import type { DecodeMode } from './types.js';

/** Elements of an array or set; `null` for anything else. */
export function collectionValues(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (value instanceof Set) return [...value];
  return null;
}

/** Entries of a map or plain record; `null` for anything else. */
export function mappingEntries(value: unknown): Array<[unknown, unknown]> | null {
  if (value instanceof Map) return [...value.entries()];
  if (isRecord(value)) return Object.entries(value);
  return null;
}

export function recordFromEntries(entries: Array<[unknown, unknown]>): UnknownRecord {
  const record: UnknownRecord = {};
  for (const [key, value] of entries) {
    record[String(key)] = value;
  }
  return record;
}

/** Key a decode reads from its source. */
export function decodeSourceKey(field: TransferFieldDefinition, mode: DecodeMode): string {
  return mode.fieldNames ? field.name : field.serializationName;
}

export function decodeMatches(nested: NestedInfo, value: unknown, mode: DecodeMode): boolean {
  if (!mode.fieldNames) {
    return value instanceof nested.transferModel.cls;
  }
  return isRecord(value) && Object.keys(value).every((key) => nested.fieldNames.has(key));
}

export function encodeMatches(nested: NestedInfo, value: unknown, introspector: ModelIntrospector): boolean {
  return introspector.isInstance(nested.model, value);
}

/**
 * First alternative accepted by `matches`, in declared order. Logs a warning
 * when a later alternative would match too.
 */
export function selectNestedOption(
  options: readonly NestedInfo[],
  matches: (nested: NestedInfo) => boolean
): NestedInfo | null {
  let selected: NestedInfo | null = null;
  for (const nested of options) {
    if (!matches(nested)) continue;
    if (selected) {
      getLogger().warn('Union value matches more than one nested alternative; using the first', {
        selected: selected.transferModel.name,
        alsoMatching: nested.transferModel.name,
      });
      break;
    }
    selected = nested;
  }
  return selected;
}

/**
 * Guards the encode of a union value no nested alternative claimed. Records
 * go out unchanged only when a mapping alternative or a scalar alternative
 * takes them; otherwise they would carry every field of a domain object.
 *
 * @throws TransferError for a record no alternative accepts.
 */
export function assertUnclaimedValue(options: readonly TransferNode[], value: unknown): void {
  if (!isRecord(value)) return;

  const accepted = options.some((option) => {
    if (option.hasNested) return false;
    if (option.kind === 'mapping') return true;
    return option.kind === 'simple' && option.type.kind === 'scalar' && z.safeParse(option.type.schema, value).success;
  });
  if (accepted) return;

  const alternatives = options
    .map(nestedOption)
    .filter((nested) => nested !== null)
    .map((nested) => nested.transferModel.name);
  throw new TransferError('Value matches no alternative of a union with nested models', alternatives);
}
