import { z } from 'zod';
import { EMPTY, type ScalarRef, type UnknownRecord } from '../core/types.js';
import {
  TransferObject,
  type TransferClass,
  type TransferFieldDefinition,
  type TransferModel,
  type TransferNode,
} from './transfer-types.js';

export interface TransferModelOptions {
  /** Reject wire objects carrying keys the model does not define. */
  strict: boolean;
}

/** Creates a `TransferObject` subclass whose `name` is `name`. */
export function createTransferClass(name: string): TransferClass {
  const holder = { [name]: class extends TransferObject {} };
  return holder[name];
}

/**
 * Wire schema of a scalar. Dates and bigints are coerced, since JSON carries
 * them as strings.
 */
function scalarSchema(type: ScalarRef): z.core.$ZodType {
  switch (type.name) {
    case 'date':
      return z.coerce.date();
    case 'bigint':
      return z.coerce.bigint();
    default:
      return type.schema;
  }
}

/**
 * Zod schema validating the wire shape of a transfer node.
 * Nested levels validate into their transfer model instances; sets travel
 * as arrays and maps as string-keyed records.
 */
export function nodeSchema(node: TransferNode): z.core.$ZodType {
  switch (node.kind) {
    case 'simple':
      if (node.nested) return node.nested.transferModel.schema;
      return node.type.kind === 'scalar' ? scalarSchema(node.type) : z.unknown();

    case 'collection':
      return z.array(nodeSchema(node.inner));

    case 'mapping':
      return z.record(z.string(), nodeSchema(node.value));

    case 'tuple': {
      const [first, ...others] = node.items.map(nodeSchema);
      if (!first) {
        return node.rest ? z.array(nodeSchema(node.rest)) : z.tuple([]);
      }
      return node.rest ? z.tuple([first, ...others], nodeSchema(node.rest)) : z.tuple([first, ...others]);
    }

    case 'union':
      return z.union(node.options.map(nodeSchema));
  }
}

function collectNested(node: TransferNode, into: TransferModel[]): void {
  switch (node.kind) {
    case 'simple':
      if (node.nested) into.push(node.nested.transferModel);
      return;
    case 'collection':
      collectNested(node.inner, into);
      return;
    case 'mapping':
      collectNested(node.key, into);
      collectNested(node.value, into);
      return;
    case 'tuple':
      node.items.forEach((item) => collectNested(item, into));
      if (node.rest) collectNested(node.rest, into);
      return;
    case 'union':
      node.options.forEach((option) => collectNested(option, into));
      return;
  }
}

/**
 * Synthesizes the transfer model for one schema level.
 *
 * Only non-excluded fields appear, under their serialization names. Partial
 * fields may be absent and are never defaulted; otherwise absent fields with
 * a default (or default factory) receive it.
 */
export function createTransferModel(
  name: string,
  fields: readonly TransferFieldDefinition[],
  options: TransferModelOptions
): TransferModel {
  const cls = createTransferClass(name);
  const shape: Record<string, z.core.$ZodType> = {};
  const defaults: Array<{ key: string; value: () => unknown }> = [];
  const nested: TransferModel[] = [];

  for (const field of fields) {
    if (field.isExcluded) continue;

    const key = field.serializationName;
    const schema = nodeSchema(field.transferType);
    collectNested(field.transferType, nested);

    const hasDefault = field.default !== EMPTY || field.defaultFactory !== null;
    shape[key] = field.isPartial || field.optional || hasDefault ? z.optional(schema) : schema;

    if (field.isPartial || !hasDefault) continue;
    const factory = field.defaultFactory;
    const value = field.default;
    defaults.push({ key, value: factory ?? (() => value) });
  }

  const base = options.strict ? z.strictObject(shape) : z.object(shape);
  const schema: z.ZodType<TransferObject> = base.transform((parsed) => {
    const values: UnknownRecord = { ...parsed };
    for (const fieldDefault of defaults) {
      if (values[fieldDefault.key] === undefined) {
        values[fieldDefault.key] = fieldDefault.value();
      }
    }
    return new cls(values);
  });

  return Object.freeze({ name, cls, schema, nested: Object.freeze(nested) });
}
