import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';
import { EMPTY, isMark, type FieldDefinition, type Mark, type ModelRef, type TypeRef } from '../core/types.js';

// ============================================================================
// Field Marks
// ============================================================================

export interface DTOFieldMeta {
  mark: Mark;
}

/**
 * Registry holding per-field marks for zod-described fields.
 *
 * @example
 * ```ts
 * const User = z.object({
 *   id: z.uuid().register(dtoFieldRegistry, { mark: 'read-only' }),
 *   password: dtoField(z.string(), 'write-only'),
 * });
 * ```
 */
export const dtoFieldRegistry = z.registry<DTOFieldMeta>();

/** Attaches a mark to a field schema and returns the same schema. */
export function dtoField<T extends z.core.$ZodType>(schema: T, mark: Mark): T {
  dtoFieldRegistry.add(schema, { mark });
  return schema;
}

// ============================================================================
// Zod → TypeRef
// ============================================================================

/**
 * Decides whether a zod schema stands for a nested model.
 * Returns the model reference, `null` for "not a model", or `'unresolved'`
 * for a reference that cannot be resolved (the field is then skipped).
 */
export type ZodModelResolver = (schema: z.core.$ZodType) => ModelRef | 'unresolved' | null;

const NULL_REF: TypeRef = { kind: 'scalar', name: 'null', schema: z.null() };

function scalar(schema: z.core.$ZodType): TypeRef {
  return { kind: 'scalar', name: schema._zod.def.type, schema };
}

/**
 * Translates a zod schema into a TypeRef.
 * Returns `null` when a model reference inside the schema cannot be resolved.
 */
export function zodToTypeRef(schema: z.core.$ZodType, resolveModel: ZodModelResolver): TypeRef | null {
  const resolved = resolveModel(schema);
  if (resolved === 'unresolved') return null;
  if (resolved) return resolved;

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault || schema instanceof z.ZodReadonly) {
    return zodToTypeRef(schema.def.innerType, resolveModel);
  }

  if (schema instanceof z.ZodNullable) {
    const inner = zodToTypeRef(schema.def.innerType, resolveModel);
    return inner ? { kind: 'union', options: [inner, NULL_REF] } : null;
  }

  if (schema instanceof z.ZodLazy) {
    return zodToTypeRef(schema.def.getter(), resolveModel);
  }

  if (schema instanceof z.ZodArray) {
    const element = zodToTypeRef(schema.def.element, resolveModel);
    return element ? { kind: 'collection', origin: 'array', element } : null;
  }

  if (schema instanceof z.ZodSet) {
    const element = zodToTypeRef(schema.def.valueType, resolveModel);
    return element ? { kind: 'collection', origin: 'set', element } : null;
  }

  if (schema instanceof z.ZodTuple) {
    const rest = schema.def.rest ? zodToTypeRef(schema.def.rest, resolveModel) : null;
    if (schema.def.rest && !rest) return null;

    if (schema.def.items.length === 0 && rest) {
      return { kind: 'collection', origin: 'array', element: rest };
    }

    const items: TypeRef[] = [];
    for (const item of schema.def.items) {
      const ref = zodToTypeRef(item, resolveModel);
      if (!ref) return null;
      items.push(ref);
    }
    return { kind: 'tuple', items, rest };
  }

  if (schema instanceof z.ZodRecord || schema instanceof z.ZodMap) {
    const key = zodToTypeRef(schema.def.keyType, resolveModel);
    const value = zodToTypeRef(schema.def.valueType, resolveModel);
    if (!key || !value) return null;
    return { kind: 'mapping', origin: schema instanceof z.ZodMap ? 'map' : 'record', key, value };
  }

  if (schema instanceof z.ZodUnion) {
    const options: TypeRef[] = [];
    for (const option of schema.def.options) {
      const ref = zodToTypeRef(option, resolveModel);
      if (!ref) return null;
      options.push(ref);
    }
    return { kind: 'union', options };
  }

  return scalar(schema);
}

// ============================================================================
// Zod Field → FieldDefinition
// ============================================================================

/**
 * Builds the field definition for one entry of a zod shape, peeling
 * optional/default/nullable/readonly wrappers and reading the field mark.
 *
 * @throws ConfigurationException when the registered mark is not a known mark.
 */
export function zodFieldDefinition(
  name: string,
  fieldSchema: z.core.$ZodType,
  modelName: string,
  resolveModel: ZodModelResolver
): FieldDefinition | null {
  let current: z.core.$ZodType = fieldSchema;
  let optional = false;
  let nullable = false;
  let defaultFactory: (() => unknown) | null = null;
  let mark: unknown = undefined;
  let resolved: ModelRef | 'unresolved' | null = null;

  for (;;) {
    const meta: { mark?: unknown } | undefined = dtoFieldRegistry.get(current);
    if (meta && mark === undefined) {
      mark = meta.mark;
    }

    resolved = resolveModel(current);
    if (resolved !== null) break;

    if (current instanceof z.ZodOptional) {
      optional = true;
      current = current.def.innerType;
    } else if (current instanceof z.ZodDefault) {
      const withDefault = current;
      optional = true;
      defaultFactory ??= () => withDefault.def.defaultValue;
      current = withDefault.def.innerType;
    } else if (current instanceof z.ZodNullable) {
      nullable = true;
      current = current.def.innerType;
    } else if (current instanceof z.ZodReadonly) {
      current = current.def.innerType;
    } else {
      break;
    }
  }

  let fieldMark: Mark | null = null;
  if (mark !== undefined) {
    if (!isMark(mark)) {
      throw new ConfigurationException(
        `Invalid DTO field mark on '${modelName}.${name}': ${String(mark)}`,
        { field: `${modelName}.${name}`, mark: String(mark) }
      );
    }
    fieldMark = mark;
  }

  if (resolved === 'unresolved') return null;
  const inner = resolved ?? zodToTypeRef(current, resolveModel);
  if (!inner) return null;

  return {
    name,
    type: nullable ? { kind: 'union', options: [inner, NULL_REF] } : inner,
    default: EMPTY,
    defaultFactory,
    mark: fieldMark,
    optional,
    modelName,
  };
}

/** Name of a zod schema taken from its `.meta({ id })` or `.meta({ title })`. */
export function zodSchemaName(schema: z.core.$ZodType, fallback: string): string {
  const meta = z.globalRegistry.get(schema);
  if (meta && typeof meta.id === 'string') return meta.id;
  if (meta && typeof meta.title === 'string') return meta.title;
  return fallback;
}
