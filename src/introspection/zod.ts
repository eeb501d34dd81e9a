import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';
import { isRecord, type FieldDefinition, type ModelRef, type TypeRef, type UnknownRecord } from '../core/types.js';
import { typeContainsModel, type ModelIntrospector } from './types.js';
import { zodFieldDefinition, zodSchemaName, type ZodModelResolver } from './zod-types.js';

/** A zod object schema used as a domain model. */
export type ZodModel = z.ZodObject;

/**
 * Introspector for zod object schemas.
 * Domain values are plain objects; nested models are nested `z.object` fields.
 *
 * @example
 * ```ts
 * const Address = z.object({ street: z.string(), city: z.string() }).meta({ id: 'Address' });
 * const Person = z.object({ name: z.string(), address: Address }).meta({ id: 'Person' });
 *
 * new ZodIntrospector().generateFieldDefinitions(Person);
 * // [{ name: 'name', type: { kind: 'scalar', ... } }, { name: 'address', type: { kind: 'model', ... } }]
 * ```
 */
export class ZodIntrospector implements ModelIntrospector<ZodModel> {
  readonly kind = 'zod';

  private readonly cache = new WeakMap<ZodModel, readonly FieldDefinition[]>();

  private readonly resolveModel: ZodModelResolver = (schema) => {
    if (schema instanceof z.ZodObject) {
      return this.modelRef(schema);
    }
    return null;
  };

  assertModel(model: unknown): asserts model is ZodModel {
    if (typeof model === 'string') {
      throw new ConfigurationException('Forward references are not supported as DTO model type', { model });
    }
    if (model instanceof z.ZodUnion || model instanceof z.ZodNullable || model instanceof z.ZodOptional) {
      throw new ConfigurationException('Unions are not supported as DTO model type');
    }
    if (!(model instanceof z.ZodObject)) {
      throw new ConfigurationException('Expected a zod object schema as DTO model type');
    }
  }

  modelName(model: ZodModel): string {
    return zodSchemaName(model, 'Model');
  }

  generateFieldDefinitions(model: ZodModel): readonly FieldDefinition[] {
    const cached = this.cache.get(model);
    if (cached) return cached;

    const modelName = this.modelName(model);
    const fields: FieldDefinition[] = [];
    for (const [name, fieldSchema] of Object.entries(model.shape)) {
      const definition = zodFieldDefinition(name, fieldSchema, modelName, this.resolveModel);
      if (definition) {
        fields.push(definition);
      }
    }

    const frozen = Object.freeze(fields);
    this.cache.set(model, frozen);
    return frozen;
  }

  detectNestedField(type: TypeRef): boolean {
    return typeContainsModel(type);
  }

  instantiate(_model: ZodModel, values: UnknownRecord): UnknownRecord {
    return { ...values };
  }

  /**
   * Structural check on keys alone: every required field is present and,
   * unless the schema has a catchall, no key lies outside the shape. Field
   * values are never read.
   */
  isInstance(model: ZodModel, value: unknown): boolean {
    if (!isRecord(value)) return false;

    const shape = model.shape;
    const catchall = model.def.catchall;
    if (!catchall || catchall instanceof z.ZodNever) {
      if (Object.keys(value).some((key) => !Object.hasOwn(shape, key))) return false;
    }
    return this.generateFieldDefinitions(model).every((field) => field.optional || field.name in value);
  }

  isSubtype(candidate: object, base: ZodModel): boolean {
    return candidate === base;
  }

  private modelRef(schema: ZodModel): ModelRef {
    return { kind: 'model', name: this.modelName(schema), model: schema };
  }
}
