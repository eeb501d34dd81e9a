/**
 * Plain class models ("structs").
 *
 * TypeScript erases class field types, so a struct declares its fields once
 * as a zod shape. The shape is a thunk, resolved on first inspection, so
 * structs can reference each other (or themselves) in any order.
 *
 * @example
 * ```ts
 * class Address extends Struct {
 *   declare street: string;
 *   declare city: string;
 * }
 * defineStruct(Address, { fields: () => ({ street: z.string(), city: z.string() }) });
 *
 * class Person extends Struct {
 *   declare name: string;
 *   declare address: Address;
 * }
 * defineStruct(Person, { fields: () => ({ name: z.string(), address: structRef(Address) }) });
 * ```
 */

import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';
import { getLogger } from '../core/logger.js';
import type { FieldDefinition, ModelRef, TypeRef, UnknownRecord } from '../core/types.js';
import { typeContainsModel, type ModelIntrospector } from './types.js';
import { zodFieldDefinition, type ZodModelResolver } from './zod-types.js';

// ============================================================================
// Struct Base Class
// ============================================================================

/** Base class for struct models. The constructor copies the given field values. */
export abstract class Struct {
  constructor(values: UnknownRecord = {}) {
    Object.assign(this, values);
  }
}

export type StructClass<T extends Struct = Struct> = new (values?: UnknownRecord) => T;

type StructShape = Record<string, z.core.$ZodType>;

export interface StructOptions {
  /** Defaults to the class name. */
  name?: string;
  fields: () => StructShape;
}

interface StructEntry {
  name: string;
  cls: StructClass;
  fields: () => StructShape;
  resolved: StructShape | null;
}

const structs = new WeakMap<object, StructEntry>();
const structsByName = new Map<string, StructClass>();
const structRefs = new WeakMap<z.core.$ZodType, StructClass>();
const forwardRefs = new WeakMap<z.core.$ZodType, string>();

/**
 * Registers `cls` as a struct model and returns it.
 *
 * @throws ConfigurationException when the class is registered twice.
 */
export function defineStruct<C extends StructClass>(cls: C, options: StructOptions): C {
  if (structs.has(cls)) {
    throw new ConfigurationException(`Struct '${cls.name}' is already defined`);
  }
  const name = options.name ?? cls.name;
  structs.set(cls, { name, cls, fields: options.fields, resolved: null });
  structsByName.set(name, cls);
  return cls;
}

export function isStruct(value: unknown): value is StructClass {
  return typeof value === 'function' && structs.has(value);
}

/** Field type for "an instance of struct `cls`". */
export function structRef<T extends Struct>(cls: StructClass<T>): z.ZodType<T> {
  const schema = z.custom<T>((value) => value instanceof cls);
  structRefs.set(schema, cls);
  return schema;
}

/**
 * Field type referencing a struct by name. Resolved when the owning struct is
 * inspected, against the introspector's namespace, then every defined struct.
 */
export function forwardRef(name: string): z.ZodType<Struct> {
  const schema = z.custom<Struct>((value) => value instanceof Struct);
  forwardRefs.set(schema, name);
  return schema;
}

/** Forgets every struct registered by name. Test teardown only. */
export function clearStructNames(): void {
  structsByName.clear();
}

// ============================================================================
// Introspector
// ============================================================================

export interface StructIntrospectorOptions {
  /** Extra names for resolving `forwardRef`s, checked before the global registry. */
  namespace?: Record<string, StructClass>;
}

export class StructIntrospector implements ModelIntrospector<StructClass> {
  readonly kind = 'struct';

  private readonly namespace: Record<string, StructClass>;
  private readonly cache = new WeakMap<StructClass, readonly FieldDefinition[]>();

  private readonly resolveModel: ZodModelResolver = (schema) => {
    const cls = structRefs.get(schema);
    if (cls) {
      return this.modelRef(cls);
    }

    const forwardName = forwardRefs.get(schema);
    if (forwardName === undefined) {
      return null;
    }
    const resolved = this.namespace[forwardName] ?? structsByName.get(forwardName);
    if (!resolved || !structs.has(resolved)) {
      getLogger().warn('Unresolvable struct reference, field skipped', { reference: forwardName });
      return 'unresolved';
    }
    return this.modelRef(resolved);
  };

  constructor(options: StructIntrospectorOptions = {}) {
    this.namespace = options.namespace ?? {};
  }

  assertModel(model: unknown): asserts model is StructClass {
    if (typeof model === 'string') {
      throw new ConfigurationException('Forward references are not supported as DTO model type', { model });
    }
    if (!isStruct(model)) {
      throw new ConfigurationException('Expected a class registered with defineStruct() as DTO model type');
    }
  }

  modelName(model: StructClass): string {
    return this.entry(model).name;
  }

  generateFieldDefinitions(model: StructClass): readonly FieldDefinition[] {
    const cached = this.cache.get(model);
    if (cached) return cached;

    const entry = this.entry(model);
    entry.resolved ??= entry.fields();

    const fields: FieldDefinition[] = [];
    for (const [name, fieldSchema] of Object.entries(entry.resolved)) {
      const definition = zodFieldDefinition(name, fieldSchema, entry.name, this.resolveModel);
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

  instantiate(model: StructClass, values: UnknownRecord): Struct {
    const Cls = this.entry(model).cls;
    return new Cls(values);
  }

  isInstance(model: StructClass, value: unknown): boolean {
    return value instanceof model;
  }

  isSubtype(candidate: object, base: StructClass): boolean {
    return candidate === base || (typeof candidate === 'function' && candidate.prototype instanceof base);
  }

  private entry(model: StructClass): StructEntry {
    const entry = structs.get(model);
    if (!entry) {
      throw new ConfigurationException(`'${model.name}' is not registered with defineStruct()`);
    }
    return entry;
  }

  private modelRef(cls: StructClass): ModelRef {
    return { kind: 'model', name: this.modelName(cls), model: cls };
  }
}
