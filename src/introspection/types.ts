import type { FieldDefinition, TypeRef, UnknownRecord } from '../core/types.js';

/**
 * Adapter between one kind of domain model and the DTO engine.
 *
 * Implementations must be deterministic: the same model always yields the
 * same fields in the same order. They may cache per model but must not
 * mutate shared state.
 */
export interface ModelIntrospector<M extends object = object> {
  /** Short identifier used in diagnostics (`zod`, `struct`, `drizzle`). */
  readonly kind: string;

  /**
   * Rejects values that cannot be a DTO root model (unions, forward references,
   * models of another kind).
   *
   * @throws ConfigurationException
   */
  assertModel(model: unknown): asserts model is M;

  modelName(model: M): string;

  /**
   * Ordered field definitions of `model`. A field whose type cannot be
   * resolved is left out.
   */
  generateFieldDefinitions(model: M): readonly FieldDefinition[];

  /**
   * True when `type` (or, for a collection or union, one of its immediate
   * inner types) is a model this introspector handles.
   */
  detectNestedField(type: TypeRef): boolean;

  /** Builds a domain value of `model` from field values keyed by field name. */
  instantiate(model: M, values: UnknownRecord): unknown;

  /** Runtime "is this value a `model`" check used to pick union alternatives. */
  isInstance(model: M, value: unknown): boolean;

  /** True when values of `candidate` may be used where `base` is expected. */
  isSubtype(candidate: object, base: M): boolean;
}

/** `detectNestedField` shared by every introspector. */
export function typeContainsModel(type: TypeRef): boolean {
  switch (type.kind) {
    case 'model':
      return true;
    case 'collection':
      return type.element.kind === 'model';
    case 'mapping':
      return type.key.kind === 'model' || type.value.kind === 'model';
    case 'tuple':
      return type.items.some((item) => item.kind === 'model') || type.rest?.kind === 'model';
    case 'union':
      return type.options.some((option) => option.kind === 'model');
    default:
      return false;
  }
}
