import type { z } from 'zod';

// ============================================================================
// Marks and Directions
// ============================================================================

/** Field marks restricting the directions a field participates in. */
export const MARKS = ['read-only', 'write-only', 'private'] as const;

/**
 * - `read-only`: sent to clients, never accepted from them.
 * - `write-only`: accepted from clients, never sent back.
 * - `private`: never crosses the wire.
 */
export type Mark = (typeof MARKS)[number];

export function isMark(value: unknown): value is Mark {
  return typeof value === 'string' && (MARKS as readonly string[]).includes(value);
}

/**
 * `data` is the client → server direction (decode), `return` the
 * server → client direction (encode).
 */
export type DTODirection = 'data' | 'return';

// ============================================================================
// Runtime Type Descriptors
// ============================================================================

export type CollectionOrigin = 'array' | 'set';
export type MappingOrigin = 'record' | 'map';

/** Leaf value validated on the wire by its zod schema. */
export interface ScalarRef {
  kind: 'scalar';
  name: string;
  schema: z.core.$ZodType;
}

/** A domain model of the same kind as the introspector that produced it. */
export interface ModelRef {
  kind: 'model';
  name: string;
  model: object;
}

export interface CollectionRef {
  kind: 'collection';
  origin: CollectionOrigin;
  element: TypeRef;
}

export interface MappingRef {
  kind: 'mapping';
  origin: MappingOrigin;
  key: TypeRef;
  value: TypeRef;
}

export interface TupleRef {
  kind: 'tuple';
  items: TypeRef[];
  rest: TypeRef | null;
}

export interface UnionRef {
  kind: 'union';
  options: TypeRef[];
}

/**
 * Runtime description of a declared field type.
 * Introspectors translate their model kind's type information into this shape.
 */
export type TypeRef = ScalarRef | ModelRef | CollectionRef | MappingRef | TupleRef | UnionRef;

// ============================================================================
// Field Definitions
// ============================================================================

/** Sentinel for "this field has no default value". */
export const EMPTY: unique symbol = Symbol('transfer-dto.empty');
export type Empty = typeof EMPTY;

/**
 * Introspector-agnostic description of one domain model field.
 * Created fresh on every inspection and never mutated afterwards.
 */
export interface FieldDefinition {
  readonly name: string;
  readonly type: TypeRef;
  readonly default: unknown;
  readonly defaultFactory: (() => unknown) | null;
  readonly mark: Mark | null;
  /** The field may be absent from a domain value. */
  readonly optional: boolean;
  readonly modelName: string;
}

/** Anything with string keys. Transfer instances, domain objects and builtins all qualify. */
export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
