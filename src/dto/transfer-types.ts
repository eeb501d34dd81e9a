import type { z } from 'zod';
import type {
  CollectionOrigin,
  FieldDefinition,
  MappingOrigin,
  Mark,
  TypeRef,
  UnknownRecord,
} from '../core/types.js';

// ============================================================================
// Transfer Models
// ============================================================================

/**
 * Base of every synthesized transfer model class.
 * Instances hold wire field values under their serialization names and are frozen.
 */
export class TransferObject {
  readonly [field: string]: unknown;

  constructor(values: UnknownRecord) {
    Object.assign(this, values);
    Object.freeze(this);
  }
}

export type TransferClass = new (values: UnknownRecord) => TransferObject;

export interface TransferModel {
  /** Process-unique name; also the class name and the OpenAPI component name. */
  readonly name: string;
  readonly cls: TransferClass;
  /** Validates a wire object and produces a frozen `cls` instance. */
  readonly schema: z.ZodType<TransferObject>;
  /** Transfer models of the nested fields one level down. */
  readonly nested: readonly TransferModel[];
}

// ============================================================================
// Transfer Nodes
// ============================================================================

/** Everything needed to transfer one nested model level. */
export interface NestedInfo {
  readonly transferModel: TransferModel;
  readonly fields: readonly TransferFieldDefinition[];
  /** The domain model built on decode. */
  readonly model: object;
  /** Field names of `fields`, used to recognise builtins records of this level. */
  readonly fieldNames: ReadonlySet<string>;
}

/** Scalar or nested-model leaf. */
export interface SimpleNode {
  readonly kind: 'simple';
  readonly type: TypeRef;
  readonly nested: NestedInfo | null;
  readonly hasNested: boolean;
}

export interface CollectionNode {
  readonly kind: 'collection';
  readonly origin: CollectionOrigin;
  readonly inner: TransferNode;
  readonly hasNested: boolean;
}

export interface MappingNode {
  readonly kind: 'mapping';
  readonly origin: MappingOrigin;
  readonly key: TransferNode;
  readonly value: TransferNode;
  readonly hasNested: boolean;
}

export interface TupleNode {
  readonly kind: 'tuple';
  readonly items: readonly TransferNode[];
  readonly rest: TransferNode | null;
  readonly hasNested: boolean;
}

/** Ordered alternatives. An alternative with `hasNested` is matched by instance checks. */
export interface UnionNode {
  readonly kind: 'union';
  readonly options: readonly TransferNode[];
  readonly hasNested: boolean;
}

export type TransferNode = SimpleNode | CollectionNode | MappingNode | TupleNode | UnionNode;

// ============================================================================
// Transfer Field Definitions
// ============================================================================

export interface TransferFieldDefinition extends FieldDefinition {
  /** Effective mark, after underscore-private promotion. */
  readonly mark: Mark | null;
  readonly serializationName: string;
  readonly isPartial: boolean;
  /** Known to the schema but never transferred in this direction. */
  readonly isExcluded: boolean;
  readonly transferType: TransferNode;
}

// ============================================================================
// Node Constructors
// ============================================================================

export function simpleNode(type: TypeRef, nested: NestedInfo | null = null): SimpleNode {
  return { kind: 'simple', type, nested, hasNested: nested !== null };
}

export function collectionNode(origin: CollectionOrigin, inner: TransferNode): CollectionNode {
  return { kind: 'collection', origin, inner, hasNested: inner.hasNested };
}

export function mappingNode(origin: MappingOrigin, key: TransferNode, value: TransferNode): MappingNode {
  return { kind: 'mapping', origin, key, value, hasNested: key.hasNested || value.hasNested };
}

export function tupleNode(items: readonly TransferNode[], rest: TransferNode | null): TupleNode {
  return {
    kind: 'tuple',
    items,
    rest,
    hasNested: items.some((item) => item.hasNested) || (rest?.hasNested ?? false),
  };
}

export function unionNode(options: readonly TransferNode[]): UnionNode {
  return { kind: 'union', options, hasNested: options.some((option) => option.hasNested) };
}

/** Nested info of a union alternative, when the alternative is a nested model leaf. */
export function nestedOption(option: TransferNode): NestedInfo | null {
  return option.kind === 'simple' ? option.nested : null;
}
