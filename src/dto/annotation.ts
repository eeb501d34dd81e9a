import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';
import type {
  CollectionRef,
  MappingRef,
  ModelRef,
  ScalarRef,
  TupleRef,
  TypeRef,
  UnionRef,
} from '../core/types.js';
import {
  collectionNode,
  mappingNode,
  simpleNode,
  tupleNode,
  unionNode,
  type NestedInfo,
  type TransferNode,
} from './transfer-types.js';

// ============================================================================
// Handler Annotations
// ============================================================================

/** The handler receives a `DTOData` wrapping the decoded builtins. */
export interface DTODataAnnotation {
  kind: 'dto-data';
  inner: TypeRef;
}

/**
 * A generic container (a pagination envelope, say). Only `attribute` goes
 * through the DTO; the other attributes pass through unchanged.
 */
export interface WrapperAnnotation {
  kind: 'wrapper';
  attribute: string;
  inner: TypeRef;
}

/** What a handler declares for its body or its return value. */
export type HandlerAnnotation = TypeRef | DTODataAnnotation | WrapperAnnotation;

function isNullRef(type: TypeRef): boolean {
  return type.kind === 'scalar' && type.name === 'null';
}

/**
 * Builders for handler annotations.
 *
 * @example
 * ```ts
 * ref.array(ref.model(Person));
 * ref.nullable(ref.model(Person));
 * ref.dtoData(ref.model(Person));
 * ref.wrapper('items', ref.array(ref.model(Person)));
 * ```
 */
export const ref = {
  model(model: object, name?: string): ModelRef {
    return { kind: 'model', name: name ?? (typeof model === 'function' ? model.name : 'Model'), model };
  },
  scalar(schema: z.core.$ZodType, name?: string): ScalarRef {
    return { kind: 'scalar', name: name ?? schema._zod.def.type, schema };
  },
  array(element: TypeRef): CollectionRef {
    return { kind: 'collection', origin: 'array', element };
  },
  set(element: TypeRef): CollectionRef {
    return { kind: 'collection', origin: 'set', element };
  },
  record(value: TypeRef): MappingRef {
    return { kind: 'mapping', origin: 'record', key: ref.scalar(z.string()), value };
  },
  map(key: TypeRef, value: TypeRef): MappingRef {
    return { kind: 'mapping', origin: 'map', key, value };
  },
  tuple(items: TypeRef[], rest: TypeRef | null = null): TupleRef {
    return { kind: 'tuple', items, rest };
  },
  union(...options: TypeRef[]): UnionRef {
    return { kind: 'union', options };
  },
  nullable(inner: TypeRef): UnionRef {
    return { kind: 'union', options: [inner, ref.scalar(z.null())] };
  },
  dtoData(inner: TypeRef): DTODataAnnotation {
    return { kind: 'dto-data', inner };
  },
  wrapper(attribute: string, inner: TypeRef): WrapperAnnotation {
    return { kind: 'wrapper', attribute, inner };
  },
};

// ============================================================================
// Resolution
// ============================================================================

export interface ResolvedAnnotation {
  /** The annotation without the `dto-data` / `wrapper` layer. */
  inner: TypeRef;
  /** The model the handler declares. */
  model: object;
  isDTOData: boolean;
  wrapperAttribute: string | null;
  nullable: boolean;
}

function findModel(type: TypeRef): ModelRef {
  switch (type.kind) {
    case 'model':
      return type;
    case 'collection':
      return findModel(type.element);
    case 'mapping':
      return findModel(type.value);
    case 'union': {
      const candidates = type.options.filter((option) => !isNullRef(option));
      const [only] = candidates;
      if (candidates.length !== 1 || !only) {
        throw new ConfigurationException('Unions are not supported as DTO handler type');
      }
      return findModel(only);
    }
    case 'tuple':
      throw new ConfigurationException('DTOs only support homogeneous collection types');
    case 'scalar':
      throw new ConfigurationException(`Handler type '${type.name}' is not a model`);
  }
}

/**
 * Unwraps `dto-data`, wrappers, nullable unions, collections and mapping
 * values down to the declared model.
 *
 * @throws ConfigurationException when no single model can be found.
 */
export function resolveAnnotation(annotation: HandlerAnnotation): ResolvedAnnotation {
  let inner: TypeRef;
  let isDTOData = false;
  let wrapperAttribute: string | null = null;

  if (annotation.kind === 'dto-data') {
    inner = annotation.inner;
    isDTOData = true;
  } else if (annotation.kind === 'wrapper') {
    inner = annotation.inner;
    wrapperAttribute = annotation.attribute;
  } else {
    inner = annotation;
  }

  return {
    inner,
    model: findModel(inner).model,
    isDTOData,
    wrapperAttribute,
    nullable: inner.kind === 'union' && inner.options.some(isNullRef),
  };
}

/**
 * Root transfer node of a handler: the annotation with every model of the
 * DTO replaced by the root schema level.
 */
export function annotationNode(
  type: TypeRef,
  root: NestedInfo,
  isBoundModel: (model: object) => boolean
): TransferNode {
  const node = (inner: TypeRef): TransferNode => annotationNode(inner, root, isBoundModel);

  switch (type.kind) {
    case 'model':
      if (!isBoundModel(type.model)) return simpleNode(type);
      return simpleNode(type, type.model === root.model ? root : { ...root, model: type.model });
    case 'collection':
      return collectionNode(type.origin, node(type.element));
    case 'mapping':
      return mappingNode(type.origin, node(type.key), node(type.value));
    case 'tuple':
      return tupleNode(type.items.map(node), type.rest ? node(type.rest) : null);
    case 'union':
      return unionNode(type.options.map(node));
    case 'scalar':
      return simpleNode(type);
  }
}
