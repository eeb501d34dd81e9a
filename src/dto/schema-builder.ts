import { serializationNameFor, type DTOConfig } from '../config/index.js';
import { SchemaConstructionError } from '../core/exceptions.js';
import type { DTODirection, FieldDefinition, Mark, TypeRef } from '../core/types.js';
import type { ModelIntrospector } from '../introspection/types.js';
import { reserveTransferModelName } from './names.js';
import { createTransferModel } from './transfer-model.js';
import {
  collectionNode,
  mappingNode,
  simpleNode,
  tupleNode,
  unionNode,
  type NestedInfo,
  type TransferFieldDefinition,
  type TransferModel,
  type TransferNode,
} from './transfer-types.js';

export interface SchemaBuilderOptions {
  introspector: ModelIntrospector;
  config: DTOConfig;
  direction: DTODirection;
  handlerId: string;
}

/**
 * Reduces the exclude/include paths of a parent to those of one child.
 * `address.street` becomes `street` for `address`; other paths are dropped.
 */
export function filterNestedPaths(paths: ReadonlySet<string>, segment: string): Set<string> {
  const filtered = new Set<string>();
  const prefix = `${segment}.`;
  for (const path of paths) {
    if (path.startsWith(prefix) && path.length > prefix.length) {
      filtered.add(path.slice(prefix.length));
    }
  }
  return filtered;
}

function effectiveMark(field: FieldDefinition, underscorePrivate: boolean): Mark | null {
  if (underscorePrivate && field.mark === null && field.name.startsWith('_')) {
    return 'private';
  }
  return field.mark;
}

function isExcluded(
  name: string,
  mark: Mark | null,
  exclude: ReadonlySet<string>,
  include: ReadonlySet<string>,
  direction: DTODirection
): boolean {
  if (exclude.has(name)) return true;
  if (include.size > 0 && !include.has(name)) {
    const prefix = `${name}.`;
    if (![...include].some((path) => path.startsWith(prefix))) return true;
  }
  if (mark === 'private') return true;
  if (direction === 'data' && mark === 'read-only') return true;
  return direction === 'return' && mark === 'write-only';
}

/**
 * Walks a model's field definitions and produces its transfer schema.
 *
 * One builder serves one binding (model, direction, handler). Nested levels
 * stop at `config.maxNestedDepth`; a field that would need a deeper level is
 * dropped from the schema and its path recorded in `droppedFieldPaths`.
 */
export class SchemaBuilder {
  readonly droppedFieldPaths: string[] = [];

  private readonly introspector: ModelIntrospector;
  private readonly config: DTOConfig;
  private readonly direction: DTODirection;
  private readonly handlerId: string;

  constructor(options: SchemaBuilderOptions) {
    this.introspector = options.introspector;
    this.config = options.config;
    this.direction = options.direction;
    this.handlerId = options.handlerId;
  }

  parseModel(
    model: object,
    exclude: ReadonlySet<string>,
    include: ReadonlySet<string>,
    nestedDepth = 0,
    path = ''
  ): TransferFieldDefinition[] {
    const definitions = this.introspector.generateFieldDefinitions(model);
    if (!Array.isArray(definitions)) {
      throw new SchemaConstructionError(`Introspector '${this.introspector.kind}' returned no field definitions`);
    }

    const parsed: TransferFieldDefinition[] = [];
    for (const field of definitions) {
      const fieldPath = path ? `${path}.${field.name}` : field.name;
      const transferType = this.createTransferType(
        field.type,
        filterNestedPaths(exclude, field.name),
        filterNestedPaths(include, field.name),
        nestedDepth,
        fieldPath
      );
      if (!transferType) {
        this.droppedFieldPaths.push(fieldPath);
        continue;
      }

      const mark = effectiveMark(field, this.config.underscoreFieldsPrivate);
      parsed.push({
        ...field,
        mark,
        serializationName: serializationNameFor(field.name, this.config),
        isPartial: this.config.partial,
        isExcluded: isExcluded(field.name, mark, exclude, include, this.direction),
        transferType,
      });
    }
    return parsed;
  }

  /** Reserves a name and synthesizes the transfer model for one level. */
  createTransferModel(modelName: string, fields: readonly TransferFieldDefinition[]): TransferModel {
    const name = reserveTransferModelName(this.handlerId, modelName, this.direction);
    return createTransferModel(name, fields, { strict: this.config.forbidUnknownFields });
  }

  /** Parses `model` one level deeper and wraps the result. */
  buildNestedInfo(
    model: object,
    modelName: string,
    exclude: ReadonlySet<string>,
    include: ReadonlySet<string>,
    nestedDepth: number,
    path: string
  ): NestedInfo {
    const fields = this.parseModel(model, exclude, include, nestedDepth, path);
    return {
      transferModel: this.createTransferModel(modelName, fields),
      fields,
      model,
      fieldNames: new Set(fields.map((field) => field.name)),
    };
  }

  /**
   * Derives the transfer node of one declared type. Returns `null` when the
   * type needs a nested level beyond the depth limit; the caller drops the
   * whole field.
   */
  private createTransferType(
    type: TypeRef,
    exclude: ReadonlySet<string>,
    include: ReadonlySet<string>,
    nestedDepth: number,
    path: string
  ): TransferNode | null {
    const child = (inner: TypeRef, position: number): TransferNode | null =>
      this.createTransferType(
        inner,
        filterNestedPaths(exclude, String(position)),
        filterNestedPaths(include, String(position)),
        nestedDepth,
        `${path}.${position}`
      );

    switch (type.kind) {
      case 'union': {
        const options: TransferNode[] = [];
        for (const [position, option] of type.options.entries()) {
          const node = child(option, position);
          if (!node) return null;
          options.push(node);
        }
        return unionNode(options);
      }

      case 'tuple': {
        const items: TransferNode[] = [];
        for (const [position, item] of type.items.entries()) {
          const node = child(item, position);
          if (!node) return null;
          items.push(node);
        }
        const rest = type.rest ? child(type.rest, items.length) : null;
        if (type.rest && !rest) return null;
        return tupleNode(items, rest);
      }

      case 'collection': {
        const inner = child(type.element, 0);
        return inner ? collectionNode(type.origin, inner) : null;
      }

      case 'mapping': {
        const key = child(type.key, 0);
        const value = child(type.value, 1);
        return key && value ? mappingNode(type.origin, key, value) : null;
      }

      default:
        break;
    }

    if (type.kind === 'model' && this.introspector.detectNestedField(type)) {
      if (nestedDepth === this.config.maxNestedDepth) {
        return null;
      }
      const nested = this.buildNestedInfo(type.model, type.name, exclude, include, nestedDepth + 1, path);
      return simpleNode(type, nested);
    }

    return simpleNode(type);
  }
}
