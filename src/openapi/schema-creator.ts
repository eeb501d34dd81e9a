import { z } from 'zod';
import type { TransferModel, TransferNode } from '../dto/transfer-types.js';

export type JsonSchema = Record<string, unknown>;

const COMPONENTS_PREFIX = '#/components/schemas/';

/**
 * Collects transfer models as named OpenAPI components.
 *
 * Each registered model (and every nested model it references) becomes one
 * entry of `components.schemas`; references between them use `$ref`.
 *
 * @example
 * ```ts
 * const creator = new SchemaCreator();
 * const requestBody = PersonWrite.createOpenApiSchema('data', 'people.create', creator);
 * // { $ref: '#/components/schemas/CreatePersonRequestBody' }
 * const components = { schemas: creator.components() };
 * ```
 */
export class SchemaCreator {
  private readonly registry = z.registry<{ id?: string }>();
  private readonly models = new Map<string, TransferModel>();

  register(model: TransferModel): void {
    if (this.models.has(model.name)) return;
    this.models.set(model.name, model);
    this.registry.add(model.schema, { id: model.name });
    for (const nested of model.nested) {
      this.register(nested);
    }
  }

  /** `{ $ref }` pointing at the component of `model`, registering it first. */
  refFor(model: TransferModel): JsonSchema {
    this.register(model);
    return { $ref: `${COMPONENTS_PREFIX}${model.name}` };
  }

  has(name: string): boolean {
    return this.models.has(name);
  }

  /** Component schemas keyed by transfer model name, describing request-side input. */
  components(): Record<string, JsonSchema> {
    const { schemas } = z.toJSONSchema(this.registry, {
      io: 'input',
      unrepresentable: 'any',
      uri: (id) => `${COMPONENTS_PREFIX}${id}`,
    });
    const result: Record<string, JsonSchema> = {};
    for (const [name, schema] of Object.entries(schemas)) {
      const { $schema: _dialect, ...rest } = schema;
      result[name] = rest;
    }
    return result;
  }

  /** Inline JSON schema of a scalar. */
  scalar(schema: z.core.$ZodType): JsonSchema {
    const { $schema: _dialect, ...rest } = z.toJSONSchema(schema, { io: 'input', unrepresentable: 'any' });
    return rest;
  }
}

/**
 * JSON schema of a handler annotation: transfer models become `$ref`s,
 * collections arrays, nullable unions `anyOf` with `null`.
 */
export function nodeJsonSchema(node: TransferNode, creator: SchemaCreator): JsonSchema {
  switch (node.kind) {
    case 'simple':
      if (node.nested) return creator.refFor(node.nested.transferModel);
      return node.type.kind === 'scalar' ? creator.scalar(node.type.schema) : {};

    case 'collection':
      return node.origin === 'set'
        ? { type: 'array', items: nodeJsonSchema(node.inner, creator), uniqueItems: true }
        : { type: 'array', items: nodeJsonSchema(node.inner, creator) };

    case 'mapping':
      return { type: 'object', additionalProperties: nodeJsonSchema(node.value, creator) };

    case 'tuple': {
      const schema: JsonSchema = {
        type: 'array',
        prefixItems: node.items.map((item) => nodeJsonSchema(item, creator)),
      };
      if (node.rest) {
        schema.items = nodeJsonSchema(node.rest, creator);
      } else {
        schema.minItems = node.items.length;
        schema.maxItems = node.items.length;
      }
      return schema;
    }

    case 'union':
      return { anyOf: node.options.map((option) => nodeJsonSchema(option, creator)) };
  }
}

export function annotationJsonSchema(
  node: TransferNode,
  wrapperAttribute: string | null,
  creator: SchemaCreator
): JsonSchema {
  const schema = nodeJsonSchema(node, creator);
  if (!wrapperAttribute) return schema;
  return {
    type: 'object',
    properties: { [wrapperAttribute]: schema },
    required: [wrapperAttribute],
  };
}
