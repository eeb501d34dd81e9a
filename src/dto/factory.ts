import type { Table } from 'drizzle-orm';
import { defineDTOConfig, type DTOConfig, type DTOConfigInput } from '../config/index.js';
import { ConfigurationException } from '../core/exceptions.js';
import type { DTODirection } from '../core/types.js';
import { DrizzleIntrospector, type DrizzleIntrospectorOptions } from '../introspection/drizzle.js';
import { StructIntrospector, type StructClass, type StructIntrospectorOptions } from '../introspection/struct.js';
import type { ModelIntrospector } from '../introspection/types.js';
import { ZodIntrospector, type ZodModel } from '../introspection/zod.js';
import { annotationJsonSchema, type JsonSchema, type SchemaCreator } from '../openapi/schema-creator.js';
import { resolveAnnotation, type HandlerAnnotation } from './annotation.js';
import { DTOBackend } from './backend.js';

export interface HandlerRegistration {
  /** The type the handler declares for its body (`data`) or result (`return`). */
  annotation: HandlerAnnotation;
  dtoFor: DTODirection;
  handlerId: string;
}

export interface DTOOptions<M extends object> {
  introspector: ModelIntrospector<M>;
  config?: DTOConfig | DTOConfigInput;
}

function isDTOConfig(config: DTOConfig | DTOConfigInput): config is DTOConfig {
  return Object.isFrozen(config) && config.exclude instanceof Set && config.include instanceof Set;
}

/**
 * A DTO over one domain model.
 *
 * Handlers bind to it with `onRegistration`, which builds (once) the transfer
 * schema, transfer model and engine for that handler and direction. Requests
 * then go through `decodeBytes`, `decodeBuiltins` and `encodeData`.
 *
 * @example
 * ```ts
 * const PersonRead = zodDTO(Person, { exclude: ['email'] });
 * PersonRead.onRegistration({ annotation: ref.model(Person), dtoFor: 'return', handlerId: 'people.get' });
 * PersonRead.encodeData('people.get', person);
 * ```
 */
export class DTO<M extends object = object> {
  readonly model: M;
  readonly introspector: ModelIntrospector<M>;
  readonly config: DTOConfig;

  /** Bound backends, keyed by handler id. */
  private readonly handlers: Record<DTODirection, Map<string, DTOBackend>> = {
    data: new Map(),
    return: new Map(),
  };

  constructor(model: unknown, options: DTOOptions<M>) {
    options.introspector.assertModel(model);
    this.model = model;
    this.introspector = options.introspector;
    const config = options.config ?? {};
    this.config = isDTOConfig(config) ? config : defineDTOConfig(config);
  }

  /**
   * Binds a handler. The backend is built on the first registration of a
   * (direction, handler id) pair; registering the pair again with the same
   * annotation returns it unchanged.
   *
   * @throws ConfigurationException when the handler's model is not the DTO's
   *   model (or a subtype), the annotation has no single model, or the handler
   *   is already bound with another annotation.
   */
  onRegistration(registration: HandlerRegistration): DTOBackend {
    const { annotation, dtoFor, handlerId } = registration;

    const cached = this.handlers[dtoFor].get(handlerId);
    if (cached) {
      if (cached.annotation === annotation) return cached;
      throw new ConfigurationException(`Handler '${handlerId}' is already bound for '${dtoFor}' with another annotation`, {
        handlerId,
        dtoFor,
      });
    }

    const { model } = resolveAnnotation(annotation);
    if (!this.introspector.isSubtype(model, this.model)) {
      throw new ConfigurationException(
        `DTO narrowed with '${this.introspector.modelName(this.model)}', handler '${handlerId}' declares another model`,
        { handlerId, dtoFor }
      );
    }

    const backend = new DTOBackend({
      model: this.model,
      introspector: this.introspector,
      config: this.config,
      annotation,
      direction: dtoFor,
      handlerId,
    });

    this.handlers[dtoFor].set(handlerId, backend);
    return backend;
  }

  isRegistered(dtoFor: DTODirection, handlerId: string): boolean {
    return this.handlers[dtoFor].has(handlerId);
  }

  /** @throws ConfigurationException when the handler was never registered. */
  backendFor(dtoFor: DTODirection, handlerId: string): DTOBackend {
    const backend = this.handlers[dtoFor].get(handlerId);
    if (!backend) {
      throw new ConfigurationException(`Handler '${handlerId}' is not registered for '${dtoFor}'`, {
        handlerId,
        dtoFor,
      });
    }
    return backend;
  }

  /** Raw request body → domain value (or `DTOData`). */
  decodeBytes(handlerId: string, raw: Uint8Array | string, mediaType = 'application/json'): unknown {
    return this.backendFor('data', handlerId).populateFromRaw(raw, mediaType);
  }

  /** Already-decoded wire values → domain value (or `DTOData`). */
  decodeBuiltins(handlerId: string, value: unknown): unknown {
    return this.backendFor('data', handlerId).populateFromBuiltins(value);
  }

  /** Domain value → transfer instance(s), ready for a codec. */
  encodeData(handlerId: string, value: unknown): unknown {
    return this.backendFor('return', handlerId).encodeData(value);
  }

  /**
   * Registers the handler's transfer model with `schemaCreator` and returns
   * the schema of the handler annotation, referencing it.
   */
  createOpenApiSchema(dtoFor: DTODirection, handlerId: string, schemaCreator: SchemaCreator): JsonSchema {
    const backend = this.backendFor(dtoFor, handlerId);
    return annotationJsonSchema(backend.rootNode, backend.wrapperAttribute, schemaCreator);
  }

  /** Forgets every binding. Test teardown only. */
  clearBindings(): void {
    this.handlers.data.clear();
    this.handlers.return.clear();
  }
}

// ============================================================================
// Factories
// ============================================================================

/** DTO over a zod object schema. */
export function zodDTO(schema: ZodModel, config?: DTOConfig | DTOConfigInput): DTO<ZodModel> {
  return new DTO(schema, { introspector: new ZodIntrospector(), config });
}

export interface StructDTOOptions extends StructIntrospectorOptions {
  config?: DTOConfig | DTOConfigInput;
}

/** DTO over a struct class registered with `defineStruct`. */
export function structDTO(cls: StructClass, options: StructDTOOptions = {}): DTO<StructClass> {
  return new DTO(cls, {
    introspector: new StructIntrospector({ namespace: options.namespace }),
    config: options.config,
  });
}

export interface DrizzleDTOOptions extends DrizzleIntrospectorOptions {
  config?: DTOConfig | DTOConfigInput;
}

/** DTO over a drizzle table. */
export function drizzleDTO(table: Table, options: DrizzleDTOOptions = {}): DTO<Table> {
  return new DTO(table, {
    introspector: new DrizzleIntrospector({ marks: options.marks }),
    config: options.config,
  });
}
