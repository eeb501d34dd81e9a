import { z } from 'zod';
import { decodeWithSchema, validateWithSchema } from '../codec/index.js';
import type { DTOConfig } from '../config/index.js';
import { ConfigurationException } from '../core/exceptions.js';
import { getLogger } from '../core/logger.js';
import { isRecord, type DTODirection } from '../core/types.js';
import type { ModelIntrospector } from '../introspection/types.js';
import { annotationNode, resolveAnnotation, type HandlerAnnotation } from './annotation.js';
import { DTOData } from './data.js';
import { createTransferEngine, type DecodeOptions, type TransferEngine } from './engine/index.js';
import { SchemaBuilder } from './schema-builder.js';
import { nodeSchema } from './transfer-model.js';
import type { NestedInfo, TransferFieldDefinition, TransferModel, TransferNode } from './transfer-types.js';

export interface DTOBackendOptions {
  model: object;
  introspector: ModelIntrospector;
  config: DTOConfig;
  annotation: HandlerAnnotation;
  direction: DTODirection;
  handlerId: string;
}

/**
 * Everything one (handler, direction) binding needs at request time: the
 * parsed fields, the transfer models, the wire schema and the engine.
 * Built once when the handler is registered.
 */
export class DTOBackend {
  readonly handlerId: string;
  readonly direction: DTODirection;
  readonly annotation: HandlerAnnotation;
  readonly fields: readonly TransferFieldDefinition[];
  readonly transferModel: TransferModel;
  readonly rootNode: TransferNode;
  /** Validates wire values of the handler annotation into transfer instances. */
  readonly transferSchema: z.core.$ZodType;
  readonly engine: TransferEngine;
  readonly isDTOData: boolean;
  readonly wrapperAttribute: string | null;
  readonly nullable: boolean;
  /** Fields left out because they lie beyond `maxNestedDepth`. */
  readonly droppedFieldPaths: readonly string[];

  constructor(options: DTOBackendOptions) {
    const { model, introspector, config, direction, handlerId } = options;
    this.handlerId = handlerId;
    this.direction = direction;
    this.annotation = options.annotation;

    const resolved = resolveAnnotation(options.annotation);
    this.isDTOData = resolved.isDTOData;
    this.wrapperAttribute = resolved.wrapperAttribute;
    this.nullable = resolved.nullable;

    if (this.isDTOData && direction === 'return') {
      throw new ConfigurationException('DTOData is only supported for request data', { handlerId });
    }

    const builder = new SchemaBuilder({ introspector, config, direction, handlerId });
    const root: NestedInfo = builder.buildNestedInfo(
      model,
      introspector.modelName(model),
      config.exclude,
      config.include,
      0,
      ''
    );
    this.fields = root.fields;
    this.transferModel = root.transferModel;
    this.droppedFieldPaths = Object.freeze([...builder.droppedFieldPaths]);

    this.rootNode = annotationNode(resolved.inner, root, (candidate) => introspector.isSubtype(candidate, model));
    const rootSchema = nodeSchema(this.rootNode);
    this.transferSchema = this.wrapperAttribute
      ? z.looseObject({ [this.wrapperAttribute]: rootSchema })
      : rootSchema;

    this.engine = createTransferEngine(config.backend, { root: this.rootNode, introspector });

    getLogger().debug('DTO binding built', {
      handlerId,
      direction,
      transferModel: this.transferModel.name,
      engine: config.backend,
    });
    if (this.droppedFieldPaths.length > 0) {
      getLogger().debug('Nested fields dropped beyond maxNestedDepth', {
        handlerId,
        paths: this.droppedFieldPaths,
      });
    }
  }

  /** Validates builtins (already-decoded wire values) into transfer instances. */
  parseBuiltins(value: unknown): unknown {
    return validateWithSchema(value, this.transferSchema);
  }

  /** Decodes raw bytes with the codec for `mediaType` and validates them. */
  parseRaw(raw: Uint8Array | string, mediaType: string): unknown {
    return decodeWithSchema(raw, mediaType, this.transferSchema);
  }

  populateFromBuiltins(value: unknown): unknown {
    return this.populate(this.parseBuiltins(value));
  }

  populateFromRaw(raw: Uint8Array | string, mediaType: string): unknown {
    return this.populate(this.parseRaw(raw, mediaType));
  }

  /** Decodes builtins keyed by field name, as `DTOData` holds them. */
  transferFromBuiltins(builtins: unknown, options: DecodeOptions = {}): unknown {
    return this.engine.decode(builtins, { fieldNames: true, output: options.output ?? 'domain' });
  }

  /** Domain value(s) to transfer instance(s), ready for a codec. */
  encodeData(data: unknown): unknown {
    const attribute = this.wrapperAttribute;
    if (attribute && isRecord(data)) {
      return { ...data, [attribute]: this.engine.encode(data[attribute]) };
    }
    return this.engine.encode(data);
  }

  private populate(transfer: unknown): unknown {
    const attribute = this.wrapperAttribute;
    if (attribute && isRecord(transfer)) {
      return { ...transfer, [attribute]: this.decodeTransfer(transfer[attribute]) };
    }
    return this.decodeTransfer(transfer);
  }

  private decodeTransfer(transfer: unknown): unknown {
    if (this.isDTOData) {
      return new DTOData(this, this.engine.decode(transfer, { output: 'builtins' }));
    }
    return this.engine.decode(transfer);
  }
}
