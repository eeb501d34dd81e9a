// Core exports
export {
  ApiException,
  InputValidationException,
  UnsupportedMediaTypeException,
  ConfigurationException,
  SchemaConstructionError,
  TransferError,
  ERROR_CODES,
} from './core/exceptions.js';
export type { ApiStatusCode, ApiErrorBody, ErrorCode, ValidationIssue } from './core/exceptions.js';
export { createErrorHandler, zodErrorMapper } from './core/error-handler.js';
export type { ErrorMapper, ErrorHook, ErrorHandlerConfig } from './core/error-handler.js';
export { setLogger, getLogger, resetLogger, createConsoleLogger } from './core/logger.js';
export type { Logger, LogLevel, LogContext } from './core/logger.js';
export { MARKS, EMPTY, isMark } from './core/types.js';
export type {
  Mark,
  DTODirection,
  TypeRef,
  ScalarRef,
  ModelRef,
  CollectionRef,
  MappingRef,
  TupleRef,
  UnionRef,
  CollectionOrigin,
  MappingOrigin,
  FieldDefinition,
  Empty,
  UnknownRecord,
} from './core/types.js';

// Configuration
export {
  defineDTOConfig,
  extendDTOConfig,
  renameField,
  serializationNameFor,
  RENAME_STRATEGIES,
} from './config/index.js';
export type {
  DTOConfig,
  DTOConfigInput,
  RenameStrategy,
  RenameStrategyName,
  TransferBackendKind,
} from './config/index.js';

// Model introspection
export type { ModelIntrospector } from './introspection/types.js';
export { ZodIntrospector } from './introspection/zod.js';
export type { ZodModel } from './introspection/zod.js';
export { dtoField, dtoFieldRegistry, zodToTypeRef } from './introspection/zod-types.js';
export type { DTOFieldMeta } from './introspection/zod-types.js';
export {
  Struct,
  StructIntrospector,
  defineStruct,
  structRef,
  forwardRef,
  isStruct,
  clearStructNames,
} from './introspection/struct.js';
export type { StructClass, StructOptions, StructIntrospectorOptions } from './introspection/struct.js';
export { DrizzleIntrospector } from './introspection/drizzle.js';
export type { DrizzleIntrospectorOptions } from './introspection/drizzle.js';

// DTOs
export { DTO, zodDTO, structDTO, drizzleDTO } from './dto/factory.js';
export type { DTOOptions, HandlerRegistration, StructDTOOptions, DrizzleDTOOptions } from './dto/factory.js';
export { DTOBackend } from './dto/backend.js';
export { DTOData } from './dto/data.js';
export { ref, resolveAnnotation } from './dto/annotation.js';
export type { HandlerAnnotation, DTODataAnnotation, WrapperAnnotation } from './dto/annotation.js';
export { SchemaBuilder, filterNestedPaths } from './dto/schema-builder.js';
export { createTransferModel, createTransferClass, nodeSchema } from './dto/transfer-model.js';
export { reserveTransferModelName, clearTransferModelNames, isTransferModelNameTaken } from './dto/names.js';
export { TransferObject } from './dto/transfer-types.js';
export type {
  TransferModel,
  TransferClass,
  TransferNode,
  TransferFieldDefinition,
  NestedInfo,
  SimpleNode,
  CollectionNode,
  MappingNode,
  TupleNode,
  UnionNode,
} from './dto/transfer-types.js';
export { createTransferEngine, InterpretedEngine, CodegenEngine } from './dto/engine/index.js';
export type { TransferEngine, DecodeOptions, DecodeOutput } from './dto/engine/index.js';

// Codecs
export {
  getCodec,
  negotiateCodec,
  normalizeMediaType,
  decodeWithSchema,
  validateWithSchema,
  jsonCodec,
  msgpackCodec,
} from './codec/index.js';
export type { Codec } from './codec/index.js';

// OpenAPI
export { SchemaCreator, nodeJsonSchema } from './openapi/schema-creator.js';
export type { JsonSchema } from './openapi/schema-creator.js';

// Hono
export { createDTOHandler } from './hono/handler.js';
export type { DTOBinding, DTOHandlerContext, DTOHandlerOptions } from './hono/handler.js';
