/**
 * Declarative DTO configuration.
 *
 * A single immutable object decides which fields cross the wire, under which
 * names, and how deep nested models are unwrapped.
 *
 * @example
 * ```ts
 * import { defineDTOConfig, zodDTO } from 'transfer-dto';
 *
 * const PersonRead = zodDTO(PersonSchema, defineDTOConfig({
 *   exclude: ['email', 'address.street'],
 *   renameStrategy: 'camel',
 * }));
 * ```
 */

import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';

// ============================================================================
// Type Definitions
// ============================================================================

export const RENAME_STRATEGIES = ['upper', 'lower', 'camel', 'pascal', 'kebab'] as const;

export type RenameStrategyName = (typeof RENAME_STRATEGIES)[number];

/** A named strategy or a function mapping a field name to its wire name. */
export type RenameStrategy = RenameStrategyName | ((name: string) => string);

/**
 * `interpreted` walks the transfer schema on each call; `codegen` compiles
 * one specialised function per schema level when the binding is built.
 */
export type TransferBackendKind = 'interpreted' | 'codegen';

export interface DTOConfigInput {
  /** Dotted field paths never transferred. Collection, tuple and union positions use `0`, `1`, ... */
  exclude?: Iterable<string>;
  /** Dotted field paths to transfer; everything else is excluded. Exclusive with `exclude`. */
  include?: Iterable<string>;
  /** Explicit wire names, keyed by field name. Wins over `renameStrategy`. */
  renameFields?: Record<string, string>;
  renameStrategy?: RenameStrategy;
  /** How many levels of nested models are unwrapped. @default 1 */
  maxNestedDepth?: number;
  /** Absent wire fields are left unset instead of failing validation. */
  partial?: boolean;
  /** Mark unmarked fields whose name starts with `_` as private. @default true */
  underscoreFieldsPrivate?: boolean;
  /** Reject payloads with keys the transfer model does not know. */
  forbidUnknownFields?: boolean;
  /** @default 'interpreted' */
  backend?: TransferBackendKind;
}

export interface DTOConfig {
  readonly exclude: ReadonlySet<string>;
  readonly include: ReadonlySet<string>;
  readonly renameFields: Readonly<Record<string, string>>;
  readonly renameStrategy: RenameStrategy | null;
  readonly maxNestedDepth: number;
  readonly partial: boolean;
  readonly underscoreFieldsPrivate: boolean;
  readonly forbidUnknownFields: boolean;
  readonly backend: TransferBackendKind;
}

const configInputSchema = z.object({
  renameFields: z.record(z.string(), z.string()).optional(),
  renameStrategy: z
    .union([z.enum(RENAME_STRATEGIES), z.custom<(name: string) => string>((v) => typeof v === 'function')])
    .optional(),
  maxNestedDepth: z.number().int().nonnegative().optional(),
  partial: z.boolean().optional(),
  underscoreFieldsPrivate: z.boolean().optional(),
  forbidUnknownFields: z.boolean().optional(),
  backend: z.enum(['interpreted', 'codegen']).optional(),
});

// ============================================================================
// Construction
// ============================================================================

/**
 * Validates and freezes a DTO configuration.
 *
 * @throws ConfigurationException when `exclude` and `include` are both set,
 *   or when an option has the wrong shape.
 */
export function defineDTOConfig(input: DTOConfigInput = {}): DTOConfig {
  const exclude = new Set(input.exclude ?? []);
  const include = new Set(input.include ?? []);

  if (exclude.size > 0 && include.size > 0) {
    throw new ConfigurationException(
      "'exclude' and 'include' are mutually exclusive",
      { exclude: [...exclude], include: [...include] }
    );
  }

  const parsed = configInputSchema.safeParse({
    renameFields: input.renameFields,
    renameStrategy: input.renameStrategy,
    maxNestedDepth: input.maxNestedDepth,
    partial: input.partial,
    underscoreFieldsPrivate: input.underscoreFieldsPrivate,
    forbidUnknownFields: input.forbidUnknownFields,
    backend: input.backend,
  });
  if (!parsed.success) {
    throw new ConfigurationException(
      'Invalid DTO configuration',
      parsed.error.issues.map((issue) => ({ path: issue.path.map(String).join('.'), message: issue.message }))
    );
  }

  return Object.freeze({
    exclude,
    include,
    renameFields: Object.freeze({ ...(input.renameFields ?? {}) }),
    renameStrategy: input.renameStrategy ?? null,
    maxNestedDepth: input.maxNestedDepth ?? 1,
    partial: input.partial ?? false,
    underscoreFieldsPrivate: input.underscoreFieldsPrivate ?? true,
    forbidUnknownFields: input.forbidUnknownFields ?? false,
    backend: input.backend ?? 'interpreted',
  });
}

/**
 * Derives a new config from an existing one. `exclude`/`include` given in
 * `overrides` replace the base sets rather than merging with them.
 */
export function extendDTOConfig(base: DTOConfig, overrides: DTOConfigInput): DTOConfig {
  return defineDTOConfig({
    exclude: overrides.exclude ?? (overrides.include ? undefined : base.exclude),
    include: overrides.include ?? (overrides.exclude ? undefined : base.include),
    renameFields: overrides.renameFields ?? base.renameFields,
    renameStrategy: overrides.renameStrategy ?? base.renameStrategy ?? undefined,
    maxNestedDepth: overrides.maxNestedDepth ?? base.maxNestedDepth,
    partial: overrides.partial ?? base.partial,
    underscoreFieldsPrivate: overrides.underscoreFieldsPrivate ?? base.underscoreFieldsPrivate,
    forbidUnknownFields: overrides.forbidUnknownFields ?? base.forbidUnknownFields,
    backend: overrides.backend ?? base.backend,
  });
}

// ============================================================================
// Renaming
// ============================================================================

function splitWords(name: string): string[] {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0);
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * `first_name` → `firstName` (or `FirstName` when `capitalizeFirst`).
 * A leading underscore is kept.
 */
export function camelize(value: string, capitalizeFirst: boolean): string {
  const leading = value.match(/^_+/)?.[0] ?? '';
  const words = splitWords(value.slice(leading.length));
  const joined = words
    .map((word, index) => (index === 0 && !capitalizeFirst ? word.toLowerCase() : capitalize(word)))
    .join('');
  return leading + joined;
}

export function renameField(name: string, strategy: RenameStrategy): string {
  if (typeof strategy === 'function') {
    return strategy(name);
  }

  switch (strategy) {
    case 'camel':
      return camelize(name, false);
    case 'pascal':
      return camelize(name, true);
    case 'kebab':
      return splitWords(name).map((word) => word.toLowerCase()).join('-');
    case 'lower':
      return name.toLowerCase();
    case 'upper':
      return name.toUpperCase();
  }
}

/** Wire name for `name`: explicit rename, then strategy, then identity. */
export function serializationNameFor(name: string, config: DTOConfig): string {
  const explicit = config.renameFields[name];
  if (explicit !== undefined) {
    return explicit;
  }
  if (config.renameStrategy) {
    return renameField(name, config.renameStrategy);
  }
  return name;
}
