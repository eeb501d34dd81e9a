import { getTableColumns, getTableName, is, SQL, Table, type Column } from 'drizzle-orm';
import { z } from 'zod';
import { ConfigurationException } from '../core/exceptions.js';
import { EMPTY, isMark, isRecord, type FieldDefinition, type Mark, type TypeRef, type UnknownRecord } from '../core/types.js';
import { typeContainsModel, type ModelIntrospector } from './types.js';

export interface DrizzleIntrospectorOptions {
  /** Field marks keyed by column property name. Generated columns are read-only unless marked here. */
  marks?: Readonly<Record<string, Mark>>;
}

const NULL_REF: TypeRef = { kind: 'scalar', name: 'null', schema: z.null() };

function scalar(name: string, schema: z.core.$ZodType): TypeRef {
  return { kind: 'scalar', name, schema };
}

/**
 * Maps a column's drizzle data type to a TypeRef.
 * Dates and bigints are coerced so they can arrive as strings.
 */
function columnTypeRef(column: Column): TypeRef {
  switch (column.dataType) {
    case 'string':
      return column.enumValues && column.enumValues.length > 0
        ? scalar('enum', z.enum(column.enumValues))
        : scalar('string', z.string());
    case 'number':
      return scalar('number', z.number());
    case 'boolean':
      return scalar('boolean', z.boolean());
    case 'date':
      return scalar('date', z.coerce.date());
    case 'bigint':
      return scalar('bigint', z.coerce.bigint());
    case 'array':
      return { kind: 'collection', origin: 'array', element: scalar('unknown', z.unknown()) };
    default:
      return scalar('unknown', z.unknown());
  }
}

/**
 * Introspector for drizzle table definitions.
 * Domain values are plain row objects keyed by column property name.
 *
 * @example
 * ```ts
 * const users = pgTable('users', {
 *   id: uuid('id').primaryKey().defaultRandom(),
 *   name: text('name').notNull(),
 *   password: text('password').notNull(),
 * });
 *
 * new DrizzleIntrospector({ marks: { password: 'write-only' } }).generateFieldDefinitions(users);
 * ```
 */
export class DrizzleIntrospector implements ModelIntrospector<Table> {
  readonly kind = 'drizzle';

  private readonly marks: Readonly<Record<string, Mark>>;
  private readonly cache = new WeakMap<Table, readonly FieldDefinition[]>();

  constructor(options: DrizzleIntrospectorOptions = {}) {
    this.marks = options.marks ?? {};
  }

  assertModel(model: unknown): asserts model is Table {
    if (typeof model === 'string') {
      throw new ConfigurationException('Forward references are not supported as DTO model type', { model });
    }
    if (!is(model, Table)) {
      throw new ConfigurationException('Expected a drizzle table as DTO model type');
    }
  }

  modelName(model: Table): string {
    return getTableName(model);
  }

  generateFieldDefinitions(model: Table): readonly FieldDefinition[] {
    const cached = this.cache.get(model);
    if (cached) return cached;

    const modelName = this.modelName(model);
    const fields: FieldDefinition[] = [];

    for (const [name, column] of Object.entries(getTableColumns(model))) {
      const base = columnTypeRef(column);
      const sqlDefault = is(column.default, SQL);
      const defaultFn = column.defaultFn;

      fields.push({
        name,
        type: column.notNull ? base : { kind: 'union', options: [base, NULL_REF] },
        default: column.default !== undefined && !sqlDefault ? column.default : EMPTY,
        defaultFactory: defaultFn ? () => defaultFn() : null,
        mark: this.columnMark(modelName, name, column),
        optional: !column.notNull || column.hasDefault || column.generated !== undefined,
        modelName,
      });
    }

    const frozen = Object.freeze(fields);
    this.cache.set(model, frozen);
    return frozen;
  }

  detectNestedField(type: TypeRef): boolean {
    return typeContainsModel(type);
  }

  instantiate(_model: Table, values: UnknownRecord): UnknownRecord {
    return { ...values };
  }

  isInstance(_model: Table, value: unknown): boolean {
    return isRecord(value);
  }

  isSubtype(candidate: object, base: Table): boolean {
    return candidate === base;
  }

  private columnMark(modelName: string, name: string, column: Column): Mark | null {
    const mark: unknown = this.marks[name];
    if (mark === undefined) {
      return column.generated !== undefined ? 'read-only' : null;
    }
    if (!isMark(mark)) {
      throw new ConfigurationException(
        `Invalid DTO field mark on '${modelName}.${name}': ${String(mark)}`,
        { field: `${modelName}.${name}`, mark: String(mark) }
      );
    }
    return mark;
  }
}
