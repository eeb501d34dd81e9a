import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  SchemaBuilder,
  ZodIntrospector,
  TransferObject,
  defineDTOConfig,
  reserveTransferModelName,
  isTransferModelNameTaken,
  clearTransferModelNames,
  type DTOConfigInput,
  type TransferModel,
} from '../src/index.js';

const TmItem = z
  .object({
    name: z.string(),
    count: z.number().default(1),
    note: z.string().optional(),
    at: z.date(),
    first_name: z.string().optional(),
  })
  .meta({ id: 'TmItem' });

function itemModel(input: DTOConfigInput = {}): TransferModel {
  const config = defineDTOConfig(input);
  const builder = new SchemaBuilder({
    introspector: new ZodIntrospector(),
    config,
    direction: 'data',
    handlerId: 'items.create',
  });
  const fields = builder.parseModel(TmItem, config.exclude, config.include);
  return builder.createTransferModel('TmItem', fields);
}

beforeEach(() => {
  clearTransferModelNames();
});

// ============================================================================
// Names
// ============================================================================

describe('reserveTransferModelName', () => {
  it('should use the short prefix first', () => {
    expect(reserveTransferModelName('users.getUser', 'User', 'return')).toBe('GetUserUserResponseBody');
    expect(reserveTransferModelName('users.createUser', 'User', 'data')).toBe('CreateUserUserRequestBody');
  });

  it('should fall back to the long prefix, then a counter', () => {
    expect(reserveTransferModelName('users.getUser', 'User', 'return')).toBe('GetUserUserResponseBody');
    expect(reserveTransferModelName('admin.getUser', 'User', 'return')).toBe('admin.getUserUserResponseBody');
    expect(reserveTransferModelName('admin.getUser', 'User', 'return')).toBe('admin.getUserUserResponseBody_0');
    expect(reserveTransferModelName('admin.getUser', 'User', 'return')).toBe('admin.getUserUserResponseBody_1');
  });

  it('should cut the long prefix at the method separator', () => {
    expect(reserveTransferModelName('users.list::GET', 'User', 'return')).toBe('ListUserResponseBody');
    expect(reserveTransferModelName('users.list::HEAD', 'User', 'return')).toBe('users.listUserResponseBody');
  });

  it('should forget names on clear', () => {
    reserveTransferModelName('users.getUser', 'User', 'return');
    expect(isTransferModelNameTaken('GetUserUserResponseBody')).toBe(true);

    clearTransferModelNames();
    expect(isTransferModelNameTaken('GetUserUserResponseBody')).toBe(false);
  });
});

// ============================================================================
// Synthesized Models
// ============================================================================

describe('createTransferModel', () => {
  it('should create a named class', () => {
    const model = itemModel();

    expect(model.name).toBe('CreateTmItemRequestBody');
    expect(model.cls.name).toBe('CreateTmItemRequestBody');
    expect(model.nested).toEqual([]);
  });

  it('should validate into a frozen instance with defaults applied', () => {
    const model = itemModel();

    const instance = model.schema.parse({ name: 'bolt', at: '2024-01-02T03:04:05.000Z' });

    expect(instance).toBeInstanceOf(model.cls);
    expect(instance).toBeInstanceOf(TransferObject);
    expect(Object.isFrozen(instance)).toBe(true);
    expect(instance.name).toBe('bolt');
    expect(instance.count).toBe(1);
    expect(instance.at).toEqual(new Date('2024-01-02T03:04:05.000Z'));
    expect('note' in instance).toBe(false);
  });

  it('should keep a supplied value over the default', () => {
    const instance = itemModel().schema.parse({ name: 'bolt', count: 4, at: '2024-01-02' });

    expect(instance.count).toBe(4);
  });

  it('should fail on missing required fields', () => {
    const result = itemModel().schema.safeParse({ count: 2 });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => issue.path.join('.'))).toEqual(['name', 'at']);
  });

  it('should leave partial fields unset and undefaulted', () => {
    const instance = itemModel({ partial: true }).schema.parse({ note: 'loose' });

    expect({ ...instance }).toEqual({ note: 'loose' });
  });

  it('should strip unknown keys unless forbidden', () => {
    const lenient = itemModel().schema.parse({ name: 'bolt', at: '2024-01-02', colour: 'red' });
    expect('colour' in lenient).toBe(false);

    const strict = itemModel({ forbidUnknownFields: true }).schema.safeParse({
      name: 'bolt',
      at: '2024-01-02',
      colour: 'red',
    });
    expect(strict.success).toBe(false);
  });

  it('should key fields by serialization name', () => {
    const instance = itemModel({ renameStrategy: 'camel' }).schema.parse({
      name: 'bolt',
      at: '2024-01-02',
      firstName: 'Ada',
    });

    expect(instance.firstName).toBe('Ada');
    expect('first_name' in instance).toBe(false);
  });
});
