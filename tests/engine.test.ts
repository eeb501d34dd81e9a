import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { z } from 'zod';
import {
  zodDTO,
  dtoField,
  ref,
  jsonCodec,
  clearTransferModelNames,
  setLogger,
  resetLogger,
  TransferObject,
  TransferError,
  type TransferBackendKind,
  type UnknownRecord,
} from '../src/index.js';

const EnTag = z.object({ label: z.string() }).meta({ id: 'EnTag' });
const EnBadge = z.object({ label: z.string(), level: z.number().optional() }).meta({ id: 'EnBadge' });
const EnPerson = z
  .object({
    name: z.string(),
    secret: dtoField(z.string(), 'private'),
    tags: z.array(EnTag),
    scores: z.record(z.string(), z.number()),
    lookup: z.map(z.string(), EnTag),
    labels: z.set(z.string()),
    pair: z.tuple([z.string(), EnTag]),
    favourite: EnTag.nullable(),
  })
  .meta({ id: 'EnPerson' });
const EnHolder = z.object({ item: z.union([EnTag, EnBadge]) }).meta({ id: 'EnHolder' });
const EnLooseHolder = z.object({ item: z.union([EnBadge, z.string()]) }).meta({ id: 'EnLooseHolder' });
const EnAccount = z
  .object({ login: z.string().min(3), passwordHash: dtoField(z.string(), 'private') })
  .meta({ id: 'EnAccount' });
const EnUser = z.object({ name: z.string(), account: EnAccount.nullable() }).meta({ id: 'EnUser' });

const wire = {
  name: 'Ada',
  secret: 'ignored',
  tags: [{ label: 'x' }],
  scores: { a: 1 },
  lookup: { k: { label: 'y' } },
  labels: ['p', 'q'],
  pair: ['one', { label: 'z' }],
  favourite: null,
};

const domain = {
  name: 'Ada',
  secret: 'hunter',
  tags: [{ label: 'x' }],
  scores: { a: 1 },
  lookup: new Map([['k', { label: 'y' }]]),
  labels: new Set(['p', 'q']),
  pair: ['one', { label: 'z' }],
  favourite: { label: 'w' },
};

function toWire(value: unknown): unknown {
  return jsonCodec.decode(jsonCodec.encode(value));
}

beforeEach(() => {
  clearTransferModelNames();
});

afterEach(() => {
  resetLogger();
});

describe.each<TransferBackendKind>(['interpreted', 'codegen'])('%s engine', (backend) => {
  function bind(direction: 'data' | 'return') {
    const dto = zodDTO(EnPerson, { backend });
    return {
      dto,
      backend: dto.onRegistration({ annotation: ref.model(EnPerson), dtoFor: direction, handlerId: 'people.sync' }),
    };
  }

  it('should use the configured engine', () => {
    expect(bind('data').backend.engine.kind).toBe(backend);
  });

  it('should decode wire data into domain values', () => {
    const { dto } = bind('data');

    const decoded = dto.decodeBuiltins('people.sync', wire);

    expect(decoded).toEqual({
      name: 'Ada',
      tags: [{ label: 'x' }],
      scores: { a: 1 },
      lookup: new Map([['k', { label: 'y' }]]),
      labels: new Set(['p', 'q']),
      pair: ['one', { label: 'z' }],
      favourite: null,
    });
  });

  it('should decode builtins with field names', () => {
    const { backend: bound } = bind('data');

    const decoded = bound.engine.decode(
      { name: 'Ada', labels: ['p'], lookup: { k: { label: 'y' } } },
      { fieldNames: true, output: 'builtins' }
    );

    expect(decoded).toEqual({ name: 'Ada', labels: ['p'], lookup: { k: { label: 'y' } } });
  });

  it('should encode domain values into transfer instances', () => {
    const { dto } = bind('return');

    const encoded = dto.encodeData('people.sync', domain);

    expect(encoded).toBeInstanceOf(TransferObject);
    expect(toWire(encoded)).toEqual({
      name: 'Ada',
      tags: [{ label: 'x' }],
      scores: { a: 1 },
      lookup: { k: { label: 'y' } },
      labels: ['p', 'q'],
      pair: ['one', { label: 'z' }],
      favourite: { label: 'w' },
    });
  });

  it('should never read excluded fields while encoding', () => {
    const { dto } = bind('return');
    const reads: string[] = [];
    const tracked = new Proxy<UnknownRecord>(
      { ...domain },
      {
        get(target, key, receiver) {
          if (typeof key === 'string') reads.push(key);
          return Reflect.get(target, key, receiver);
        },
      }
    );

    dto.encodeData('people.sync', tracked);

    expect(reads).not.toContain('secret');
    expect(reads).toContain('name');
  });

  it('should skip undefined values', () => {
    const { dto } = bind('return');

    const encoded = dto.encodeData('people.sync', { ...domain, favourite: undefined });

    expect(encoded).toBeInstanceOf(TransferObject);
    expect(toWire(encoded)).not.toHaveProperty('favourite');
  });

  it('should pick the first matching union alternative and warn', () => {
    const warn = vi.fn();
    setLogger({ debug: vi.fn(), warn, error: vi.fn() });
    const dto = zodDTO(EnHolder, { backend });
    dto.onRegistration({ annotation: ref.model(EnHolder), dtoFor: 'return', handlerId: 'holders.get' });

    const encoded = dto.encodeData('holders.get', { item: { label: 'gold' } });

    expect(toWire(encoded)).toEqual({ item: { label: 'gold' } });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe('Union value matches more than one nested alternative; using the first');
  });

  it('should pass through unmatched union values', () => {
    const dto = zodDTO(EnLooseHolder, { backend });
    dto.onRegistration({ annotation: ref.model(EnLooseHolder), dtoFor: 'return', handlerId: 'holders.loose' });

    expect(toWire(dto.encodeData('holders.loose', { item: 'plain' }))).toEqual({ item: 'plain' });
  });

  it('should pick the alternative whose keys fit the value', () => {
    const dto = zodDTO(EnHolder, { backend });
    dto.onRegistration({ annotation: ref.model(EnHolder), dtoFor: 'return', handlerId: 'holders.badge' });

    const encoded = dto.encodeData('holders.badge', { item: { label: 'gold', level: 3 } });

    expect(toWire(encoded)).toEqual({ item: { label: 'gold', level: 3 } });
  });

  it('should filter nullable nested models whose values fail refinements', () => {
    const dto = zodDTO(EnUser, { backend });
    dto.onRegistration({ annotation: ref.model(EnUser), dtoFor: 'return', handlerId: 'users.get' });

    const encoded = dto.encodeData('users.get', { name: 'a', account: { login: 'ab', passwordHash: 'test-secret' } });

    expect(toWire(encoded)).toEqual({ name: 'a', account: { login: 'ab' } });
  });

  it('should not read excluded fields of nullable nested models', () => {
    const dto = zodDTO(EnUser, { backend, exclude: ['account.0.login'] });
    dto.onRegistration({ annotation: ref.model(EnUser), dtoFor: 'return', handlerId: 'users.summary' });
    const reads: string[] = [];
    const account = new Proxy<UnknownRecord>(
      { login: 'ab', passwordHash: 'test-secret' },
      {
        get(target, key, receiver) {
          if (typeof key === 'string') reads.push(key);
          return Reflect.get(target, key, receiver);
        },
      }
    );

    const encoded = dto.encodeData('users.summary', { name: 'a', account });

    expect(reads).toEqual([]);
    expect(toWire(encoded)).toEqual({ name: 'a', account: {} });
  });

  it('should refuse to send a record no union alternative accepts', () => {
    const dto = zodDTO(EnUser, { backend });
    dto.onRegistration({ annotation: ref.model(EnUser), dtoFor: 'return', handlerId: 'users.raw' });

    expect(() =>
      dto.encodeData('users.raw', { name: 'a', account: { login: 'ada', passwordHash: 'test-secret', role: 'admin' } })
    ).toThrow(TransferError);
  });

  it('should transfer lists of the root model', () => {
    const dto = zodDTO(EnTag, { backend });
    dto.onRegistration({ annotation: ref.array(ref.model(EnTag)), dtoFor: 'data', handlerId: 'tags.bulk' });

    expect(dto.decodeBuiltins('tags.bulk', [{ label: 'a' }, { label: 'b' }])).toEqual([
      { label: 'a' },
      { label: 'b' },
    ]);
  });
});

describe('engine equivalence', () => {
  it('should produce equal output on both engines', () => {
    const interpreted = zodDTO(EnPerson, { backend: 'interpreted' });
    const codegen = zodDTO(EnPerson, { backend: 'codegen' });
    for (const dto of [interpreted, codegen]) {
      dto.onRegistration({ annotation: ref.model(EnPerson), dtoFor: 'data', handlerId: 'people.in' });
      dto.onRegistration({ annotation: ref.model(EnPerson), dtoFor: 'return', handlerId: 'people.out' });
    }

    expect(codegen.decodeBuiltins('people.in', wire)).toEqual(interpreted.decodeBuiltins('people.in', wire));
    expect(toWire(codegen.encodeData('people.out', domain))).toEqual(
      toWire(interpreted.encodeData('people.out', domain))
    );
  });
});
