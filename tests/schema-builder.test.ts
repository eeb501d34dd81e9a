import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import {
  SchemaBuilder,
  ZodIntrospector,
  StructIntrospector,
  Struct,
  defineStruct,
  structRef,
  defineDTOConfig,
  dtoField,
  filterNestedPaths,
  clearTransferModelNames,
  type DTOConfigInput,
  type DTODirection,
  type TransferFieldDefinition,
  type TransferNode,
  type NestedInfo,
  type ModelIntrospector,
} from '../src/index.js';

const SbStreet = z.object({ line: z.string() }).meta({ id: 'SbStreet' });
const SbAddress = z.object({ city: z.string(), street: SbStreet }).meta({ id: 'SbAddress' });
const SbPerson = z
  .object({
    id: dtoField(z.number(), 'read-only'),
    first_name: z.string(),
    password: dtoField(z.string(), 'write-only'),
    _internal: z.string().optional(),
    address: SbAddress,
    previous: z.array(SbAddress),
    tags: z.array(z.string()),
  })
  .meta({ id: 'SbPerson' });

const SbNode = z.object({
  label: z.string(),
  get child() {
    return z.array(SbNode);
  },
});
z.globalRegistry.add(SbNode, { id: 'SbNode' });

class SbTreeNode extends Struct {
  declare label: string;
  declare child: SbTreeNode[];
}
defineStruct(SbTreeNode, {
  fields: () => ({ label: z.string(), child: z.array(structRef(SbTreeNode)) }),
});

const SbHome = z
  .object({ owner: z.string(), address: SbAddress.nullable() })
  .meta({ id: 'SbHome' });

function build(direction: DTODirection, input: DTOConfigInput = {}) {
  const config = defineDTOConfig(input);
  const builder = new SchemaBuilder({
    introspector: new ZodIntrospector(),
    config,
    direction,
    handlerId: 'people.get',
  });
  const fields = builder.parseModel(SbPerson, config.exclude, config.include);
  return { builder, fields };
}

function field(fields: readonly TransferFieldDefinition[], name: string): TransferFieldDefinition {
  const found = fields.find((candidate) => candidate.name === name);
  if (!found) throw new Error(`field ${name} not found`);
  return found;
}

function nestedOf(node: TransferNode): NestedInfo {
  if (node.kind === 'simple' && node.nested) return node.nested;
  if (node.kind === 'collection') return nestedOf(node.inner);
  if (node.kind === 'union') {
    const option = node.options.find((candidate) => candidate.hasNested);
    if (option) return nestedOf(option);
  }
  throw new Error(`no nested model in ${node.kind} node`);
}

beforeEach(() => {
  clearTransferModelNames();
});

// ============================================================================
// Path Filtering
// ============================================================================

describe('filterNestedPaths', () => {
  it('should keep the remainder of paths under the segment', () => {
    const paths = new Set(['address.street', 'address.geo.lat', 'email', 'address.', 'addresses.city']);

    expect([...filterNestedPaths(paths, 'address')]).toEqual(['street', 'geo.lat']);
  });
});

// ============================================================================
// Exclusion Rules
// ============================================================================

describe('SchemaBuilder exclusion', () => {
  it('should exclude write-only and private fields from responses', () => {
    const { fields } = build('return');

    expect(field(fields, 'id').isExcluded).toBe(false);
    expect(field(fields, 'password').isExcluded).toBe(true);
    expect(field(fields, '_internal').isExcluded).toBe(true);
    expect(field(fields, '_internal').mark).toBe('private');
    expect(field(fields, 'first_name').isExcluded).toBe(false);
  });

  it('should exclude read-only fields from request data', () => {
    const { fields } = build('data');

    expect(field(fields, 'id').isExcluded).toBe(true);
    expect(field(fields, 'password').isExcluded).toBe(false);
  });

  it('should leave underscore fields alone when disabled', () => {
    const { fields } = build('return', { underscoreFieldsPrivate: false });

    expect(field(fields, '_internal').mark).toBeNull();
    expect(field(fields, '_internal').isExcluded).toBe(false);
  });

  it('should keep excluded fields in the parsed list', () => {
    const { fields } = build('return', { exclude: ['tags'] });

    expect(fields.map((f) => f.name)).toEqual([
      'id',
      'first_name',
      'password',
      '_internal',
      'address',
      'previous',
      'tags',
    ]);
    expect(field(fields, 'tags').isExcluded).toBe(true);
  });

  it('should apply dotted exclude paths to nested levels', () => {
    const { fields } = build('return', { exclude: ['address.city'] });

    const address = nestedOf(field(fields, 'address').transferType);
    expect(field(address.fields, 'city').isExcluded).toBe(true);
    expect(field(fields, 'address').isExcluded).toBe(false);
  });

  it('should address collection elements by position', () => {
    const { fields } = build('return', { exclude: ['previous.0.city'] });

    const previous = nestedOf(field(fields, 'previous').transferType);
    expect(field(previous.fields, 'city').isExcluded).toBe(true);
    const address = nestedOf(field(fields, 'address').transferType);
    expect(field(address.fields, 'city').isExcluded).toBe(false);
  });

  it('should address union alternatives by position', () => {
    const config = defineDTOConfig({ exclude: ['address.0.city'] });
    const builder = new SchemaBuilder({
      introspector: new ZodIntrospector(),
      config,
      direction: 'return',
      handlerId: 'homes.get',
    });

    const fields = builder.parseModel(SbHome, config.exclude, config.include);

    const address = nestedOf(field(fields, 'address').transferType);
    expect(field(address.fields, 'city').isExcluded).toBe(true);
    expect(field(fields, 'address').isExcluded).toBe(false);
  });

  it('should include only listed paths and their parents', () => {
    const { fields } = build('return', { include: ['first_name', 'address.city'], maxNestedDepth: 2 });

    expect(field(fields, 'id').isExcluded).toBe(true);
    expect(field(fields, 'first_name').isExcluded).toBe(false);
    expect(field(fields, 'address').isExcluded).toBe(false);
    expect(field(fields, 'previous').isExcluded).toBe(true);

    const address = nestedOf(field(fields, 'address').transferType);
    expect(field(address.fields, 'city').isExcluded).toBe(false);
    expect(field(address.fields, 'street').isExcluded).toBe(true);
  });
});

// ============================================================================
// Depth, Names and Flags
// ============================================================================

describe('SchemaBuilder nesting', () => {
  it('should drop fields beyond the nesting depth', () => {
    const { builder, fields } = build('return');

    const address = nestedOf(field(fields, 'address').transferType);
    expect(address.fields.map((f) => f.name)).toEqual(['city']);
    expect(builder.droppedFieldPaths).toEqual(['address.street', 'previous.0.street']);
  });

  it('should drop every nested field at depth zero', () => {
    const { builder, fields } = build('return', { maxNestedDepth: 0 });

    expect(fields.map((f) => f.name)).toEqual(['id', 'first_name', 'password', '_internal', 'tags']);
    expect(builder.droppedFieldPaths).toEqual(['address', 'previous']);
  });

  it.each<[string, ModelIntrospector<object>, object]>([
    ['zod getter', new ZodIntrospector(), SbNode],
    ['struct', new StructIntrospector(), SbTreeNode],
  ])('should cut a self-referencing %s model after the last allowed level', (_kind, introspector, model) => {
    const config = defineDTOConfig({ maxNestedDepth: 2 });
    const builder = new SchemaBuilder({ introspector, config, direction: 'return', handlerId: 'nodes.get' });

    const fields = builder.parseModel(model, config.exclude, config.include);

    const first = nestedOf(field(fields, 'child').transferType);
    const second = nestedOf(field(first.fields, 'child').transferType);
    expect(first.fields.map((f) => f.name)).toEqual(['label', 'child']);
    expect(second.fields.map((f) => f.name)).toEqual(['label']);
    expect(builder.droppedFieldPaths).toEqual(['child.0.child.0.child']);
  });

  it('should name nested transfer models after the handler', () => {
    const { fields } = build('return');

    expect(nestedOf(field(fields, 'address').transferType).transferModel.name).toBe('GetSbAddressResponseBody');
    expect(nestedOf(field(fields, 'previous').transferType).transferModel.name).toBe(
      'people.getSbAddressResponseBody'
    );
  });

  it('should compute serialization names', () => {
    const { fields } = build('data', { renameStrategy: 'camel', renameFields: { tags: 'labels' } });

    expect(field(fields, 'first_name').serializationName).toBe('firstName');
    expect(field(fields, 'tags').serializationName).toBe('labels');
  });

  it('should flag every field partial', () => {
    const { fields } = build('data', { partial: true });

    expect(fields.every((f) => f.isPartial)).toBe(true);
  });
});
