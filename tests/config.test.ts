import { describe, it, expect } from 'vitest';
import {
  defineDTOConfig,
  extendDTOConfig,
  renameField,
  serializationNameFor,
  ConfigurationException,
} from '../src/index.js';

// ============================================================================
// defineDTOConfig
// ============================================================================

describe('defineDTOConfig', () => {
  it('should apply defaults', () => {
    const config = defineDTOConfig();

    expect(config.exclude.size).toBe(0);
    expect(config.include.size).toBe(0);
    expect(config.renameStrategy).toBeNull();
    expect(config.maxNestedDepth).toBe(1);
    expect(config.partial).toBe(false);
    expect(config.underscoreFieldsPrivate).toBe(true);
    expect(config.forbidUnknownFields).toBe(false);
    expect(config.backend).toBe('interpreted');
  });

  it('should freeze the result', () => {
    const config = defineDTOConfig({ renameFields: { name: 'fullName' } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.renameFields)).toBe(true);
  });

  it('should collect exclude paths into a set', () => {
    const config = defineDTOConfig({ exclude: ['email', 'address.street', 'email'] });

    expect([...config.exclude]).toEqual(['email', 'address.street']);
  });

  it('should reject exclude together with include', () => {
    expect(() => defineDTOConfig({ exclude: ['email'], include: ['name'] })).toThrow(ConfigurationException);
    expect(() => defineDTOConfig({ exclude: ['email'], include: ['name'] })).toThrow(
      "'exclude' and 'include' are mutually exclusive"
    );
  });

  it('should reject a negative depth', () => {
    try {
      defineDTOConfig({ maxNestedDepth: -1 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationException);
      if (error instanceof ConfigurationException) {
        expect(error.message).toBe('Invalid DTO configuration');
        expect(error.status).toBe(500);
        expect(error.code).toBe('CONFIGURATION_ERROR');
      }
    }
  });

  it('should accept a function rename strategy', () => {
    const config = defineDTOConfig({ renameStrategy: (name) => `x_${name}` });

    expect(serializationNameFor('age', config)).toBe('x_age');
  });
});

// ============================================================================
// extendDTOConfig
// ============================================================================

describe('extendDTOConfig', () => {
  it('should keep base values not overridden', () => {
    const base = defineDTOConfig({ exclude: ['email'], partial: true, backend: 'codegen' });
    const extended = extendDTOConfig(base, { maxNestedDepth: 3 });

    expect([...extended.exclude]).toEqual(['email']);
    expect(extended.partial).toBe(true);
    expect(extended.backend).toBe('codegen');
    expect(extended.maxNestedDepth).toBe(3);
  });

  it('should replace exclude with include', () => {
    const base = defineDTOConfig({ exclude: ['email'] });
    const extended = extendDTOConfig(base, { include: ['name'] });

    expect(extended.exclude.size).toBe(0);
    expect([...extended.include]).toEqual(['name']);
  });
});

// ============================================================================
// Renaming
// ============================================================================

describe('renameField', () => {
  it('should convert to camel case', () => {
    expect(renameField('first_name', 'camel')).toBe('firstName');
    expect(renameField('home_address_line', 'camel')).toBe('homeAddressLine');
  });

  it('should keep a leading underscore', () => {
    expect(renameField('_private_field', 'camel')).toBe('_privateField');
  });

  it('should convert to pascal case', () => {
    expect(renameField('first_name', 'pascal')).toBe('FirstName');
  });

  it('should convert to kebab case', () => {
    expect(renameField('firstName', 'kebab')).toBe('first-name');
    expect(renameField('first_name', 'kebab')).toBe('first-name');
  });

  it('should convert case', () => {
    expect(renameField('name', 'upper')).toBe('NAME');
    expect(renameField('NAME', 'lower')).toBe('name');
  });
});

describe('serializationNameFor', () => {
  it('should prefer explicit renames over the strategy', () => {
    const config = defineDTOConfig({
      renameFields: { first_name: 'given' },
      renameStrategy: 'camel',
    });

    expect(serializationNameFor('first_name', config)).toBe('given');
    expect(serializationNameFor('last_name', config)).toBe('lastName');
  });

  it('should use the field name without renames', () => {
    expect(serializationNameFor('last_name', defineDTOConfig())).toBe('last_name');
  });
});
