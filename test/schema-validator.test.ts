// This test suite verifies fail-fast argument validation order, type tags, enums, and nested paths.

import { describe, expect, it } from 'vitest';
import { SchemaValidator } from '../src/mcp/schema-validator.js';
import type { ArgumentSchema } from '../src/types/domain.js';
import { ValidationError } from '../src/utils/errors.js';

const validator = new SchemaValidator();

const searchSchema: ArgumentSchema = {
  properties: {
    query: { type: 'string' },
    limit: { type: 'integer' },
    mode: { type: 'string', enum: ['fast', 'exact'] }
  },
  required: ['query']
};

describe('schema validator', () => {
  it('accepts arguments that satisfy the schema', () => {
    expect(validator.check({ query: 'tea', limit: 5, mode: 'fast' }, searchSchema)).toBeNull();
    expect(() => validator.validate({ query: 'tea' }, searchSchema)).not.toThrow();
  });

  it('reports the missing required field', () => {
    expect(validator.check({ limit: 5 }, searchSchema)).toEqual({
      path: 'query',
      constraint: 'required',
      message: 'Missing required parameter: query'
    });
  });

  it('treats an undefined value as missing', () => {
    expect(validator.check({ query: undefined }, searchSchema)?.constraint).toBe('required');
  });

  it('checks required names before any type mismatch', () => {
    const schema: ArgumentSchema = {
      properties: { a: { type: 'string' }, b: { type: 'string' } },
      required: ['b']
    };

    expect(validator.check({ a: 1 }, schema)?.path).toBe('b');
  });

  it('reports type mismatches without coercion', () => {
    expect(validator.check({ query: 'tea', limit: '5' }, searchSchema)).toEqual({
      path: 'limit',
      constraint: 'type',
      expected: 'integer',
      message: 'Invalid type for parameter limit: expected integer, received string'
    });
    expect(validator.check({ query: 'tea', limit: 1.5 }, searchSchema)?.constraint).toBe('type');
  });

  it('reports enum violations with the allowed values', () => {
    expect(validator.check({ query: 'tea', mode: 'slow' }, searchSchema)).toEqual({
      path: 'mode',
      constraint: 'enum',
      expected: ['fast', 'exact'],
      message: 'Invalid value for parameter mode: must be one of [fast, exact]'
    });
  });

  it('uses deep equality for enum membership', () => {
    const schema: ArgumentSchema = {
      properties: { point: { enum: [{ x: 1, y: 2 }] } },
      required: []
    };

    expect(validator.check({ point: { x: 1, y: 2 } }, schema)).toBeNull();
    expect(validator.check({ point: { x: 2, y: 1 } }, schema)?.constraint).toBe('enum');
  });

  it('distinguishes number, object, array and null tags', () => {
    const schema: ArgumentSchema = {
      properties: {
        n: { type: 'number' },
        o: { type: 'object' },
        l: { type: 'array' },
        z: { type: 'null' }
      },
      required: []
    };

    expect(validator.check({ n: Number.NaN }, schema)?.path).toBe('n');
    expect(validator.check({ o: [] }, schema)?.path).toBe('o');
    expect(validator.check({ o: null }, schema)?.path).toBe('o');
    expect(validator.check({ l: {} }, schema)?.path).toBe('l');
    expect(validator.check({ z: 0 }, schema)?.path).toBe('z');
    expect(validator.check({ n: 2.5, o: {}, l: [], z: null }, schema)).toBeNull();
  });

  it('accepts any listed type and ignores unknown type tags', () => {
    const schema: ArgumentSchema = {
      properties: { id: { type: ['string', 'integer'] }, blob: { type: 'any' } },
      required: []
    };

    expect(validator.check({ id: 'a', blob: 42 }, schema)).toBeNull();
    expect(validator.check({ id: 7, blob: 'x' }, schema)).toBeNull();
    expect(validator.check({ id: true }, schema)?.message).toBe(
      'Invalid type for parameter id: expected string | integer, received boolean'
    );
  });

  it('treats a required name without a declared property as required but untyped', () => {
    const schema: ArgumentSchema = { properties: {}, required: ['token'] };

    expect(validator.check({ token: 123 }, schema)).toBeNull();
    expect(validator.check({}, schema)?.path).toBe('token');
  });

  it('recurses into nested objects and array items', () => {
    const schema: ArgumentSchema = {
      properties: {
        filter: {
          type: 'object',
          properties: { field: { type: 'string' } },
          required: ['field']
        },
        tags: {
          type: 'array',
          items: { type: 'object', properties: { name: { type: 'string' } }, required: ['name'] }
        }
      },
      required: []
    };

    expect(validator.check({ filter: {} }, schema)?.path).toBe('filter.field');
    expect(validator.check({ tags: [{ name: 'a' }, { name: 2 }] }, schema)?.path).toBe('tags[1].name');
    expect(validator.check({ tags: [{ name: 'a' }, {}] }, schema)?.path).toBe('tags[1].name');
  });

  it('follows an explicit property order when names look like integers', () => {
    const properties = { name: { type: 'string' }, '1': { type: 'number' } };
    const args = { name: 5, '1': 'first' };

    expect(validator.check(args, { properties, required: [] })?.path).toBe('1');
    expect(validator.check(args, { properties, required: [], propertyOrder: ['name', '1'] })?.path).toBe('name');
  });

  it('applies property order to nested objects', () => {
    const schema: ArgumentSchema = {
      properties: {
        filter: {
          type: 'object',
          properties: { label: { type: 'string' }, '2': { type: 'string' } },
          propertyOrder: ['label', '2']
        }
      },
      required: []
    };

    expect(validator.check({ filter: { label: 1, '2': 2 } }, schema)?.path).toBe('filter.label');
  });

  it('throws a ValidationError that carries the structured violation', () => {
    try {
      validator.validate({}, searchSchema);
      expect.unreachable('validation should have failed');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Schema validation failed');
        expect(error.violation.path).toBe('query');
      }
    }
  });
});
