import { describe, it, expect } from 'vitest';
import { replaceRefsWithDefs } from '../../src/schema/jsonSchemaCleaner.js';

// ============================================================================
// FIXTURES
// ============================================================================

function personSchema(): Record<string, unknown> {
  return {
    $defs: {
      address: {
        type: 'object',
        properties: {
          street: { type: 'string' },
          city: { type: 'string' },
        },
        required: ['street', 'city'],
      },
    },
    title: 'Person',
    type: 'object',
    properties: {
      name: { type: 'string' },
      age: { type: 'integer' },
      address: { $ref: '#/$defs/address' },
    },
    required: ['name', 'age', 'address'],
  };
}

// ============================================================================
// TESTS
// ============================================================================

describe('replaceRefsWithDefs', () => {
  it('inlines $defs references and reshapes into a function definition', () => {
    expect(replaceRefsWithDefs(personSchema())).toEqual({
      name: 'Person',
      parameters: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          age: { type: 'integer' },
          address: {
            type: 'object',
            properties: {
              street: { type: 'string' },
              city: { type: 'string' },
            },
            required: ['street', 'city'],
          },
        },
        required: ['name', 'age', 'address'],
      },
    });
  });

  it('inlines references nested inside definitions and arrays', () => {
    const result = replaceRefsWithDefs({
      $defs: {
        city: { type: 'string', minLength: 1 },
        address: { type: 'object', properties: { city: { $ref: '#/$defs/city' } } },
      },
      title: 'Directory',
      type: 'object',
      properties: {
        addresses: { type: 'array', items: { $ref: '#/$defs/address' } },
      },
      required: ['addresses'],
    });

    expect(result.parameters.properties).toEqual({
      addresses: {
        type: 'array',
        items: { type: 'object', properties: { city: { type: 'string', minLength: 1 } } },
      },
    });
  });

  it('keeps siblings of a $ref, letting the definition win on conflicts', () => {
    const result = replaceRefsWithDefs({
      $defs: { code: { type: 'string', description: 'from def' } },
      title: 'Lookup',
      type: 'object',
      properties: { code: { $ref: '#/$defs/code', description: 'sibling', examples: ['x'] } },
      required: [],
    });

    expect(result.parameters.properties['code']).toEqual({
      type: 'string',
      description: 'from def',
      examples: ['x'],
    });
  });

  it('carries the description and defaults missing fields', () => {
    expect(replaceRefsWithDefs({ title: 'Ping', description: 'Health check' })).toEqual({
      name: 'Ping',
      description: 'Health check',
      parameters: { type: 'object', properties: {}, required: [] },
    });
  });

  it('does not mutate its input', () => {
    const schema = personSchema();
    const before = structuredClone(schema);

    replaceRefsWithDefs(schema);

    expect(schema).toEqual(before);
  });

  it('throws when $ref is used without $defs', () => {
    const schema = personSchema();
    delete schema['$defs'];

    expect(() => replaceRefsWithDefs(schema)).toThrow('Schema contains $ref but has no $defs');
  });

  it('throws on unresolvable references', () => {
    expect(() =>
      replaceRefsWithDefs({
        $defs: {},
        title: 'Broken',
        properties: { a: { $ref: '#/$defs/missing' } },
      })
    ).toThrow('Unresolvable $ref: #/$defs/missing');
  });

  it('throws on circular references', () => {
    expect(() =>
      replaceRefsWithDefs({
        $defs: { node: { type: 'object', properties: { next: { $ref: '#/$defs/node' } } } },
        title: 'List',
        properties: { head: { $ref: '#/$defs/node' } },
      })
    ).toThrow('Circular $ref cannot be inlined: #/$defs/node');
  });

  it('requires a title', () => {
    expect(() => replaceRefsWithDefs({ type: 'object', properties: {} })).toThrow();
  });
});
