/**
 * Schema SAID tests
 */

import { describe, test, expect } from 'vitest';
import { deriveSchemaSaid, saidifySchema, verifySchemaSaid } from './said';

const person = {
  type: 'object' as const,
  properties: {
    name: { type: 'string' as const },
  },
  required: ['name'],
};

describe('Schema SAID', () => {
  test('should digest the canonical form with a placeholder $id', () => {
    expect(deriveSchemaSaid(person)).toBe('EGJLLuhS4_bEWrnf4TNG-cMZWDdATlvrV5ND5I08b00d');
  });

  test('should not depend on key order or an existing $id', () => {
    const reordered = { required: ['name'], $id: 'Estale', properties: { name: { type: 'string' } }, type: 'object' };
    expect(deriveSchemaSaid(reordered)).toBe('EGJLLuhS4_bEWrnf4TNG-cMZWDdATlvrV5ND5I08b00d');
  });

  test('should embed and verify the SAID', () => {
    const schema = saidifySchema(person);

    expect(schema.$id).toBe('EGJLLuhS4_bEWrnf4TNG-cMZWDdATlvrV5ND5I08b00d');
    expect(schema.required).toEqual(['name']);
    expect(verifySchemaSaid(schema)).toBe(true);
  });

  test('should detect a modified schema', () => {
    const schema = saidifySchema(person);
    expect(verifySchemaSaid({ ...schema, required: [] })).toBe(false);
  });

  test('should reject a missing or malformed $id', () => {
    expect(verifySchemaSaid(person)).toBe(false);
    expect(verifySchemaSaid({ ...person, $id: 'not-a-said' })).toBe(false);
  });

  test('should honour the digest code of the $id', () => {
    const schema = saidifySchema(person, 'I');
    expect(schema.$id.startsWith('I')).toBe(true);
    expect(verifySchemaSaid(schema)).toBe(true);
  });
});
