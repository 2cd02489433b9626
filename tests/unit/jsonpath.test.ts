/**
 * Unit Tests: JSONPath subset used by response assertions.
 */
import { describe, it, expect } from 'vitest';
import { extractJsonPath, JsonPathError } from '../../src/jsonpath.js';
import type { JsonValue } from '../../src/suite.js';

const document: JsonValue = {
  user: { id: 42, name: 'Ada', active: true },
  items: [{ sku: 'a-1' }, { sku: 'b-2' }],
  matrix: [[1, 2]],
  nothing: null,
};

describe('extractJsonPath', () => {
  it('reads nested fields', () => {
    expect(extractJsonPath(document, '$.user.name')).toBe('Ada');
    expect(extractJsonPath(document, '$.user.id')).toBe(42);
  });

  it('returns whole objects and nulls', () => {
    expect(extractJsonPath(document, '$.user')).toEqual({ id: 42, name: 'Ada', active: true });
    expect(extractJsonPath(document, '$.nothing')).toBeNull();
  });

  it('indexes into a field-qualified array', () => {
    expect(extractJsonPath(document, '$.items[1].sku')).toBe('b-2');
  });

  it('indexes into a root array', () => {
    const list: JsonValue = [{ id: 'first' }, { id: 'second' }];
    expect(extractJsonPath(list, '$[1].id')).toBe('second');
    expect(extractJsonPath(list, '$[0]')).toEqual({ id: 'first' });
  });

  it('accepts paths without the $. prefix', () => {
    expect(extractJsonPath(document, 'user.active')).toBe(true);
  });

  it('names a missing field', () => {
    expect(() => extractJsonPath(document, '$.user.email')).toThrow("Field 'email' not found in JSON");
  });

  it('names an out-of-range index', () => {
    expect(() => extractJsonPath(document, '$.items[5]')).toThrow('Array index 5 not found');
  });

  it('rejects a non-numeric index', () => {
    expect(() => extractJsonPath(document, '$.items[*]')).toThrow('Invalid array index: *');
  });

  it('rejects indexing into a non-array', () => {
    expect(() => extractJsonPath(document, '$.user[0]')).toThrow(JsonPathError);
  });

  it('does not treat array elements as fields', () => {
    expect(() => extractJsonPath(document, '$.items.sku')).toThrow("Field 'sku' not found in JSON");
  });
});
