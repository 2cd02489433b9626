import type { JsonValue } from './suite.js';

export class JsonPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JsonPathError';
  }
}

/**
 * Resolves the supported path subset against a parsed JSON document:
 * `$.a.b`, `$.items[0].id` and `$[0].field`. Throws a JsonPathError naming
 * the field or index that could not be resolved.
 */
export function extractJsonPath(json: JsonValue, path: string): JsonValue {
  if (path.startsWith('$[')) {
    const remaining = path.slice(1);
    const bracketEnd = remaining.indexOf(']');
    if (bracketEnd !== -1) {
      const current = indexInto(json, remaining.slice(1, bracketEnd));
      const rest = remaining.slice(bracketEnd + 1);
      return rest.startsWith('.') ? extractJsonPath(current, rest.slice(1)) : current;
    }
  }

  const stripped = path.startsWith('$.') ? path.slice(2) : path;
  let current = json;

  for (const part of stripped.split('.')) {
    if (part === '') {
      continue;
    }

    const bracket = part.indexOf('[');
    if (bracket !== -1 && part.endsWith(']')) {
      const field = part.slice(0, bracket);
      if (field !== '') {
        current = getField(current, field);
      }
      current = indexInto(current, part.slice(bracket + 1, -1));
    } else {
      current = getField(current, part);
    }
  }

  return current;
}

function getField(value: JsonValue, name: string): JsonValue {
  if (value !== null && typeof value === 'object' && !Array.isArray(value) && Object.hasOwn(value, name)) {
    return value[name];
  }
  throw new JsonPathError(`Field '${name}' not found in JSON`);
}

function indexInto(value: JsonValue, raw: string): JsonValue {
  if (!/^\d+$/.test(raw)) {
    throw new JsonPathError(`Invalid array index: ${raw}`);
  }
  const index = parseInt(raw, 10);
  if (Array.isArray(value) && index < value.length) {
    return value[index];
  }
  throw new JsonPathError(`Array index ${index} not found`);
}
