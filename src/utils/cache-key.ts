import { createHash } from 'crypto';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type CacheKeyComponent = JsonValue;

export const KEY_SEPARATOR = '|';
const DIGEST_LENGTH = 16;
const MAX_INLINE_TEXT = 48;

type KeyPart =
  | { kind: 'mapping'; value: { [key: string]: JsonValue } }
  | { kind: 'sequence'; value: JsonValue[] }
  | { kind: 'text'; value: string }
  | { kind: 'scalar'; value: JsonPrimitive };

function classify(component: CacheKeyComponent): KeyPart {
  if (Array.isArray(component)) {
    return { kind: 'sequence', value: component };
  }
  if (component !== null && typeof component === 'object') {
    return { kind: 'mapping', value: component };
  }
  if (
    typeof component === 'string' &&
    (component.length > MAX_INLINE_TEXT || component.includes(KEY_SEPARATOR))
  ) {
    return { kind: 'text', value: component };
  }
  return { kind: 'scalar', value: component };
}

function digest(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, DIGEST_LENGTH);
}

/**
 * Recursively sorts object keys so logically equal values serialize to the
 * same bytes. Array order is preserved.
 */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

function toToken(part: KeyPart): string {
  switch (part.kind) {
    case 'mapping':
    case 'sequence':
      return digest(canonicalJson(part.value));
    case 'text':
      return digest(part.value);
    case 'scalar':
      return String(part.value);
  }
}

/**
 * Builds a deterministic cache key. Objects and arrays collapse to a
 * fixed-width digest, long strings are hashed, short scalars stay readable.
 */
export function makeCacheKey(
  prefix: string,
  components: readonly CacheKeyComponent[],
): string {
  return [prefix, ...components.map((c) => toToken(classify(c)))].join(
    KEY_SEPARATOR,
  );
}
