/**
 * Canonical JSON serialization (RFC 8785 style).
 *
 * Object members are ordered by UTF-16 code units of their names, no
 * insignificant whitespace is emitted, and strings and numbers use the
 * ECMAScript serialization, so equal JSON values always produce equal bytes.
 */
export function canonicalizeJson(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError('Non-finite numbers have no JSON representation');
      }
      return JSON.stringify(value);
    case 'string':
      return JSON.stringify(value);
    case 'object': {
      if (Array.isArray(value)) {
        return `[${value.map((item: unknown) => canonicalizeJson(item)).join(',')}]`;
      }
      const members = Object.entries(value).sort(([a], [b]) =>
        a < b ? -1 : a > b ? 1 : 0,
      );
      return `{${members
        .map(([key, member]) => `${JSON.stringify(key)}:${canonicalizeJson(member)}`)
        .join(',')}}`;
    }
    default:
      throw new TypeError(`Unsupported JSON value of type ${typeof value}`);
  }
}

/**
 * Canonical UTF-8 bytes of a JSON value
 */
export function canonicalJsonBytes(value: unknown): Buffer {
  return Buffer.from(canonicalizeJson(value), 'utf8');
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nesting depth of a parsed JSON value; scalars have depth 0
 */
export function jsonDepth(value: unknown): number {
  if (typeof value !== 'object' || value === null) {
    return 0;
  }
  let deepest = 0;
  for (const child of Object.values(value)) {
    deepest = Math.max(deepest, jsonDepth(child));
  }
  return deepest + 1;
}
