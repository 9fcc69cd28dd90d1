/**
 * Flattening of parsed YAML documents into dotted keys.
 *
 *   { a: { b: [1, 2] }, c: null }  ->  a.b[0]=1, a.b[1]=2, c=null
 *
 * Mappings add `.key` (a bare key at the top level), sequences add `[i]`.
 * Strings, numbers, booleans and null keep their type. A bare scalar
 * document has no key to live under and contributes nothing.
 */

export type PropertyValue = string | number | boolean | null;
export type PropertyMap = Map<string, PropertyValue>;

function scalarValue(value: unknown): PropertyValue | undefined {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return undefined;
}

function isPlainMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function flattenInto(value: unknown, out: PropertyMap, prefix?: string): PropertyMap {
  if (Array.isArray(value)) {
    value.forEach((element: unknown, index) => {
      flattenInto(element, out, `${prefix ?? ''}[${index}]`);
    });
    return out;
  }

  const scalar = scalarValue(value);
  if (scalar !== undefined) {
    if (prefix !== undefined) {
      out.set(prefix, scalar);
    }
    return out;
  }

  if (isPlainMapping(value)) {
    for (const [key, child] of Object.entries(value)) {
      flattenInto(child, out, prefix === undefined ? key : `${prefix}.${key}`);
    }
  }
  return out;
}

export function flatten(value: unknown): PropertyMap {
  return flattenInto(value, new Map());
}

/**
 * Plain object for JSON output.
 */
export function toJsonObject(properties: PropertyMap): Record<string, PropertyValue> {
  return Object.fromEntries(properties);
}
