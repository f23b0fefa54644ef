import { SerializationError } from '../shared/errors.js';

export type AttrValue = string | number | boolean | null | AttrValue[] | AttrMap;

export interface AttrMap {
  [name: string]: AttrValue;
}

/** Discriminant stored in the attrs.type column. */
export type AttrValueKind = 'string' | 'number' | 'boolean' | 'null' | 'array' | 'map';

export interface SerializedValue {
  /** null for raw strings, which are stored verbatim */
  type: Exclude<AttrValueKind, 'string'> | null;
  value: string;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describe(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return value.constructor?.name ?? 'object';
  }
  if (typeof value === 'number') return Object.is(value, -0) ? '-0' : String(value);
  return typeof value;
}

interface Unsupported {
  path: string;
  member: unknown;
}

/** First member with no codec mapping, or null when the whole value is supported. */
function findUnsupported(value: unknown, path: string): Unsupported | null {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return null;
    case 'number':
      // JSON has no negative zero
      return Number.isFinite(value) && !Object.is(value, -0) ? null : { path, member: value };
    case 'object': {
      if (value === null) return null;
      if (Array.isArray(value)) {
        for (let i = 0; i < value.length; i++) {
          const found = findUnsupported(value[i], `${path}[${i}]`);
          if (found) return found;
        }
        return null;
      }
      if (!isPlainObject(value)) return { path, member: value };
      for (const [name, member] of Object.entries(value)) {
        const found = findUnsupported(member, `${path}.${name}`);
        if (found) return found;
      }
      return null;
    }
    default:
      return { path, member: value };
  }
}

export function isAttrValue(value: unknown): value is AttrValue {
  return findUnsupported(value, '$') === null;
}

function assertSupported(value: unknown, path: string): asserts value is AttrValue {
  const found = findUnsupported(value, path);
  if (found) {
    throw new SerializationError(
      `Unsupported value (${describe(found.member)}) at ${found.path}`,
      found.path,
    );
  }
}

export function kindOf(value: AttrValue): AttrValueKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'map';
  }
}

export function serializeValue(value: unknown): SerializedValue {
  assertSupported(value, '$');
  const kind = kindOf(value);
  if (kind === 'string') {
    return { type: null, value: String(value) };
  }
  return { type: kind, value: JSON.stringify(value) };
}

export function deserializeValue(text: string | null, type?: string | null): AttrValue {
  if (text === null) return null;
  if (!type || type === 'string') return text;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SerializationError(
      `Stored ${type} value is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      '$',
    );
  }
  assertSupported(parsed, '$');
  return parsed;
}
