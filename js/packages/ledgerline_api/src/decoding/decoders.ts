/**
 * Small decoder combinators for API responses.
 *
 * A decoder checks an already-parsed JSON value and returns it typed, or throws a
 * {@link SchemaError} naming where in the document the mismatch is.
 */

export type Decoder<T> = (value: unknown, path?: string) => T;

export class SchemaError extends Error {
  override name = 'SchemaError';

  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: unknown
  ) {
    super(`${path}: expected ${expected}, got ${describeValue(actual)}`);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

const ROOT = '$';

export const str: Decoder<string> = (value, path = ROOT) => {
  if (typeof value !== 'string') throw new SchemaError(path, 'string', value);
  return value;
};

export const int: Decoder<number> = (value, path = ROOT) => {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new SchemaError(path, 'integer', value);
  }
  return value;
};

export const bool: Decoder<boolean> = (value, path = ROOT) => {
  if (typeof value !== 'boolean') throw new SchemaError(path, 'boolean', value);
  return value;
};

/**
 * Accepts null or a missing field as `null`
 */
export function nullable<T>(inner: Decoder<T>): Decoder<T | null> {
  return (value, path = ROOT) => (value === null || value === undefined ? null : inner(value, path));
}

export function array<T>(item: Decoder<T>): Decoder<T[]> {
  return (value, path = ROOT) => {
    if (!Array.isArray(value)) throw new SchemaError(path, 'array', value);
    return value.map((entry: unknown, index) => item(entry, `${path}[${index}]`));
  };
}

/**
 * Narrow a value to a JSON object so its fields can be decoded one by one
 */
export function record(value: unknown, path = ROOT): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new SchemaError(path, 'object', value);
  }
  return { ...value };
}

/**
 * Decode `source[key]`, reporting mismatches at `path.key`
 */
export function field<T>(
  source: Record<string, unknown>,
  key: string,
  decoder: Decoder<T>,
  path = ROOT
): T {
  return decoder(source[key], `${path}.${key}`);
}
