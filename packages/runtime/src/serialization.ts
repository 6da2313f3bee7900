/**
 * Element encoding for blob-collection columns.
 *
 * Each element of a `list<blob>` or value of a `map<text,blob>` holds one
 * JSON document. Encoding failures throw so the generated DAO can log and
 * skip the element; decoding failures yield `undefined` and the element is
 * dropped.
 */

export class ElementSerializationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ElementSerializationError';
  }
}

export function encodeElement(value: unknown): Buffer {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new ElementSerializationError('Could not marshal value', err);
  }

  if (typeof text !== 'string') {
    throw new ElementSerializationError(`Value of type ${typeof value} has no JSON form`);
  }
  return Buffer.from(text, 'utf8');
}

export function decodeElement<T>(bytes: Buffer | null | undefined): T | undefined {
  if (!bytes || bytes.length === 0) {
    return undefined;
  }

  try {
    const value: T = JSON.parse(bytes.toString('utf8'));
    return value;
  } catch {
    return undefined;
  }
}

/**
 * Normalize a timestamp cell. The driver yields `Date` or `null`; numbers and
 * ISO strings are accepted for values that went through a custom codec.
 */
export function toTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'string') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}
