// ---------------------------------------------------------------------------
// Strata — Key/Value Text Conversion
// ---------------------------------------------------------------------------
// Key/value tables store every value as text. Booleans are written as
// "1" / "0"; everything else uses its canonical string form.
// ---------------------------------------------------------------------------

import { CastTypes, StorableValue, ValueCast } from '../types/storage';
import { StorageTypeError } from '../../shared/errors';

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;
const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
/** Non-finite values as `toStoredText` writes them. */
const NON_FINITE_TEXT = new Set(['NaN', 'Infinity', '-Infinity']);

/**
 * Render a value to the text stored in a key/value table.
 *
 * @throws StorageTypeError for anything but a string, number, bigint or boolean.
 */
export function toStoredText(value: StorableValue): string {
  const candidate: unknown = value;
  switch (typeof candidate) {
    case 'boolean':
      return candidate ? '1' : '0';
    case 'string':
      return candidate;
    case 'number':
    case 'bigint':
      return candidate.toString();
    default:
      throw new StorageTypeError(
        `Cannot store a value of type ${candidate === null ? 'null' : typeof candidate} as text`,
      );
  }
}

function parseInteger(text: string): number {
  if (!INTEGER_TEXT.test(text)) {
    throw new StorageTypeError(`Cannot read ${JSON.stringify(text)} as an integer`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new StorageTypeError(
      `Cannot read ${JSON.stringify(text)} as an integer without losing precision; use the 'bigint' cast`,
    );
  }
  return value;
}

const CASTS: { [C in ValueCast]: (text: string) => CastTypes[C] } = {
  string: (text) => text,
  number: (text) => {
    const trimmed = text.trim();
    if (!DECIMAL_TEXT.test(trimmed) && !NON_FINITE_TEXT.has(trimmed)) {
      throw new StorageTypeError(`Cannot read ${JSON.stringify(text)} as a number`);
    }
    return Number(trimmed);
  },
  integer: parseInteger,
  boolean: (text) => {
    if (!INTEGER_TEXT.test(text)) {
      throw new StorageTypeError(`Cannot read ${JSON.stringify(text)} as a boolean`);
    }
    return BigInt(text.trim()) !== 0n;
  },
  bigint: (text) => {
    if (!INTEGER_TEXT.test(text)) {
      throw new StorageTypeError(`Cannot read ${JSON.stringify(text)} as a bigint`);
    }
    return BigInt(text.trim());
  },
};

/** Cast stored text back to the requested type. */
export function castStoredText<C extends ValueCast>(text: string, as: C): CastTypes[C] {
  return CASTS[as](text);
}
