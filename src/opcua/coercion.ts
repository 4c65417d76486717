/**
 * Primitive coercion
 *
 * Read values are turned into text first and then parsed into the requested
 * primitive type, so a node holding the string "42" reads as the integer 42.
 */

import { DataType } from 'node-opcua-client';
import { ConversionError } from '../errors';

export interface PrimitiveTypeMap {
  string: string;
  int16: number;
  int32: number;
  float: number;
  double: number;
  boolean: boolean;
}

export type PrimitiveType = keyof PrimitiveTypeMap;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:NaN|Infinity|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?[fFdD]?)$/;

/**
 * Shortest decimal that rounds back to the same single-precision value,
 * so a Float holding 0.1f renders as "0.1" rather than its widened double.
 */
function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) {
      return String(candidate);
    }
  }
  return String(value);
}

/**
 * Renders a read value as text. `dataType` is the OPC UA type the value was
 * read as; Float values are rendered at single precision.
 */
export function stringifyValue(raw: unknown, dataType?: DataType): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  if (typeof raw === 'string') {
    return raw;
  }
  if (typeof raw === 'number' && dataType === DataType.Float) {
    return formatFloat(raw);
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  return String(raw);
}

function integerParser(type: 'int16' | 'int32', min: number, max: number) {
  return (text: string): number => {
    if (!INTEGER_PATTERN.test(text)) {
      throw new ConversionError(text, type);
    }
    const value = Number(text);
    if (value < min || value > max) {
      throw new ConversionError(text, type);
    }
    // "-0" parses to -0
    return value === 0 ? 0 : value;
  };
}

function parseDecimal(text: string, type: 'float' | 'double'): number {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new ConversionError(text, type);
  }
  return Number(trimmed.replace(/[fFdD]$/, ''));
}

const PARSERS: { [K in PrimitiveType]: (text: string) => PrimitiveTypeMap[K] } = {
  string: text => text,
  int16: integerParser('int16', -32768, 32767),
  int32: integerParser('int32', -2147483648, 2147483647),
  float: text => Math.fround(parseDecimal(text, 'float')),
  double: text => parseDecimal(text, 'double'),
  boolean: text => {
    const lowered = text.toLowerCase();
    return lowered === 'true' || lowered === '1';
  },
};

const ZERO_VALUES: PrimitiveTypeMap = {
  string: '',
  int16: 0,
  int32: 0,
  float: 0,
  double: 0,
  boolean: false,
};

/**
 * @throws ConversionError when the text is not a valid literal of the type
 */
export function parseAs<T extends PrimitiveType>(text: string, type: T): PrimitiveTypeMap[T] {
  const parser: (text: string) => PrimitiveTypeMap[T] = PARSERS[type];
  return parser(text);
}

export function zeroValue<T extends PrimitiveType>(type: T): PrimitiveTypeMap[T] {
  return ZERO_VALUES[type];
}
