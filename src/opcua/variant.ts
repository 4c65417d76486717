/**
 * Variant construction and unwrapping
 *
 * Values written through the accessor are wrapped in a type-tagged Variant.
 * The data type is inferred from the JavaScript value unless one is given.
 */

import { DataType, Variant, VariantArrayType } from 'node-opcua-client';
import { UnsupportedValueError } from '../errors';

export type WritableValue = boolean | number | string | bigint | Date | Buffer;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

export function inferDataType(value: unknown): DataType {
  switch (typeof value) {
    case 'boolean':
      return DataType.Boolean;
    case 'string':
      return DataType.String;
    case 'number':
      return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
        ? DataType.Int32
        : DataType.Double;
    case 'bigint':
      return DataType.Int64;
  }
  if (value instanceof Date) {
    return DataType.DateTime;
  }
  if (Buffer.isBuffer(value)) {
    return DataType.ByteString;
  }
  throw new UnsupportedValueError(value);
}

function isInt64Type(dataType: DataType): boolean {
  return dataType === DataType.Int64 || dataType === DataType.UInt64;
}

/**
 * node-opcua carries 64-bit integers as a [high, low] pair of unsigned 32-bit words
 */
function toWordPair(value: bigint): [number, number] {
  const unsigned = BigInt.asUintN(64, value);
  return [Number(unsigned >> 32n), Number(unsigned & 0xffffffffn)];
}

function isWordPair(value: unknown): value is [number, number] {
  return Array.isArray(value) && value.length === 2 && value.every(word => typeof word === 'number');
}

export function toVariant(value: WritableValue, dataType: DataType = inferDataType(value)): Variant {
  if (typeof value === 'bigint' && isInt64Type(dataType)) {
    return new Variant({ dataType, arrayType: VariantArrayType.Scalar, value: toWordPair(value) });
  }
  return new Variant({ dataType, value });
}

/**
 * Raw value of a read Variant; 64-bit integers come back as bigint
 */
export function fromVariant(variant: Variant): unknown {
  const { dataType, value } = variant;

  if (isInt64Type(dataType) && isWordPair(value)) {
    const combined = (BigInt(value[0]) << 32n) | BigInt(value[1]);
    return dataType === DataType.Int64 ? BigInt.asIntN(64, combined) : combined;
  }

  return value;
}
