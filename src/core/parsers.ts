import { Decimal } from 'decimal.js';

import { ParseError } from '../utils/errors.js';

export type ScalarKind =
  | 'token'
  | 'line'
  | 'int8'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'boolean'
  | 'bigint'
  | 'decimal';

export interface ScalarValues {
  token: string;
  line: string;
  int8: number;
  int16: number;
  int32: number;
  int64: bigint;
  float32: number;
  float64: number;
  boolean: boolean;
  bigint: bigint;
  decimal: Decimal;
}

export type ScalarParser<T> = (raw: string) => T;

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = /^([+-]?Infinity|NaN)$/;

function integerInRange(typeName: string, min: bigint, max: bigint): ScalarParser<bigint> {
  return (raw) => {
    if (!INTEGER.test(raw)) throw new ParseError(raw, typeName);
    const value = BigInt(raw);
    if (value < min || value > max) throw new ParseError(raw, typeName);
    return value;
  };
}

const int8 = integerInRange('int8', -128n, 127n);
const int16 = integerInRange('int16', -32768n, 32767n);
const int32 = integerInRange('int32', -2147483648n, 2147483647n);
const int64 = integerInRange('int64', -(2n ** 63n), 2n ** 63n - 1n);
const arraySize = integerInRange('array size', 0n, 2147483647n);

function parseFloat64(raw: string): number {
  if (!FLOAT.test(raw) && !FLOAT_SPECIAL.test(raw)) throw new ParseError(raw, 'float64');
  return Number(raw);
}

export const SCALAR_PARSERS: { [K in ScalarKind]: ScalarParser<ScalarValues[K]> } = {
  token: (raw) => raw,
  line: (raw) => raw,
  int8: (raw) => Number(int8(raw)),
  int16: (raw) => Number(int16(raw)),
  int32: (raw) => Number(int32(raw)),
  int64,
  float32: (raw) => Math.fround(parseFloat64(raw)),
  float64: parseFloat64,
  boolean: (raw) => {
    const lower = raw.toLowerCase();
    if (lower === 'true') return true;
    if (lower === 'false') return false;
    throw new ParseError(raw, 'boolean');
  },
  bigint: (raw) => {
    if (!INTEGER.test(raw)) throw new ParseError(raw, 'bigint');
    return BigInt(raw);
  },
  decimal: (raw) => {
    if (!FLOAT.test(raw)) throw new ParseError(raw, 'decimal');
    return new Decimal(raw);
  },
};

export function parseArraySize(raw: string): number {
  return Number(arraySize(raw));
}

/** Scalars read a whole line rather than a single token. */
export function readsWholeLine(kind: ScalarKind): boolean {
  return kind === 'line';
}
