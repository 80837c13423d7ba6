import { Decimal } from 'decimal.js';
import { z } from 'zod';

import type { OutputSink } from '../ui/screen.js';
import { UnknownParameterError } from '../utils/errors.js';
import { InputReader } from './input-reader.js';
import type { ScalarKind } from './parsers.js';

export type TypeShape =
  | { kind: 'scalar'; scalar: ScalarKind }
  | { kind: 'array'; element: ValueType<unknown> }
  | { kind: 'object' }
  | { kind: 'stream'; stream: 'input' | 'output' };

/**
 * Runtime description of a value the menus can build from console input.
 * `schema` checks a built value and gives it its static type.
 */
export interface ValueType<T> {
  readonly typeName: string;
  readonly shape: TypeShape;
  readonly schema: z.ZodType<T>;
}

function scalar<T>(scalar: ScalarKind, typeName: string, schema: z.ZodType<T>): ValueType<T> {
  return { typeName, shape: { kind: 'scalar', scalar }, schema };
}

function isOutputSink(value: unknown): value is OutputSink {
  return (
    typeof value === 'object' && value !== null && 'write' in value && typeof value.write === 'function'
  );
}

export const t = {
  string: () => scalar('line', 'string', z.string()),
  word: () => scalar('token', 'word', z.string()),
  int8: () => scalar('int8', 'int8', z.number().int().min(-128).max(127)),
  int16: () => scalar('int16', 'int16', z.number().int().min(-32768).max(32767)),
  int32: () => scalar('int32', 'int32', z.number().int().min(-2147483648).max(2147483647)),
  int64: () => scalar('int64', 'int64', z.bigint()),
  float32: () => scalar('float32', 'float32', z.number().or(z.nan())),
  float64: () => scalar('float64', 'float64', z.number().or(z.nan())),
  boolean: () => scalar('boolean', 'boolean', z.boolean()),
  bigint: () => scalar('bigint', 'bigint', z.bigint()),
  decimal: () => scalar('decimal', 'decimal', z.instanceof(Decimal)),

  array<T>(element: ValueType<T>): ValueType<T[]> {
    return {
      typeName: `${element.typeName}[]`,
      shape: { kind: 'array', element },
      schema: z.array(element.schema),
    };
  },

  /** An object type built through a constructor registered under its class name. */
  instance<T extends object>(
    cls: abstract new (...args: never[]) => T,
    typeName: string = cls.name,
  ): ValueType<T> {
    return { typeName, shape: { kind: 'object' }, schema: z.instanceof(cls) };
  },

  /** An object type identified by name and checked with a type guard. */
  object<T>(typeName: string, guard: (value: unknown) => value is T): ValueType<T> {
    return { typeName, shape: { kind: 'object' }, schema: z.custom<T>(guard) };
  },

  input: (): ValueType<InputReader> => ({
    typeName: 'InputReader',
    shape: { kind: 'stream', stream: 'input' },
    schema: z.instanceof(InputReader),
  }),

  output: (): ValueType<OutputSink> => ({
    typeName: 'OutputSink',
    shape: { kind: 'stream', stream: 'output' },
    schema: z.custom<OutputSink>(isOutputSink),
  }),
};

export interface Parameter<T> {
  readonly name: string;
  readonly type: ValueType<T>;
}

export function param<T>(name: string, type: ValueType<T>): Parameter<T> {
  return { name, type };
}

/** Collected values for an ordered parameter list. */
export class ArgumentList {
  constructor(
    readonly parameters: readonly Parameter<unknown>[],
    private readonly values: readonly unknown[],
  ) {}

  get<T>(parameter: Parameter<T>): T {
    let index = this.parameters.indexOf(parameter);
    if (index === -1) {
      index = this.parameters.findIndex((p) => p.name === parameter.name);
    }
    if (index === -1) {
      throw new UnknownParameterError(parameter.name);
    }
    return parameter.type.schema.parse(this.values[index]);
  }

  get length(): number {
    return this.values.length;
  }

  toArray(): unknown[] {
    return [...this.values];
  }
}
