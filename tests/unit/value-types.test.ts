import { Decimal } from 'decimal.js';
import { ZodError } from 'zod';

import { ArgumentList, param, t } from '../../src/core/value-types.js';
import { UnknownParameterError } from '../../src/utils/errors.js';

class Account {
  constructor(readonly owner: string) {}
}

describe('value types', () => {
  it('should name arrays after their element type', () => {
    expect(t.array(t.int32()).typeName).toBe('int32[]');
    expect(t.array(t.array(t.string())).typeName).toBe('string[][]');
    expect(t.instance(Account).typeName).toBe('Account');
  });

  it('should describe how each type is read', () => {
    expect(t.string().shape).toEqual({ kind: 'scalar', scalar: 'line' });
    expect(t.word().shape).toEqual({ kind: 'scalar', scalar: 'token' });
    expect(t.instance(Account).shape).toEqual({ kind: 'object' });
    expect(t.output().shape).toEqual({ kind: 'stream', stream: 'output' });
  });

  it('should validate values with their schema', () => {
    expect(t.int8().schema.safeParse(200).success).toBe(false);
    expect(t.decimal().schema.safeParse(new Decimal(1)).success).toBe(true);
    expect(t.instance(Account).schema.safeParse({ owner: 'x' }).success).toBe(false);
    expect(t.output().schema.safeParse({ write: () => true }).success).toBe(true);
    expect(t.output().schema.safeParse({}).success).toBe(false);
  });

  it('should accept guarded object types', () => {
    const isTag = (value: unknown): value is { tag: string } =>
      typeof value === 'object' && value !== null && 'tag' in value;
    const tagType = t.object('Tag', isTag);

    expect(tagType.schema.parse({ tag: 'a' })).toEqual({ tag: 'a' });
    expect(() => tagType.schema.parse(1)).toThrow(ZodError);
  });
});

describe('ArgumentList', () => {
  const owner = param('owner', t.string());
  const amount = param('amount', t.int32());

  it('should return values by parameter', () => {
    const args = new ArgumentList([owner, amount], ['ada', 10]);

    expect(args.get(owner)).toBe('ada');
    expect(args.get(amount)).toBe(10);
    expect(args.length).toBe(2);
  });

  it('should fall back to the parameter name', () => {
    const args = new ArgumentList([owner], ['ada']);

    expect(args.get(param('owner', t.string()))).toBe('ada');
  });

  it('should reject a parameter it does not hold', () => {
    const args = new ArgumentList([owner], ['ada']);

    expect(() => args.get(amount)).toThrow(UnknownParameterError);
  });

  it('should reject a value that does not match the parameter type', () => {
    const args = new ArgumentList([amount], ['ten']);

    expect(() => args.get(amount)).toThrow(ZodError);
  });
});
