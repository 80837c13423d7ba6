import type { ArgumentList, Parameter } from './value-types.js';

export interface Operation {
  readonly name: string;
  readonly parameters: readonly Parameter<unknown>[];
  invoke(args: ArgumentList): unknown;
}

/** An object whose operations can be listed in a SubMenu. */
export interface MenuTarget {
  describeOperations(): readonly Operation[];
}

export function defineOperation(
  name: string,
  parameters: readonly Parameter<unknown>[],
  invoke: (args: ArgumentList) => unknown,
): Operation {
  return { name, parameters, invoke };
}

export interface Constructor<T> {
  readonly parameters: readonly Parameter<unknown>[];
  create(args: ArgumentList): T | Promise<T>;
}
