import { logger } from '../ui/logger.js';
import { NoConstructorError } from '../utils/errors.js';
import type { Constructor } from './operations.js';
import type { ValueType } from './value-types.js';

/**
 * Factories for object types, keyed by type name. A type may have several
 * constructors; the one with the most parameters wins, ties going to the one
 * registered first.
 */
export class ConstructorRegistry {
  private readonly constructors = new Map<string, Constructor<unknown>[]>();

  register<T>(type: ValueType<T>, constructor: Constructor<T>): this {
    const existing = this.constructors.get(type.typeName);
    if (existing) {
      existing.push(constructor);
    } else {
      this.constructors.set(type.typeName, [constructor]);
    }
    return this;
  }

  has(type: ValueType<unknown>): boolean {
    return (this.constructors.get(type.typeName)?.length ?? 0) > 0;
  }

  list(type: ValueType<unknown>): readonly Constructor<unknown>[] {
    return this.constructors.get(type.typeName) ?? [];
  }

  select(type: ValueType<unknown>): Constructor<unknown> {
    const candidates = this.list(type);
    if (candidates.length === 0) {
      throw new NoConstructorError(type.typeName);
    }

    let selected = candidates[0];
    for (const candidate of candidates) {
      if (candidate.parameters.length > selected.parameters.length) {
        selected = candidate;
      }
    }
    logger.debug(
      `Using ${type.typeName} constructor with ${selected.parameters.length} parameter(s)`,
    );
    return selected;
  }
}
