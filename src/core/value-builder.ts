import { ConstructionError } from '../utils/errors.js';
import type { ConstructorRegistry } from './constructor-registry.js';
import type { MenuConsole } from './menu-console.js';
import { parseArraySize } from './parsers.js';
import { ArgumentList } from './value-types.js';
import type { ValueType } from './value-types.js';

/**
 * Builds values of any described type from console input: scalars through the
 * typed prompts, arrays element by element, and object types through their
 * registered constructors, recursing into each constructor parameter.
 */
export class ValueBuilder {
  constructor(
    private readonly io: MenuConsole,
    private readonly registry: ConstructorRegistry,
  ) {}

  async buildValue<T>(type: ValueType<T>, displayName: string): Promise<T> {
    return type.schema.parse(await this.buildRaw(type, displayName));
  }

  async createArray<T>(element: ValueType<T>, displayName: string): Promise<T[]> {
    const size = await this.io.prompt.prompt(
      this.io.messages.arraySizePrompt(displayName, element.typeName),
      parseArraySize,
      true,
    );
    const values: T[] = [];
    for (let i = 0; i < size; i++) {
      values.push(await this.buildValue(element, `${displayName}[${i}]`));
    }
    return values;
  }

  async fillArray<T>(elementsName: string, array: T[], element: ValueType<T>): Promise<T[]> {
    for (let i = 0; i < array.length; i++) {
      array[i] = await this.buildValue(element, `${elementsName}[${i}]`);
    }
    return array;
  }

  async construct<T>(type: ValueType<T>): Promise<T> {
    const constructor = this.registry.select(type);
    const values: unknown[] = [];
    for (const parameter of constructor.parameters) {
      values.push(await this.buildValue(parameter.type, parameter.name));
    }

    let created: unknown;
    try {
      created = await constructor.create(new ArgumentList(constructor.parameters, values));
    } catch (error) {
      throw new ConstructionError(type.typeName, error);
    }
    return type.schema.parse(created);
  }

  private buildRaw(type: ValueType<unknown>, displayName: string): Promise<unknown> {
    const { shape } = type;
    switch (shape.kind) {
      case 'array':
        return this.createArray(shape.element, displayName);
      case 'scalar':
        return this.io.prompt.promptScalar(
          shape.scalar,
          this.io.messages.valuePrompt(displayName, type.typeName),
          true,
        );
      case 'stream':
        return Promise.resolve(shape.stream === 'input' ? this.io.reader : this.io.sink);
      case 'object':
        this.io.println(this.io.messages.creatingInstance(type.typeName));
        return this.construct(type);
    }
  }
}
