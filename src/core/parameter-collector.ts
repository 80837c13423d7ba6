import { ArgumentList } from './value-types.js';
import type { Parameter } from './value-types.js';

/**
 * Cursor over an operation's parameters. Filling advances the cursor,
 * stepping back moves it one slot left and keeps every value already
 * collected, so a later fill simply overwrites.
 */
export class ParameterCollector {
  private readonly values: unknown[];
  private readonly filled: boolean[];
  private cursor = 0;

  constructor(readonly parameters: readonly Parameter<unknown>[]) {
    this.values = new Array<unknown>(parameters.length);
    this.filled = new Array<boolean>(parameters.length).fill(false);
  }

  get position(): number {
    return this.cursor;
  }

  get isComplete(): boolean {
    return this.cursor >= this.parameters.length;
  }

  get current(): Parameter<unknown> | undefined {
    return this.parameters[this.cursor];
  }

  fill(value: unknown): void {
    if (this.isComplete) {
      throw new Error('All parameters are already filled');
    }
    this.values[this.cursor] = value;
    this.filled[this.cursor] = true;
    this.cursor++;
  }

  stepBack(): void {
    if (this.cursor > 0) this.cursor--;
  }

  isFilled(index: number): boolean {
    return this.filled[index] ?? false;
  }

  valueAt(index: number): unknown {
    return this.values[index];
  }

  toArgumentList(): ArgumentList {
    if (!this.isComplete) {
      throw new Error(`Parameter ${this.cursor + 1} of ${this.parameters.length} is still missing`);
    }
    return new ArgumentList(this.parameters, [...this.values]);
  }
}
