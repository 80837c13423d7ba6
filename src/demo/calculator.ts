import type { Decimal } from 'decimal.js';

import { defineOperation } from '../core/operations.js';
import type { MenuTarget, Operation } from '../core/operations.js';
import type { Runnable } from '../core/main-menu.js';
import type { MenuConsole } from '../core/menu-console.js';
import { SubMenu } from '../core/sub-menu.js';
import { param, t } from '../core/value-types.js';
import type { OutputSink } from '../ui/screen.js';

const left = param('left', t.float64());
const right = param('right', t.float64());
const dividend = param('dividend', t.decimal());
const divisor = param('divisor', t.decimal());
const values = param('values', t.array(t.float64()));

export const SHOW_HISTORY = 'Show history';

export class Calculator implements MenuTarget {
  readonly history: string[] = [];

  constructor(private readonly out: OutputSink) {}

  add(a: number, b: number): number {
    return this.record(`${a} + ${b}`, a + b);
  }

  multiply(a: number, b: number): number {
    return this.record(`${a} * ${b}`, a * b);
  }

  divide(a: Decimal, b: Decimal): Decimal {
    if (b.isZero()) {
      throw new RangeError('Division by zero');
    }
    const result = a.div(b);
    this.record(`${a.toString()} / ${b.toString()}`, result.toString());
    return result;
  }

  sum(numbers: readonly number[]): number {
    return this.record(`sum(${numbers.join(', ')})`, numbers.reduce((acc, n) => acc + n, 0));
  }

  clear(): void {
    this.history.length = 0;
  }

  getLastResult(): string | undefined {
    return this.history.at(-1);
  }

  printHistory(): void {
    for (const line of this.history) {
      this.out.write(`${line}\n`);
    }
  }

  describeOperations(): readonly Operation[] {
    return [
      defineOperation('add', [left, right], (args) => this.add(args.get(left), args.get(right))),
      defineOperation('multiply', [left, right], (args) =>
        this.multiply(args.get(left), args.get(right)),
      ),
      defineOperation('divide', [dividend, divisor], (args) =>
        this.divide(args.get(dividend), args.get(divisor)),
      ),
      defineOperation('sum', [values], (args) => this.sum(args.get(values))),
      defineOperation('clear', [], () => this.clear()),
      defineOperation('getLastResult', [], () => this.getLastResult()),
    ];
  }

  private record<T extends number | string>(expression: string, result: T): T {
    const line = `${expression} = ${result}`;
    this.history.push(line);
    this.out.write(`${line}\n`);
    return result;
  }
}

/** Calculator screen: loops its SubMenu until exit, answering "Show history" itself. */
export class CalculatorMenu implements Runnable {
  constructor(private readonly calculator: Calculator) {}

  async run(io: MenuConsole): Promise<void> {
    const menu = new SubMenu(this.calculator, {
      name: 'Calculator',
      console: io,
      customOptions: [SHOW_HISTORY],
      hiddenOptions: ['clear'],
    });

    while (true) {
      const selection = await menu.run(io);
      if (selection === menu.exitIndex) return;

      const resolved = menu.options.resolve(selection);
      if (resolved.kind === 'custom' && resolved.marker === SHOW_HISTORY) {
        this.calculator.printHistory();
      }
    }
  }
}
