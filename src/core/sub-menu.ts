import { logger } from '../ui/logger.js';
import { SEPARATOR } from '../ui/screen.js';
import { InputClosedError, InvocationError } from '../utils/errors.js';
import { ConstructorRegistry } from './constructor-registry.js';
import { getDefaultConsole } from './menu-console.js';
import type { MenuConsole } from './menu-console.js';
import { MenuOptionSet } from './menu-option-set.js';
import type { MenuTarget, Operation } from './operations.js';
import { ParameterCollector } from './parameter-collector.js';
import { ValueBuilder } from './value-builder.js';
import type { ArgumentList } from './value-types.js';

export interface SubMenuOptions {
  name?: string;
  customOptions?: readonly string[];
  hiddenOptions?: readonly string[];
  handleTitle?: boolean;
  width?: number;
  height?: number;
  console?: MenuConsole;
  registry?: ConstructorRegistry;
}

/**
 * One screen of a target's operations. Each run() shows the options once,
 * acts on the selection and returns it; the caller decides whether to loop
 * and handles selections that land on custom options.
 */
export class SubMenu {
  name: string;
  handleTitle: boolean;
  width: number;
  height: number;
  readonly options: MenuOptionSet;
  readonly registry: ConstructorRegistry;
  private readonly io: MenuConsole | undefined;

  constructor(target: MenuTarget, options: SubMenuOptions = {}) {
    this.name = options.name ?? 'SubMenu';
    this.io = options.console;
    this.handleTitle = options.handleTitle ?? this.io?.settings.handleTitle ?? true;
    this.width = options.width ?? this.io?.settings.titleWidth ?? 22;
    this.height = options.height ?? this.io?.settings.titleHeight ?? 7;
    this.registry = options.registry ?? new ConstructorRegistry();
    this.options = new MenuOptionSet(target, {
      customOptions: options.customOptions,
      hiddenNames: options.hiddenOptions,
    });
  }

  get exitIndex(): number {
    return this.options.exitIndex;
  }

  bind(target: MenuTarget, hiddenOptions?: readonly string[]): void {
    this.options.bind(target, hiddenOptions);
  }

  setCustomOptions(names: readonly string[]): void {
    this.options.setCustomOptions(names);
  }

  async run(io: MenuConsole = this.io ?? getDefaultConsole()): Promise<number> {
    this.printOptions(io);

    const selection = await io.prompt.promptInt32(io.messages.selectOption, false);
    io.screen.clear();

    const resolved = this.options.resolve(selection);
    switch (resolved.kind) {
      case 'exit':
        io.println(io.messages.closing);
        break;
      case 'operation':
        await this.dispatch(resolved.operation, io);
        break;
      case 'custom':
        // Left to the caller, which branches on the returned index.
        break;
      case 'invalid':
        io.println(io.messages.invalidOption);
        break;
    }
    return selection;
  }

  /**
   * Walk the operation's parameters with the step-back protocol and return
   * the collected arguments in declaration order.
   */
  async askParameters(operation: Operation, io: MenuConsole): Promise<ArgumentList> {
    const { messages, prompt } = io;
    const builder = new ValueBuilder(io, this.registry);
    const collector = new ParameterCollector(operation.parameters);

    while (true) {
      const parameter = collector.current;
      if (!parameter) {
        return collector.toArgumentList();
      }

      io.println(SEPARATOR);
      io.println(messages.argumentNumber(collector.position + 1));
      io.println(SEPARATOR);
      io.println(messages.autoFillHeading);
      io.println(messages.keepEntering);
      io.println(messages.stepBack);
      io.println(SEPARATOR);

      const choice = await prompt.promptInt32(messages.selectOption, false);
      if (choice === 1) {
        const answer = await prompt.promptLine(messages.cancelPrompt, false);
        if (answer === messages.cancelKeyword) {
          io.println(messages.undoing);
          collector.stepBack();
          continue;
        }
        collector.fill(await builder.buildValue(parameter.type, parameter.name));
      } else if (choice === 2) {
        io.println(messages.steppingBack);
        collector.stepBack();
      } else {
        io.println(messages.invalidChoiceRetry);
      }
    }
  }

  private printOptions(io: MenuConsole): void {
    if (this.handleTitle) {
      io.screen.printTitle(this.name, this.width, this.height);
    }
    for (const entry of this.options.entries()) {
      io.println(`${entry.index}- ${entry.label}.`);
    }
    io.println(`${this.options.exitIndex}- ${io.messages.exitLabel}.`);
    io.println(SEPARATOR);
  }

  private async dispatch(operation: Operation, io: MenuConsole): Promise<void> {
    try {
      const args = await this.askParameters(operation, io);
      await invoke(operation, args);
    } catch (error) {
      if (error instanceof InputClosedError) throw error;
      logger.failure(`${this.name}: ${operation.name}`, error);
      io.println(io.messages.somethingWentWrong);
    }
  }
}

async function invoke(operation: Operation, args: ArgumentList): Promise<void> {
  try {
    await operation.invoke(args);
  } catch (error) {
    if (error instanceof InputClosedError) throw error;
    throw new InvocationError(operation.name, error);
  }
}
