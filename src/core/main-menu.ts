import { logger } from '../ui/logger.js';
import { SEPARATOR } from '../ui/screen.js';
import {
  CardinalityMismatchError,
  DuplicateLabelError,
  InputClosedError,
  OptionIndexError,
} from '../utils/errors.js';
import { getDefaultConsole } from './menu-console.js';
import type { MenuConsole } from './menu-console.js';

/** Anything the main menu can hand the console to, usually a loop around a SubMenu. */
export interface Runnable {
  run(io: MenuConsole): unknown;
}

export interface MainMenuOptions {
  name?: string;
  pattern?: string;
  handleTitle?: boolean;
  width?: number;
  height?: number;
  console?: MenuConsole;
}

interface MainMenuEntry {
  target: Runnable;
  label?: string;
}

/**
 * Top-level menu over an ordered list of runnables. Entries are shown in the
 * order they were given, labelled `<pattern><n>` until renamed.
 */
export class MainMenu {
  name: string;
  pattern: string;
  handleTitle: boolean;
  width: number;
  height: number;
  private entries: MainMenuEntry[] = [];
  private readonly io: MenuConsole | undefined;

  constructor(targets: readonly Runnable[], options: MainMenuOptions = {}) {
    this.name = options.name ?? 'Main menu';
    this.pattern = options.pattern ?? 'Option ';
    this.io = options.console;
    this.handleTitle = options.handleTitle ?? this.io?.settings.handleTitle ?? true;
    this.width = options.width ?? this.io?.settings.titleWidth ?? 22;
    this.height = options.height ?? this.io?.settings.titleHeight ?? 7;
    this.setTargets(targets);
  }

  get count(): number {
    return this.entries.length;
  }

  get exitIndex(): number {
    return this.count + 1;
  }

  get labels(): string[] {
    return this.entries.map((entry, i) => entry.label ?? `${this.pattern}${i + 1}`);
  }

  /** Replace every entry; custom labels are dropped. */
  setTargets(targets: readonly Runnable[]): void {
    this.entries = targets.map((target) => ({ target }));
  }

  renameOption(index: number, name: string): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.entries.length) {
      throw new OptionIndexError(index, this.entries.length);
    }
    const labels = this.labels;
    if (labels.some((label, i) => i !== index && label === name)) {
      throw new DuplicateLabelError(name);
    }
    this.entries[index] = { ...this.entries[index], label: name };
  }

  renameOptions(names: readonly string[]): void {
    if (names.length !== this.entries.length) {
      throw new CardinalityMismatchError(this.entries.length, names.length);
    }
    if (new Set(names).size !== names.length) {
      const duplicate = names.find((name, i) => names.indexOf(name) !== i) ?? '';
      throw new DuplicateLabelError(duplicate);
    }
    this.entries = this.entries.map((entry, i) => ({ target: entry.target, label: names[i] }));
  }

  async run(io: MenuConsole = this.io ?? getDefaultConsole()): Promise<number> {
    while (true) {
      this.printOptions(io);
      const selection = await io.prompt.promptInt32(io.messages.selectOption, false);
      io.screen.clear();

      if (selection > 0 && selection < this.exitIndex) {
        await this.runEntry(selection - 1, io);
      } else if (selection === this.exitIndex) {
        io.println(io.messages.closing);
        return 0;
      } else {
        io.println(io.messages.invalidOption);
      }
    }
  }

  private printOptions(io: MenuConsole): void {
    if (this.handleTitle) {
      io.screen.printTitle(this.name, this.width, this.height);
    }
    this.labels.forEach((label, i) => {
      io.println(`${i + 1}- ${label}.`);
    });
    io.println(`${this.exitIndex}- ${io.messages.exitLabel}.`);
    io.println(SEPARATOR);
  }

  private async runEntry(index: number, io: MenuConsole): Promise<void> {
    const entry = this.entries[index];
    try {
      await entry.target.run(io);
    } catch (error) {
      if (error instanceof InputClosedError) throw error;
      logger.failure(`${this.name}: ${this.labels[index]}`, error);
      io.println(io.messages.somethingWentWrong);
    }
  }
}
