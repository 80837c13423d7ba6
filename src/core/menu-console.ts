import { getMessages } from '../ui/messages.js';
import type { Messages } from '../ui/messages.js';
import { Screen } from '../ui/screen.js';
import type { OutputSink } from '../ui/screen.js';
import { resolveMenuSettings } from './config.js';
import type { MenuSettings, MenuSettingsInput } from './config.js';
import { InputReader, ReadlineLineSource } from './input-reader.js';
import type { LineSource } from './input-reader.js';
import { ScalarPrompt } from './scalar-prompt.js';

export interface MenuConsoleOptions {
  input?: LineSource | InputReader;
  output?: OutputSink;
  settings?: MenuSettingsInput;
}

/** The terminal a menu talks to: one input reader, one output sink, one locale. */
export class MenuConsole {
  readonly reader: InputReader;
  readonly sink: OutputSink;
  readonly settings: MenuSettings;
  readonly messages: Messages;
  readonly screen: Screen;
  readonly prompt: ScalarPrompt;
  private readonly ownedSource: ReadlineLineSource | null;

  constructor(options: MenuConsoleOptions = {}) {
    let input: LineSource | InputReader;
    if (options.input) {
      input = options.input;
      this.ownedSource = null;
    } else {
      this.ownedSource = new ReadlineLineSource(process.stdin);
      input = this.ownedSource;
    }
    this.reader = input instanceof InputReader ? input : new InputReader(input);
    this.sink = options.output ?? process.stdout;
    this.settings = resolveMenuSettings(options.settings);
    this.messages = getMessages(this.settings.locale);
    this.screen = new Screen(this.sink, this.settings.clearScreen);
    this.prompt = new ScalarPrompt(this.reader, this.screen, this.messages);
  }

  print(text: string): void {
    this.screen.print(text);
  }

  println(text = ''): void {
    this.screen.println(text);
  }

  /** Close the stdin reader this console opened itself, if any. */
  close(): void {
    this.ownedSource?.close();
  }
}

let defaultConsole: MenuConsole | null = null;

export function getDefaultConsole(): MenuConsole {
  defaultConsole ??= new MenuConsole();
  return defaultConsole;
}

/** Release stdin so the process can exit once the menus are done. */
export function closeDefaultConsole(): void {
  defaultConsole?.close();
  defaultConsole = null;
}
