import type { Decimal } from 'decimal.js';

import type { Messages } from '../ui/messages.js';
import type { Screen } from '../ui/screen.js';
import { ParseError } from '../utils/errors.js';
import type { InputReader } from './input-reader.js';
import { SCALAR_PARSERS, readsWholeLine } from './parsers.js';
import type { ScalarKind, ScalarParser, ScalarValues } from './parsers.js';

export type ReadMode = 'token' | 'line';

/**
 * Typed console prompts. Every variant retries on malformed input and, when
 * asked to, echoes the value back for a yes/no confirmation before returning.
 */
export class ScalarPrompt {
  constructor(
    private readonly reader: InputReader,
    private readonly screen: Screen,
    private readonly messages: Messages,
  ) {}

  async prompt<T>(
    text: string,
    parse: ScalarParser<T>,
    confirm: boolean,
    mode: ReadMode = 'token',
  ): Promise<T> {
    while (true) {
      this.screen.print(text);
      try {
        const raw = mode === 'line' ? await this.reader.nextLine() : await this.readToken();
        const value = parse(raw);
        if (!confirm || (await this.askConfirmation(value))) {
          return value;
        }
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.screen.println(this.messages.invalidValue);
        this.reader.discardLine();
      }
    }
  }

  promptScalar<K extends ScalarKind>(
    kind: K,
    text: string,
    confirm: boolean,
  ): Promise<ScalarValues[K]> {
    return this.prompt(text, SCALAR_PARSERS[kind], confirm, readsWholeLine(kind) ? 'line' : 'token');
  }

  async askSomething(message: string, affirmative: string): Promise<boolean> {
    this.screen.println(message);
    let option = '';
    while (option.length === 0) {
      option = (await this.reader.nextLine()).toLowerCase();
    }
    return option.charAt(0) === affirmative.toLowerCase();
  }

  askConfirmation(value?: unknown): Promise<boolean> {
    const message =
      value === undefined ? this.messages.confirm : this.messages.confirmValue(String(value));
    return this.askSomething(message, this.messages.affirmative);
  }

  promptToken(text: string, confirm: boolean): Promise<string> {
    return this.promptScalar('token', text, confirm);
  }

  promptLine(text: string, confirm: boolean): Promise<string> {
    return this.promptScalar('line', text, confirm);
  }

  promptInt8(text: string, confirm: boolean): Promise<number> {
    return this.promptScalar('int8', text, confirm);
  }

  promptInt16(text: string, confirm: boolean): Promise<number> {
    return this.promptScalar('int16', text, confirm);
  }

  promptInt32(text: string, confirm: boolean): Promise<number> {
    return this.promptScalar('int32', text, confirm);
  }

  promptInt64(text: string, confirm: boolean): Promise<bigint> {
    return this.promptScalar('int64', text, confirm);
  }

  promptFloat32(text: string, confirm: boolean): Promise<number> {
    return this.promptScalar('float32', text, confirm);
  }

  promptFloat64(text: string, confirm: boolean): Promise<number> {
    return this.promptScalar('float64', text, confirm);
  }

  promptBoolean(text: string, confirm: boolean): Promise<boolean> {
    return this.promptScalar('boolean', text, confirm);
  }

  promptBigInt(text: string, confirm: boolean): Promise<bigint> {
    return this.promptScalar('bigint', text, confirm);
  }

  promptDecimal(text: string, confirm: boolean): Promise<Decimal> {
    return this.promptScalar('decimal', text, confirm);
  }

  private async readToken(): Promise<string> {
    const token = await this.reader.nextToken();
    this.reader.discardLine();
    return token;
  }
}
