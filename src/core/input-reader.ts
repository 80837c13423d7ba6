import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';

import { InputClosedError } from '../utils/errors.js';

export interface LineSource {
  /** Resolves with the next line (without its terminator), or null at end of input. */
  readLine(): Promise<string | null>;
}

/**
 * Line source over a readable stream. Lines are queued by the iterator as they
 * arrive, so piped input that lands before a prompt is not lost.
 */
export class ReadlineLineSource implements LineSource {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream = process.stdin) {
    this.rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string | null> {
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

const LEADING_TOKEN = /^\s*(\S+)/;

/**
 * Token and line reader with a one-line buffer: a token read leaves the rest
 * of its line pending until it is consumed by nextLine() or dropped by
 * discardLine().
 */
export class InputReader {
  private pending: string | null = null;

  constructor(private readonly source: LineSource) {}

  async nextToken(): Promise<string> {
    while (true) {
      if (this.pending !== null) {
        const match = LEADING_TOKEN.exec(this.pending);
        if (match) {
          this.pending = this.pending.slice(match[0].length);
          return match[1];
        }
        this.pending = null;
      }
      this.pending = await this.readRaw();
    }
  }

  async nextLine(): Promise<string> {
    if (this.pending !== null) {
      const rest = this.pending;
      this.pending = null;
      return rest;
    }
    return this.readRaw();
  }

  discardLine(): void {
    this.pending = null;
  }

  get hasPendingInput(): boolean {
    return this.pending !== null;
  }

  private async readRaw(): Promise<string> {
    const line = await this.source.readLine();
    if (line === null) {
      throw new InputClosedError();
    }
    return line;
  }
}
