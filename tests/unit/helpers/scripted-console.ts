import type { MenuSettingsInput } from '../../../src/core/config.js';
import type { LineSource } from '../../../src/core/input-reader.js';
import { MenuConsole } from '../../../src/core/menu-console.js';
import type { OutputSink } from '../../../src/ui/screen.js';

/** Feeds fixed lines, then reports end of input. */
export class ScriptedLineSource implements LineSource {
  private readonly lines: string[];

  constructor(lines: readonly string[]) {
    this.lines = [...lines];
  }

  get remaining(): number {
    return this.lines.length;
  }

  async readLine(): Promise<string | null> {
    return this.lines.shift() ?? null;
  }
}

export class CapturedOutput implements OutputSink {
  text = '';

  constructor(readonly isTTY = false) {}

  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }

  get lines(): string[] {
    return this.text.split('\n');
  }
}

export function scriptedConsole(lines: readonly string[], settings: MenuSettingsInput = {}) {
  const source = new ScriptedLineSource(lines);
  const output = new CapturedOutput();
  const io = new MenuConsole({
    input: source,
    output,
    settings: { clearScreen: 'off', handleTitle: false, ...settings },
  });
  return { io, source, output };
}
