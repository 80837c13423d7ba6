import type { ClearScreenMode } from '../core/config.js';

export interface OutputSink {
  write(text: string): unknown;
  readonly isTTY?: boolean;
}

export const SEPARATOR = '='.repeat(26);

const ANSI_CLEAR = '\x1b[H\x1b[2J';
const CLEAR_FALLBACK = '\n'.repeat(6);

/**
 * Build the framed title block. The frame is `width + name.length` wide,
 * rounded up to an even number, with the name centred vertically among
 * `height` blank rows.
 */
export function frameTitle(name: string, width: number, height: number): string[] {
  let total = width + name.length;
  if (total % 2 !== 0) total++;

  const border = '='.repeat(total);
  const blank = '|' + ' '.repeat(Math.max(0, total - 2)) + '|';
  const centerY = Math.floor(height / 2);
  const free = Math.max(0, total - name.length - 2);
  const padding = Math.floor(free / 2);
  const centred = '|' + ' '.repeat(padding) + name + ' '.repeat(padding + (free % 2)) + '|';

  const lines = [border];
  for (let y = 0; y < height; y++) {
    if (y === centerY) lines.push(centred);
    lines.push(blank);
  }
  lines.push(border);
  return lines;
}

export class Screen {
  constructor(
    private readonly sink: OutputSink,
    private readonly clearMode: ClearScreenMode,
  ) {}

  print(text: string): void {
    this.sink.write(text);
  }

  println(text = ''): void {
    this.sink.write(text + '\n');
  }

  printTitle(name: string, width: number, height: number): void {
    for (const line of frameTitle(name, width, height)) {
      this.println(line);
    }
  }

  clear(): void {
    switch (this.clearMode) {
      case 'off':
        return;
      case 'ansi':
        this.sink.write(ANSI_CLEAR);
        return;
      case 'newlines':
        this.sink.write(CLEAR_FALLBACK);
        return;
      case 'auto':
        this.sink.write(this.sink.isTTY ? ANSI_CLEAR : CLEAR_FALLBACK);
        return;
    }
  }
}
