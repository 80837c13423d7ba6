import { Screen, SEPARATOR, frameTitle } from '../../src/ui/screen.js';
import { CapturedOutput } from './helpers/scripted-console.js';

describe('frameTitle', () => {
  it('should centre the name in a frame of the default size', () => {
    const lines = frameTitle('Menu', 22, 7);

    expect(lines).toHaveLength(10);
    expect(lines[0]).toBe('='.repeat(26));
    expect(lines[1]).toBe(`|${' '.repeat(24)}|`);
    expect(lines[4]).toBe(`|${' '.repeat(10)}Menu${' '.repeat(10)}|`);
    expect(lines[9]).toBe('='.repeat(26));
  });

  it('should round an odd width up and put the extra space after the name', () => {
    expect(frameTitle('abc', 4, 2)).toEqual([
      '========',
      '|      |',
      '| abc  |',
      '|      |',
      '========',
    ]);
  });
});

describe('Screen', () => {
  it('should write lines with a trailing newline', () => {
    const output = new CapturedOutput();
    const screen = new Screen(output, 'off');

    screen.print('a');
    screen.println('b');
    screen.println();

    expect(output.text).toBe('ab\n\n');
    expect(SEPARATOR).toBe('==========================');
  });

  it('should clear with ANSI sequences on a terminal in auto mode', () => {
    const output = new CapturedOutput(true);
    new Screen(output, 'auto').clear();

    expect(output.text).toBe('\x1b[H\x1b[2J');
  });

  it('should fall back to blank lines when the sink is not a terminal', () => {
    const output = new CapturedOutput(false);
    new Screen(output, 'auto').clear();

    expect(output.text).toBe('\n\n\n\n\n\n');
  });

  it('should honour forced modes', () => {
    const ansi = new CapturedOutput(false);
    const newlines = new CapturedOutput(true);
    const off = new CapturedOutput(true);

    new Screen(ansi, 'ansi').clear();
    new Screen(newlines, 'newlines').clear();
    new Screen(off, 'off').clear();

    expect(ansi.text).toBe('\x1b[H\x1b[2J');
    expect(newlines.text).toBe('\n'.repeat(6));
    expect(off.text).toBe('');
  });
});
