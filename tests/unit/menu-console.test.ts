import { InputReader } from '../../src/core/input-reader.js';
import { MenuConsole } from '../../src/core/menu-console.js';
import { InvalidSettingsError } from '../../src/utils/errors.js';
import { CapturedOutput, ScriptedLineSource } from './helpers/scripted-console.js';

describe('MenuConsole', () => {
  it('should reuse an InputReader it is given', () => {
    const reader = new InputReader(new ScriptedLineSource([]));
    const io = new MenuConsole({ input: reader, output: new CapturedOutput() });

    expect(io.reader).toBe(reader);
  });

  it('should pick the message catalog of the configured locale', () => {
    const source = new ScriptedLineSource([]);

    expect(new MenuConsole({ input: source }).messages.exitLabel).toBe('Salir');
    expect(
      new MenuConsole({ input: source, settings: { locale: 'en' } }).messages.exitLabel,
    ).toBe('Exit');
  });

  it('should write through its screen', () => {
    const output = new CapturedOutput();
    const io = new MenuConsole({ input: new ScriptedLineSource([]), output });

    io.print('> ');
    io.println('done');

    expect(output.text).toBe('> done\n');
  });

  it('should reject invalid settings', () => {
    expect(
      () => new MenuConsole({ input: new ScriptedLineSource([]), settings: { titleHeight: 1.5 } }),
    ).toThrow(InvalidSettingsError);
  });
});
