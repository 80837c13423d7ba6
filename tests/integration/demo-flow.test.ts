import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { demoCommand } from '../../src/commands/demo.js';
import { logger } from '../../src/ui/logger.js';
import { InvocationError } from '../../src/utils/errors.js';
import { CapturedOutput, ScriptedLineSource } from '../unit/helpers/scripted-console.js';

vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    failure: vi.fn(),
  },
}));

describe('demo flow', () => {
  let tempDir: string;
  let config: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await mkdtemp(join(tmpdir(), 'ascii-menus-demo-'));
    config = join(tempDir, 'ascii-menus.json');
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should add numbers, survive a failing division and print the history', async () => {
    const output = new CapturedOutput();
    const input = new ScriptedLineSource([
      '1',
      '1', '1', 'ok', '2', 'y', '1', 'ok', '3', 'y',
      '2', '1', 'ok', '1', 'y', '1', 'ok', '0', 'y',
      '5',
      '6',
      '3',
    ]);

    await demoCommand({ config, locale: 'en', input, output });

    expect(input.remaining).toBe(0);
    expect(output.lines.filter((line) => line === '2 + 3 = 5')).toHaveLength(2);
    expect(output.lines).toContain('Something went wrong...');
    expect(output.lines.filter((line) => line === 'Closing the program.')).toHaveLength(2);
    expect(logger.failure).toHaveBeenCalledTimes(1);
    const [context, error] = vi.mocked(logger.failure).mock.calls[0];
    expect(context).toBe('Calculator: divide');
    expect(error).toBeInstanceOf(InvocationError);
  });

  it('should build contacts through their registered constructor', async () => {
    const output = new CapturedOutput();
    const input = new ScriptedLineSource([
      '2',
      '1', '1', 'ok', 'Ada Lovelace', 'y', '555-0100', 'y', '36', 'y',
      '4',
      '3', '1', 'ok', 'Nobody', 'y',
      '5',
      '3',
    ]);

    await demoCommand({ config, locale: 'en', input, output });

    expect(input.remaining).toBe(0);
    expect(output.lines).toContain('Creating instance of custom type: Contact');
    expect(output.lines).toContain('Added Ada Lovelace <555-0100> (36)');
    expect(output.lines).toContain('1. Ada Lovelace <555-0100> (36)');
    expect(output.lines).toContain('No contact named Nobody');
  });

  it('should show the main menu with renamed entries and the configured title', async () => {
    await writeFile(config, JSON.stringify({ titleWidth: 4, titleHeight: 1, clearScreen: 'off' }));
    const output = new CapturedOutput();

    await demoCommand({ config, input: new ScriptedLineSource(['3']), output });

    expect(output.lines.slice(0, 8)).toEqual([
      '='.repeat(16),
      '| ascii-menus  |',
      `|${' '.repeat(14)}|`,
      '='.repeat(16),
      '1- Calculator.',
      '2- Address book.',
      '3- Salir.',
      '==========================',
    ]);
  });

  it('should return quietly when input ends inside a menu', async () => {
    const output = new CapturedOutput();

    await expect(
      demoCommand({ config, input: new ScriptedLineSource(['1']), output }),
    ).resolves.toBeUndefined();
    expect(logger.failure).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it('should refuse an unknown locale', async () => {
    await demoCommand({ config, locale: 'fr', input: new ScriptedLineSource([]) });

    expect(logger.error).toHaveBeenCalledWith('Unsupported locale: fr (expected es or en)');
    expect(process.exitCode).toBe(1);
  });

  it('should report an invalid settings file', async () => {
    await writeFile(config, JSON.stringify({ titleWidth: 'wide' }));

    await demoCommand({ config, input: new ScriptedLineSource([]) });

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBe(1);
  });
});
