import { resolve } from 'node:path';

import { loadMenuSettings } from '../core/config.js';
import type { MenuSettingsInput } from '../core/config.js';
import type { LineSource } from '../core/input-reader.js';
import { MainMenu } from '../core/main-menu.js';
import { MenuConsole } from '../core/menu-console.js';
import { AddressBook, AddressBookMenu } from '../demo/address-book.js';
import { Calculator, CalculatorMenu } from '../demo/calculator.js';
import { logger } from '../ui/logger.js';
import type { OutputSink } from '../ui/screen.js';
import { InputClosedError, InvalidSettingsError } from '../utils/errors.js';
import { fileExists } from '../utils/fs.js';

export interface DemoOptions {
  config?: string;
  locale?: string;
  /** Terminal stand-ins; stdin and stdout when omitted. */
  input?: LineSource;
  output?: OutputSink;
}

const DEFAULT_CONFIG_FILE = 'ascii-menus.json';

export async function demoCommand(options: DemoOptions = {}): Promise<void> {
  const configPath = resolve(options.config ?? DEFAULT_CONFIG_FILE);
  const overrides: MenuSettingsInput = {};
  if (options.locale === 'es' || options.locale === 'en') {
    overrides.locale = options.locale;
  } else if (options.locale !== undefined) {
    logger.error(`Unsupported locale: ${options.locale} (expected es or en)`);
    process.exitCode = 1;
    return;
  }

  if (await fileExists(configPath)) {
    logger.info(`Using settings from ${configPath}`);
  } else if (options.config !== undefined) {
    logger.warn(`Settings file ${configPath} not found, using defaults`);
  }

  let io: MenuConsole;
  try {
    const settings = await loadMenuSettings(configPath, overrides);
    io = new MenuConsole({ input: options.input, output: options.output, settings });
  } catch (error) {
    if (!(error instanceof InvalidSettingsError)) throw error;
    logger.error(error.message);
    process.exitCode = 1;
    return;
  }

  logger.debug(`Menu settings: ${JSON.stringify(io.settings)}`);

  const menu = new MainMenu(
    [new CalculatorMenu(new Calculator(io.sink)), new AddressBookMenu(new AddressBook(io.sink))],
    { name: 'ascii-menus', console: io },
  );
  menu.renameOptions(['Calculator', 'Address book']);

  try {
    await menu.run(io);
  } catch (error) {
    if (!(error instanceof InputClosedError)) throw error;
    logger.debug('Input closed, leaving the menus');
  } finally {
    io.close();
  }
}
