import { Command } from 'commander';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string; description: string };

export const program = new Command()
  .name('ascii-menus')
  .description(pkg.description)
  .version(pkg.version);

program
  .command('demo')
  .description('Run the sample main menu over a calculator and an address book')
  .option('-c, --config <file>', 'Menu settings JSON file (default: ascii-menus.json)')
  .option('-l, --locale <locale>', 'Message language (es or en)')
  .action(async (options: { config?: string; locale?: string }) => {
    const { demoCommand } = await import('./commands/demo.js');
    await demoCommand(options);
  });
