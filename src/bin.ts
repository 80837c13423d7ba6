#!/usr/bin/env node
import { program } from './cli.js';
import { closeDefaultConsole } from './core/menu-console.js';
import { logger } from './ui/logger.js';

program
  .parseAsync()
  .catch((error: unknown) => {
    logger.failure('ascii-menus', error);
    process.exitCode = 1;
  })
  .finally(closeDefaultConsole);
