import chalk from 'chalk';

import { formatErrorDetail } from '../utils/errors.js';

export const logger = {
  info(msg: string) {
    console.log(chalk.blue('ℹ'), msg);
  },

  warn(msg: string) {
    console.log(chalk.yellow('⚠'), msg);
  },

  error(msg: string) {
    console.error(chalk.red('✖'), msg);
  },

  debug(msg: string) {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  failure(context: string, error: unknown) {
    console.error(chalk.red('✖'), chalk.bold(context));
    console.error(chalk.dim(formatErrorDetail(error)));
  },
};
