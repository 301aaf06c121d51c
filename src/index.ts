#!/usr/bin/env node

import chalk from 'chalk';
import { errorMessage } from './errors.js';
import { main } from './main.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(chalk.red(`ERROR - ${errorMessage(error)}`));
    process.exitCode = 1;
  },
);
