#!/usr/bin/env node
/**
 * lfr: generate LFR benchmark or scale-free networks from the command line.
 */
import chalk from 'chalk';
import { createProgram, describeError } from './program';

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(describeError(err)));
  process.exitCode = 1;
});
