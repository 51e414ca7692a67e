#!/usr/bin/env node
/**
 * dockerd-pull CLI
 */

import { Command } from 'commander';
import { VERSION } from '../version';
import { pullCommand } from './commands/pull';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dockerd-pull')
    .description('Trigger image pulls on a docker daemon')
    .version(VERSION);

  program.addCommand(pullCommand());

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync()
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
