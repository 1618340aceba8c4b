import { Command } from 'commander';
import { registerRunCommand } from './commands/run.js';
import { registerValidateCommand } from './commands/validate.js';

export const VERSION = '1.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cachesim')
    .description('Multi-level inclusive write-back cache hierarchy simulator')
    .version(VERSION);

  registerRunCommand(program);
  registerValidateCommand(program);

  return program;
}
