import { Command } from 'commander';
import { QUERYMIX_VERSION } from '@querymix/core';
import { registerInspectCommand } from './commands/inspect.js';
import { registerSampleCommand } from './commands/sample.js';
import { registerImportCommand } from './commands/import-cmd.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('querymix')
    .description('querymix: weighted SQL query selection for stress runs')
    .version(QUERYMIX_VERSION);

  registerInspectCommand(program);
  registerSampleCommand(program);
  registerImportCommand(program);

  return program;
}
