import { Command } from 'commander';
import { STORAGE_FILE_ENV } from '@dolist/core';
import type { GlobalOptions } from './helpers.js';
import { openStore, $try } from './helpers.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand, printTasks } from './commands/list.js';
import { createCheckCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';

export const VERSION = '1.0.0';

/** Build the CLI program */
export function createProgram(): Command {
  const program = new Command()
    .name('dolist')
    .description('Personal task tracker')
    .version(VERSION)
    .allowExcessArguments(false)
    .option('-f, --file <path>', `Tasks file (default: $${STORAGE_FILE_ENV} or the platform data directory)`);

  program.addCommand(createAddCommand());
  program.addCommand(createListCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createDeleteCommand());

  // Default action (no command): show open tasks
  program.action((_opts: unknown, cmd: Command) => $try(() => {
    const g = cmd.optsWithGlobals<GlobalOptions>();
    printTasks(openStore(g.file));
  }));

  return program;
}
