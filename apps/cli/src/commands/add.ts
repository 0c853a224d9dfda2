import { Command } from 'commander';
import { Priority, parseDate } from '@dolist/core';
import type { GlobalOptions } from '../helpers.js';
import { openStore, parsePriorityArg, report, fail, $try } from '../helpers.js';

interface AddOptions extends GlobalOptions {
  due?: string;
  priority?: string;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description>', 'Task description')
    .option('-d, --due <date>', 'Due date: YYYY-MM-DD, today, tomorrow, +3d, +2w or a weekday (fri, friday)')
    .option('-p, --priority <level>', 'Priority: high, medium, low (or 1, 2, 3); anything else means medium')
    .action((description: string, _opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<AddOptions>();

      if (!description.trim()) {
        fail('Description cannot be empty!');
        return;
      }

      let dueDate: string | null = null;
      if (g.due != null) {
        dueDate = parseDate(g.due);
        if (dueDate == null) {
          fail(`Could not understand due date '${g.due}'`);
          return;
        }
      }

      const priority = parsePriorityArg(g.priority ?? '') ?? Priority.Medium;
      report(openStore(g.file).add(description, { dueDate, priority }));
    }));
}
