import { Command } from 'commander';
import type { TaskStore, ListOptions } from '@dolist/core';
import * as out from '../output.js';
import type { GlobalOptions } from '../helpers.js';
import { openStore, parsePriorityArg, fail, $try } from '../helpers.js';

const TITLE = '--- To-Do List ---';

interface ListCommandOptions extends GlobalOptions {
  completed?: boolean;
  priority?: string;
}

/** Print the numbered list. Numbers are positions, the ones check/delete take. */
export function printTasks(store: TaskStore, options: ListOptions = {}): void {
  out.heading(TITLE);

  if (store.size === 0) {
    out.info('No tasks found. Add some tasks to get started!');
    return;
  }

  for (const entry of store.list(options)) {
    out.info(out.formatListedTask(entry));
  }
  out.rule(TITLE.length);
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks (open ones only, unless --completed)')
    .option('-c, --completed', 'Include completed tasks')
    .option('-p, --priority <level>', 'Only tasks with this priority (high, medium, low)')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const g = cmd.optsWithGlobals<ListCommandOptions>();

      const options: ListOptions = { showCompleted: g.completed ?? false };
      if (g.priority != null) {
        const priority = parsePriorityArg(g.priority);
        if (priority == null) {
          fail(`Unknown priority '${g.priority}'. Use high, medium or low`);
          return;
        }
        options.priority = priority;
      }

      printTasks(openStore(g.file), options);
    }));
}
