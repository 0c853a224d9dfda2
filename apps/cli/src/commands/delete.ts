import { Command } from 'commander';
import type { GlobalOptions } from '../helpers.js';
import { openStore, parsePosition, report, fail, $try } from '../helpers.js';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete a task. Tasks after it move up one number.')
    .argument('<number>', 'Task number as shown by list')
    .action((raw: string, _opts: unknown, cmd: Command) => $try(() => {
      const position = parsePosition(raw);
      if (position == null) {
        fail('Invalid task number!');
        return;
      }

      const g = cmd.optsWithGlobals<GlobalOptions>();
      report(openStore(g.file).delete(position));
    }));
}
