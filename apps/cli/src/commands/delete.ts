import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { forEachId } from '../helpers.js';

export function createDeleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[]) => {
      const deleted = forEachId(taskIds, (id) => {
        ctx.store.remove(id);
        out.success(`Deleted task ${id}`);
      });
      if (deleted > 0) ctx.save();
    });
}
