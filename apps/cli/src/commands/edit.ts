import { Command } from 'commander';
import { parseDueInput } from '@eisen/core';
import type { TaskUpdate } from '@eisen/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseNotesArg, $try } from '../helpers.js';

interface EditOptions {
  title?: string;
  urgent?: boolean;
  important?: boolean;
  tag?: string[];
  due?: string;
  notes?: string;
}

export function createEditCommand(ctx: CliContext): Command {
  return new Command('edit')
    .description('Change fields of a task')
    .argument('<taskId>', 'The id of the task to edit')
    .option('--title <title>', 'New title')
    .option('-u, --urgent', 'Mark as urgent')
    .option('--no-urgent', 'Mark as not urgent')
    .option('-i, --important', 'Mark as important')
    .option('--no-important', 'Mark as not important')
    .option('-t, --tag <tags...>', 'Replace the tags')
    .option('-d, --due <date>', 'New due date, or "clear"')
    .option('-n, --notes <text>', 'New notes, or "clear"')
    .action((taskId: string, opts: EditOptions) => $try(() => {
      const fields: TaskUpdate = {};
      if (opts.title !== undefined) fields.title = opts.title;
      if (opts.urgent !== undefined) fields.urgent = opts.urgent;
      if (opts.important !== undefined) fields.important = opts.important;
      if (opts.tag !== undefined) fields.tags = opts.tag;
      if (opts.due !== undefined) fields.dueDate = parseDueInput(opts.due, ctx.now());
      if (opts.notes !== undefined) fields.notes = parseNotesArg(opts.notes);

      if (Object.keys(fields).length === 0) {
        out.warning('Nothing to change. See edit --help for the available options');
        return;
      }

      ctx.store.update(taskId, fields);
      ctx.save();
      out.success(`Task ${taskId} updated`);
    }));
}
