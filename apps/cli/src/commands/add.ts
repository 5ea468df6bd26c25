import { Command } from 'commander';
import { QuadrantName, quadrantOf, parseDueInput } from '@eisen/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

interface AddOptions {
  urgent?: boolean;
  important?: boolean;
  tag?: string[];
  due?: string;
  notes?: string;
}

export function createAddCommand(ctx: CliContext): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title...>', 'Task title')
    .option('-u, --urgent', 'Mark as urgent')
    .option('-i, --important', 'Mark as important')
    .option('-t, --tag <tags...>', 'Tags, with or without #')
    .option('-d, --due <date>', 'Due date (today, tomorrow, +3d, fri, jan15, yyyy-MM-dd)')
    .option('-n, --notes <text>', 'Free-form notes')
    .action((words: string[], opts: AddOptions) => $try(() => {
      const task = ctx.store.add({
        title: words.join(' '),
        urgent: opts.urgent ?? false,
        important: opts.important ?? false,
        tags: opts.tag ?? [],
        dueDate: opts.due !== undefined ? parseDueInput(opts.due, ctx.now()) : null,
        notes: opts.notes ?? null,
      });
      ctx.save();

      out.success(`Task ${task.id} saved to ${QuadrantName[quadrantOf(task)]}`);
    }));
}
