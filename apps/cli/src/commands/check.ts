import { Command } from 'commander';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { forEachId } from '../helpers.js';

function createCompletionCommand(
  ctx: CliContext,
  name: string,
  description: string,
  apply: (id: string) => string,
): Command {
  return new Command(name)
    .description(description)
    .argument('<taskIds...>', `The id(s) of the task(s) to ${name}`)
    .action((taskIds: string[]) => {
      const changed = forEachId(taskIds, id => out.success(apply(id)));
      if (changed > 0) ctx.save();
    });
}

export function createCheckCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'check', 'Check one or more tasks', (id) => {
    ctx.store.update(id, { completed: true });
    return `Checked task ${id}`;
  });
}

export function createUncheckCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'uncheck', 'Uncheck one or more tasks', (id) => {
    ctx.store.update(id, { completed: false });
    return `Unchecked task ${id}`;
  });
}

export function createToggleCommand(ctx: CliContext): Command {
  return createCompletionCommand(ctx, 'toggle', 'Flip the completion of one or more tasks', (id) => {
    const task = ctx.store.toggleCompleted(id);
    return `${task.completed ? 'Checked' : 'Unchecked'} task ${id}`;
  });
}
