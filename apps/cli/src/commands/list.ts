import { Command } from 'commander';
import { QUADRANT_ORDER, getHideCompleted } from '@eisen/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { parseQuadrantArg, $try } from '../helpers.js';

interface ListOptions {
  tag?: string;
  hideCompleted?: boolean;
  showCompleted?: boolean;
}

export function createListCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('Show the matrix, or one quadrant')
    .argument('[quadrant]', 'q1-q4, do-first, schedule, delegate or eliminate')
    .option('--tag <tag>', 'Only tasks with this tag')
    .option('--hide-completed', 'Hide completed tasks')
    .option('--show-completed', 'Show completed tasks even if hidden by config')
    .action((quadrantArg: string | undefined, opts: ListOptions) => $try(() => {
      const quadrants = quadrantArg !== undefined ? [parseQuadrantArg(quadrantArg)] : QUADRANT_ORDER;

      if (ctx.store.size === 0) {
        out.info('No tasks saved yet... use the add command to create one');
        return;
      }

      const hideCompleted = opts.showCompleted ? false : opts.hideCompleted ?? getHideCompleted(ctx.db);
      const tag = opts.tag?.replace(/^#/, '');
      const today = ctx.now();

      quadrants.forEach((quadrant, i) => {
        const tasks = ctx.store.listByQuadrant(quadrant)
          .filter(t => !hideCompleted || !t.completed)
          .filter(t => tag === undefined || t.tags.includes(tag));

        if (i > 0) console.log();
        console.log(out.formatQuadrantHeader(quadrant, tasks.length));
        for (const task of tasks) {
          console.log(out.formatTask(task, today));
        }
      });
    }));
}
