import { Command } from 'commander';
import { QuadrantName, quadrantOf } from '@eisen/core';
import chalk from 'chalk';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createSearchCommand(ctx: CliContext): Command {
  return new Command('search')
    .description('Search tasks (tag:x quadrant:q1 status:done due:overdue has:notes id:ab ...)')
    .argument('<query...>', 'Free text and filters')
    .action((words: string[]) => $try(() => {
      const results = ctx.store.search(words.join(' '));
      if (results.length === 0) {
        out.info('No matching tasks');
        return;
      }

      const today = ctx.now();
      for (const task of results) {
        console.log(`${out.formatTask(task, today)}  ${chalk.dim(QuadrantName[quadrantOf(task)])}`);
      }
    }));
}
