import { Command } from 'commander';
import chalk from 'chalk';
import type { CliContext } from '../context.js';
import * as out from '../output.js';

export function createTagsCommand(ctx: CliContext): Command {
  return new Command('tags')
    .description('List tags with how many tasks use each')
    .action(() => {
      const counts = ctx.store.tagCounts();
      if (counts.length === 0) {
        out.info('No tags yet');
        return;
      }
      for (const { tag, count } of counts) {
        console.log(`${out.tagColor(tag)(`#${tag}`)} ${chalk.dim(String(count))}`);
      }
    });
}
