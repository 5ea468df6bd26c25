import { Command } from 'commander';
import {
  encodeMarkdown, decodeMarkdown, readTextFile, writeTextFile, getExportPath, ValidationError,
} from '@eisen/core';
import type { CliContext } from '../context.js';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createExportCommand(ctx: CliContext): Command {
  return new Command('export')
    .description('Write every task to a Markdown file')
    .argument('[path]', 'Target file (defaults to the export_path config)')
    .action((path: string | undefined) => $try(() => {
      const target = path ?? getExportPath(ctx.db);
      const tasks = ctx.store.list();
      writeTextFile(target, encodeMarkdown(tasks));
      out.success(`Exported ${tasks.length} task(s) to ${target}`);
    }));
}

interface ImportOptions {
  force?: boolean;
  merge?: boolean;
}

export function createImportCommand(ctx: CliContext): Command {
  return new Command('import')
    .description('Load tasks from a Markdown file, replacing or keeping the current ones')
    .argument('<path>', 'Markdown file to read')
    .option('-f, --force', 'Replace every existing task with the imported ones')
    .option('-m, --merge', 'Add the imported tasks next to the existing ones')
    .action((path: string, opts: ImportOptions) => $try(() => {
      if (opts.force && opts.merge) {
        throw new ValidationError('Choose either --force or --merge, not both');
      }
      if (!opts.force && !opts.merge) {
        out.warning(
          `Import replaces all ${ctx.store.size} existing task(s). ` +
          'Re-run with --force to replace them or --merge to keep them',
        );
        process.exitCode = 1;
        return;
      }

      const imported = decodeMarkdown(readTextFile(path));

      if (opts.force) {
        ctx.store.replace(imported);
        ctx.save();
        out.success(`Imported ${imported.length} task(s) from ${path}`);
        return;
      }

      const existing = ctx.store.size;
      for (const task of imported) {
        const added = ctx.store.add({
          title: task.title,
          urgent: task.urgent,
          important: task.important,
          tags: task.tags,
          dueDate: task.dueDate,
          notes: task.notes,
        });
        if (task.completed) ctx.store.toggleCompleted(added.id);
      }
      ctx.save();
      out.success(`Imported ${imported.length} task(s) from ${path} (kept ${existing} existing)`);
    }));
}
