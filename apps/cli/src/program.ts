import { Command } from 'commander';
import type { CliContext } from './context.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createEditCommand } from './commands/edit.js';
import { createCheckCommand, createUncheckCommand, createToggleCommand } from './commands/check.js';
import { createDeleteCommand } from './commands/delete.js';
import { createSearchCommand } from './commands/search.js';
import { createTagsCommand } from './commands/tags.js';
import { createExportCommand, createImportCommand } from './commands/transfer.js';
import { createConfigCommand } from './commands/config.js';

/** Build the CLI program around a loaded context */
export function createProgram(ctx: CliContext): Command {
  const program = new Command()
    .name('eisen')
    .description('Four-quadrant task manager')
    .version('1.0.0');

  program.addCommand(createAddCommand(ctx));
  // Default command: running with no arguments shows the matrix
  program.addCommand(createListCommand(ctx), { isDefault: true });
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createCheckCommand(ctx));
  program.addCommand(createUncheckCommand(ctx));
  program.addCommand(createToggleCommand(ctx));
  program.addCommand(createDeleteCommand(ctx));
  program.addCommand(createSearchCommand(ctx));
  program.addCommand(createTagsCommand(ctx));
  program.addCommand(createExportCommand(ctx));
  program.addCommand(createImportCommand(ctx));
  program.addCommand(createConfigCommand(ctx));

  return program;
}
