import { Command } from 'commander';
import { registerConvert } from './commands/convert.js';
import { registerMerge } from './commands/merge.js';
import { registerDiff } from './commands/diff.js';
import { registerSync } from './commands/sync.js';
import { registerValidate } from './commands/validate.js';
import { registerFixPlaceholders } from './commands/fix-placeholders.js';
import { registerStats } from './commands/stats.js';
import { registerEdit } from './commands/edit.js';
import { registerView } from './commands/view.js';
import { registerFormats } from './commands/formats.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('lexiforge')
    .description('Convert, merge, diff, sync and validate localization files')
    .version('0.1.0');

  registerConvert(program);
  registerMerge(program);
  registerDiff(program);
  registerSync(program);
  registerValidate(program);
  registerFixPlaceholders(program);
  registerStats(program);
  registerEdit(program);
  registerView(program);
  registerFormats(program);

  return program;
}

export { runConvert } from './commands/convert.js';
export { runMerge } from './commands/merge.js';
export { runDiff } from './commands/diff.js';
export { runSync } from './commands/sync.js';
export { runValidate } from './commands/validate.js';
export { runFixPlaceholders } from './commands/fix-placeholders.js';
export { runStats } from './commands/stats.js';
export { runEdit } from './commands/edit.js';
export { runView, renderView } from './commands/view.js';
