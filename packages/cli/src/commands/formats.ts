import { Command } from 'commander';
import chalk from 'chalk';
import type { FormatAdapter } from '@lexiforge/core';
import { getRegistry } from '../utils/resource-io.js';

export function listFormats(): FormatAdapter[] {
  return getRegistry().list();
}

export function registerFormats(program: Command): void {
  program
    .command('formats')
    .description('List the supported file formats')
    .option('--json', 'Print the formats as JSON', false)
    .action((options: { json?: boolean }) => {
      const adapters = listFormats();
      if (options.json) {
        const payload = adapters.map((adapter) => ({
          tag: adapter.tag,
          extensions: adapter.extensions,
          ...adapter.capabilities,
        }));
        console.log(JSON.stringify(payload, null, 2));
        return;
      }

      console.log(chalk.blue('Supported formats:'));
      for (const adapter of adapters) {
        const traits = [
          adapter.capabilities.plurals ? 'plurals' : 'no plurals',
          adapter.capabilities.multiLanguage ? 'multi-language' : 'single language',
        ];
        console.log(`  ${adapter.tag.padEnd(10)} ${adapter.extensions.join(', ').padEnd(12)} ${chalk.gray(traits.join(', '))}`);
      }
    });
}
