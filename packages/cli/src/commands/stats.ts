import { Command } from 'commander';
import chalk from 'chalk';
import { computeStats, type ResourceStats } from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { printWarnings, readResource } from '../utils/resource-io.js';

export interface StatsCommandOptions extends CommonCommandOptions {
  input: string;
  lang?: string;
  json?: boolean;
  strict?: boolean;
}

function printStats(stats: ResourceStats): void {
  console.log(
    chalk.blue(`${stats.totalEntries} entries, ${stats.uniqueKeys} keys, ${stats.languages.length} language(s)`)
  );
  for (const language of stats.languages) {
    const { byStatus } = language;
    console.log(`  ${language.language.padEnd(8)} ${String(language.total).padStart(5)}  ${language.completion.toFixed(2)}%`);
    console.log(
      chalk.gray(
        `    translated ${byStatus.translated}, new ${byStatus.new}, needs_review ${byStatus.needs_review}, ` +
          `stale ${byStatus.stale}, do_not_translate ${byStatus.do_not_translate}`
      )
    );
    if (language.incompletePlurals) {
      console.log(
        chalk.yellow(
          `    ${language.incompletePlurals} of ${language.pluralEntries} plural entr${language.pluralEntries === 1 ? 'y' : 'ies'} missing ${language.missingCategories} categor${language.missingCategories === 1 ? 'y' : 'ies'}`
        )
      );
    }
  }
}

export async function runStats(options: StatsCommandOptions): Promise<ResourceStats> {
  const context = await loadCliContext(options);
  const loaded = await readResource(context.resolvePath(options.input), {
    defaultLanguage: context.config.sourceLanguage,
    strict: options.strict ?? context.config.strict,
  });
  if (!options.json) {
    printWarnings(loaded.warnings, options.input);
  }

  const stats = computeStats(loaded.resource, await context.loadPluralRules(), { language: options.lang });
  if (options.json) {
    console.log(JSON.stringify(stats, null, 2));
  } else {
    printStats(stats);
  }
  return stats;
}

export function registerStats(program: Command): void {
  program
    .command('stats')
    .description('Summarize entry counts, statuses and completion per language')
    .requiredOption('-i, --input <path>', 'File to summarize')
    .option('-l, --lang <language>', 'Only count one language')
    .option('--json', 'Print the statistics as JSON', false)
    .option('--strict', 'Fail on recoverable parse anomalies')
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: StatsCommandOptions) => {
        await runStats(options);
      })
    );
}
