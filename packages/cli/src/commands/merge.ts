import { Command } from 'commander';
import chalk from 'chalk';
import {
  MERGE_STRATEGIES,
  isMergeStrategy,
  listLanguages,
  mergeResources,
  type MergeStrategy,
  type Resource,
} from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { collectPatterns, expandInputs } from '../utils/path-glob.js';
import { printWarnings, readResource, writeResource } from '../utils/resource-io.js';

export interface MergeCommandOptions extends CommonCommandOptions {
  input: string[];
  output: string;
  strategy?: string;
  inputFormat?: string;
  outputFormat?: string;
  lang?: string;
  sourceLang?: string;
  strict?: boolean;
}

export interface MergeSummary {
  inputs: string[];
  output: string;
  strategy: MergeStrategy;
  entries: number;
  languages: string[];
}

function resolveStrategy(value: string | undefined, fallback: MergeStrategy): MergeStrategy {
  if (value === undefined) {
    return fallback;
  }
  if (!isMergeStrategy(value)) {
    throw new CliError(`Unknown merge strategy "${value}". Expected one of: ${MERGE_STRATEGIES.join(', ')}`);
  }
  return value;
}

export async function runMerge(options: MergeCommandOptions): Promise<MergeSummary> {
  const context = await loadCliContext(options);
  const strategy = resolveStrategy(options.strategy, context.config.merge.strategy);
  const strict = options.strict ?? context.config.strict;
  const inputs = await expandInputs(options.input, context.cwd);

  const resources: Resource[] = [];
  for (const input of inputs) {
    const loaded = await readResource(context.resolvePath(input), {
      format: options.inputFormat,
      defaultLanguage: context.config.sourceLanguage,
      strict,
    });
    printWarnings(loaded.warnings, input);
    resources.push(loaded.resource);
  }

  const merged = mergeResources(resources, strategy);
  const languages = listLanguages(merged);
  // A language tag from one input no longer describes the merged whole
  if (languages.length > 1) {
    delete merged.metadata.language;
  }
  if (options.sourceLang) {
    merged.metadata.source_language = options.sourceLang;
  }

  const outputPath = context.resolvePath(options.output);
  const written = await writeResource(outputPath, merged, {
    format: options.outputFormat,
    language: options.lang,
    strict,
  });
  printWarnings(written.warnings, options.output);

  console.log(
    chalk.green(
      `Merged ${inputs.length} file${inputs.length === 1 ? '' : 's'} (${merged.entries.length} entries, strategy ${strategy}) into ${options.output}`
    )
  );

  return { inputs, output: outputPath, strategy, entries: merged.entries.length, languages };
}

export function registerMerge(program: Command): void {
  program
    .command('merge')
    .description('Merge several localization files into one')
    .requiredOption('-i, --input <patterns...>', 'Files or glob patterns to merge, in priority order', collectPatterns, [])
    .requiredOption('-o, --output <path>', 'File to write')
    .option('-s, --strategy <strategy>', `Conflict strategy (${MERGE_STRATEGIES.join(', ')})`)
    .option('--input-format <tag>', 'Format tag for every input (detected by default)')
    .option('--output-format <tag>', 'Output format tag (detected by default)')
    .option('-l, --lang <language>', 'Language to write when the output holds a single language')
    .option('--source-lang <language>', 'Source language recorded in the output metadata')
    .option('--strict', 'Fail on recoverable anomalies and lossy writes')
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: MergeCommandOptions) => {
        await runMerge(options);
      })
    );
}
