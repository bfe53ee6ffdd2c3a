import { Command } from 'commander';
import chalk from 'chalk';
import type { FormatWarning } from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { printWarnings, readResource, writeResource } from '../utils/resource-io.js';

export interface ConvertCommandOptions extends CommonCommandOptions {
  input: string;
  output: string;
  inputFormat?: string;
  outputFormat?: string;
  lang?: string;
  strict?: boolean;
}

export interface ConvertSummary {
  input: string;
  output: string;
  inputFormat: string;
  outputFormat: string;
  entries: number;
  warnings: FormatWarning[];
}

export async function runConvert(options: ConvertCommandOptions): Promise<ConvertSummary> {
  const context = await loadCliContext(options);
  const strict = options.strict ?? context.config.strict;
  const inputPath = context.resolvePath(options.input);
  const outputPath = context.resolvePath(options.output);

  const source = await readResource(inputPath, {
    format: options.inputFormat,
    language: options.lang,
    defaultLanguage: context.config.sourceLanguage,
    strict,
  });
  printWarnings(source.warnings, options.input);

  const written = await writeResource(outputPath, source.resource, {
    format: options.outputFormat,
    language: options.lang,
    strict,
  });
  printWarnings(written.warnings, options.output);

  console.log(
    chalk.green(
      `Converted ${source.resource.entries.length} entr${source.resource.entries.length === 1 ? 'y' : 'ies'} from ${source.adapter.tag} to ${written.adapter.tag}: ${options.output}`
    )
  );

  return {
    input: inputPath,
    output: outputPath,
    inputFormat: source.adapter.tag,
    outputFormat: written.adapter.tag,
    entries: source.resource.entries.length,
    warnings: [...source.warnings, ...written.warnings],
  };
}

export function registerConvert(program: Command): void {
  program
    .command('convert')
    .description('Convert a localization file from one format to another')
    .requiredOption('-i, --input <path>', 'File to read')
    .requiredOption('-o, --output <path>', 'File to write')
    .option('--input-format <tag>', 'Input format tag (detected from the extension by default)')
    .option('--output-format <tag>', 'Output format tag (detected from the extension by default)')
    .option('-l, --lang <language>', 'Language of a single-language input, or the language to write')
    .option('--strict', 'Fail on recoverable anomalies and lossy writes')
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: ConvertCommandOptions) => {
        await runConvert(options);
      })
    );
}
