import { Command } from 'commander';
import chalk from 'chalk';
import {
  PLACEHOLDER_STYLES,
  describePlaceholderIssue,
  fixPlaceholders,
  formatTranslation,
  isPlaceholderStyle,
  type FixPlaceholdersResult,
  type PlaceholderStyle,
} from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { printWarnings, readResource, writeResource } from '../utils/resource-io.js';

export interface FixPlaceholdersCommandOptions extends CommonCommandOptions {
  input: string;
  output?: string;
  style?: string;
  sourceLang?: string;
  strict?: boolean;
  dryRun?: boolean;
}

export interface FixPlaceholdersSummary {
  style: PlaceholderStyle;
  output: string;
  fixed: FixPlaceholdersResult['fixed'];
  skipped: FixPlaceholdersResult['skipped'];
}

function resolveStyle(value: string | undefined, fallback: PlaceholderStyle): PlaceholderStyle {
  if (value === undefined) {
    return fallback;
  }
  if (!isPlaceholderStyle(value)) {
    throw new CliError(`Unknown placeholder style "${value}". Expected one of: ${PLACEHOLDER_STYLES.join(', ')}`);
  }
  return value;
}

export async function runFixPlaceholders(options: FixPlaceholdersCommandOptions): Promise<FixPlaceholdersSummary> {
  const context = await loadCliContext(options);
  const style = resolveStyle(options.style, context.config.placeholders.style);
  const strict = options.strict ?? context.config.strict;

  const loaded = await readResource(context.resolvePath(options.input), {
    defaultLanguage: context.config.sourceLanguage,
    strict,
  });
  printWarnings(loaded.warnings, options.input);

  const result = fixPlaceholders(loaded.resource, {
    style,
    sourceLanguage: options.sourceLang ?? loaded.resource.metadata.source_language ?? context.config.sourceLanguage,
  });

  result.fixed.forEach((fix) => {
    console.log(chalk.gray(`  ${fix.key} (${fix.language}): ${formatTranslation(fix.before)} → ${formatTranslation(fix.after)}`));
  });
  result.skipped.forEach((issue) => {
    console.log(chalk.yellow(`  skipped ${issue.key} (${issue.language}): ${describePlaceholderIssue(issue)}`));
  });

  const outputName = options.output ?? options.input;
  const outputPath = context.resolvePath(outputName);
  const written = await writeResource(outputPath, result.resource, {
    format: options.output ? undefined : loaded.adapter.tag,
    strict,
    dryRun: options.dryRun,
  });
  printWarnings(written.warnings, outputName);

  const count = result.fixed.length;
  const label = `${count} value${count === 1 ? '' : 's'} to ${style} style`;
  if (options.dryRun) {
    console.log(chalk.yellow(`DRY RUN: would re-encode ${label} in ${outputName}`));
  } else {
    console.log(chalk.green(`Re-encoded ${label} in ${outputName}`));
  }

  return { style, output: outputPath, fixed: result.fixed, skipped: result.skipped };
}

export function registerFixPlaceholders(program: Command): void {
  program
    .command('fix-placeholders')
    .description('Re-encode printf-style placeholders into one style')
    .requiredOption('-i, --input <path>', 'File to fix')
    .option('-s, --style <style>', `Placeholder style (${PLACEHOLDER_STYLES.join(', ')})`)
    .option('-o, --output <path>', 'Write the result here instead of over the input')
    .option('--source-lang <language>', 'Language whose placeholders are authoritative')
    .option('--strict', 'Fail on recoverable anomalies and lossy writes')
    .option('--dry-run', 'Show what would change without writing', false)
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: FixPlaceholdersCommandOptions) => {
        await runFixPlaceholders(options);
      })
    );
}
