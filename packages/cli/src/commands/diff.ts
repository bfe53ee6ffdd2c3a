import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { diffResources, hasDifferences, summarizeDiff, type DiffReport, type DiffSummary } from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';
import {
  buildLanguagePatches,
  printDiffReport,
  printLanguagePatches,
  writeLanguagePatches,
  type LanguagePatch,
} from '../utils/diff-utils.js';
import { printWarnings, readResource, writeFileAtomic } from '../utils/resource-io.js';

export interface DiffCommandOptions extends CommonCommandOptions {
  source: string;
  target: string;
  lang?: string;
  json?: boolean;
  output?: string;
  patch?: boolean;
  patchDir?: string;
  strict?: boolean;
}

export interface DiffCommandResult {
  report: DiffReport;
  summary: DiffSummary;
  patches: LanguagePatch[];
}

export async function runDiff(options: DiffCommandOptions): Promise<DiffCommandResult> {
  const context = await loadCliContext(options);
  const strict = options.strict ?? context.config.strict;
  const readOptions = { defaultLanguage: context.config.sourceLanguage, strict };

  const source = await readResource(context.resolvePath(options.source), readOptions);
  const target = await readResource(context.resolvePath(options.target), readOptions);
  if (!options.json) {
    printWarnings(source.warnings, options.source);
    printWarnings(target.warnings, options.target);
  }

  const report = diffResources(source.resource, target.resource, { language: options.lang });
  const summary = summarizeDiff(report);
  const wantsPatches = Boolean(options.patch || options.patchDir);
  const patches = wantsPatches
    ? buildLanguagePatches(
        source.resource,
        target.resource,
        { source: options.source, target: options.target },
        options.lang ? Object.keys(report) : undefined
      )
    : [];

  if (options.output) {
    const outputPath = context.resolvePath(options.output);
    await writeFileAtomic(outputPath, `${JSON.stringify(report, null, 2)}\n`);
    if (!options.json) {
      console.log(chalk.green(`Diff report written to ${path.relative(context.cwd, outputPath)}`));
    }
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return { report, summary, patches };
  }

  console.log(chalk.blue(`Comparing ${options.source} → ${options.target}`));
  printDiffReport(report);
  if (!hasDifferences(report)) {
    console.log(chalk.green('No differences found.'));
  } else {
    console.log(
      chalk.gray(
        `Total: ${summary.added} added, ${summary.removed} removed, ${summary.changed} changed across ${summary.languages} language(s)`
      )
    );
  }

  if (options.patch) {
    printLanguagePatches(patches);
  }
  if (options.patchDir) {
    await writeLanguagePatches(patches, context.resolvePath(options.patchDir));
  }

  return { report, summary, patches };
}

export function registerDiff(program: Command): void {
  program
    .command('diff')
    .description('Compare two localization files entry by entry')
    .requiredOption('--source <path>', 'Baseline file')
    .requiredOption('--target <path>', 'File compared against the baseline')
    .option('-l, --lang <language>', 'Only compare one language')
    .option('--json', 'Print the report as JSON', false)
    .option('--output <path>', 'Write the JSON report to a file')
    .option('--patch', 'Print unified diffs per language', false)
    .option('--patch-dir <path>', 'Write unified diffs per language into a directory')
    .option('--strict', 'Fail on recoverable parse anomalies')
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: DiffCommandOptions) => {
        await runDiff(options);
      })
    );
}
