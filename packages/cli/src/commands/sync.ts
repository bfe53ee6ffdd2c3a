import path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { SyncPolicyError, syncResources, type SyncReport } from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { collectPatterns } from '../utils/path-glob.js';
import { printWarnings, readResource, writeFileAtomic, writeResource } from '../utils/resource-io.js';

export interface SyncCommandOptions extends CommonCommandOptions {
  source: string;
  target: string;
  output?: string;
  lang?: string[];
  matchLang?: string;
  reportJson?: string;
  failOnUnmatched?: boolean;
  failOnAmbiguous?: boolean;
  provenance?: boolean;
  strict?: boolean;
  dryRun?: boolean;
}

export interface SyncCommandResult {
  report: SyncReport;
  output: string;
  written: boolean;
}

function printSyncReport(report: SyncReport): void {
  console.log(chalk.blue(`Match language: ${report.matchLanguage}`));
  for (const [language, summary] of Object.entries(report.languages)) {
    console.log(
      `  ${language}: ${summary.matched} matched (${summary.exact} exact, ${summary.fallback} fallback), ` +
        `${summary.updated} updated, ${summary.unchanged} unchanged`
    );
    if (summary.unmatched.length) {
      console.log(chalk.yellow(`    unmatched: ${summary.unmatched.join(', ')}`));
    }
    summary.ambiguous.forEach((match) => {
      console.log(chalk.yellow(`    ambiguous: ${match.key} (candidates: ${match.candidates.join(', ')})`));
    });
    if (summary.missingLanguage.length) {
      console.log(chalk.gray(`    no ${language} value in source: ${summary.missingLanguage.join(', ')}`));
    }
    if (summary.typeMismatch.length) {
      console.log(chalk.gray(`    singular/plural mismatch: ${summary.typeMismatch.join(', ')}`));
    }
  }
}

/**
 * Update the target from the source without adding or removing target keys.
 * Nothing is written, not even the report, when a fail-on policy trips.
 * Strict mode turns both fail-on policies on unless a flag says otherwise.
 */
export async function runSync(options: SyncCommandOptions): Promise<SyncCommandResult> {
  const context = await loadCliContext(options);
  const { config } = context;
  const strict = options.strict ?? config.strict;
  const readOptions = { defaultLanguage: config.sourceLanguage, strict };

  const source = await readResource(context.resolvePath(options.source), readOptions);
  printWarnings(source.warnings, options.source);
  const target = await readResource(context.resolvePath(options.target), readOptions);
  printWarnings(target.warnings, options.target);

  const result = syncResources(source.resource, target.resource, {
    matchLanguage: options.matchLang ?? config.sync.matchLanguage,
    failOnUnmatched: options.failOnUnmatched ?? (strict || config.sync.failOnUnmatched),
    failOnAmbiguous: options.failOnAmbiguous ?? (strict || config.sync.failOnAmbiguous),
    recordProvenance: options.provenance ?? config.sync.recordProvenance,
    languages: options.lang?.length ? options.lang : undefined,
  });

  printSyncReport(result.report);
  if (result.violations.length) {
    throw new SyncPolicyError(result.violations);
  }

  const outputName = options.output ?? options.target;
  const outputPath = context.resolvePath(outputName);
  const written = await writeResource(outputPath, result.resource, {
    format: options.output ? undefined : target.adapter.tag,
    strict,
    dryRun: options.dryRun,
  });
  printWarnings(written.warnings, outputName);

  if (options.reportJson) {
    const reportPath = context.resolvePath(options.reportJson);
    await writeFileAtomic(reportPath, `${JSON.stringify(result.report, null, 2)}\n`);
    console.log(chalk.gray(`Sync report written to ${path.relative(context.cwd, reportPath)}`));
  }

  const { updated } = result.report.totals;
  if (options.dryRun) {
    console.log(chalk.yellow(`DRY RUN: ${updated} entr${updated === 1 ? 'y' : 'ies'} would be updated in ${outputName}`));
  } else {
    console.log(chalk.green(`Updated ${updated} entr${updated === 1 ? 'y' : 'ies'} in ${outputName}`));
  }

  return { report: result.report, output: outputPath, written: !options.dryRun };
}

export function registerSync(program: Command): void {
  program
    .command('sync')
    .description('Copy values from a source file into the matching entries of a target file')
    .requiredOption('--source <path>', 'File providing values')
    .requiredOption('--target <path>', 'File to update; its keys are never added or removed')
    .option('-o, --output <path>', 'Write the result here instead of over the target')
    .option('-l, --lang <languages>', 'Only sync these languages (comma-separated or repeated)', collectPatterns, [])
    .option('--match-lang <language>', 'Language whose text pairs entries with different keys')
    .option('--report-json <path>', 'Write the sync report to a JSON file')
    .option('--fail-on-unmatched', 'Fail without writing when a target entry has no source match')
    .option('--fail-on-ambiguous', 'Fail without writing when a target entry matches several source keys')
    .option('--provenance', 'Record the source key and match kind on updated entries')
    .option('--strict', 'Fail on recoverable anomalies, lossy writes, unmatched and ambiguous entries')
    .option('--dry-run', 'Report what would change without writing', false)
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: SyncCommandOptions) => {
        await runSync(options);
      })
    );
}
