import { Command } from 'commander';
import chalk from 'chalk';
import {
  describePlaceholderIssue,
  validatePlaceholders,
  validatePlurals,
  type PlaceholderValidationReport,
  type PluralRuleTable,
  type PluralValidationReport,
} from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES, setExitCode, type ExitCode } from '../utils/exit-codes.js';
import { collectPatterns, expandInputs } from '../utils/path-glob.js';
import { printWarnings, readResource } from '../utils/resource-io.js';

export interface ValidateCommandOptions extends CommonCommandOptions {
  input: string[];
  /** `--no-plurals` sets this to false */
  plurals?: boolean;
  /** `--no-placeholders` sets this to false */
  placeholders?: boolean;
  sourceLang?: string;
  strict?: boolean;
  json?: boolean;
}

export interface FileValidation {
  file: string;
  /** Set when the file could not be read or parsed */
  error?: string;
  plurals?: PluralValidationReport;
  placeholders?: PlaceholderValidationReport;
}

export interface ValidateResult {
  strict: boolean;
  files: FileValidation[];
  exitCode: ExitCode;
}

function hasPluralIssues(file: FileValidation): boolean {
  return Boolean(file.plurals && !file.plurals.valid);
}

function hasPlaceholderIssues(file: FileValidation): boolean {
  return Boolean(file.placeholders && !file.placeholders.valid);
}

/**
 * Read failures always fail the run. Findings only fail it in strict mode,
 * where a missing plural category outranks everything else.
 */
export function validationExitCode(files: FileValidation[], strict: boolean): ExitCode {
  if (strict && files.some(hasPluralIssues)) {
    return EXIT_CODES.PLURAL_VALIDATION;
  }
  if (files.some((file) => file.error !== undefined)) {
    return EXIT_CODES.ERROR;
  }
  if (strict && files.some(hasPlaceholderIssues)) {
    return EXIT_CODES.ERROR;
  }
  return EXIT_CODES.SUCCESS;
}

function printFileValidation(file: FileValidation, strict: boolean): void {
  if (file.error !== undefined) {
    console.log(chalk.red(`❌ ${file.file}: ${file.error}`));
    return;
  }

  const clean = !hasPluralIssues(file) && !hasPlaceholderIssues(file);
  const color = strict ? chalk.red : chalk.yellow;
  console.log(clean ? chalk.green(`✅ ${file.file}`) : color(`${strict ? '❌' : '⚠️ '} ${file.file}`));

  file.plurals?.issues.forEach((issue) => {
    console.log(color(`    ${issue.key} (${issue.language}): missing plural ${issue.missingCategories.join(', ')}`));
  });
  file.plurals?.shapeMismatches.forEach((mismatch) => {
    console.log(
      chalk.gray(
        `    ${mismatch.key}: singular in ${mismatch.singular.join(', ')}, plural in ${mismatch.plural.join(', ')}`
      )
    );
  });
  file.placeholders?.issues.forEach((issue) => {
    const where = issue.category ? `${issue.language}, ${issue.category}` : issue.language;
    console.log(color(`    ${issue.key} (${where}): ${describePlaceholderIssue(issue)}`));
  });
}

export async function runValidate(options: ValidateCommandOptions): Promise<ValidateResult> {
  const context = await loadCliContext(options);
  const strict = options.strict ?? context.config.strict;
  const inputs = await expandInputs(options.input, context.cwd);
  const checkPlurals = options.plurals !== false;
  const checkPlaceholders = options.placeholders !== false;
  const table: PluralRuleTable | undefined = checkPlurals ? await context.loadPluralRules() : undefined;

  const files: FileValidation[] = [];
  for (const input of inputs) {
    const file: FileValidation = { file: input };
    files.push(file);

    const loaded = await readResource(context.resolvePath(input), {
      defaultLanguage: context.config.sourceLanguage,
      strict,
    }).catch((error: unknown) => {
      file.error = error instanceof Error ? error.message : String(error);
      return undefined;
    });
    if (!loaded) {
      continue;
    }
    if (!options.json) {
      printWarnings(loaded.warnings, input);
    }
    const { resource } = loaded;

    if (table) {
      file.plurals = validatePlurals(resource, table, 'permissive');
    }
    if (checkPlaceholders) {
      file.placeholders = validatePlaceholders(resource, {
        sourceLanguage: options.sourceLang ?? resource.metadata.source_language ?? context.config.sourceLanguage,
        mode: 'permissive',
      });
    }
  }

  const exitCode = validationExitCode(files, strict);
  if (options.json) {
    console.log(JSON.stringify({ strict, exitCode, files }, null, 2));
  } else {
    files.forEach((file) => printFileValidation(file, strict));
    const failing = files.filter((file) => file.error !== undefined || hasPluralIssues(file) || hasPlaceholderIssues(file));
    if (!failing.length) {
      console.log(chalk.green(`Validated ${files.length} file${files.length === 1 ? '' : 's'}; no issues found.`));
    } else {
      const summary = `${failing.length} of ${files.length} file${files.length === 1 ? '' : 's'} with issues`;
      console.log(exitCode === EXIT_CODES.SUCCESS ? chalk.yellow(summary) : chalk.red(summary));
    }
  }

  return { strict, files, exitCode };
}

export function registerValidate(program: Command): void {
  program
    .command('validate')
    .description('Check plural categories and placeholder signatures')
    .requiredOption('-i, --input <patterns...>', 'Files or glob patterns to validate', collectPatterns, [])
    .option('--no-plurals', 'Skip plural category checks')
    .option('--no-placeholders', 'Skip placeholder checks')
    .option('--source-lang <language>', 'Language placeholders are compared against')
    .option('--strict', 'Treat findings as failures (exit 2 for plurals, 1 for placeholders)')
    .option('--json', 'Print the results as JSON', false)
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: ValidateCommandOptions) => {
        const result = await runValidate(options);
        if (result.exitCode !== EXIT_CODES.SUCCESS) {
          setExitCode(result.exitCode);
        }
      })
    );
}
