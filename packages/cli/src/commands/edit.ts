import { Command } from 'commander';
import chalk from 'chalk';
import {
  ENTRY_STATUSES,
  parseEntryStatus,
  setEntry,
  type EditAction,
  type EntryStatus,
  type Resource,
} from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES, setExitCode, type ExitCode } from '../utils/exit-codes.js';
import { collectPatterns, expandInputs } from '../utils/path-glob.js';
import { printWarnings, readResource, writeResource } from '../utils/resource-io.js';

export interface EditCommandOptions extends CommonCommandOptions {
  input: string[];
  key: string;
  /** Omitted or empty removes the entry */
  value?: string;
  lang?: string;
  comment?: string;
  status?: string;
  output?: string;
  strict?: boolean;
  dryRun?: boolean;
  continueOnError?: boolean;
}

export interface EditOutcome {
  file: string;
  action?: EditAction;
  language?: string;
  error?: string;
}

export interface EditCommandResult {
  outcomes: EditOutcome[];
  exitCode: ExitCode;
}

function resolveStatus(value: string | undefined): EntryStatus | undefined {
  if (value === undefined) {
    return undefined;
  }
  const status = parseEntryStatus(value);
  if (!status) {
    throw new CliError(`Unknown status "${value}". Expected one of: ${ENTRY_STATUSES.join(', ')}`);
  }
  return status;
}

/**
 * `--lang`, then the language the file declares or the single language it
 * holds.
 */
function resolveEditLanguage(resource: Resource, explicit: string | undefined, file: string): string {
  if (explicit) {
    return explicit;
  }
  if (resource.metadata.language) {
    return resource.metadata.language;
  }
  const languages = new Set(resource.entries.map((entry) => entry.language));
  if (languages.size === 1) {
    const [only] = languages;
    return only;
  }
  throw new CliError(`${file} holds ${languages.size ? 'several languages' : 'no entries'}; pass --lang`);
}

const ACTION_LABELS: Record<EditAction, string> = {
  added: 'Added',
  updated: 'Updated',
  removed: 'Removed',
  unchanged: 'Unchanged',
};

export async function runEdit(options: EditCommandOptions): Promise<EditCommandResult> {
  const context = await loadCliContext(options);
  const strict = options.strict ?? context.config.strict;
  const status = resolveStatus(options.status);
  const inputs = await expandInputs(options.input, context.cwd);
  if (options.output && inputs.length > 1) {
    throw new CliError('--output can only be used with a single input');
  }

  const editFile = async (input: string): Promise<EditOutcome> => {
    const loaded = await readResource(context.resolvePath(input), {
      language: options.lang,
      defaultLanguage: context.config.sourceLanguage,
      strict,
    });
    printWarnings(loaded.warnings, input);

    const language = resolveEditLanguage(loaded.resource, options.lang, input);
    const { resource, action } = setEntry(loaded.resource, {
      key: options.key,
      language,
      value: options.value,
      comment: options.comment,
      status,
    });

    const outputName = options.output ?? input;
    if (action !== 'unchanged' || options.output) {
      const written = await writeResource(context.resolvePath(outputName), resource, {
        format: options.output ? undefined : loaded.adapter.tag,
        language,
        strict,
        dryRun: options.dryRun,
      });
      printWarnings(written.warnings, outputName);
    }

    const prefix = options.dryRun ? 'DRY RUN: ' : '';
    const message = `${prefix}${ACTION_LABELS[action]} "${options.key}" (${language}) in ${outputName}`;
    console.log(action === 'unchanged' ? chalk.gray(message) : chalk.green(message));
    return { file: input, action, language };
  };

  const outcomes: EditOutcome[] = [];
  for (const input of inputs) {
    if (!options.continueOnError) {
      outcomes.push(await editFile(input));
      continue;
    }
    try {
      outcomes.push(await editFile(input));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`❌ ${input}: ${message}`));
      outcomes.push({ file: input, error: message });
    }
  }

  const failed = outcomes.filter((outcome) => outcome.error !== undefined);
  if (failed.length) {
    console.log(chalk.red(`${failed.length} of ${outcomes.length} file(s) failed`));
  }
  return { outcomes, exitCode: failed.length ? EXIT_CODES.ERROR : EXIT_CODES.SUCCESS };
}

export function registerEdit(program: Command): void {
  program
    .command('edit')
    .description('Add, update or remove one entry')
    .requiredOption('-i, --input <patterns...>', 'Files or glob patterns to edit', collectPatterns, [])
    .requiredOption('-k, --key <key>', 'Entry key')
    .option('-v, --value <value>', 'New value; omit to remove the entry')
    .option('-l, --lang <language>', 'Entry language (required for multi-language files)')
    .option('--comment <text>', 'Translator comment')
    .option('--status <status>', `Entry status (${ENTRY_STATUSES.join(', ')})`)
    .option('-o, --output <path>', 'Write the result here instead of over the input (single input only)')
    .option('--strict', 'Fail on recoverable anomalies and lossy writes')
    .option('--dry-run', 'Show what would change without writing', false)
    .option('--continue-on-error', 'Keep editing the remaining inputs after a failure', false)
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: EditCommandOptions) => {
        const result = await runEdit(options);
        if (result.exitCode !== EXIT_CODES.SUCCESS) {
          setExitCode(result.exitCode);
        }
      })
    );
}
