import { Command } from 'commander';
import chalk from 'chalk';
import { formatTranslation, languagesMatch, listLanguages, validatePlurals, type Resource } from '@lexiforge/core';
import { loadCliContext, type CommonCommandOptions } from '../utils/config.js';
import { withErrorHandling } from '../utils/errors.js';
import { printWarnings, readResource } from '../utils/resource-io.js';

export interface ViewCommandOptions extends CommonCommandOptions {
  input: string;
  lang?: string;
  full?: boolean;
  checkPlurals?: boolean;
  strict?: boolean;
}

export interface RenderViewOptions {
  language?: string;
  /** Disable column truncation */
  full?: boolean;
  /** Aligned columns for a terminal; tab-separated lines otherwise */
  tty?: boolean;
  /** Terminal width in columns */
  width?: number;
}

const KEY_WIDTH = 24;
const LANGUAGE_WIDTH = 8;
const MIN_VALUE_WIDTH = 16;

export function truncateDisplay(text: string, max: number): string {
  const chars = Array.from(text);
  if (chars.length <= max) {
    return text;
  }
  if (max <= 3) {
    return '.'.repeat(max);
  }
  return `${chars.slice(0, max - 3).join('')}...`;
}

function singleLine(text: string): string {
  return text.replace(/\r?\n/g, '\\n').replace(/\t/g, '\\t');
}

/**
 * Lines to print for a resource. A language column is added when more than
 * one language is shown.
 */
export function renderView(resource: Resource, options: RenderViewOptions = {}): string[] {
  const entries = options.language
    ? resource.entries.filter((entry) => languagesMatch(entry.language, options.language ?? ''))
    : resource.entries;
  const showLanguage = !options.language && listLanguages(resource).length > 1;

  if (!options.tty) {
    return entries.map((entry) => {
      const value = singleLine(formatTranslation(entry.value));
      return showLanguage ? `${entry.key}\t${entry.language}\t${value}` : `${entry.key}\t${value}`;
    });
  }

  const width = options.width ?? 80;
  const fixed = KEY_WIDTH + 1 + (showLanguage ? LANGUAGE_WIDTH + 1 : 0);
  const valueWidth = width > fixed + MIN_VALUE_WIDTH ? width - fixed : MIN_VALUE_WIDTH;
  const row = (key: string, language: string, value: string) =>
    showLanguage
      ? `${key.padEnd(KEY_WIDTH)} ${language.padEnd(LANGUAGE_WIDTH)} ${value}`
      : `${key.padEnd(KEY_WIDTH)} ${value}`;

  const lines = [row('Key', 'Lang', 'Value')];
  for (const entry of entries) {
    const value = singleLine(formatTranslation(entry.value));
    lines.push(
      row(
        options.full ? entry.key : truncateDisplay(entry.key, KEY_WIDTH),
        entry.language,
        options.full ? value : truncateDisplay(value, valueWidth)
      )
    );
  }
  return lines;
}

export async function runView(options: ViewCommandOptions): Promise<string[]> {
  const context = await loadCliContext(options);
  const loaded = await readResource(context.resolvePath(options.input), {
    defaultLanguage: context.config.sourceLanguage,
    strict: options.strict ?? context.config.strict,
  });
  printWarnings(loaded.warnings, options.input);

  const lines = renderView(loaded.resource, {
    language: options.lang,
    full: options.full,
    tty: Boolean(process.stdout.isTTY),
    width: process.stdout.columns,
  });
  lines.forEach((line) => console.log(line));

  if (options.checkPlurals) {
    // Strict mode throws PluralValidationError, which exits with code 2
    validatePlurals(loaded.resource, await context.loadPluralRules(), 'strict');
    console.log(chalk.green('✅ Plural validation passed'));
  }
  return lines;
}

export function registerView(program: Command): void {
  program
    .command('view')
    .description('Print the entries of a localization file')
    .requiredOption('-i, --input <path>', 'File to show')
    .option('-l, --lang <language>', 'Only show one language')
    .option('--full', 'Do not truncate long keys or values', false)
    .option('--check-plurals', 'Validate plural categories after printing (exit 2 on failure)', false)
    .option('--strict', 'Fail on recoverable parse anomalies')
    .option('-c, --config <path>', 'Path to lexiforge config file')
    .action(
      withErrorHandling(async (options: ViewCommandOptions) => {
        await runView(options);
      })
    );
}
