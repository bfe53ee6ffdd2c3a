/**
 * CLI presentation layer for resource diffs: terminal summaries and unified
 * patches of the entries that differ.
 */

import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { createPatch } from 'diff';
import {
  formatTranslation,
  listLanguages,
  normalizeLanguage,
  sortEntries,
  type DiffReport,
  type Resource,
} from '@lexiforge/core';

export interface LanguagePatch {
  language: string;
  patch: string;
}

/**
 * One line per entry, sorted, so patches stay stable whatever the file format.
 */
export function renderCanonical(resource: Resource, language: string): string {
  const normalized = normalizeLanguage(language);
  const lines = sortEntries(resource.entries)
    .filter((entry) => normalizeLanguage(entry.language) === normalized)
    .map((entry) => `${entry.key} = ${JSON.stringify(formatTranslation(entry.value))} [${entry.status}]`);
  return lines.length ? `${lines.join('\n')}\n` : '';
}

export function buildLanguagePatches(
  source: Resource,
  target: Resource,
  labels: { source: string; target: string },
  languages?: string[]
): LanguagePatch[] {
  const all = languages ?? Array.from(
    new Set([...listLanguages(source), ...listLanguages(target)].map(normalizeLanguage))
  ).sort();
  const patches: LanguagePatch[] = [];

  for (const language of all) {
    const before = renderCanonical(source, language);
    const after = renderCanonical(target, language);
    if (before === after) {
      continue;
    }
    patches.push({
      language,
      patch: createPatch(language, before, after, labels.source, labels.target),
    });
  }
  return patches;
}

export function printDiffReport(report: DiffReport): void {
  const languages = Object.keys(report);
  if (!languages.length) {
    console.log(chalk.gray('No entries to compare.'));
    return;
  }

  for (const language of languages) {
    const diff = report[language];
    const header = `${language}: +${diff.added.length} -${diff.removed.length} ~${diff.changed.length} (${diff.unchanged} unchanged)`;
    console.log(chalk.blue(header));
    diff.added.forEach((key) => console.log(chalk.green(`  + ${key}`)));
    diff.removed.forEach((key) => console.log(chalk.red(`  - ${key}`)));
    diff.changed.forEach((change) => {
      console.log(chalk.yellow(`  ~ ${change.key}`));
      console.log(chalk.gray(`      ${formatTranslation(change.before)} [${change.beforeStatus}]`));
      console.log(chalk.gray(`    → ${formatTranslation(change.after)} [${change.afterStatus}]`));
    });
  }
}

export function printLanguagePatches(patches: LanguagePatch[]): void {
  if (!patches.length) {
    console.log(chalk.gray('No differences to display.'));
    return;
  }

  console.log(chalk.blue('\nUnified diffs:'));
  patches.forEach((entry) => {
    console.log(chalk.yellow(`\n--- ${entry.language}`));
    console.log(entry.patch.trimEnd());
  });
}

export async function writeLanguagePatches(patches: LanguagePatch[], directory: string): Promise<string[]> {
  if (!patches.length) {
    console.log(chalk.gray('No differences to write.'));
    return [];
  }

  await fs.mkdir(directory, { recursive: true });
  const written = await Promise.all(
    patches.map(async (entry) => {
      const safeLanguage = entry.language.replace(/[^a-z0-9_-]/gi, '-');
      const filePath = path.join(directory, `${safeLanguage || 'language'}.patch`);
      await fs.writeFile(filePath, `${entry.patch.trimEnd()}\n`, 'utf8');
      return filePath;
    })
  );

  console.log(
    chalk.green(`Wrote ${patches.length} patch file${patches.length === 1 ? '' : 's'} to ${directory}.`)
  );
  return written;
}
