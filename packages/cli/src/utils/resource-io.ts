import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import type { FormatAdapter, FormatRegistry, FormatWarning, Resource } from '@lexiforge/core';
import { createDefaultRegistry, inferLanguageFromPath } from '@lexiforge/formats';
import { CliError } from './errors.js';

let defaultRegistry: FormatRegistry | undefined;

export function getRegistry(): FormatRegistry {
  defaultRegistry ??= createDefaultRegistry();
  return defaultRegistry;
}

export interface ReadResourceOptions {
  format?: string;
  /** Language of a single-language file; inferred from the path when omitted */
  language?: string;
  /** Language assumed when neither the path nor the file names one */
  defaultLanguage?: string;
  strict?: boolean;
  registry?: FormatRegistry;
}

export interface LoadedResource {
  path: string;
  adapter: FormatAdapter;
  resource: Resource;
  warnings: FormatWarning[];
}

export async function readResource(filePath: string, options: ReadResourceOptions = {}): Promise<LoadedResource> {
  const registry = options.registry ?? getRegistry();
  const adapter = registry.resolve(filePath, options.format);

  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new CliError(`Input file not found: ${filePath}`);
    }
    throw new CliError(`Unable to read ${filePath}: ${err.message}`);
  }

  const { resource, warnings } = adapter.parse(bytes, {
    strict: options.strict,
    language: options.language ?? inferLanguageFromPath(filePath),
    defaultLanguage: options.defaultLanguage,
  });
  return { path: filePath, adapter, resource, warnings };
}

export interface WriteResourceOptions {
  format?: string;
  /** Language to emit when the output format holds a single language */
  language?: string;
  strict?: boolean;
  dryRun?: boolean;
  registry?: FormatRegistry;
}

export interface WrittenResource {
  path: string;
  adapter: FormatAdapter;
  output: string;
  warnings: FormatWarning[];
}

/**
 * Serialize first, then replace the file through a temp file and rename, so
 * a failure leaves the previous contents in place.
 */
export async function writeResource(
  filePath: string,
  resource: Resource,
  options: WriteResourceOptions = {}
): Promise<WrittenResource> {
  const registry = options.registry ?? getRegistry();
  const adapter = registry.resolve(filePath, options.format);
  const language = options.language ?? (adapter.capabilities.multiLanguage ? undefined : inferLanguageFromPath(filePath));
  const { output, warnings } = adapter.serialize(resource, { strict: options.strict, language });

  if (!options.dryRun) {
    await writeFileAtomic(filePath, output);
  }
  return { path: filePath, adapter, output, warnings };
}

export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${crypto.randomBytes(6).toString('hex')}.tmp`;

  try {
    await fs.writeFile(tempPath, contents, 'utf8');
    await replaceFile(tempPath, filePath);
  } finally {
    await fs.rm(tempPath, { force: true }).catch(() => {});
  }
}

async function replaceFile(tempPath: string, filePath: string): Promise<void> {
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code !== 'EEXIST' && err.code !== 'EPERM') {
      throw error;
    }
    await fs.rm(filePath, { force: true }).catch(() => {});
    await fs.rename(tempPath, filePath);
  }
}

export function printWarnings(warnings: FormatWarning[], source: string): void {
  for (const warning of warnings) {
    const where = warning.line !== undefined ? `${source}:${warning.line}` : source;
    console.warn(chalk.yellow(`⚠️  ${where}: ${warning.message}`));
  }
}
