/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { LexiforgeConfig, LoadConfigResult } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';
import { loadDefaultPluralRules, loadPluralRulesFile, type PluralRuleTable } from '../plural-rules.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search upward through directories for a file.
 */
export async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = path.resolve(cwd);
  const maxDepth = 10;

  for (let depth = 0; depth <= maxDepth; depth += 1) {
    const filePath = path.join(currentDir, filename);
    if (await fileExists(filePath)) {
      return filePath;
    }
    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

async function readConfigFile(resolvedPath: string): Promise<unknown> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new Error(`Config file not found at ${resolvedPath}.`);
    }
    throw new Error(`Unable to read config file at ${resolvedPath}: ${err.message}`);
  }

  try {
    return JSON.parse(fileContents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config file at ${resolvedPath} contains invalid JSON: ${message}`);
  }
}

/**
 * Load the config file. An explicit path must exist; without one the default
 * filename is searched for from `cwd` upward and defaults apply when none is
 * found.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  let resolvedPath: string | null;

  if (configPath) {
    resolvedPath = path.resolve(cwd, configPath);
  } else {
    resolvedPath = await findUp(DEFAULT_CONFIG_FILENAME, cwd);
  }

  if (!resolvedPath) {
    const config = normalizeConfig({});
    return { config, configPath: null, projectRoot: path.resolve(cwd) };
  }

  const rawConfig = await readConfigFile(resolvedPath);
  const config = normalizeConfig(rawConfig);
  assertConfigValid(config);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
  };
}

export async function loadConfig(configPath?: string, options?: { cwd?: string }): Promise<LexiforgeConfig> {
  const result = await loadConfigWithMeta(configPath, options);
  return result.config;
}

/**
 * Plural rule table for a project: the shipped table, then the rules file,
 * then inline `plurals.rules`.
 */
export async function resolvePluralRules(config: LexiforgeConfig, projectRoot: string): Promise<PluralRuleTable> {
  const base = config.plurals.rulesFile
    ? await loadPluralRulesFile(path.resolve(projectRoot, config.plurals.rulesFile))
    : loadDefaultPluralRules();
  return Object.keys(config.plurals.rules).length ? base.extend(config.plurals.rules) : base;
}
