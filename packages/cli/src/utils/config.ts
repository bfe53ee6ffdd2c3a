import path from 'path';
import chalk from 'chalk';
import {
  loadConfigWithMeta,
  resolvePluralRules,
  type LexiforgeConfig,
  type PluralRuleTable,
} from '@lexiforge/core';
import { CliError } from './errors.js';

export interface CommonCommandOptions {
  /** Path to lexiforge.config.json; discovered by walking up when omitted */
  config?: string;
  /** Base directory for relative paths and config discovery (defaults to process.cwd()) */
  cwd?: string;
}

export interface CliContext {
  config: LexiforgeConfig;
  configPath: string | null;
  projectRoot: string;
  cwd: string;
  resolvePath(filePath: string): string;
  loadPluralRules(): Promise<PluralRuleTable>;
}

export async function loadCliContext(options: CommonCommandOptions = {}): Promise<CliContext> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  let loaded: Awaited<ReturnType<typeof loadConfigWithMeta>>;
  try {
    loaded = await loadConfigWithMeta(options.config, { cwd });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(message);
  }

  const { config, configPath, projectRoot } = loaded;
  if (configPath && projectRoot !== cwd) {
    console.log(chalk.gray(`Config found at ${path.relative(cwd, configPath)}`));
  }

  return {
    config,
    configPath,
    projectRoot,
    cwd,
    resolvePath: (filePath) => path.resolve(cwd, filePath),
    loadPluralRules: async () => {
      try {
        return await resolvePluralRules(config, projectRoot);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CliError(`Unable to load plural rules: ${message}`);
      }
    },
  };
}
