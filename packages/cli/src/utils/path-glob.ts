import fg from 'fast-glob';
import { CliError } from './errors.js';

/**
 * Expand input arguments. Literal paths pass through in order; glob patterns
 * expand to their sorted matches. Duplicates are dropped.
 */
export async function expandInputs(patterns: string[], cwd: string): Promise<string[]> {
  const files: string[] = [];
  const seen = new Set<string>();

  for (const pattern of patterns) {
    const matches = fg.isDynamicPattern(pattern)
      ? (
          await fg(pattern, {
            cwd,
            ignore: ['**/node_modules/**'],
            onlyFiles: true,
            absolute: false,
          })
        ).sort()
      : [pattern];

    if (!matches.length) {
      throw new CliError(`No input files match "${pattern}"`);
    }
    for (const match of matches) {
      if (!seen.has(match)) {
        seen.add(match);
        files.push(match);
      }
    }
  }

  if (!files.length) {
    throw new CliError('No input files given');
  }
  return files;
}

export function collectPatterns(value: string, previous: string[] = []): string[] {
  return previous.concat(
    value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean)
  );
}
