import chalk from 'chalk';
import { LexiforgeError, MergeConflictError, PluralValidationError } from '@lexiforge/core';
import { EXIT_CODES, setExitCode } from './exit-codes.js';

export class CliError extends Error {
  constructor(message: string, public exitCode: number = EXIT_CODES.ERROR) {
    super(message);
    this.name = 'CliError';
  }
}

type MaybePromise<T> = T | Promise<T>;

export function exitCodeForError(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof PluralValidationError) {
    return EXIT_CODES.PLURAL_VALIDATION;
  }
  return EXIT_CODES.ERROR;
}

function printLexiforgeError(error: LexiforgeError): void {
  console.error(chalk.red(`${error.name}: ${error.message}`));
  if (error instanceof MergeConflictError) {
    for (const conflict of error.conflicts) {
      console.error(chalk.yellow(`  ${conflict.key} (${conflict.language})`));
      for (const member of conflict.members) {
        console.error(chalk.gray(`    input ${member.input + 1}: ${JSON.stringify(member.value)} [${member.status}]`));
      }
    }
  }
  if (error instanceof PluralValidationError) {
    for (const issue of error.report.issues) {
      console.error(chalk.yellow(`  ${issue.key} (${issue.language}): missing ${issue.missingCategories.join(', ')}`));
    }
  }
}

export function withErrorHandling<A extends unknown[], R>(
  action: (...args: A) => MaybePromise<R>
): (...args: A) => Promise<R | undefined> {
  return async (...args: A): Promise<R | undefined> => {
    try {
      return (await action(...args)) as R;
    } catch (error) {
      if (error instanceof CliError) {
        console.error(chalk.red(error.message));
        setExitCode(error.exitCode);
        return undefined;
      }

      if (error instanceof LexiforgeError) {
        printLexiforgeError(error);
        setExitCode(exitCodeForError(error));
        return undefined;
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`Unexpected error: ${message}`));
      if (error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      setExitCode(EXIT_CODES.ERROR);
      return undefined;
    }
  };
}
