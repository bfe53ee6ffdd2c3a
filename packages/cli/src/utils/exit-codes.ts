/**
 * Exit Code Reference for the lexiforge CLI
 *
 * | Code | Meaning                                                     |
 * |------|-------------------------------------------------------------|
 * | 0    | Success                                                     |
 * | 1    | Runtime failure, validation failure or sync policy violation |
 * | 2    | Plural validation failure                                   |
 *
 * ```bash
 * lexiforge validate -i res/values-fr/strings.xml --strict
 * case $? in
 *   0) echo "All clear" ;;
 *   2) echo "Plural categories missing" ;;
 *   *) echo "Failed" ;;
 * esac
 * ```
 */

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,
  /** General error, including parse/write failures and placeholder mismatches */
  ERROR: 1,
  /** At least one plural entry misses a required category */
  PLURAL_VALIDATION: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const EXIT_CODE_DESCRIPTIONS: Record<number, string> = {
  [EXIT_CODES.SUCCESS]: 'Success',
  [EXIT_CODES.ERROR]: 'General error',
  [EXIT_CODES.PLURAL_VALIDATION]: 'Plural validation failed',
};

export function getExitCodeDescription(code: number): string {
  return EXIT_CODE_DESCRIPTIONS[code] ?? `Unknown exit code: ${code}`;
}

/**
 * Set the process exit code, logging its meaning when `DEBUG` mentions lexiforge.
 */
export function setExitCode(code: number, options?: { silent?: boolean }): void {
  process.exitCode = code;
  if (!options?.silent && code !== 0 && process.env.DEBUG?.includes('lexiforge')) {
    console.error(`[lexiforge] Exit code ${code}: ${getExitCodeDescription(code)}`);
  }
}
