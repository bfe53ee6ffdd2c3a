import { ParseError, type FormatWarning, type ParseOptions } from '@lexiforge/core';

/**
 * Collects recoverable parse anomalies. In strict mode the first one becomes
 * a ParseError; otherwise it is kept as a warning and parsing continues.
 */
export class AnomalyCollector {
  public readonly warnings: FormatWarning[] = [];

  constructor(private readonly format: string, private readonly strict: boolean) {}

  public report(message: string, context: { key?: string; line?: number } = {}): void {
    if (this.strict) {
      throw new ParseError(message, this.format, context.line !== undefined ? { line: context.line } : undefined);
    }
    const warning: FormatWarning = { message };
    if (context.key !== undefined) warning.key = context.key;
    if (context.line !== undefined) warning.line = context.line;
    this.warnings.push(warning);
  }

  /**
   * Language for a single-language file: the caller's hint, then whatever the
   * file declares, then the caller's default. Missing all three is an anomaly
   * resolved to `und`.
   */
  public resolveLanguage(options: ParseOptions, declared?: string): string {
    const language = options.language?.trim() || declared?.trim() || options.defaultLanguage?.trim();
    if (language) {
      return language;
    }
    this.report(`No language given for ${this.format} input; using "und"`);
    return 'und';
  }
}
