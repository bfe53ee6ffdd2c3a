import type { PluralValidationReport } from './plural-validator.js';
import type { PlaceholderValidationReport } from './placeholders.js';

export type LexiforgeErrorCode =
  | 'PARSE_ERROR'
  | 'WRITE_ERROR'
  | 'UNKNOWN_FORMAT'
  | 'DUPLICATE_ENTRY'
  | 'MERGE_CONFLICT'
  | 'PLURAL_VALIDATION'
  | 'PLACEHOLDER_VALIDATION'
  | 'SYNC_POLICY';

export class LexiforgeError extends Error {
  constructor(message: string, public readonly code: LexiforgeErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LexiforgeError';
  }
}

/**
 * Raised by format adapters when input cannot be read, or when a recoverable
 * anomaly is hit in strict mode.
 */
export class ParseError extends LexiforgeError {
  constructor(
    message: string,
    public readonly format: string,
    public readonly location?: { line?: number; path?: string },
    options?: { cause?: unknown }
  ) {
    super(message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
  }
}

export class WriteError extends LexiforgeError {
  constructor(message: string, public readonly format: string, public readonly key?: string) {
    super(message, 'WRITE_ERROR');
    this.name = 'WriteError';
  }
}

export class UnknownFormatError extends LexiforgeError {
  constructor(public readonly format: string, known: string[]) {
    super(`Unknown format "${format}". Known formats: ${known.join(', ') || 'none'}`, 'UNKNOWN_FORMAT');
    this.name = 'UnknownFormatError';
  }
}

export class DuplicateEntryError extends LexiforgeError {
  constructor(public readonly key: string, public readonly language: string) {
    super(`Duplicate entry for key "${key}" in language "${language}"`, 'DUPLICATE_ENTRY');
    this.name = 'DuplicateEntryError';
  }
}

export interface MergeConflictMember {
  /** Index of the input resource the value came from */
  input: number;
  value: string;
  status: string;
}

export interface MergeConflict {
  key: string;
  language: string;
  members: MergeConflictMember[];
}

export class MergeConflictError extends LexiforgeError {
  constructor(public readonly conflicts: MergeConflict[]) {
    const preview = conflicts
      .slice(0, 5)
      .map((conflict) => `${conflict.key} (${conflict.language})`)
      .join(', ');
    const suffix = conflicts.length > 5 ? ` and ${conflicts.length - 5} more` : '';
    super(
      `Merge failed with ${conflicts.length} conflicting entr${conflicts.length === 1 ? 'y' : 'ies'}: ${preview}${suffix}`,
      'MERGE_CONFLICT'
    );
    this.name = 'MergeConflictError';
  }
}

export class PluralValidationError extends LexiforgeError {
  constructor(public readonly report: PluralValidationReport) {
    super(
      `Plural validation failed: ${report.issues.length} entr${report.issues.length === 1 ? 'y is' : 'ies are'} missing required categories`,
      'PLURAL_VALIDATION'
    );
    this.name = 'PluralValidationError';
  }
}

export class PlaceholderValidationError extends LexiforgeError {
  constructor(public readonly report: PlaceholderValidationReport) {
    super(
      `Placeholder validation failed: ${report.issues.length} mismatch${report.issues.length === 1 ? '' : 'es'} against source language "${report.sourceLanguage}"`,
      'PLACEHOLDER_VALIDATION'
    );
    this.name = 'PlaceholderValidationError';
  }
}

export class SyncPolicyError extends LexiforgeError {
  constructor(public readonly violations: string[]) {
    super(`Sync policy violated: ${violations.join('; ')}`, 'SYNC_POLICY');
    this.name = 'SyncPolicyError';
  }
}
