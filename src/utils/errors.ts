// src/utils/errors.ts

export type ExtractionErrorCode = 'UNREADABLE' | 'NO_TEXT';

/**
 * Fatal, per-document failure. Classification anomalies never raise this;
 * they are recorded as warnings on the result instead.
 */
export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;
  readonly source: string;

  constructor(code: ExtractionErrorCode, source: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.code = code;
    this.source = source;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
