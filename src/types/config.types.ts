// src/types/config.types.ts

export interface ExtractionConfig {
  frontMatterPageLimit: number;
  columnTolerance: number;
  lineTolerance: number;
  cellGap: number;
  marginBand: number;
  categoryFontRatio: number;
  subcategoryFontRatio: number;
  indentTolerance: number;
  maxHeaderLength: number;
  minHeaderConfidence: number;
  lenientRows: boolean;
  splitPageColumns: boolean;
  minGutterWidth: number;
  frontMatterTitlePatterns: string[];
  columnHeaderLabels: string[];
}

export type SpreadsheetLayout = 'banded' | 'sheet-per-category';

export interface PipelineOptions {
  outputDir: string;
  jsonOnly: boolean;
  concurrency: number;
  layout: SpreadsheetLayout;
}

export interface LoggingProfile {
  appendTimestamp: boolean;
  timestampFormat: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  enableWarningLog: boolean;
  logDirectory: string;
}

export interface LoggingConfig extends Partial<LoggingProfile> {
  profile?: string;
  profiles?: { [name: string]: LoggingProfile };
}
