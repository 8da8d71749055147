// src/config/extraction-config.ts
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ExtractionConfig } from '../types/config.types';
import { ConfigError } from '../utils/errors';

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/extraction-config.json');

const fraction = z.number().gt(0).lt(1);

const regexSource = z.string().min(1).refine(source => {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}, { message: 'not a valid regular expression' });

export const ExtractionConfigSchema = z.object({
  front_matter_page_limit: z.number().int().min(0),
  column_tolerance: fraction,
  line_tolerance: fraction,
  cell_gap: fraction,
  margin_band: z.number().min(0).lt(0.5),
  category_font_ratio: z.number().min(1),
  subcategory_font_ratio: z.number().min(1),
  indent_tolerance: fraction,
  max_header_length: z.number().int().positive(),
  min_header_confidence: z.number().min(0).max(1),
  lenient_rows: z.boolean(),
  split_page_columns: z.boolean(),
  min_gutter_width: fraction,
  front_matter_title_patterns: z.array(regexSource),
  column_header_labels: z.array(z.string().min(1))
}).strict().refine(
  cfg => cfg.category_font_ratio >= cfg.subcategory_font_ratio,
  { message: 'category_font_ratio must not be smaller than subcategory_font_ratio', path: ['category_font_ratio'] }
);

export type ExtractionConfigFile = z.infer<typeof ExtractionConfigSchema>;

const PartialConfigSchema = z.record(z.unknown());

function readJson(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Configuration file not readable: ${filePath}`, [String(error)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Configuration file is not valid JSON: ${filePath}`, [String(error)]);
  }

  const result = PartialConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${filePath}`);
  }
  return result.data;
}

export function toExtractionConfig(file: ExtractionConfigFile): ExtractionConfig {
  return {
    frontMatterPageLimit: file.front_matter_page_limit,
    columnTolerance: file.column_tolerance,
    lineTolerance: file.line_tolerance,
    cellGap: file.cell_gap,
    marginBand: file.margin_band,
    categoryFontRatio: file.category_font_ratio,
    subcategoryFontRatio: file.subcategory_font_ratio,
    indentTolerance: file.indent_tolerance,
    maxHeaderLength: file.max_header_length,
    minHeaderConfidence: file.min_header_confidence,
    lenientRows: file.lenient_rows,
    splitPageColumns: file.split_page_columns,
    minGutterWidth: file.min_gutter_width,
    frontMatterTitlePatterns: file.front_matter_title_patterns,
    columnHeaderLabels: file.column_header_labels
  };
}

/**
 * Validate a snake_case configuration object (defaults already merged in).
 */
export function parseExtractionConfig(input: unknown): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigError('Invalid extraction configuration', issues);
  }
  return toExtractionConfig(result.data);
}

/**
 * Load the bundled defaults, then merge an optional user file and explicit overrides over them.
 */
export function loadExtractionConfig(
  userConfigPath?: string,
  overrides: Record<string, unknown> = {},
  defaultsPath: string = DEFAULT_CONFIG_PATH
): ExtractionConfig {
  const defaults = readJson(defaultsPath);
  const user = userConfigPath ? readJson(path.resolve(userConfigPath)) : {};
  return parseExtractionConfig({ ...defaults, ...user, ...overrides });
}

let cachedDefaults: ExtractionConfig | null = null;

export function getDefaultExtractionConfig(): ExtractionConfig {
  if (!cachedDefaults) {
    cachedDefaults = loadExtractionConfig();
  }
  return { ...cachedDefaults };
}
