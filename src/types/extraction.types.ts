// src/types/extraction.types.ts

// ---- Token stream (what the PDF adapter hands to the core)

export interface TextToken {
  text: string;
  // Normalized to the page, origin top-left
  x: number;
  y: number;
  width: number;
  fontSize: number;
  bold: boolean;
}

export interface PageTokens {
  pageNumber: number;
  width: number;
  height: number;
  tokens: TextToken[];
}

export interface TokenSource {
  /**
   * Open the document and return its page count.
   * Rejects with an ExtractionError when the document cannot be read at all.
   */
  open(): Promise<number>;
  readPage(pageNumber: number): Promise<PageTokens>;
}

// ---- Assembled lines

export interface LineCell {
  text: string;
  x: number;
  x1: number;
}

export interface AssembledLine {
  pageNumber: number;
  lineIndex: number;
  text: string;
  x: number;
  y: number;
  fontSize: number;
  bold: boolean;
  cells: LineCell[];
}

export interface PageLayout {
  pageNumber: number;
  bodyFontSize: number;
  leftMargin: number;
}

// ---- Classification

export enum LineRole {
  CATEGORY_HEADER = 'CATEGORY_HEADER',
  SUBCATEGORY_HEADER = 'SUBCATEGORY_HEADER',
  COLUMN_HEADER = 'COLUMN_HEADER',
  DATA_ROW = 'DATA_ROW',
  TOC_ENTRY = 'TOC_ENTRY',
  AMBIGUOUS_HEADER = 'AMBIGUOUS_HEADER',
  NOISE = 'NOISE'
}

export type NoiseReason =
  | 'blank'
  | 'running_header_footer'
  | 'page_number'
  | 'front_matter_title'
  | 'unstructured_text';

interface ClassifiedLineBase {
  line: AssembledLine;
}

export interface CategoryHeaderLine extends ClassifiedLineBase {
  role: LineRole.CATEGORY_HEADER;
  name: string;
  confidence: number;
}

export interface SubCategoryHeaderLine extends ClassifiedLineBase {
  role: LineRole.SUBCATEGORY_HEADER;
  name: string;
  confidence: number;
}

export interface ColumnHeaderLine extends ClassifiedLineBase {
  role: LineRole.COLUMN_HEADER;
  labels: LineCell[];
}

export interface DataRowLine extends ClassifiedLineBase {
  role: LineRole.DATA_ROW;
  cells: LineCell[];
  // Lone text cell under an active grid: wrapped text belonging to the row above
  continuation: boolean;
}

export interface TocEntryLine extends ClassifiedLineBase {
  role: LineRole.TOC_ENTRY;
  label: string;
  pageReference: string | number;
}

export interface AmbiguousHeaderLine extends ClassifiedLineBase {
  role: LineRole.AMBIGUOUS_HEADER;
}

export interface NoiseLine extends ClassifiedLineBase {
  role: LineRole.NOISE;
  reason: NoiseReason;
}

export type ClassifiedLine =
  | CategoryHeaderLine
  | SubCategoryHeaderLine
  | ColumnHeaderLine
  | DataRowLine
  | TocEntryLine
  | AmbiguousHeaderLine
  | NoiseLine;

// ---- Column grid

export interface GridColumn {
  name: string;
  x: number;
}

export type GridSource = 'header' | 'inferred';

export interface ColumnGrid {
  source: GridSource;
  columns: GridColumn[];
}

// ---- Output hierarchy

export type Row = Record<string, string>;

export interface SubCategory {
  name: string;
  rows: Row[];
}

export interface Category {
  name: string;
  subCategories: SubCategory[];
}

export interface TOCEntry {
  label: string;
  pageReference: string | number;
}

export enum WarningReason {
  MALFORMED_ROW = 'malformed_row',
  ROW_BEFORE_SUBCATEGORY = 'row_before_subcategory',
  SUBCATEGORY_WITHOUT_CATEGORY = 'subcategory_without_category',
  UNCLASSIFIABLE_HEADER = 'unclassifiable_header',
  PAGE_WITHOUT_TEXT = 'page_without_text'
}

export interface ExtractionWarning {
  readonly pageNumber: number;
  readonly rawText: string;
  readonly reason: WarningReason;
  readonly context?: string;
}

export interface ExtractionResult {
  categories: Category[];
  warnings: ExtractionWarning[];
  table_of_contents: TOCEntry[];
}

export interface ExtractionStats {
  pages: number;
  lines: number;
  roleCounts: Record<LineRole, number>;
  dataRowCandidates: number;
  rowsAppended: number;
  rowsJoined: number;
  rowWarnings: number;
  categories: number;
  subCategories: number;
  tocEntries: number;
}

export interface ExtractionReport {
  result: ExtractionResult;
  stats: ExtractionStats;
}
