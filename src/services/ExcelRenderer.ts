// src/services/ExcelRenderer.ts
import * as XLSX from 'xlsx';
import { Category, ExtractionWarning, Row, SubCategory, TOCEntry } from '../types/extraction.types';
import { SpreadsheetLayout } from '../types/config.types';
import { Logger } from '../utils/logger';

export interface RenderInput {
  categories: Category[];
  warnings?: ExtractionWarning[];
  tableOfContents?: TOCEntry[];
}

type CellValue = string | number;

interface SheetBuffer {
  rows: CellValue[][];
  merges: XLSX.Range[];
}

export const FORMULARY_SHEET = 'Formulary';
export const WARNINGS_SHEET = 'Warnings';
export const TOC_SHEET = 'Table of Contents';

const MAX_SHEET_NAME = 31;
const MIN_COLUMN_WIDTH = 8;
const MAX_COLUMN_WIDTH = 60;

/**
 * Excel sheet names: at most 31 characters, none of []:*?/\ and no leading or trailing apostrophe.
 */
export function sanitizeSheetName(name: string, used: Set<string>): string {
  const base = name
    .replace(/[[\]:*?/\\]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^'+|'+$/g, '')
    .trim()
    .slice(0, MAX_SHEET_NAME)
    .trim() || 'Category';

  let candidate = base;
  let counter = 2;
  while (used.has(candidate.toLowerCase())) {
    const suffix = ` (${counter++})`;
    candidate = base.slice(0, MAX_SHEET_NAME - suffix.length).trimEnd() + suffix;
  }
  used.add(candidate.toLowerCase());
  return candidate;
}

// Column order is first appearance across the rows; grids that grew mid-subcategory widen earlier rows
function columnsOf(sub: SubCategory): string[] {
  const columns: string[] = [];
  for (const row of sub.rows) {
    for (const key of Object.keys(row)) {
      if (!columns.includes(key)) columns.push(key);
    }
  }
  return columns;
}

function rowValues(row: Row, columns: string[]): string[] {
  return columns.map(column => row[column] ?? '');
}

export class ExcelRenderer {
  private readonly logger = new Logger('ExcelRenderer');

  constructor(private readonly layout: SpreadsheetLayout = 'banded') {}

  buildWorkbook(input: RenderInput): XLSX.WorkBook {
    const workbook = XLSX.utils.book_new();
    const used = new Set<string>([WARNINGS_SHEET.toLowerCase(), TOC_SHEET.toLowerCase()]);

    if (this.layout === 'sheet-per-category' && input.categories.length > 0) {
      for (const category of input.categories) {
        const sheet = this.newSheetBuffer();
        this.appendCategory(sheet, category, this.widthOf([category]));
        XLSX.utils.book_append_sheet(workbook, this.toWorksheet(sheet), sanitizeSheetName(category.name, used));
      }
    } else {
      const sheet = this.newSheetBuffer();
      const width = this.widthOf(input.categories);
      for (const category of input.categories) {
        this.appendCategory(sheet, category, width);
      }
      XLSX.utils.book_append_sheet(workbook, this.toWorksheet(sheet), FORMULARY_SHEET);
    }

    if (input.warnings?.length) {
      const sheet = this.newSheetBuffer();
      sheet.rows.push(['Page', 'Reason', 'Text', 'Context']);
      for (const w of input.warnings) {
        sheet.rows.push([w.pageNumber, w.reason, w.rawText, w.context ?? '']);
      }
      XLSX.utils.book_append_sheet(workbook, this.toWorksheet(sheet), WARNINGS_SHEET);
    }

    if (input.tableOfContents?.length) {
      const sheet = this.newSheetBuffer();
      sheet.rows.push(['Label', 'Page']);
      for (const entry of input.tableOfContents) {
        sheet.rows.push([entry.label, entry.pageReference]);
      }
      XLSX.utils.book_append_sheet(workbook, this.toWorksheet(sheet), TOC_SHEET);
    }

    return workbook;
  }

  render(input: RenderInput, outputPath: string): void {
    const workbook = this.buildWorkbook(input);
    XLSX.writeFile(workbook, outputPath, { bookType: 'xlsx' });
    this.logger.info(`Workbook written: ${outputPath} (${workbook.SheetNames.join(', ')})`);
  }

  private newSheetBuffer(): SheetBuffer {
    return { rows: [], merges: [] };
  }

  private widthOf(categories: Category[]): number {
    let width = 1;
    for (const category of categories) {
      for (const sub of category.subCategories) {
        width = Math.max(width, columnsOf(sub).length);
      }
    }
    return width;
  }

  /**
   * Banner row for the category, a sub-header row per subcategory,
   * a column-label row whenever the column set changes, then the data rows.
   */
  private appendCategory(sheet: SheetBuffer, category: Category, width: number): void {
    const bannerRow = sheet.rows.length;
    sheet.rows.push([category.name]);
    if (width > 1) {
      sheet.merges.push({ s: { r: bannerRow, c: 0 }, e: { r: bannerRow, c: width - 1 } });
    }

    let previousColumns: string | null = null;
    for (const sub of category.subCategories) {
      sheet.rows.push([sub.name]);
      const columns = columnsOf(sub);
      if (!columns.length) continue;

      const signature = columns.join('\u0000');
      if (signature !== previousColumns) {
        sheet.rows.push(columns);
        previousColumns = signature;
      }
      for (const row of sub.rows) {
        sheet.rows.push(rowValues(row, columns));
      }
    }
  }

  private toWorksheet(sheet: SheetBuffer): XLSX.WorkSheet {
    const worksheet = XLSX.utils.aoa_to_sheet(sheet.rows);
    if (sheet.merges.length) {
      worksheet['!merges'] = sheet.merges;
    }
    worksheet['!cols'] = this.columnWidths(sheet);
    return worksheet;
  }

  // Banner rows span merged cells, so they do not widen the first column
  private columnWidths(sheet: SheetBuffer): XLSX.ColInfo[] {
    const bannerRows = new Set(sheet.merges.map(m => m.s.r));
    const widths: number[] = [];
    sheet.rows.forEach((row, r) => {
      if (bannerRows.has(r)) return;
      row.forEach((value, c) => {
        const length = String(value).length + 2;
        widths[c] = Math.max(widths[c] ?? MIN_COLUMN_WIDTH, Math.min(length, MAX_COLUMN_WIDTH));
      });
    });
    return Array.from(widths, width => ({ wch: width ?? MIN_COLUMN_WIDTH }));
  }
}
