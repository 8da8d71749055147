// src/tests/ExcelRenderer.test.ts
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as XLSX from 'xlsx';
import { ExcelRenderer, FORMULARY_SHEET, sanitizeSheetName } from '../services/ExcelRenderer';
import { Category, WarningReason } from '../types/extraction.types';

type SheetRow = Array<string | number>;

function sheetRows(workbook: XLSX.WorkBook, name: string): SheetRow[] {
  return XLSX.utils.sheet_to_json<SheetRow>(workbook.Sheets[name], { header: 1, defval: '' });
}

const categories: Category[] = [
  {
    name: 'Antibiotics',
    subCategories: [
      {
        name: 'Penicillins',
        rows: [
          { 'Drug Name': 'Amoxicillin', Tier: 'Tier 1' },
          { 'Drug Name': 'Penicillin VK', Tier: 'Tier 2' }
        ]
      },
      { name: 'Cephalosporins', rows: [{ 'Drug Name': 'Cefalexin', Tier: 'Tier 2' }] }
    ]
  },
  {
    name: 'Antivirals',
    subCategories: [
      { name: 'Influenza', rows: [{ 'Column 1': 'Oseltamivir', 'Column 2': 'Tier 3', 'Column 3': 'QL' }] }
    ]
  }
];

describe('ExcelRenderer', () => {
  describe('banded layout', () => {
    const workbook = new ExcelRenderer('banded').buildWorkbook({ categories });

    it('should lay out categories, subcategories and rows in document order on one sheet', () => {
      expect(workbook.SheetNames).toEqual([FORMULARY_SHEET]);
      expect(sheetRows(workbook, FORMULARY_SHEET)).toEqual([
        ['Antibiotics', '', ''],
        ['Penicillins', '', ''],
        ['Drug Name', 'Tier', ''],
        ['Amoxicillin', 'Tier 1', ''],
        ['Penicillin VK', 'Tier 2', ''],
        ['Cephalosporins', '', ''],
        ['Cefalexin', 'Tier 2', ''],
        ['Antivirals', '', ''],
        ['Influenza', '', ''],
        ['Column 1', 'Column 2', 'Column 3'],
        ['Oseltamivir', 'Tier 3', 'QL']
      ]);
    });

    it('should merge each category banner across the widest column set', () => {
      expect(workbook.Sheets[FORMULARY_SHEET]['!merges']).toEqual([
        { s: { r: 0, c: 0 }, e: { r: 0, c: 2 } },
        { s: { r: 7, c: 0 }, e: { r: 7, c: 2 } }
      ]);
    });

    it('should size columns to their content within bounds', () => {
      expect(workbook.Sheets[FORMULARY_SHEET]['!cols']).toEqual([{ wch: 16 }, { wch: 10 }, { wch: 10 }]);
    });
  });

  describe('sheet-per-category layout', () => {
    it('should give each category its own sheet with a safe unique name', () => {
      const workbook = new ExcelRenderer('sheet-per-category').buildWorkbook({
        categories: [
          { name: 'Antibiotics: Oral/IV', subCategories: [] },
          { name: 'Warnings', subCategories: [] },
          { name: 'Antibiotics: Oral/IV', subCategories: [] }
        ]
      });

      expect(workbook.SheetNames).toEqual(['Antibiotics Oral IV', 'Warnings (2)', 'Antibiotics Oral IV (2)']);
      expect(sheetRows(workbook, 'Warnings (2)')).toEqual([['Warnings']]);
    });
  });

  describe('sanitizeSheetName', () => {
    it('should truncate to 31 characters and keep suffixes within the limit', () => {
      const used = new Set<string>();
      const long = 'Antineoplastic and Immunosuppressant Agents';

      expect(sanitizeSheetName(long, used)).toBe('Antineoplastic and Immunosuppre');
      expect(sanitizeSheetName(long, used)).toBe('Antineoplastic and Immunosu (2)');
    });

    it('should name a sheet whose name is only forbidden characters', () => {
      expect(sanitizeSheetName('[?]', new Set())).toBe('Category');
    });
  });

  describe('warnings and table of contents', () => {
    it('should add sheets for non-empty warning and TOC lists', () => {
      const workbook = new ExcelRenderer().buildWorkbook({
        categories,
        warnings: [
          { pageNumber: 3, rawText: 'Ampicillin chewable Tier 2', reason: WarningReason.MALFORMED_ROW, context: 'Amoxicillin Tier 1' },
          { pageNumber: 4, rawText: '', reason: WarningReason.PAGE_WITHOUT_TEXT }
        ],
        tableOfContents: [{ label: 'Antibiotics', pageReference: 3 }, { label: 'Preface', pageReference: 'ii' }]
      });

      expect(workbook.SheetNames).toEqual(['Formulary', 'Warnings', 'Table of Contents']);
      expect(sheetRows(workbook, 'Warnings')).toEqual([
        ['Page', 'Reason', 'Text', 'Context'],
        [3, 'malformed_row', 'Ampicillin chewable Tier 2', 'Amoxicillin Tier 1'],
        [4, 'page_without_text', '', '']
      ]);
      expect(sheetRows(workbook, 'Table of Contents')).toEqual([
        ['Label', 'Page'],
        ['Antibiotics', 3],
        ['Preface', 'ii']
      ]);
    });

    it('should leave those sheets out when the lists are empty', () => {
      const workbook = new ExcelRenderer().buildWorkbook({ categories, warnings: [], tableOfContents: [] });
      expect(workbook.SheetNames).toEqual(['Formulary']);
    });
  });

  it('should write a workbook file that reads back', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'formulary-xlsx-'));
    try {
      const outputPath = path.join(dir, 'plan.xlsx');
      new ExcelRenderer().render({ categories }, outputPath);
      const workbook = XLSX.readFile(outputPath);

      expect(workbook.SheetNames).toEqual(['Formulary']);
      expect(sheetRows(workbook, 'Formulary')[3]).toEqual(['Amoxicillin', 'Tier 1', '']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
