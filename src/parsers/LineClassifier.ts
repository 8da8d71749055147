// src/parsers/LineClassifier.ts
import {
  AssembledLine,
  ClassifiedLine,
  ColumnGrid,
  LineCell,
  LineRole,
  PageLayout
} from '../types/extraction.types';
import { ExtractionConfig } from '../types/config.types';

export interface ClassifierContext {
  // Title and TOC matching apply only while this is set
  frontMatter: boolean;
  layout: PageLayout;
  activeGrid: ColumnGrid | null;
}

type ClassifierOptions = Pick<
  ExtractionConfig,
  | 'marginBand'
  | 'categoryFontRatio'
  | 'subcategoryFontRatio'
  | 'indentTolerance'
  | 'maxHeaderLength'
  | 'frontMatterTitlePatterns'
  | 'columnHeaderLabels'
  | 'columnTolerance'
>;

interface HeaderCues {
  fontRatio: number;
  bold: boolean;
  upper: boolean;
  atMargin: boolean;
}

export class LineClassifier {
  private readonly options: ClassifierOptions;
  private readonly titlePatterns: RegExp[];
  private readonly columnLabels: Set<string>;

  private readonly pageNumberPatterns = [
    /^\d{1,4}$/,
    /^page\s+\d{1,4}(\s+of\s+\d{1,4})?$/i,
    /^[-–—]\s*\d{1,4}\s*[-–—]$/,
    /^\d{1,4}\s*\/\s*\d{1,4}$/
  ];

  // Label, dot leaders, then the page reference
  private readonly tocLeaderPattern = /^(.*?\p{L}.*?)\s*(?:\.\s*){2,}\s*(\S+)$/u;
  // Arabic numbers, or lower-case roman numerals as printed on front-matter pages
  private readonly pageReferencePattern = /^(?:\d{1,4}|(?=[ivxlc])c{0,3}(?:xc|xl|l?x{0,3})(?:ix|iv|v?i{0,3}))$/;

  constructor(options: ClassifierOptions) {
    this.options = options;
    this.titlePatterns = options.frontMatterTitlePatterns.map(source => new RegExp(source, 'i'));
    this.columnLabels = new Set(options.columnHeaderLabels.map(label => label.toLowerCase()));
  }

  classify(line: AssembledLine, context: ClassifierContext): ClassifiedLine {
    const text = line.text.trim();

    if (!text) {
      return { role: LineRole.NOISE, reason: 'blank', line };
    }
    if (line.y < this.options.marginBand || line.y > 1 - this.options.marginBand) {
      return { role: LineRole.NOISE, reason: 'running_header_footer', line };
    }
    if (this.pageNumberPatterns.some(pattern => pattern.test(text))) {
      return { role: LineRole.NOISE, reason: 'page_number', line };
    }

    if (context.frontMatter) {
      if (this.titlePatterns.some(pattern => pattern.test(text))) {
        return { role: LineRole.NOISE, reason: 'front_matter_title', line };
      }
      const toc = this.matchTocEntry(line);
      if (toc) {
        return { role: LineRole.TOC_ENTRY, label: toc.label, pageReference: toc.pageReference, line };
      }
    }

    const cues = this.headerCues(line, context.layout);
    if (line.cells.length === 1 && this.looksLikeHeader(text, cues)) {
      return this.classifyHeader(line, text, cues);
    }

    if (line.cells.length > 1 && this.isColumnHeader(line.cells, cues)) {
      return { role: LineRole.COLUMN_HEADER, labels: line.cells, line };
    }

    if (line.cells.length > 1 || /\d/.test(text)) {
      return { role: LineRole.DATA_ROW, cells: line.cells, continuation: false, line };
    }
    if (this.alignsWithGrid(line.cells[0], context.activeGrid)) {
      return { role: LineRole.DATA_ROW, cells: line.cells, continuation: true, line };
    }

    return { role: LineRole.NOISE, reason: 'unstructured_text', line };
  }

  matchTocEntry(line: AssembledLine): { label: string; pageReference: string | number } | null {
    const text = line.text.trim();

    const leader = this.tocLeaderPattern.exec(text);
    if (leader && this.pageReferencePattern.test(leader[2])) {
      return { label: leader[1].trim(), pageReference: this.toPageReference(leader[2]) };
    }

    // Two cells: a textual label and a separate trailing page reference
    if (line.cells.length === 2) {
      const [label, reference] = line.cells;
      if (/\p{L}/u.test(label.text) && !/\d/.test(label.text) && this.pageReferencePattern.test(reference.text)) {
        return { label: label.text.trim(), pageReference: this.toPageReference(reference.text) };
      }
    }
    return null;
  }

  headerCues(line: AssembledLine, layout: PageLayout): HeaderCues {
    const letters = line.text.replace(/[^\p{L}]/gu, '');
    return {
      fontRatio: layout.bodyFontSize > 0 ? line.fontSize / layout.bodyFontSize : 1,
      bold: line.bold,
      upper: letters.length >= 3 && letters === letters.toUpperCase() && letters !== letters.toLowerCase(),
      atMargin: line.x - layout.leftMargin <= this.options.indentTolerance
    };
  }

  private looksLikeHeader(text: string, cues: HeaderCues): boolean {
    if (!/\p{L}/u.test(text)) return false;
    return cues.bold || cues.fontRatio >= this.options.subcategoryFontRatio;
  }

  private classifyHeader(line: AssembledLine, text: string, cues: HeaderCues): ClassifiedLine {
    if (text.length > this.options.maxHeaderLength || /[.!?;]$/.test(text)) {
      return { role: LineRole.AMBIGUOUS_HEADER, line };
    }

    const large = cues.fontRatio >= this.options.categoryFontRatio;
    if (large || (cues.bold && cues.upper && cues.atMargin)) {
      const confidence = Math.min(1,
        0.3 +
        (large ? 0.25 : 0) +
        (cues.bold ? 0.2 : 0) +
        (cues.upper ? 0.15 : 0) +
        (cues.atMargin ? 0.1 : 0)
      );
      return { role: LineRole.CATEGORY_HEADER, name: text, confidence: round2(confidence), line };
    }

    const confidence = Math.min(1,
      0.5 +
      (cues.bold ? 0.25 : 0) +
      (cues.fontRatio >= this.options.subcategoryFontRatio ? 0.25 : 0)
    );
    return { role: LineRole.SUBCATEGORY_HEADER, name: text, confidence: round2(confidence), line };
  }

  private isColumnHeader(cells: LineCell[], cues: HeaderCues): boolean {
    if (cells.some(cell => /\d/.test(cell.text))) return false;
    if (cues.bold) return true;
    return cells.every(cell => this.columnLabels.has(cell.text.trim().toLowerCase()));
  }

  private alignsWithGrid(cell: LineCell | undefined, grid: ColumnGrid | null): boolean {
    if (!cell || !grid) return false;
    return grid.columns.some(col => Math.abs(cell.x - col.x) <= this.options.columnTolerance);
  }

  private toPageReference(raw: string): string | number {
    return /^\d+$/.test(raw) ? parseInt(raw, 10) : raw;
  }
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
