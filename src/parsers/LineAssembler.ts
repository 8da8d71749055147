// src/parsers/LineAssembler.ts
// Group positioned tokens into lines and split each line into cells by horizontal gaps.

import {
  AssembledLine,
  LineCell,
  PageLayout,
  PageTokens,
  TextToken
} from '../types/extraction.types';
import { ExtractionConfig } from '../types/config.types';
import { collapseWhitespace, median, stableSortBy } from '../utils/layout-math';

type AssemblerOptions = Pick<ExtractionConfig, 'lineTolerance' | 'cellGap' | 'splitPageColumns' | 'minGutterWidth'>;

interface LineAcc {
  y: number;
  tokens: TextToken[];
}

// Below this many tokens on either side a gap is treated as table whitespace, not a gutter
const MIN_COLUMN_TOKENS = 8;

export interface AssembledPage {
  lines: AssembledLine[];
  layout: PageLayout;
}

export class LineAssembler {
  private readonly options: AssemblerOptions;

  constructor(options: AssemblerOptions) {
    this.options = options;
  }

  assemble(page: PageTokens): AssembledPage {
    const tokens = page.tokens
      .map(token => ({ ...token, text: collapseWhitespace(token.text) }))
      .filter(token => token.text.length > 0);

    let lines: AssembledLine[];
    const gutter = this.options.splitPageColumns ? this.findGutter(tokens) : null;

    if (gutter !== null) {
      const left = tokens.filter(t => t.x < gutter);
      const right = tokens.filter(t => t.x >= gutter);
      lines = [
        ...this.buildLines(page.pageNumber, left),
        ...this.buildLines(page.pageNumber, right)
      ];
    } else {
      lines = this.buildLines(page.pageNumber, tokens);
    }

    lines.forEach((line, index) => {
      line.lineIndex = index;
    });

    return {
      lines,
      layout: {
        pageNumber: page.pageNumber,
        bodyFontSize: median(tokens.map(t => t.fontSize).filter(size => size > 0)),
        leftMargin: lines.length ? Math.min(...lines.map(l => l.x)) : 0
      }
    };
  }

  /**
   * Find a vertical strip no token crosses, wide enough to separate two text columns.
   * Returns the x of the strip's middle, or null when the page reads as one column.
   */
  findGutter(tokens: TextToken[]): number | null {
    if (tokens.length < MIN_COLUMN_TOKENS * 2) return null;

    const spans = stableSortBy(
      tokens.map(t => ({ x0: t.x, x1: t.x + Math.max(0, t.width) })),
      span => span.x0
    );

    let best: { start: number; end: number } | null = null;
    let coveredTo = spans[0].x1;
    for (let i = 1; i < spans.length; i++) {
      const gapStart = coveredTo;
      const gapEnd = spans[i].x0;
      const middle = (gapStart + gapEnd) / 2;
      if (gapEnd - gapStart >= this.options.minGutterWidth && middle > 0.2 && middle < 0.8) {
        if (!best || gapEnd - gapStart > best.end - best.start) {
          best = { start: gapStart, end: gapEnd };
        }
      }
      coveredTo = Math.max(coveredTo, spans[i].x1);
    }

    if (!best) return null;

    const boundary = (best.start + best.end) / 2;
    const leftCount = tokens.filter(t => t.x < boundary).length;
    const rightCount = tokens.length - leftCount;
    if (leftCount < MIN_COLUMN_TOKENS || rightCount < MIN_COLUMN_TOKENS) return null;
    return boundary;
  }

  private buildLines(pageNumber: number, tokens: TextToken[]): AssembledLine[] {
    const sorted = stableSortBy(tokens, t => t.y * 10_000 + t.x);
    const groups: LineAcc[] = [];

    for (const token of sorted) {
      // Deterministic placement: first matching line by insertion order
      const group = groups.find(g => Math.abs(g.y - token.y) <= this.options.lineTolerance);
      if (group) {
        group.tokens.push(token);
      } else {
        groups.push({ y: token.y, tokens: [token] });
      }
    }

    const lines = groups.map(group => this.toLine(pageNumber, group));
    return stableSortBy(lines, l => l.y * 10_000 + l.x);
  }

  private toLine(pageNumber: number, group: LineAcc): AssembledLine {
    const tokens = stableSortBy(group.tokens, t => t.x);
    const cells = this.splitCells(tokens);

    return {
      pageNumber,
      lineIndex: 0,
      text: cells.map(c => c.text).join(' '),
      x: cells[0].x,
      y: group.y,
      fontSize: Math.max(...tokens.map(t => t.fontSize)),
      bold: tokens.every(t => t.bold),
      cells
    };
  }

  private splitCells(tokens: TextToken[]): LineCell[] {
    const cells: LineCell[] = [];
    const spaceGap = this.options.cellGap * 0.15;
    let current: { parts: string[]; x: number; x1: number } | null = null;

    for (const token of tokens) {
      const end = token.x + Math.max(0, token.width);
      if (current && token.x - current.x1 <= this.options.cellGap) {
        if (token.x - current.x1 > spaceGap) {
          current.parts.push(' ');
        }
        current.parts.push(token.text);
        current.x1 = Math.max(current.x1, end);
        continue;
      }
      if (current) {
        cells.push(this.closeCell(current));
      }
      current = { parts: [token.text], x: token.x, x1: end };
    }
    if (current) {
      cells.push(this.closeCell(current));
    }
    return cells;
  }

  private closeCell(acc: { parts: string[]; x: number; x1: number }): LineCell {
    return { text: collapseWhitespace(acc.parts.join('')), x: acc.x, x1: acc.x1 };
  }
}
