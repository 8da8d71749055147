// src/parsers/PdfTokenReader.ts
// pdf2json-backed token source: positioned text runs per page, normalized to the page box.

import * as fs from 'fs';
import PDFParser from 'pdf2json';
import { z } from 'zod';
import { PageTokens, TextToken, TokenSource } from '../types/extraction.types';
import { ExtractionError, errorMessage } from '../utils/errors';
import { clamp01 } from '../utils/layout-math';
import { Logger } from '../utils/logger';

// TS = [fontFaceId, fontSize, bold, italic]
const Pdf2JsonRunSchema = z.object({
  T: z.string(),
  TS: z.array(z.number()).optional()
});

const Pdf2JsonTextSchema = z.object({
  x: z.number(),
  y: z.number(),
  w: z.number().optional(),
  R: z.array(Pdf2JsonRunSchema)
});

const Pdf2JsonPageSchema = z.object({
  Width: z.number().positive().optional(),
  Height: z.number().positive(),
  Texts: z.array(Pdf2JsonTextSchema)
});

const Pdf2JsonOutputSchema = z.object({
  Pages: z.array(Pdf2JsonPageSchema)
});

export type Pdf2JsonOutput = z.infer<typeof Pdf2JsonOutputSchema>;
type Pdf2JsonText = z.infer<typeof Pdf2JsonTextSchema>;

// pdf2json measures pages in its own unit; a Letter page is 38.25 wide
const DEFAULT_PAGE_WIDTH = 38.25;
const DEFAULT_FONT_SIZE = 10;
// Rough glyph advance in page units per point of font size, used when a run has no width
const GLYPH_WIDTH_PER_POINT = 0.03;

function decodeRunText(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function toToken(text: Pdf2JsonText, pageWidth: number, pageHeight: number): TextToken | null {
  const content = text.R.map(run => decodeRunText(run.T)).join('');
  if (!content.trim()) return null;

  const style = text.R[0]?.TS ?? [];
  const fontSize = style[1] && style[1] > 0 ? style[1] : DEFAULT_FONT_SIZE;
  const bold = style[2] === 1;
  const width = text.w && text.w > 0 ? text.w : content.length * fontSize * GLYPH_WIDTH_PER_POINT;

  return {
    text: content,
    x: clamp01(text.x / pageWidth),
    y: clamp01(text.y / pageHeight),
    width: clamp01(width / pageWidth),
    fontSize,
    bold
  };
}

/**
 * Convert validated pdf2json output into normalized page tokens.
 */
export function toPageTokens(output: Pdf2JsonOutput): PageTokens[] {
  return output.Pages.map((page, index) => {
    const width = page.Width ?? DEFAULT_PAGE_WIDTH;
    const tokens: TextToken[] = [];
    for (const text of page.Texts) {
      const token = toToken(text, width, page.Height);
      if (token) tokens.push(token);
    }
    return { pageNumber: index + 1, width, height: page.Height, tokens };
  });
}

export function parsePdf2JsonOutput(raw: unknown, source: string): PageTokens[] {
  const parsed = Pdf2JsonOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExtractionError('UNREADABLE', source, `Unexpected pdf2json output structure: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return toPageTokens(parsed.data);
}

export class PdfTokenReader implements TokenSource {
  private pages: PageTokens[] | null = null;
  private readonly logger = new Logger('PdfTokenReader');

  constructor(private readonly pdfPath: string) {}

  async open(): Promise<number> {
    if (!this.pages) {
      this.pages = await this.parse();
      this.logger.debug(`Parsed ${this.pages.length} pages from ${this.pdfPath}`);
    }
    return this.pages.length;
  }

  async readPage(pageNumber: number): Promise<PageTokens> {
    const pages = this.pages ?? [];
    const page = pages[pageNumber - 1];
    if (!page) {
      throw new ExtractionError('UNREADABLE', this.pdfPath, `Page ${pageNumber} requested before open() or out of range`);
    }
    return page;
  }

  private async parse(): Promise<PageTokens[]> {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(this.pdfPath);
    } catch (error) {
      throw new ExtractionError('UNREADABLE', this.pdfPath, `Cannot read PDF file: ${errorMessage(error)}`, { cause: error });
    }

    const raw = await new Promise<unknown>((resolve, reject) => {
      const parser = new PDFParser();
      parser.on('pdfParser_dataError', (err: unknown) => {
        const inner = typeof err === 'object' && err !== null && 'parserError' in err ? err.parserError : err;
        reject(new ExtractionError('UNREADABLE', this.pdfPath, `pdf2json error: ${errorMessage(inner)}`, { cause: inner }));
      });
      parser.on('pdfParser_dataReady', (data: unknown) => resolve(data));
      parser.parseBuffer(buffer);
    });

    return parsePdf2JsonOutput(raw, this.pdfPath);
  }
}
