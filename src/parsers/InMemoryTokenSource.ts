// src/parsers/InMemoryTokenSource.ts
import { PageTokens, TokenSource } from '../types/extraction.types';
import { ExtractionError } from '../utils/errors';

/**
 * Token source over pages that were already extracted, e.g. a saved token dump.
 */
export class InMemoryTokenSource implements TokenSource {
  constructor(private readonly pages: PageTokens[], private readonly name: string = 'in-memory') {}

  async open(): Promise<number> {
    return this.pages.length;
  }

  async readPage(pageNumber: number): Promise<PageTokens> {
    const page = this.pages[pageNumber - 1];
    if (!page) {
      throw new ExtractionError('UNREADABLE', this.name, `Page ${pageNumber} is out of range (1..${this.pages.length})`);
    }
    return { ...page, pageNumber };
  }
}
