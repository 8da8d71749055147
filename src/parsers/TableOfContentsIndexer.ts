// src/parsers/TableOfContentsIndexer.ts
import { TOCEntry, TocEntryLine } from '../types/extraction.types';

/**
 * Collects the document's printed table of contents, in document order and without deduplication.
 * Once closed it never reopens.
 */
export class TableOfContentsIndexer {
  private readonly entries: TOCEntry[] = [];
  private closed = false;

  isOpen(): boolean {
    return !this.closed;
  }

  add(line: TocEntryLine): boolean {
    if (this.closed) {
      return false;
    }
    this.entries.push({ label: line.label, pageReference: line.pageReference });
    return true;
  }

  close(): void {
    this.closed = true;
  }

  list(): TOCEntry[] {
    return this.entries.map(entry => ({ ...entry }));
  }
}
