// src/tests/TableOfContentsIndexer.test.ts
import { TableOfContentsIndexer } from '../parsers/TableOfContentsIndexer';
import { LineRole, TocEntryLine } from '../types/extraction.types';

function entry(label: string, pageReference: string | number): TocEntryLine {
  return {
    role: LineRole.TOC_ENTRY,
    label,
    pageReference,
    line: { pageNumber: 1, lineIndex: 0, text: `${label} ${pageReference}`, x: 0.1, y: 0.2, fontSize: 10, bold: false, cells: [] }
  };
}

describe('TableOfContentsIndexer', () => {
  it('should keep entries in order without removing duplicates', () => {
    const toc = new TableOfContentsIndexer();
    toc.add(entry('Antibiotics', 3));
    toc.add(entry('Preface', 'ii'));
    toc.add(entry('Antibiotics', 3));

    expect(toc.list()).toEqual([
      { label: 'Antibiotics', pageReference: 3 },
      { label: 'Preface', pageReference: 'ii' },
      { label: 'Antibiotics', pageReference: 3 }
    ]);
  });

  it('should refuse entries once closed', () => {
    const toc = new TableOfContentsIndexer();
    expect(toc.add(entry('Antibiotics', 3))).toBe(true);
    toc.close();

    expect(toc.isOpen()).toBe(false);
    expect(toc.add(entry('Antivirals', 9))).toBe(false);
    expect(toc.list()).toHaveLength(1);
  });
});
