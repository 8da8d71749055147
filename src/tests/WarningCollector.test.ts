// src/tests/WarningCollector.test.ts
import { WarningCollector } from '../parsers/WarningCollector';
import { AssembledLine, WarningReason } from '../types/extraction.types';

function line(text: string, pageNumber: number): AssembledLine {
  return { pageNumber, lineIndex: 0, text, x: 0.1, y: 0.5, fontSize: 10, bold: false, cells: [{ text, x: 0.1, x1: 0.3 }] };
}

describe('WarningCollector', () => {
  let collector: WarningCollector;

  beforeEach(() => {
    collector = new WarningCollector();
  });

  it('should attach the previous placed line on the same page as context', () => {
    collector.noteLine(line('Penicillins', 3));
    collector.recordLine(line('Amoxicillin ?? Tier 1', 3), WarningReason.MALFORMED_ROW);
    collector.recordLine(line('Cefalexin ?? Tier 2', 4), WarningReason.MALFORMED_ROW);

    expect(collector.list()).toEqual([
      { pageNumber: 3, rawText: 'Amoxicillin ?? Tier 1', reason: WarningReason.MALFORMED_ROW, context: 'Penicillins' },
      { pageNumber: 4, rawText: 'Cefalexin ?? Tier 2', reason: WarningReason.MALFORMED_ROW }
    ]);
    expect('context' in collector.list()[1]).toBe(false);
  });

  it('should truncate long context', () => {
    const warning = collector.record(1, 'Amoxicillin', WarningReason.MALFORMED_ROW, 'x'.repeat(200));
    expect(warning.context).toHaveLength(160);
  });

  it('should freeze recorded warnings', () => {
    const warning = collector.record(2, '', WarningReason.PAGE_WITHOUT_TEXT);
    expect(Object.isFrozen(warning)).toBe(true);
  });

  it('should count warnings overall and by reason', () => {
    collector.record(1, 'a', WarningReason.MALFORMED_ROW);
    collector.record(1, 'b', WarningReason.ROW_BEFORE_SUBCATEGORY);
    collector.record(2, 'c', WarningReason.UNCLASSIFIABLE_HEADER);

    expect(collector.count()).toBe(3);
    expect(collector.count([WarningReason.MALFORMED_ROW, WarningReason.ROW_BEFORE_SUBCATEGORY])).toBe(2);
  });

  it('should hand out copies of the list', () => {
    collector.record(1, 'a', WarningReason.MALFORMED_ROW);
    collector.list().pop();

    expect(collector.count()).toBe(1);
  });
});
