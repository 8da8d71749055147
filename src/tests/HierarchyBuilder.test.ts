// src/tests/HierarchyBuilder.test.ts
import { BuilderState, HierarchyBuilder, UNCATEGORIZED_CATEGORY_NAME } from '../parsers/HierarchyBuilder';
import { ColumnGridMapper } from '../parsers/ColumnGrid';
import { WarningCollector } from '../parsers/WarningCollector';
import { AssembledLine, ClassifiedLine, LineRole, WarningReason } from '../types/extraction.types';

function line(texts: Array<[string, number]>, pageNumber = 1): AssembledLine {
  return {
    pageNumber,
    lineIndex: 0,
    text: texts.map(([t]) => t).join(' '),
    x: texts[0][1],
    y: 0.5,
    fontSize: 10,
    bold: false,
    cells: texts.map(([text, x]) => ({ text, x, x1: x + text.length * 0.005 }))
  };
}

const category = (name: string, pageNumber = 1): ClassifiedLine =>
  ({ role: LineRole.CATEGORY_HEADER, name, confidence: 0.9, line: line([[name, 0.1]], pageNumber) });

const subCategory = (name: string, pageNumber = 1): ClassifiedLine =>
  ({ role: LineRole.SUBCATEGORY_HEADER, name, confidence: 0.75, line: line([[name, 0.1]], pageNumber) });

const columns = (...labels: Array<[string, number]>): ClassifiedLine => {
  const l = line(labels);
  return { role: LineRole.COLUMN_HEADER, labels: l.cells, line: l };
};

const row = (...cells: Array<[string, number]>): ClassifiedLine => {
  const l = line(cells);
  return { role: LineRole.DATA_ROW, cells: l.cells, continuation: false, line: l };
};

const wrapped = (text: string, x: number): ClassifiedLine => {
  const l = line([[text, x]]);
  return { role: LineRole.DATA_ROW, cells: l.cells, continuation: true, line: l };
};

describe('HierarchyBuilder', () => {
  let warnings: WarningCollector;
  let builder: HierarchyBuilder;

  beforeEach(() => {
    warnings = new WarningCollector();
    builder = new HierarchyBuilder(new ColumnGridMapper({ columnTolerance: 0.03, lenientRows: false }), warnings);
  });

  it('should move through the open states as headers arrive', () => {
    expect(builder.getState()).toBe(BuilderState.NO_OPEN_CATEGORY);
    builder.consume(category('Antibiotics'));
    expect(builder.getState()).toBe(BuilderState.CATEGORY_OPEN);
    builder.consume(subCategory('Penicillins'));
    expect(builder.getState()).toBe(BuilderState.SUBCATEGORY_OPEN);
    builder.consume(category('Antivirals'));
    expect(builder.getState()).toBe(BuilderState.CATEGORY_OPEN);
  });

  it('should append rows to the open subcategory using the column header grid', () => {
    builder.consume(category('Antibiotics'));
    builder.consume(columns(['Drug Name', 0.1], ['Tier', 0.6]));
    builder.consume(subCategory('Penicillins'));
    builder.consume(row(['Amoxicillin', 0.1], ['Tier 1', 0.6]));
    builder.consume(subCategory('Cephalosporins'));
    builder.consume(row(['Cefalexin', 0.1], ['Tier 2', 0.6]));

    expect(builder.finish()).toEqual([
      {
        name: 'Antibiotics',
        subCategories: [
          { name: 'Penicillins', rows: [{ 'Drug Name': 'Amoxicillin', Tier: 'Tier 1' }] },
          { name: 'Cephalosporins', rows: [{ 'Drug Name': 'Cefalexin', Tier: 'Tier 2' }] }
        ]
      }
    ]);
    expect(warnings.list()).toEqual([]);
  });

  it('should open a synthetic category for a subcategory that has none', () => {
    builder.consume(subCategory('Penicillins'));
    builder.consume(row(['Amoxicillin', 0.1], ['Tier 1', 0.6]));

    expect(warnings.list()).toEqual([
      { pageNumber: 1, rawText: 'Penicillins', reason: WarningReason.SUBCATEGORY_WITHOUT_CATEGORY }
    ]);
    expect(builder.finish()).toEqual([
      {
        name: UNCATEGORIZED_CATEGORY_NAME,
        subCategories: [{ name: 'Penicillins', rows: [{ 'Column 1': 'Amoxicillin', 'Column 2': 'Tier 1' }] }]
      }
    ]);
  });

  it('should warn about rows while no subcategory is open', () => {
    builder.consume(row(['Amoxicillin', 0.1], ['Tier 1', 0.6]));
    builder.consume(category('Antibiotics'));
    builder.consume(row(['Ampicillin', 0.1], ['Tier 2', 0.6]));

    expect(warnings.list().map(w => w.reason)).toEqual([
      WarningReason.ROW_BEFORE_SUBCATEGORY,
      WarningReason.ROW_BEFORE_SUBCATEGORY
    ]);
    expect(builder.getRowCounts()).toEqual({ appended: 0, joined: 0, warned: 2 });
    expect(builder.finish()).toEqual([{ name: 'Antibiotics', subCategories: [] }]);
  });

  describe('wrapped continuation lines', () => {
    const openDrugTable = (target: HierarchyBuilder) => {
      target.consume(category('Antibiotics'));
      target.consume(columns(['Drug Name', 0.1], ['Tier', 0.6]));
      target.consume(subCategory('Penicillins'));
    };

    it('should reject a continuation line as malformed in strict mode', () => {
      openDrugTable(builder);
      builder.consume(row(['amoxicillin/clavulanate', 0.1], ['2', 0.6]));
      builder.consume(wrapped('potassium', 0.1));

      expect(warnings.list()).toEqual([
        { pageNumber: 1, rawText: 'potassium', reason: WarningReason.MALFORMED_ROW }
      ]);
      expect(builder.getRowCounts()).toEqual({ appended: 1, joined: 0, warned: 1 });
      expect(builder.finish()[0].subCategories[0].rows).toEqual([
        { 'Drug Name': 'amoxicillin/clavulanate', Tier: '2' }
      ]);
    });

    it('should join a continuation line onto the row above in lenient mode', () => {
      const lenient = new HierarchyBuilder(new ColumnGridMapper({ columnTolerance: 0.03, lenientRows: true }), warnings);
      openDrugTable(lenient);
      lenient.consume(row(['amoxicillin/clavulanate', 0.1], ['2', 0.6]));
      lenient.consume(wrapped('potassium', 0.1));

      expect(warnings.list()).toEqual([]);
      expect(lenient.getRowCounts()).toEqual({ appended: 1, joined: 1, warned: 0 });
      expect(lenient.finish()[0].subCategories[0].rows).toEqual([
        { 'Drug Name': 'amoxicillin/clavulanate potassium', Tier: '2' }
      ]);
    });

    it('should reject a continuation line with no row above it even in lenient mode', () => {
      const lenient = new HierarchyBuilder(new ColumnGridMapper({ columnTolerance: 0.03, lenientRows: true }), warnings);
      openDrugTable(lenient);
      lenient.consume(wrapped('potassium', 0.1));

      expect(warnings.list().map(w => w.reason)).toEqual([WarningReason.MALFORMED_ROW]);
      expect(lenient.getRowCounts()).toEqual({ appended: 0, joined: 0, warned: 1 });
    });
  });

  it('should record ambiguous headers without changing state', () => {
    builder.consume(category('Antibiotics'));
    builder.consume(subCategory('Penicillins'));
    builder.consume({ role: LineRole.AMBIGUOUS_HEADER, line: line([['See the notes below.', 0.1]]) });

    expect(builder.getState()).toBe(BuilderState.SUBCATEGORY_OPEN);
    expect(warnings.list().map(w => w.reason)).toEqual([WarningReason.UNCLASSIFIABLE_HEADER]);
  });

  it('should ignore noise and TOC lines', () => {
    builder.consume({ role: LineRole.NOISE, reason: 'page_number', line: line([['12', 0.5]]) });
    builder.consume({ role: LineRole.TOC_ENTRY, label: 'Antibiotics', pageReference: 3, line: line([['Antibiotics', 0.1]]) });

    expect(builder.getState()).toBe(BuilderState.NO_OPEN_CATEGORY);
    expect(builder.finish()).toEqual([]);
    expect(warnings.list()).toEqual([]);
  });

  it('should keep repeated headers as separate nodes', () => {
    builder.consume(category('Antibiotics'));
    builder.consume(subCategory('Penicillins'));
    builder.consume(category('Antibiotics', 2));
    builder.consume(subCategory('Penicillins', 2));

    const categories = builder.finish();
    expect(categories.map(c => c.name)).toEqual(['Antibiotics', 'Antibiotics']);
    expect(categories.map(c => c.subCategories.length)).toEqual([1, 1]);
  });

  it('should expose the open nodes and active grid in a snapshot', () => {
    builder.consume(category('Antibiotics'));
    builder.consume(subCategory('Penicillins'));
    builder.consume(row(['Amoxicillin', 0.1], ['Tier 1', 0.6]));
    builder.consume(row(['Ampicillin', 0.1], ['chewable', 0.35], ['Tier 2', 0.6]));

    expect(builder.snapshot()).toEqual({
      state: BuilderState.SUBCATEGORY_OPEN,
      openCategoryIndex: 0,
      openSubCategoryIndex: 0,
      openCategoryName: 'Antibiotics',
      openSubCategoryName: 'Penicillins',
      categoryCount: 1,
      rowsAppended: 1,
      rowsJoined: 0,
      rowWarnings: 1,
      activeGrid: ['Column 1', 'Column 2']
    });
  });

  it('should close everything on finish', () => {
    builder.consume(category('Antibiotics'));
    builder.consume(subCategory('Penicillins'));
    builder.finish();

    expect(builder.getState()).toBe(BuilderState.NO_OPEN_CATEGORY);
    expect(builder.getActiveGrid()).toBeNull();
  });
});
