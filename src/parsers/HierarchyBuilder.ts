// src/parsers/HierarchyBuilder.ts
import {
  Category,
  ClassifiedLine,
  ColumnGrid,
  DataRowLine,
  LineRole,
  Row,
  WarningReason
} from '../types/extraction.types';
import { ColumnGridMapper } from './ColumnGrid';
import { WarningCollector } from './WarningCollector';
import { Logger } from '../utils/logger';

export const UNCATEGORIZED_CATEGORY_NAME = 'Uncategorized';

export enum BuilderState {
  NO_OPEN_CATEGORY = 'NO_OPEN_CATEGORY',
  CATEGORY_OPEN = 'CATEGORY_OPEN',
  SUBCATEGORY_OPEN = 'SUBCATEGORY_OPEN'
}

interface SubCategoryNode {
  name: string;
  firstPage: number;
  rows: Row[];
  grid: ColumnGrid | null;
}

interface CategoryNode {
  name: string;
  firstPage: number;
  synthetic: boolean;
  subCategories: SubCategoryNode[];
}

export interface BuilderSnapshot {
  state: BuilderState;
  openCategoryIndex: number | null;
  openSubCategoryIndex: number | null;
  openCategoryName: string | null;
  openSubCategoryName: string | null;
  categoryCount: number;
  rowsAppended: number;
  rowsJoined: number;
  rowWarnings: number;
  activeGrid: string[] | null;
}

/**
 * Category → subcategory → row state machine.
 * Open nodes are referenced by index into append-only lists; page breaks never close them.
 */
export class HierarchyBuilder {
  private readonly categories: CategoryNode[] = [];
  private state: BuilderState = BuilderState.NO_OPEN_CATEGORY;
  private openCategoryIndex: number | null = null;
  private openSubCategoryIndex: number | null = null;
  private headerGrid: ColumnGrid | null = null;
  private rowsAppended = 0;
  private rowsJoined = 0;
  private rowWarnings = 0;

  constructor(
    private readonly gridMapper: ColumnGridMapper,
    private readonly warnings: WarningCollector,
    private readonly logger: Logger = new Logger('HierarchyBuilder')
  ) {}

  consume(classified: ClassifiedLine): void {
    switch (classified.role) {
      case LineRole.CATEGORY_HEADER:
        this.openCategory(classified.name, classified.line.pageNumber, false);
        return;

      case LineRole.SUBCATEGORY_HEADER:
        if (this.state === BuilderState.NO_OPEN_CATEGORY) {
          this.warnings.recordLine(classified.line, WarningReason.SUBCATEGORY_WITHOUT_CATEGORY);
          this.openCategory(UNCATEGORIZED_CATEGORY_NAME, classified.line.pageNumber, true);
        }
        this.openSubCategory(classified.name, classified.line.pageNumber);
        return;

      case LineRole.COLUMN_HEADER: {
        const grid = this.gridMapper.fromHeader(classified.labels);
        if (this.headerGrid && !this.gridMapper.sameColumns(this.headerGrid, grid)) {
          this.logger.debug(`Column grid changed on page ${classified.line.pageNumber}: ${grid.columns.map(c => c.name).join(' | ')}`);
        }
        this.headerGrid = grid;
        const sub = this.currentSubCategory();
        if (sub) {
          sub.grid = grid;
        }
        return;
      }

      case LineRole.DATA_ROW:
        this.appendRow(classified);
        return;

      case LineRole.AMBIGUOUS_HEADER:
        this.warnings.recordLine(classified.line, WarningReason.UNCLASSIFIABLE_HEADER);
        return;

      case LineRole.TOC_ENTRY:
      case LineRole.NOISE:
        return;

      default: {
        const unhandled: never = classified;
        throw new Error(`Unhandled line role: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  getState(): BuilderState {
    return this.state;
  }

  /**
   * Grid used for the next row: the open subcategory's, else the last column header seen.
   */
  getActiveGrid(): ColumnGrid | null {
    return this.currentSubCategory()?.grid ?? this.headerGrid;
  }

  getRowCounts(): { appended: number; joined: number; warned: number } {
    return { appended: this.rowsAppended, joined: this.rowsJoined, warned: this.rowWarnings };
  }

  snapshot(): BuilderSnapshot {
    const category = this.currentCategory();
    const sub = this.currentSubCategory();
    const grid = this.getActiveGrid();
    return {
      state: this.state,
      openCategoryIndex: this.openCategoryIndex,
      openSubCategoryIndex: this.openSubCategoryIndex,
      openCategoryName: category?.name ?? null,
      openSubCategoryName: sub?.name ?? null,
      categoryCount: this.categories.length,
      rowsAppended: this.rowsAppended,
      rowsJoined: this.rowsJoined,
      rowWarnings: this.rowWarnings,
      activeGrid: grid ? grid.columns.map(c => c.name) : null
    };
  }

  /**
   * Close whatever is open and return the finished tree.
   */
  finish(): Category[] {
    this.state = BuilderState.NO_OPEN_CATEGORY;
    this.openCategoryIndex = null;
    this.openSubCategoryIndex = null;

    return this.categories.map(category => ({
      name: category.name,
      subCategories: category.subCategories.map(sub => ({
        name: sub.name,
        rows: sub.rows.map(row => ({ ...row }))
      }))
    }));
  }

  private openCategory(name: string, pageNumber: number, synthetic: boolean): void {
    this.categories.push({ name, firstPage: pageNumber, synthetic, subCategories: [] });
    this.openCategoryIndex = this.categories.length - 1;
    this.openSubCategoryIndex = null;
    this.state = BuilderState.CATEGORY_OPEN;
    this.logger.debug(`Opened ${synthetic ? 'synthetic ' : ''}category "${name}" on page ${pageNumber}`);
  }

  private openSubCategory(name: string, pageNumber: number): void {
    const category = this.currentCategory();
    if (!category) {
      throw new Error(`Cannot open subcategory "${name}" without an open category`);
    }
    category.subCategories.push({ name, firstPage: pageNumber, rows: [], grid: this.headerGrid });
    this.openSubCategoryIndex = category.subCategories.length - 1;
    this.state = BuilderState.SUBCATEGORY_OPEN;
  }

  private appendRow(classified: DataRowLine): void {
    const sub = this.currentSubCategory();
    if (this.state !== BuilderState.SUBCATEGORY_OPEN || !sub) {
      this.rowWarnings++;
      this.warnings.recordLine(classified.line, WarningReason.ROW_BEFORE_SUBCATEGORY);
      return;
    }

    if (classified.continuation) {
      this.joinToPreviousRow(classified, sub);
      return;
    }

    const grid = sub.grid ?? this.gridMapper.infer(classified.cells);
    const outcome = this.gridMapper.parseRow(classified.cells, grid);
    if (!outcome.ok) {
      this.rowWarnings++;
      this.warnings.recordLine(classified.line, WarningReason.MALFORMED_ROW, outcome.detail);
      return;
    }

    sub.grid = outcome.grid;
    sub.rows.push(outcome.row);
    this.rowsAppended++;
  }

  private joinToPreviousRow(classified: DataRowLine, sub: SubCategoryNode): void {
    const lastIndex = sub.rows.length - 1;
    const [cell] = classified.cells;
    const outcome = lastIndex >= 0 && sub.grid && cell
      ? this.gridMapper.joinContinuation(sub.rows[lastIndex], cell, sub.grid)
      : { ok: false as const, detail: `line "${classified.line.text}" has no row above it to continue` };

    if (!outcome.ok) {
      this.rowWarnings++;
      this.warnings.recordLine(classified.line, WarningReason.MALFORMED_ROW, outcome.detail);
      return;
    }

    sub.rows[lastIndex] = outcome.row;
    this.rowsJoined++;
  }

  private currentCategory(): CategoryNode | null {
    return this.openCategoryIndex === null ? null : this.categories[this.openCategoryIndex] ?? null;
  }

  private currentSubCategory(): SubCategoryNode | null {
    const category = this.currentCategory();
    if (!category || this.openSubCategoryIndex === null) return null;
    return category.subCategories[this.openSubCategoryIndex] ?? null;
  }
}
