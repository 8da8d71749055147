// src/parsers/ColumnGrid.ts
import { ColumnGrid, GridColumn, LineCell, Row } from '../types/extraction.types';
import { ExtractionConfig } from '../types/config.types';

export type RowParseOutcome =
  | { ok: true; row: Row; grid: ColumnGrid }
  | { ok: false; detail: string };

export type RowJoinOutcome =
  | { ok: true; row: Row }
  | { ok: false; detail: string };

type GridOptions = Pick<ExtractionConfig, 'columnTolerance' | 'lenientRows'>;

export function defaultColumnName(index: number): string {
  return `Column ${index + 1}`;
}

/**
 * Blank labels become "Column N", repeated labels get a " (2)" style suffix.
 * Integer-like labels are prefixed because JS objects would reorder them ahead of other keys.
 */
export function normalizeColumnNames(labels: string[]): string[] {
  const seen = new Map<string, number>();
  return labels.map((raw, index) => {
    let name = raw.trim() || defaultColumnName(index);
    if (/^\d+$/.test(name)) {
      name = `No. ${name}`;
    }
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    return count > 1 ? `${name} (${count})` : name;
  });
}

export class ColumnGridMapper {
  private readonly options: GridOptions;

  constructor(options: GridOptions) {
    this.options = options;
  }

  fromHeader(labels: LineCell[]): ColumnGrid {
    const names = normalizeColumnNames(labels.map(l => l.text));
    return {
      source: 'header',
      columns: labels.map((label, i) => ({ name: names[i], x: label.x }))
    };
  }

  infer(cells: LineCell[]): ColumnGrid {
    return {
      source: 'inferred',
      columns: cells.map((cell, i) => ({ name: defaultColumnName(i), x: cell.x }))
    };
  }

  /**
   * True when both grids carry the same labels in the same order (positions may drift between pages).
   */
  sameColumns(a: ColumnGrid, b: ColumnGrid): boolean {
    return a.columns.length === b.columns.length &&
      a.columns.every((col, i) => col.name === b.columns[i].name);
  }

  /**
   * Map a row's cells onto the grid. Every grid column appears in the row, empty when no cell landed in it.
   * An inferred grid may grow to the right; the returned grid is the one the row was parsed with.
   */
  parseRow(cells: LineCell[], grid: ColumnGrid): RowParseOutcome {
    const tolerance = this.options.columnTolerance;
    const columns: GridColumn[] = grid.columns.slice();
    const assigned = new Map<number, string>();

    for (const cell of cells) {
      let index = this.nearestAligned(cell, columns, tolerance);

      if (index === null && grid.source === 'inferred' && cell.x > columns[columns.length - 1].x + tolerance) {
        columns.push({ name: defaultColumnName(columns.length), x: cell.x });
        index = columns.length - 1;
      }

      if (index === null && this.options.lenientRows) {
        index = this.spanContaining(cell, columns, tolerance);
        if (index === null) {
          return { ok: false, detail: `cell "${cell.text}" starts left of the first column` };
        }
      }

      if (index === null) {
        return { ok: false, detail: `cell "${cell.text}" does not align with any column` };
      }

      const existing = assigned.get(index);
      if (existing !== undefined) {
        if (!this.options.lenientRows) {
          return {
            ok: false,
            detail: `cells "${existing}" and "${cell.text}" both fall in column "${columns[index].name}"`
          };
        }
        assigned.set(index, `${existing} ${cell.text}`);
      } else {
        assigned.set(index, cell.text);
      }
    }

    const row: Row = {};
    columns.forEach((col, i) => {
      row[col.name] = assigned.get(i) ?? '';
    });

    return {
      ok: true,
      row,
      grid: columns.length === grid.columns.length ? grid : { source: grid.source, columns }
    };
  }

  /**
   * Append a wrapped single-cell line to the row above, in the column the cell aligns with.
   * Only lenient mode joins; strict mode reports the line instead.
   */
  joinContinuation(previous: Row, cell: LineCell, grid: ColumnGrid): RowJoinOutcome {
    if (!this.options.lenientRows) {
      return { ok: false, detail: `line "${cell.text}" continues the previous row; joining needs lenient_rows` };
    }
    const index = this.nearestAligned(cell, grid.columns, this.options.columnTolerance);
    if (index === null) {
      return { ok: false, detail: `cell "${cell.text}" does not align with any column` };
    }
    const name = grid.columns[index].name;
    const existing = previous[name] ?? '';
    return { ok: true, row: { ...previous, [name]: existing ? `${existing} ${cell.text}` : cell.text } };
  }

  private nearestAligned(cell: LineCell, columns: GridColumn[], tolerance: number): number | null {
    let best: number | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    columns.forEach((col, i) => {
      const distance = Math.abs(cell.x - col.x);
      if (distance <= tolerance && distance < bestDistance) {
        best = i;
        bestDistance = distance;
      }
    });
    return best;
  }

  // Column j owns [x_j - T, x_{j+1} - T); the last column extends to the right edge
  private spanContaining(cell: LineCell, columns: GridColumn[], tolerance: number): number | null {
    let found: number | null = null;
    columns.forEach((col, i) => {
      if (cell.x >= col.x - tolerance) {
        found = i;
      }
    });
    return found;
  }
}
