// Result rows
// Boundary to the row iteration behind RESULT_SET values

import { TypeInfo } from "../types/type-info";
import type { Value } from "../values/values";

export interface ResultColumn {
  readonly name: string;
  readonly type: TypeInfo;
}

/**
 * Forward-only cursor over result rows.
 */
export interface ResultRows {
  readonly columnCount: number;
  readonly rowCount: number;
  columnName(index: number): string;
  columnType(index: number): TypeInfo;
  /** True if `next()` would advance to another row. */
  hasNext(): boolean;
  /** Advance to the next row; false past the end. */
  next(): boolean;
  /** Row at the cursor. */
  currentRow(): readonly Value[];
  /** Rewind to before the first row. */
  reset(): void;
  /** Independent cursor over the same rows, positioned before the first. */
  createCopy(): ResultRows;
}

/**
 * In-memory result.
 */
export class SimpleResult implements ResultRows {
  private readonly columns: ResultColumn[];
  private readonly rows: (readonly Value[])[];
  private cursor = -1;

  constructor(columns: ResultColumn[] = [], rows: (readonly Value[])[] = []) {
    this.columns = [...columns];
    this.rows = [...rows];
  }

  addColumn(name: string, type: TypeInfo): this {
    this.columns.push({ name, type });
    return this;
  }

  addRow(values: readonly Value[]): this {
    if (values.length !== this.columns.length) {
      throw new RangeError(`row has ${values.length} values, result has ${this.columns.length} columns`);
    }
    this.rows.push([...values]);
    return this;
  }

  get columnCount(): number {
    return this.columns.length;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  columnName(index: number): string {
    return this.column(index).name;
  }

  columnType(index: number): TypeInfo {
    return this.column(index).type;
  }

  hasNext(): boolean {
    return this.cursor + 1 < this.rows.length;
  }

  next(): boolean {
    if (this.cursor < this.rows.length) {
      this.cursor++;
    }
    return this.cursor < this.rows.length;
  }

  currentRow(): readonly Value[] {
    const row = this.rows[this.cursor];
    if (row === undefined) {
      throw new RangeError("no current row");
    }
    return row;
  }

  reset(): void {
    this.cursor = -1;
  }

  createCopy(): SimpleResult {
    return new SimpleResult(this.columns, this.rows);
  }

  /**
   * Every row, in order.
   */
  allRows(): readonly (readonly Value[])[] {
    return this.rows;
  }

  private column(index: number): ResultColumn {
    const column = this.columns[index];
    if (column === undefined) {
      throw new RangeError(`column index ${index} out of range`);
    }
    return column;
  }
}
