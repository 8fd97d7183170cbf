import type { CellValue } from './types';

/**
 * In-memory table with unique column labels and rows addressed by
 * (row index, column label).
 *
 * One live instance is owned per session; stores and commands hold a reference
 * to it and never copy it. Workers get {@link Dataset.snapshot} instead.
 */
export class Dataset {
  private readonly labels: readonly string[];
  private readonly index: Map<string, number>;
  private readonly rows: CellValue[][];

  constructor(columns: readonly string[], rows: CellValue[][] = []) {
    const index = new Map<string, number>();
    columns.forEach((c, i) => {
      if (index.has(c)) throw new Error(`Duplicate column label: ${c}`);
      index.set(c, i);
    });
    this.labels = [...columns];
    this.index = index;
    this.rows = rows.map((r) => columns.map((_, i) => r[i] ?? null));
  }

  static fromRecords(columns: readonly string[], records: Record<string, CellValue>[]): Dataset {
    return new Dataset(columns, records.map((rec) => columns.map((c) => rec[c] ?? null)));
  }

  static fromColumns(data: Record<string, CellValue[]>): Dataset {
    const columns = Object.keys(data);
    const height = Math.max(0, ...columns.map((c) => data[c].length));
    const rows: CellValue[][] = [];
    for (let r = 0; r < height; r++) rows.push(columns.map((c) => data[c][r] ?? null));
    return new Dataset(columns, rows);
  }

  get columns(): readonly string[] {
    return this.labels;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  get isEmpty(): boolean {
    return this.rows.length === 0;
  }

  hasColumn(column: string): boolean {
    return this.index.has(column);
  }

  get(row: number, column: string): CellValue {
    return this.rows[this.checkRow(row)][this.colIndex(column)];
  }

  set(row: number, column: string, value: CellValue): void {
    this.rows[this.checkRow(row)][this.colIndex(column)] = value;
  }

  /** Values of one column, top to bottom. */
  column(column: string): CellValue[] {
    const i = this.colIndex(column);
    return this.rows.map((r) => r[i]);
  }

  row(row: number): readonly CellValue[] {
    return [...this.rows[this.checkRow(row)]];
  }

  snapshot(): Dataset {
    return new Dataset(this.labels, this.rows.map((r) => [...r]));
  }

  private colIndex(column: string): number {
    const i = this.index.get(column);
    if (i === undefined) throw new Error(`Unknown column: ${column}`);
    return i;
  }

  private checkRow(row: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows.length) {
      throw new Error(`Row out of range: ${row}`);
    }
    return row;
  }
}
