import { cellInt, cellText, type Cell } from './_table';

/**
 * Matrix (bill-of-materials) sheet layout.
 *
 * Columns are addressed by position, not by header. Row 0 is the header,
 * row 1 carries the frame part number, rows 1.. are data rows.
 */
export const MATRIX_COLUMNS = {
  no: 0,
  startPart: 1,
  factory: 2,
  partNumber: 4,
  partName: 5,
  spec: 6,
  colorOutside: 7,
  colorInside: 8,
  quantity: 9,
  unit: 10,
} as const;

export const OPTION_START_COL = 11;

export const REQUIRED_HEADERS: ReadonlyArray<{ index: number; label: string }> = [
  { index: MATRIX_COLUMNS.no, label: 'No' },
  { index: MATRIX_COLUMNS.startPart, label: 'start part' },
  { index: MATRIX_COLUMNS.factory, label: 'factory' },
  { index: MATRIX_COLUMNS.partNumber, label: 'part number' },
];

export const MATRIX_SHEET_NAME = 'Matrix';

export class MatrixRow {
  readonly index: number;
  private readonly cells: readonly Cell[];

  constructor(index: number, cells: readonly Cell[]) {
    this.index = index;
    this.cells = cells;
  }

  get width(): number {
    return this.cells.length;
  }

  cell(column: number): Cell {
    return this.cells[column] ?? null;
  }

  text(column: number): string {
    return cellText(this.cell(column));
  }

  get startPart(): string {
    return this.text(MATRIX_COLUMNS.startPart);
  }

  get factory(): string {
    return this.text(MATRIX_COLUMNS.factory);
  }

  get partNumber(): string {
    return this.text(MATRIX_COLUMNS.partNumber);
  }

  get partName(): string {
    return this.text(MATRIX_COLUMNS.partName);
  }

  get spec(): string {
    return this.text(MATRIX_COLUMNS.spec);
  }

  get colorOutside(): string {
    return this.text(MATRIX_COLUMNS.colorOutside);
  }

  get colorInside(): string {
    return this.text(MATRIX_COLUMNS.colorInside);
  }

  get quantity(): number {
    return cellInt(this.cell(MATRIX_COLUMNS.quantity));
  }

  get unit(): string {
    return this.text(MATRIX_COLUMNS.unit);
  }

  /** Raw cells from the option start column to the end of the row */
  get optionCells(): readonly Cell[] {
    return this.cells.slice(OPTION_START_COL);
  }

  toArray(): Cell[] {
    return [...this.cells];
  }
}

/**
 * The whole matrix sheet. Rows are padded to a common width at construction,
 * so every row answers for every column up to `width`.
 */
export class MatrixTable {
  readonly rows: readonly MatrixRow[];
  readonly width: number;

  private constructor(rows: readonly MatrixRow[], width: number) {
    this.rows = rows;
    this.width = width;
  }

  static fromGrid(grid: ReadonlyArray<ReadonlyArray<Cell | undefined>>): MatrixTable {
    const width = grid.reduce((max, row) => Math.max(max, row.length), 0);
    const rows = grid.map((raw, index) => {
      const cells: Cell[] = [];
      for (let col = 0; col < width; col++) {
        cells.push(raw[col] ?? null);
      }
      return new MatrixRow(index, Object.freeze(cells));
    });
    return new MatrixTable(Object.freeze(rows), width);
  }

  get length(): number {
    return this.rows.length;
  }

  get header(): MatrixRow | undefined {
    return this.rows[0];
  }

  /** Rows from index 1 on; row 1 is both the frame row and the first data row */
  get dataRows(): readonly MatrixRow[] {
    return this.rows.slice(1);
  }

  /**
   * First data row whose part-number cell equals `partNumber`, scanning top to bottom.
   */
  findByPartNumber(partNumber: string): MatrixRow | null {
    for (const row of this.dataRows) {
      if (row.partNumber === partNumber) {
        return row;
      }
    }
    return null;
  }

  toGrid(): Cell[][] {
    return this.rows.map((row) => row.toArray());
  }
}
