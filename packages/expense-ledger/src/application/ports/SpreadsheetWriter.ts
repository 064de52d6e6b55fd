export type SheetCell = string | number;

/**
 * Grand-total row placed below the data. Rows and columns are 1-based.
 */
export interface SheetTotalRow {
  row: number;
  labelColumn: number;
  valueColumn: number;
  label: string;
  value: number;
}

/**
 * Encoder-independent description of a single-sheet workbook.
 */
export interface SheetLayout {
  title: string;
  header: string[];
  rows: SheetCell[][];
  /** Number format per column, `undefined` for the default. */
  columnFormats: (string | undefined)[];
  /** Width per column, in characters. */
  columnWidths: number[];
  total: SheetTotalRow;
}

/**
 * Capability port for writing spreadsheet files.
 * Optional: the ledger works without one and refuses spreadsheet exports.
 */
export interface SpreadsheetWriter {
  readonly name: string;
  write(layout: SheetLayout, destination: string): Promise<void>;
}
