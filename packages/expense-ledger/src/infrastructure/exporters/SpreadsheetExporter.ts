import type { Expense } from "@/domain/entities";
import { ExportEmptyError, PersistError } from "@/domain/errors";
import { Money } from "@/domain/value-objects";
import type { SheetCell, SheetLayout, SpreadsheetWriter } from "@/application/ports";
import { resolveExportPath, type ExportTarget } from "./exportFileName";

export const SHEET_TITLE = "Expenses";
export const SHEET_HEADER = ["Date", "Category", "Amount", "Description"];
export const MAX_COLUMN_WIDTH = 50;

const AMOUNT_COLUMN = 3;
const AMOUNT_FORMAT = "0.00";

function cellText(cell: SheetCell): string {
  return typeof cell === "number" ? Money.create(cell).toFixed() : cell;
}

/**
 * Lay out expenses as a sheet: header, one row per expense, and a
 * "Total:" row two rows below the last expense.
 *
 * Column widths fit the longest header or data cell, capped at 50.
 */
export function buildSheetLayout(expenses: readonly Expense[]): SheetLayout {
  const rows: SheetCell[][] = expenses.map((expense) => [
    expense.date,
    expense.category,
    Money.round(expense.amount),
    expense.description,
  ]);

  const columnWidths = SHEET_HEADER.map((title, column) =>
    Math.min(
      MAX_COLUMN_WIDTH,
      rows.reduce(
        (width, row) => Math.max(width, cellText(row[column]).length),
        title.length
      )
    )
  );

  return {
    title: SHEET_TITLE,
    header: [...SHEET_HEADER],
    rows,
    columnFormats: SHEET_HEADER.map((_, column) =>
      column + 1 === AMOUNT_COLUMN ? AMOUNT_FORMAT : undefined
    ),
    columnWidths,
    total: {
      // header row + data rows + one blank row
      row: rows.length + 3,
      labelColumn: AMOUNT_COLUMN - 1,
      valueColumn: AMOUNT_COLUMN,
      label: "Total:",
      value: Money.sum(expenses.map((expense) => expense.money)).amount,
    },
  };
}

/**
 * Writes expenses to a spreadsheet through a SpreadsheetWriter.
 */
export class SpreadsheetExporter {
  readonly format = "spreadsheet";
  readonly extension = "xlsx";

  constructor(
    private readonly writer: SpreadsheetWriter,
    private readonly target: ExportTarget
  ) {}

  /**
   * Returns the path written.
   * Rejects with ExportEmptyError for an empty list (no file is created) and
   * PersistError when the writer fails.
   */
  async export(expenses: readonly Expense[], destination?: string): Promise<string> {
    if (!expenses.length) {
      throw new ExportEmptyError(this.format);
    }

    const layout = buildSheetLayout(expenses);
    const path = resolveExportPath(destination, this.extension, this.target);
    try {
      await this.writer.write(layout, path);
    } catch (error) {
      throw new PersistError(path, "export", error);
    }
    return path;
  }
}
