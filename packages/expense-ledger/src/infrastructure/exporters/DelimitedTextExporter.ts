import { writeFileSync } from "node:fs";
import type { Expense } from "@/domain/entities";
import { ExportEmptyError, PersistError } from "@/domain/errors";
import { Money } from "@/domain/value-objects";
import { resolveExportPath, type ExportTarget } from "./exportFileName";

export const CSV_COLUMNS = ["date", "category", "amount", "description"] as const;

const DELIMITER = ",";
const LINE_BREAK = "\r\n";
const NEEDS_QUOTES = /[",\r\n]/;

/**
 * Quote a field when it holds the delimiter, a quote or a line break.
 * Embedded quotes are doubled.
 */
export function encodeField(value: string): string {
  return NEEDS_QUOTES.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function encodeRow(fields: readonly string[]): string {
  return fields.map(encodeField).join(DELIMITER) + LINE_BREAK;
}

/**
 * Encode expenses as CSV: a header row, then one row per expense in order.
 */
export function encodeDelimited(expenses: readonly Expense[]): string {
  let output = encodeRow(CSV_COLUMNS);
  for (const expense of expenses) {
    output += encodeRow([
      expense.date,
      expense.category,
      Money.create(expense.amount).toFixed(),
      expense.description,
    ]);
  }
  return output;
}

/**
 * Writes expenses to a UTF-8 CSV file.
 */
export class DelimitedTextExporter {
  readonly format = "CSV";
  readonly extension = "csv";

  constructor(private readonly target: ExportTarget) {}

  /**
   * Returns the path written.
   * Throws ExportEmptyError for an empty list (no file is created) and
   * PersistError when the file can't be written.
   */
  export(expenses: readonly Expense[], destination?: string): string {
    if (!expenses.length) {
      throw new ExportEmptyError(this.format);
    }

    const path = resolveExportPath(destination, this.extension, this.target);
    try {
      writeFileSync(path, encodeDelimited(expenses), "utf8");
    } catch (error) {
      throw new PersistError(path, "export", error);
    }
    return path;
  }
}
