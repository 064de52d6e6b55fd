import { resolveLedgerConfig, type LedgerConfig, type LedgerConfigOptions } from "./config";
import { dev } from "./dev";
import type { Expense } from "./domain/entities";
import { CapabilityUnavailableError } from "./domain/errors";
import type { CategoryBreakdown, PositionedExpense } from "./domain/services";
import type { Money } from "./domain/value-objects";
import type { Listener, Unsubscribe } from "./emitter";
import {
  ExpenseStore,
  type ExpenseChange,
  type ExpenseInput,
} from "./application/ExpenseStore";
import type { LedgerStorage, SpreadsheetWriter, WarningHandler } from "./application/ports";
import { DelimitedTextExporter, SpreadsheetExporter } from "./infrastructure/exporters";
import { hasErrorCode } from "./infrastructure/fsErrors";
import { FileStorage } from "./infrastructure/storage";

export interface ExpenseLedgerOptions extends LedgerConfigOptions {
  /**
   * Writer for spreadsheet exports.
   * `undefined` detects the exceljs writer; `null` disables spreadsheet export.
   */
  spreadsheet?: SpreadsheetWriter | null;

  /**
   * Storage to use instead of the JSON file at `dataFile`.
   */
  storage?: LedgerStorage;

  /**
   * Called for non-fatal conditions (empty file, failed backup).
   * @default logs with dev.warn
   */
  onWarning?: WarningHandler;

  /**
   * Clock for default dates and export names.
   * @default () => new Date()
   */
  now?: () => Date;

  /** Environment to read settings from. @default process.env */
  env?: Record<string, string | undefined>;
}

/**
 * Load the exceljs-backed writer if exceljs can be resolved.
 */
export async function detectSpreadsheetWriter(): Promise<SpreadsheetWriter | null> {
  try {
    const { ExcelJsSpreadsheetWriter } = await import(
      "./infrastructure/exporters/ExcelJsSpreadsheetWriter"
    );
    return new ExcelJsSpreadsheetWriter();
  } catch (error) {
    if (
      hasErrorCode(error, "ERR_MODULE_NOT_FOUND") ||
      hasErrorCode(error, "MODULE_NOT_FOUND")
    ) {
      dev.warn("exceljs is not installed, spreadsheet export is disabled");
      return null;
    }
    throw error;
  }
}

/**
 * Collaborator-facing API: the store plus both exporters.
 *
 * Presentation shells (CLI menus, web handlers) call this and render the
 * results. Positions are 0-based here; `listWithPositions()` gives 1-based
 * display labels.
 */
export class ExpenseLedger {
  private readonly csv: DelimitedTextExporter;
  private readonly spreadsheet: SpreadsheetExporter | null;

  constructor(
    readonly store: ExpenseStore,
    readonly config: LedgerConfig,
    spreadsheetWriter: SpreadsheetWriter | null,
    now?: () => Date
  ) {
    const target = { exportDir: config.exportDir, now };
    this.csv = new DelimitedTextExporter(target);
    this.spreadsheet = spreadsheetWriter
      ? new SpreadsheetExporter(spreadsheetWriter, target)
      : null;
  }

  get canExportSpreadsheet(): boolean {
    return this.spreadsheet !== null;
  }

  load(): readonly Expense[] {
    return this.store.load();
  }

  list(): readonly Expense[] {
    return this.store.list();
  }

  listWithPositions(): PositionedExpense[] {
    return this.store.withPositions();
  }

  add(input: ExpenseInput): Expense {
    return this.store.add(input);
  }

  edit(position: number, input: ExpenseInput): Expense {
    return this.store.edit(position, input);
  }

  delete(position: number): Expense {
    return this.store.delete(position);
  }

  filterByCategory(category: string): Expense[] {
    return this.store.filterByCategory(category);
  }

  summaryByCategory(): Map<string, Money> {
    return this.store.summaryByCategory();
  }

  total(): Money {
    return this.store.total();
  }

  categories(): string[] {
    return this.store.categories();
  }

  breakdown(): CategoryBreakdown[] {
    return this.store.breakdown();
  }

  onChange(listener: Listener<ExpenseChange>): Unsubscribe {
    return this.store.onChange(listener);
  }

  /**
   * Export to CSV. Returns the path written.
   */
  exportDelimited(destination?: string): string {
    return this.csv.export(this.store.list(), destination);
  }

  /**
   * Export to XLSX. Resolves to the path written.
   */
  async exportSpreadsheet(destination?: string): Promise<string> {
    if (!this.spreadsheet) {
      throw new CapabilityUnavailableError(
        "Spreadsheet export",
        "Install exceljs or pass a spreadsheet writer."
      );
    }
    return this.spreadsheet.export(this.store.list(), destination);
  }
}

/**
 * Resolve configuration, detect capabilities and load the ledger.
 *
 * @example
 * ```ts
 * const ledger = await openExpenseLedger({ dataFile: "expenses.json" });
 * ledger.add({ category: "Food", amount: "25.50", description: "Lunch" });
 * ledger.exportDelimited("expenses.csv");
 * ```
 */
export async function openExpenseLedger(
  options: ExpenseLedgerOptions = {}
): Promise<ExpenseLedger> {
  const config = resolveLedgerConfig(options, options.env);
  const writer =
    options.spreadsheet === undefined
      ? await detectSpreadsheetWriter()
      : options.spreadsheet;

  const storage =
    options.storage ??
    new FileStorage(config.dataFile, {
      backupPath: config.backupFile,
      onWarning: options.onWarning,
    });

  const store = new ExpenseStore(storage, {
    requireDescription: config.requireDescription,
    indent: config.indent,
    onWarning: options.onWarning,
    now: options.now,
  });
  store.load();

  return new ExpenseLedger(store, config, writer, options.now);
}
