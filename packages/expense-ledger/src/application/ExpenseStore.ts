import { Expense } from "@/domain/entities";
import {
  CorruptStoreError,
  IndexOutOfRangeError,
  InvalidRecordError,
} from "@/domain/errors";
import {
  ExpenseCalculator,
  type CategoryBreakdown,
  type PositionedExpense,
} from "@/domain/services";
import {
  validateExpense,
  type ExpenseFields,
  type ValidationOptions,
} from "@/domain/validation";
import { Money, today } from "@/domain/value-objects";
import { dev } from "@/dev";
import { emitter, type Listener, type Unsubscribe } from "@/emitter";
import type { LedgerStorage, WarningHandler } from "./ports";

/**
 * Fields for add() and edit(). A missing or blank date means today.
 */
export type ExpenseInput = Omit<ExpenseFields, "date"> & { date?: string };

export type ExpenseChangeType = "load" | "add" | "edit" | "delete";

export interface ExpenseChange {
  type: ExpenseChangeType;
  expenses: readonly Expense[];
}

export interface ExpenseStoreOptions extends ValidationOptions {
  /**
   * Indentation of the serialized JSON.
   * @default 2
   */
  indent?: number;

  /**
   * Called for non-fatal conditions such as an empty backing file.
   * @default logs with dev.warn
   */
  onWarning?: WarningHandler;

  /**
   * Clock used for the default date.
   * @default () => new Date()
   */
  now?: () => Date;
}

/**
 * Ordered expense collection kept in sync with its backing storage.
 *
 * Every mutation validates first, builds the next collection, writes it and
 * only then replaces the in-memory state, so a failed write leaves the store
 * as it was.
 */
export class ExpenseStore {
  private expenses: readonly Expense[] = Object.freeze([]);
  private readonly changes = emitter<ExpenseChange>();
  private readonly validation: ValidationOptions;
  private readonly indent: number;
  private readonly onWarning: WarningHandler;
  private readonly now: () => Date;

  constructor(
    private readonly storage: LedgerStorage,
    options: ExpenseStoreOptions = {}
  ) {
    this.validation = { requireDescription: options.requireDescription ?? true };
    this.indent = options.indent ?? 2;
    this.onWarning =
      options.onWarning ?? ((warning) => dev.warn(warning.message));
    this.now = options.now ?? (() => new Date());
  }

  get location(): string {
    return this.storage.location;
  }

  get size(): number {
    return this.expenses.length;
  }

  /**
   * Read-only snapshot in insertion order.
   */
  list(): readonly Expense[] {
    return this.expenses;
  }

  /**
   * Expense at a 0-based position.
   */
  at(position: number): Expense {
    this.checkPosition(position);
    return this.expenses[position];
  }

  /**
   * Replace the collection with the stored one.
   *
   * All-or-nothing: if any record is malformed or invalid, nothing is loaded
   * and the current collection is kept.
   */
  load(): readonly Expense[] {
    const text = this.storage.read();

    if (text === undefined) {
      return this.replace([], "load");
    }

    if (!text.trim()) {
      this.onWarning({
        type: "empty-store",
        path: this.storage.location,
        message: `${this.storage.location} is empty, starting with no expenses`,
      });
      return this.replace([], "load");
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new CorruptStoreError(
        this.storage.location,
        error instanceof Error ? error.message : "not valid JSON",
        { cause: error }
      );
    }

    if (!Array.isArray(parsed)) {
      throw new CorruptStoreError(
        this.storage.location,
        "expected a list of expenses"
      );
    }

    const loaded = parsed.map((mapping: unknown, index) => {
      const record = Expense.fromData(mapping, index);
      const result = validateExpense(record.toData(), this.validation);
      if (!result.ok) {
        throw new InvalidRecordError(index, result.failures);
      }
      return Expense.fromData(result.value, index);
    });

    return this.replace(loaded, "load");
  }

  /**
   * Write the current collection to storage.
   */
  save(): void {
    this.storage.write(this.serialize(this.expenses));
  }

  /**
   * Validate, append and persist a new expense.
   * Throws ValidationError with every failing field; nothing changes then.
   */
  add(input: ExpenseInput): Expense {
    const expense = this.build(input);
    this.commit([...this.expenses, expense], "add");
    return expense;
  }

  /**
   * Replace the expense at a 0-based position with a fully resolved record.
   */
  edit(position: number, input: ExpenseInput): Expense {
    this.checkPosition(position);
    const expense = this.build(input);
    const next = [...this.expenses];
    next[position] = expense;
    this.commit(next, "edit");
    return expense;
  }

  /**
   * Remove the expense at a 0-based position. Returns the removed expense.
   */
  delete(position: number): Expense {
    this.checkPosition(position);
    const removed = this.expenses[position];
    this.commit(
      this.expenses.filter((_, index) => index !== position),
      "delete"
    );
    return removed;
  }

  filterByCategory(category: string): Expense[] {
    return ExpenseCalculator.filterByCategory(this.expenses, category);
  }

  summaryByCategory(): Map<string, Money> {
    return ExpenseCalculator.calculateByCategory(this.expenses);
  }

  total(): Money {
    return ExpenseCalculator.calculateTotal(this.expenses);
  }

  categories(): string[] {
    return ExpenseCalculator.getCategories(this.expenses);
  }

  breakdown(): CategoryBreakdown[] {
    return ExpenseCalculator.getCategoryBreakdown(this.expenses);
  }

  withPositions(): PositionedExpense[] {
    return ExpenseCalculator.withPositions(this.expenses);
  }

  /**
   * Listen for successful loads and mutations.
   *
   * Listeners run after the change is saved. A listener that throws is
   * reported as a `listener-failed` warning and does not fail the operation.
   */
  onChange(listener: Listener<ExpenseChange>): Unsubscribe {
    return this.changes.on((change) => {
      try {
        listener(change);
      } catch (error) {
        this.onWarning({
          type: "listener-failed",
          path: this.storage.location,
          message: `Change listener failed after ${change.type}: ${
            error instanceof Error ? error.message : String(error)
          }`,
          error,
        });
      }
    });
  }

  private build(input: ExpenseInput): Expense {
    const date =
      input.date === undefined || !input.date.trim()
        ? today(this.now())
        : input.date;
    return Expense.create({ ...input, date }, this.validation);
  }

  private checkPosition(position: number): void {
    if (
      !Number.isInteger(position) ||
      position < 0 ||
      position >= this.expenses.length
    ) {
      throw new IndexOutOfRangeError(position, this.expenses.length);
    }
  }

  private commit(next: Expense[], type: ExpenseChangeType): void {
    this.storage.write(this.serialize(next));
    this.replace(next, type);
  }

  private replace(next: Expense[], type: ExpenseChangeType): readonly Expense[] {
    this.expenses = Object.freeze(next);
    this.changes.emit({ type, expenses: this.expenses });
    return this.expenses;
  }

  private serialize(expenses: readonly Expense[]): string {
    const data = expenses.map((expense) => expense.toData());
    return JSON.stringify(data, null, this.indent) + "\n";
  }
}
