import { Expense } from "../entities";
import { Money, categoryKey, uniqueCategories } from "../value-objects";

/**
 * Category total with record count.
 */
export interface CategoryBreakdown {
  category: string;
  total: Money;
  count: number;
}

/**
 * An expense paired with its 1-based display position.
 * Positions are recomputed from the current order and never stored.
 */
export interface PositionedExpense {
  position: number;
  expense: Expense;
}

/**
 * Domain service for expense calculations.
 */
export const ExpenseCalculator = {
  /**
   * Calculate total amount of expenses.
   */
  calculateTotal(expenses: readonly Expense[]): Money {
    return Money.sum(expenses.map((expense) => expense.money));
  },

  /**
   * Sum amounts per category. Keys keep the case of the first occurrence
   * and follow first-occurrence order.
   */
  calculateByCategory(expenses: readonly Expense[]): Map<string, Money> {
    const labels = new Map<string, string>();
    const totals = new Map<string, Money>();

    for (const expense of expenses) {
      const key = categoryKey(expense.category);
      if (!labels.has(key)) labels.set(key, expense.category);
      totals.set(key, (totals.get(key) ?? Money.zero()).add(expense.money));
    }

    const result = new Map<string, Money>();
    for (const [key, label] of labels) {
      result.set(label, totals.get(key) ?? Money.zero());
    }
    return result;
  },

  /**
   * Totals and counts per category, largest total first.
   */
  getCategoryBreakdown(expenses: readonly Expense[]): CategoryBreakdown[] {
    const byCategory = new Map<string, CategoryBreakdown>();

    for (const expense of expenses) {
      const key = categoryKey(expense.category);
      const entry = byCategory.get(key);
      if (entry) {
        entry.total = entry.total.add(expense.money);
        entry.count += 1;
      } else {
        byCategory.set(key, {
          category: expense.category,
          total: expense.money,
          count: 1,
        });
      }
    }

    // stable sort keeps first-occurrence order for equal totals
    return Array.from(byCategory.values()).sort((a, b) =>
      b.total.compare(a.total)
    );
  },

  /**
   * Filter expenses by category, ignoring case.
   */
  filterByCategory(expenses: readonly Expense[], category: string): Expense[] {
    return expenses.filter((expense) => expense.isInCategory(category));
  },

  /**
   * Unique category labels.
   */
  getCategories(expenses: readonly Expense[]): string[] {
    return uniqueCategories(expenses.map((expense) => expense.category));
  },

  /**
   * Attach 1-based display positions.
   */
  withPositions(expenses: readonly Expense[]): PositionedExpense[] {
    return expenses.map((expense, index) => ({ position: index + 1, expense }));
  },
};
