import { z } from "zod";
import { MalformedRecordError, ValidationError } from "../errors";
import {
  validateExpense,
  type ExpenseFields,
  type ValidationOptions,
} from "../validation/ExpenseValidator";
import { Money, isSameCategory } from "../value-objects";

/**
 * Plain mapping an expense is stored as.
 */
export interface ExpenseData {
  date: string;
  category: string;
  amount: number;
  description: string;
}

export type CreateExpenseInput = ExpenseFields;

/**
 * Shape check for stored mappings. Field rules are the validator's job;
 * this only rejects missing fields and wrong primitive kinds.
 */
export const expenseDataSchema = z.object({
  date: z.string(),
  category: z.string(),
  amount: z.number(),
  description: z.string(),
});

/**
 * Expense entity - one recorded transaction.
 */
export class Expense {
  private constructor(private readonly data: Readonly<ExpenseData>) {}

  /**
   * Validate raw fields and build an expense.
   * Throws ValidationError listing every failing field.
   */
  static create(input: CreateExpenseInput, options?: ValidationOptions): Expense {
    const result = validateExpense(input, options);
    if (!result.ok) {
      throw new ValidationError(result.failures);
    }
    return new Expense(result.value);
  }

  /**
   * Rebuild an expense from a stored mapping.
   * Throws MalformedRecordError when a field is missing or has the wrong kind.
   */
  static fromData(mapping: unknown, index?: number): Expense {
    const parsed = expenseDataSchema.safeParse(mapping);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.length ? issue.path.join(".") : "record";
      throw new MalformedRecordError(index, field, describeIssue(issue));
    }
    return new Expense(parsed.data);
  }

  get date(): string {
    return this.data.date;
  }

  get category(): string {
    return this.data.category;
  }

  get amount(): number {
    return this.data.amount;
  }

  get money(): Money {
    return Money.create(this.data.amount);
  }

  get description(): string {
    return this.data.description;
  }

  isInCategory(category: string): boolean {
    return isSameCategory(this.data.category, category);
  }

  toData(): ExpenseData {
    return { ...this.data };
  }

  equals(other: Expense): boolean {
    return (
      this.data.date === other.data.date &&
      this.data.category === other.data.category &&
      this.data.amount === other.data.amount &&
      this.data.description === other.data.description
    );
  }
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === "invalid_type") {
    return issue.received === "undefined"
      ? "is missing"
      : `must be a ${issue.expected}, got ${issue.received}`;
  }
  return issue.message;
}
