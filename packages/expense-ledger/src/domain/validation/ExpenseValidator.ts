import type { ExpenseField, ValidationFailure, ValidationFailureCode } from "../errors";
import { Money, parseCalendarDate } from "../value-objects";

export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ValidationFailure };

export type ExpenseValidationResult<T> =
  | { ok: true; value: T; failures: [] }
  | { ok: false; failures: ValidationFailure[] };

/**
 * Raw, unvalidated field values as a collaborator hands them over.
 * `date` must already be resolved; defaulting happens in the store.
 */
export interface ExpenseFields {
  date: string;
  category: string;
  amount: string | number;
  description?: string;
}

export interface ValidatedExpense {
  date: string;
  category: string;
  amount: number;
  description: string;
}

export interface ValidationOptions {
  /**
   * Reject empty descriptions.
   * @default true
   */
  requireDescription?: boolean;
}

const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function fail<T>(
  code: ValidationFailureCode,
  field: ExpenseField,
  message: string
): FieldResult<T> {
  return { ok: false, failure: { code, field, message } };
}

/**
 * Parse an amount and normalize it to cents.
 * Accepts numbers and plain decimal strings; rejects anything that is not
 * strictly positive once rounded to cents.
 */
export function validateAmount(raw: string | number): FieldResult<number> {
  let amount: number;

  if (typeof raw === "number") {
    amount = raw;
  } else {
    const text = raw.trim();
    if (!DECIMAL.test(text)) {
      return fail("InvalidAmount", "amount", `Amount "${raw}" is not a number`);
    }
    amount = Number(text);
  }

  if (!Number.isFinite(amount)) {
    return fail("InvalidAmount", "amount", `Amount ${raw} is not a finite number`);
  }
  if (amount <= 0) {
    return fail("InvalidAmount", "amount", "Amount must be positive");
  }
  if (!Money.fits(amount)) {
    return fail(
      "InvalidAmount",
      "amount",
      `Amount must not exceed ${Money.MAX.toFixed()}`
    );
  }

  const rounded = Money.round(amount);
  if (rounded <= 0) {
    return fail("InvalidAmount", "amount", "Amount must be at least 0.01");
  }
  return { ok: true, value: rounded };
}

export function validateDate(raw: string): FieldResult<string> {
  const text = raw.trim();
  if (!parseCalendarDate(text)) {
    return fail(
      "InvalidDate",
      "date",
      `Date "${raw}" is not a valid YYYY-MM-DD date`
    );
  }
  return { ok: true, value: text };
}

export function validateCategory(raw: string): FieldResult<string> {
  const text = raw.trim();
  if (!text) {
    return fail("EmptyCategory", "category", "Category is required");
  }
  return { ok: true, value: text };
}

export function validateDescription(
  raw: string,
  options: ValidationOptions = {}
): FieldResult<string> {
  const { requireDescription = true } = options;
  const text = raw.trim();
  if (!text && requireDescription) {
    return fail("EmptyDescription", "description", "Description is required");
  }
  return { ok: true, value: text };
}

/**
 * Validate every field of a record and collect all failures.
 */
export function validateExpense(
  fields: ExpenseFields,
  options: ValidationOptions = {}
): ExpenseValidationResult<ValidatedExpense> {
  const date = validateDate(fields.date);
  const category = validateCategory(fields.category);
  const amount = validateAmount(fields.amount);
  const description = validateDescription(fields.description ?? "", options);

  if (date.ok && category.ok && amount.ok && description.ok) {
    return {
      ok: true,
      value: {
        date: date.value,
        category: category.value,
        amount: amount.value,
        description: description.value,
      },
      failures: [],
    };
  }

  const failures: ValidationFailure[] = [];
  for (const result of [date, category, amount, description]) {
    if (!result.ok) failures.push(result.failure);
  }
  return { ok: false, failures };
}
