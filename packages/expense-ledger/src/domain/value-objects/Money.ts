import { AmountOutOfRangeError } from "../errors";

/**
 * Money value object - immutable amount held in whole cents so that sums
 * never drift.
 *
 * Cents must stay a safe integer; anything larger throws AmountOutOfRangeError.
 */
export class Money {
  /** Largest representable amount. */
  static readonly MAX = new Money(Number.MAX_SAFE_INTEGER);

  private constructor(private readonly _cents: number) {
    if (!Number.isSafeInteger(_cents)) {
      throw new AmountOutOfRangeError(_cents);
    }
  }

  /**
   * Create money from a decimal amount, rounding half away from zero to cents.
   */
  static create(amount: number): Money {
    return new Money(Money.toCents(amount));
  }

  static zero(): Money {
    return new Money(0);
  }

  /**
   * Round a decimal amount to the nearest cent.
   * Goes through the shortest decimal representation so 1.005 rounds to 1.01.
   */
  static toCents(amount: number): number {
    const [mantissa, exponent = "0"] = String(Math.abs(amount)).split("e");
    const shifted = Number(`${mantissa}e${Number(exponent) + 2}`);
    return Math.sign(amount) * Math.round(shifted);
  }

  /** Whether a decimal amount rounds to a representable number of cents. */
  static fits(amount: number): boolean {
    return Number.isSafeInteger(Money.toCents(amount));
  }

  /** Round a decimal amount to two places. */
  static round(amount: number): number {
    return Money.toCents(amount) / 100;
  }

  static sum(values: Iterable<Money>): Money {
    let cents = 0;
    for (const value of values) {
      cents += value._cents;
    }
    return new Money(cents);
  }

  get amount(): number {
    return this._cents / 100;
  }

  get cents(): number {
    return this._cents;
  }

  add(other: Money): Money {
    return new Money(this._cents + other._cents);
  }

  equals(other: Money): boolean {
    return this._cents === other._cents;
  }

  compare(other: Money): number {
    return this._cents - other._cents;
  }

  /** Two-decimal form without grouping, e.g. `1234.50`. */
  toFixed(): string {
    const sign = this._cents < 0 ? "-" : "";
    const abs = Math.abs(this._cents);
    const major = Math.floor(abs / 100);
    const minor = (abs % 100).toString().padStart(2, "0");
    return `${sign}${major}.${minor}`;
  }

  toJSON(): number {
    return this.amount;
  }

  toString(): string {
    return this.toFixed();
  }
}
