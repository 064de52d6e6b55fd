import { describe, it, expect } from "vitest";
import { Money } from "./Money";
import { AmountOutOfRangeError, isLedgerError } from "../errors";

describe("Money", () => {
  describe("create()", () => {
    it("should hold the amount in cents", () => {
      const money = Money.create(25.5);
      expect(money.amount).toBe(25.5);
      expect(money.cents).toBe(2550);
    });

    it("should round half away from zero to cents", () => {
      expect(Money.create(1.005).cents).toBe(101);
      expect(Money.create(10.126).amount).toBe(10.13);
      expect(Money.create(-1.005).cents).toBe(-101);
    });

    it("should round tiny amounts to zero", () => {
      expect(Money.create(0.001).equals(Money.zero())).toBe(true);
      expect(Money.create(1e-7).cents).toBe(0);
    });

    it("should reject amounts with more cents than fit in a safe integer", () => {
      expect(Money.fits(90071992547409.91)).toBe(true);
      expect(Money.fits(1e14)).toBe(false);
      expect(() => Money.create(1e14)).toThrow(AmountOutOfRangeError);
    });
  });

  describe("sum()", () => {
    it("should add without floating point drift", () => {
      const total = Money.sum([Money.create(0.1), Money.create(0.2)]);
      expect(total.amount).toBe(0.3);
    });

    it("should return zero for no values", () => {
      expect(Money.sum([]).amount).toBe(0);
    });

    it("should raise a ledger error when the sum overflows", () => {
      let caught: unknown;
      try {
        Money.sum([Money.MAX, Money.create(0.01)]);
      } catch (error) {
        caught = error;
      }

      expect(isLedgerError(caught, "AmountOutOfRange")).toBe(true);
    });
  });

  describe("add()", () => {
    it("should add two money values", () => {
      expect(Money.create(25.5).add(Money.create(15)).amount).toBe(40.5);
    });

    it("should refuse to go past the largest amount", () => {
      expect(() => Money.MAX.add(Money.create(0.01))).toThrow(
        "Amount of 9007199254740992 cents is outside the supported range"
      );
    });
  });

  describe("comparisons", () => {
    it("should compare by cents", () => {
      const a = Money.create(100);
      const b = Money.create(50);

      expect(a.compare(b)).toBeGreaterThan(0);
      expect(b.compare(a)).toBeLessThan(0);
      expect(a.equals(Money.create(100))).toBe(true);
      expect(a.equals(b)).toBe(false);
    });
  });

  describe("formatting", () => {
    it("should print two decimals", () => {
      expect(Money.create(40.5).toFixed()).toBe("40.50");
      expect(Money.create(0.07).toFixed()).toBe("0.07");
      expect(Money.create(-1.5).toFixed()).toBe("-1.50");
      expect(Money.MAX.toFixed()).toBe("90071992547409.91");
      expect(String(Money.create(15))).toBe("15.00");
    });

    it("should serialize to a plain number", () => {
      expect(JSON.stringify({ total: Money.create(40.5) })).toBe('{"total":40.5}');
    });
  });
});
