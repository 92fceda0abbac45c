import { describe, expect, it } from "vitest";
import { BudgetError, type BudgetErrorKind } from "./errors";
import type { MonthRecord } from "./model";
import {
  cleanAmount,
  computeRollup,
  mergeExpenses,
  monthRange,
  monthsOfYear,
  normalizeExpenseInputs,
  normalizeMonth,
} from "./rules";

function expectKind(action: () => unknown, kind: BudgetErrorKind): void {
  let caught: unknown;
  try {
    action();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(BudgetError);
  expect(caught).toMatchObject({ kind });
}

describe("rules", () => {
  describe("normalizeMonth", () => {
    it("accepts zero-padded year-month keys", () => {
      expect(normalizeMonth("2026-02")).toBe("2026-02");
      expect(normalizeMonth("1999-12")).toBe("1999-12");
    });

    it("rejects anything else", () => {
      const inputs = [
        "2026-2",
        "2026/02",
        "2026-13",
        "2026-00",
        "26-02",
        "abcd-ef",
        " 2026-02",
        202602,
      ];
      for (const input of inputs) {
        expectKind(() => normalizeMonth(input), "InvalidFormat");
      }
    });
  });

  describe("cleanAmount", () => {
    it("passes absent values through", () => {
      expect(cleanAmount(undefined)).toBeNull();
      expect(cleanAmount(null)).toBeNull();
    });

    it("drops the sign of negative amounts", () => {
      expect(cleanAmount(-50)).toBe(50);
    });

    it("keeps the sign when absolute amounts are disabled", () => {
      expect(cleanAmount(-50, { absoluteAmounts: false })).toBe(-50);
    });

    it("coerces numeric strings and rounds to cents", () => {
      expect(cleanAmount(" 19.999 ")).toBe(20);
      expect(cleanAmount(12.5)).toBe(12.5);
    });

    it("rounds exact halfway amounts to the even cent", () => {
      expect(cleanAmount(10.125)).toBe(10.12);
      expect(cleanAmount(10.375)).toBe(10.38);
      expect(cleanAmount(-10.125)).toBe(10.12);
    });

    it("rejects non-numeric values", () => {
      expectKind(() => cleanAmount("abc"), "InvalidAmount");
      expectKind(() => cleanAmount(""), "InvalidAmount");
      expectKind(() => cleanAmount(true), "InvalidAmount");
      expectKind(() => cleanAmount(Number.NaN), "InvalidAmount");
    });

    it("rejects amounts above the limit", () => {
      expect(cleanAmount(1e8)).toBe(100000000);
      expectKind(() => cleanAmount(1e9), "AmountTooLarge");
      expectKind(() => cleanAmount(-1e9), "AmountTooLarge");
    });

    it("treats infinities as too large", () => {
      expectKind(() => cleanAmount(Infinity), "AmountTooLarge");
      expectKind(() => cleanAmount("Infinity"), "AmountTooLarge");
      expectKind(() => cleanAmount("-inf"), "AmountTooLarge");
      expectKind(() => cleanAmount("nan"), "InvalidAmount");
    });
  });

  describe("normalizeExpenseInputs", () => {
    it("trims categories and defaults planned to zero", () => {
      expect(normalizeExpenseInputs([{ category: "  Food " }])).toEqual([
        { category: "Food", planned: 0, actual: null },
      ]);
    });

    it("requires a category", () => {
      expectKind(() => normalizeExpenseInputs([{ planned: 10 }]), "MissingCategory");
      expectKind(() => normalizeExpenseInputs([{ category: "   " }]), "MissingCategory");
    });
  });

  describe("mergeExpenses", () => {
    it("keeps the stored actual when the incoming item has none", () => {
      const merged = mergeExpenses(
        [{ category: "Food", planned: 100, actual: 50 }],
        [{ category: "food ", planned: 120 }],
      );

      expect(merged).toEqual([{ category: "food", planned: 120, actual: 50 }]);
    });

    it("overwrites the actual when one is given", () => {
      const merged = mergeExpenses(
        [{ category: "Food", planned: 100, actual: 50 }],
        [{ category: "Food", planned: 100, actual: 75 }],
      );

      expect(merged).toEqual([{ category: "Food", planned: 100, actual: 75 }]);
    });

    it("keeps categories missing from the input and sorts case-insensitively", () => {
      const merged = mergeExpenses(
        [
          { category: "Rent", planned: 1000, actual: null },
          { category: "car", planned: 200, actual: 180 },
        ],
        [{ category: "bills", planned: 90, actual: null }],
      );

      expect(merged.map((item) => item.category)).toEqual(["bills", "car", "Rent"]);
    });

    it("rejects items without a category", () => {
      expectKind(() => mergeExpenses([], [{ category: "" }]), "MissingCategory");
    });
  });

  describe("computeRollup", () => {
    const record: MonthRecord = {
      income: { planned: 3000, actual: 2800 },
      expenses: [
        { category: "Rent", planned: 1000, actual: 1000 },
        { category: "Food", planned: 400, actual: 450 },
        { category: "Fun", planned: 100, actual: null },
      ],
      notes: "",
    };

    it("sums totals, net savings and rates", () => {
      const rollup = computeRollup(record);

      expect(rollup.income).toEqual({ planned: 3000, actual: 2800 });
      expect(rollup.expensesTotal).toEqual({ planned: 1500, actual: 1450 });
      expect(rollup.netSavings).toEqual({ planned: 1500, actual: 1350, variance: -150 });
      expect(rollup.savingsRate).toEqual({ planned: 0.5, actual: 0.4821 });
      expect(rollup.categories.map((row) => row.variance)).toEqual([0, 50, null]);
    });

    it("leaves actual figures absent without actual income", () => {
      const rollup = computeRollup({
        ...record,
        income: { planned: 0, actual: null },
      });

      expect(rollup.netSavings).toEqual({ planned: -1500, actual: null, variance: null });
      expect(rollup.savingsRate).toEqual({ planned: null, actual: null });
    });

    it("rounds halfway rates to the even digit", () => {
      const rollup = computeRollup({
        income: { planned: 32, actual: 32 },
        expenses: [{ category: "Rent", planned: 31, actual: 31 }],
        notes: "",
      });

      expect(rollup.savingsRate).toEqual({ planned: 0.0312, actual: 0.0312 });
    });

    it("avoids dividing by zero actual income", () => {
      const rollup = computeRollup({
        ...record,
        income: { planned: 3000, actual: 0 },
      });

      expect(rollup.netSavings.actual).toBe(-1450);
      expect(rollup.savingsRate.actual).toBeNull();
    });
  });

  describe("month ranges", () => {
    it("crosses year boundaries", () => {
      expect(monthRange("2025-11", "2026-02")).toEqual([
        "2025-11",
        "2025-12",
        "2026-01",
        "2026-02",
      ]);
      expect(monthRange("2026-05", "2026-05")).toEqual(["2026-05"]);
    });

    it("rejects reversed ranges", () => {
      expectKind(() => monthRange("2026-03", "2026-01"), "InvalidRange");
    });

    it("lists the twelve months of a year", () => {
      const months = monthsOfYear(2026);
      expect(months).toHaveLength(12);
      expect(months[0]).toBe("2026-01");
      expect(months[11]).toBe("2026-12");
      expectKind(() => monthsOfYear(2026.5), "InvalidFormat");
      expectKind(() => monthsOfYear(0), "InvalidFormat");
      expectKind(() => monthsOfYear(10000), "InvalidFormat");
    });
  });
});
