import { addMonths, format, isAfter, parse } from "date-fns";
import { BudgetError } from "./errors";
import type {
  Amount,
  CategoryRow,
  ExpenseInput,
  ExpenseItem,
  MonthKey,
  MonthRecord,
  Rollup,
} from "./model";

export const MAX_AMOUNT = 1e8;

const MONTH_KEY_PATTERN = /^(\d{4})-(\d{2})$/;
const MONTH_KEY_FORMAT = "yyyy-MM";

export interface AmountOptions {
  /** Drop the sign of negative amounts. Defaults to `true`. */
  absoluteAmounts?: boolean;
}

const TIE_CHECK_DIGITS = 30;

/** Rounds to `digits` decimals, breaking exact halfway ties to the even digit. */
export function roundTo(value: number, digits: number): number {
  let rounded = Number(value.toFixed(digits));
  const exact = Math.abs(value).toFixed(digits + TIE_CHECK_DIGITS);
  const [whole = "", fraction = ""] = exact.split(".");
  const isTie =
    fraction.slice(digits) === "5".padEnd(TIE_CHECK_DIGITS, "0");
  const kept = `${whole}${fraction.slice(0, digits)}`;
  if (isTie && Number(kept.slice(-1)) % 2 === 0) {
    const sign = value < 0 ? "-" : "";
    rounded = Number(`${sign}${whole}.${fraction.slice(0, digits)}`);
  }
  return rounded === 0 ? 0 : rounded;
}

export function compareCategory(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function categoryKey(category: string): string {
  return category.trim().toLowerCase();
}

function parseMonthKey(input: unknown): { year: number; month: number } | null {
  const match = typeof input === "string" ? MONTH_KEY_PATTERN.exec(input) : null;
  if (!match) {
    return null;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  return year >= 1 && month >= 1 && month <= 12 ? { year, month } : null;
}

function monthKeyOf(year: number, month: number): MonthKey {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
}

export function isMonthKey(value: string): boolean {
  return parseMonthKey(value) !== null;
}

export function normalizeMonth(input: unknown): MonthKey {
  const parsed = parseMonthKey(input);
  if (!parsed) {
    throw new BudgetError(
      "InvalidFormat",
      "Invalid month format. Use 'YYYY-MM' (e.g., 2026-02).",
    );
  }
  return monthKeyOf(parsed.year, parsed.month);
}

function monthStart(key: MonthKey): Date {
  return parse(key, MONTH_KEY_FORMAT, new Date(2000, 0, 1));
}

export function monthsOfYear(year: number): MonthKey[] {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new BudgetError("InvalidFormat", `Invalid year: ${year}.`);
  }
  const months: MonthKey[] = [];
  for (let month = 1; month <= 12; month += 1) {
    months.push(monthKeyOf(year, month));
  }
  return months;
}

/** Every month from `from` to `to`, both included. */
export function monthRange(from: unknown, to: unknown): MonthKey[] {
  const start = monthStart(normalizeMonth(from));
  const end = monthStart(normalizeMonth(to));
  if (isAfter(start, end)) {
    throw new BudgetError("InvalidRange", "from > to");
  }
  const months: MonthKey[] = [];
  for (let cursor = start; !isAfter(cursor, end); cursor = addMonths(cursor, 1)) {
    months.push(format(cursor, MONTH_KEY_FORMAT));
  }
  return months;
}

const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

function parseNumeric(text: string): number {
  const infinity = INFINITY_PATTERN.exec(text);
  if (infinity) {
    return infinity[1] === "-" ? -Infinity : Infinity;
  }
  return Number(text);
}

export function cleanAmount(
  value: unknown,
  options: AmountOptions = {},
): Amount | null {
  if (value === null || value === undefined) {
    return null;
  }
  let parsed = Number.NaN;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    parsed = parseNumeric(value.trim());
  }
  if (Number.isNaN(parsed)) {
    throw new BudgetError("InvalidAmount", "Amounts must be numbers.");
  }
  if (Math.abs(parsed) > MAX_AMOUNT) {
    throw new BudgetError("AmountTooLarge", "Amount too large.");
  }
  // Expenses and income are entered as positive figures.
  if (parsed < 0 && options.absoluteAmounts !== false) {
    parsed = Math.abs(parsed);
  }
  return roundTo(parsed, 2);
}

function readCategory(item: ExpenseInput): string {
  const raw = item.category;
  const category =
    typeof raw === "string" || typeof raw === "number" ? String(raw).trim() : "";
  if (!category) {
    throw new BudgetError(
      "MissingCategory",
      "Each expense item must have a non-empty 'category'.",
    );
  }
  return category;
}

export function normalizeExpenseInput(
  item: ExpenseInput,
  options: AmountOptions = {},
): ExpenseItem {
  return {
    category: readCategory(item),
    planned: cleanAmount(item.planned || 0, options) ?? 0,
    actual: cleanAmount(item.actual, options),
  };
}

export function normalizeExpenseInputs(
  items: readonly ExpenseInput[] | undefined,
  options: AmountOptions = {},
): ExpenseItem[] {
  return (items ?? []).map((item) => normalizeExpenseInput(item, options));
}

/**
 * Merges incoming expense items into the existing ones by case-insensitive
 * category. An incoming item without `actual` keeps the stored actual.
 * Categories missing from `incoming` are kept.
 */
export function mergeExpenses(
  existing: readonly ExpenseItem[],
  incoming: readonly ExpenseInput[],
  options: AmountOptions = {},
): ExpenseItem[] {
  const byKey = new Map<string, ExpenseItem>();
  for (const item of existing) {
    byKey.set(categoryKey(item.category), {
      category: item.category,
      planned: item.planned,
      actual: item.actual,
    });
  }

  for (const raw of incoming) {
    const item = normalizeExpenseInput(raw, options);
    const key = categoryKey(item.category);
    const current = byKey.get(key);
    if (current) {
      current.category = item.category;
      current.planned = item.planned;
      current.actual = item.actual ?? current.actual;
    } else {
      byKey.set(key, item);
    }
  }

  return [...byKey.values()].sort((a, b) =>
    compareCategory(a.category, b.category),
  );
}

export function computeRollup(record: MonthRecord): Rollup {
  const incomePlanned = record.income.planned;
  const incomeActual = record.income.actual;

  let expensesPlanned = 0;
  let expensesActual = 0;
  const categories: CategoryRow[] = record.expenses.map((expense) => {
    expensesPlanned += expense.planned;
    expensesActual += expense.actual ?? 0;
    return {
      category: expense.category,
      planned: expense.planned,
      actual: expense.actual,
      variance:
        expense.actual === null
          ? null
          : roundTo(expense.actual - expense.planned, 2),
    };
  });

  const netPlanned = incomePlanned - expensesPlanned;
  const netActual = incomeActual === null ? null : incomeActual - expensesActual;
  const rateActual =
    netActual !== null && incomeActual !== null && incomeActual > 0
      ? netActual / incomeActual
      : null;
  const ratePlanned = incomePlanned > 0 ? netPlanned / incomePlanned : null;

  return {
    income: {
      planned: roundTo(incomePlanned, 2),
      actual: incomeActual === null ? null : roundTo(incomeActual, 2),
    },
    expensesTotal: {
      planned: roundTo(expensesPlanned, 2),
      actual: roundTo(expensesActual, 2),
    },
    categories,
    netSavings: {
      planned: roundTo(netPlanned, 2),
      actual: netActual === null ? null : roundTo(netActual, 2),
      variance: netActual === null ? null : roundTo(netActual - netPlanned, 2),
    },
    savingsRate: {
      planned: ratePlanned === null ? null : roundTo(ratePlanned, 4),
      actual: rateActual === null ? null : roundTo(rateActual, 4),
    },
  };
}
