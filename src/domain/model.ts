export type MonthKey = string;
export type Amount = number;

export interface Income {
  planned: Amount;
  actual: Amount | null;
}

export interface ExpenseItem {
  category: string;
  planned: Amount;
  actual: Amount | null;
}

export interface MonthRecord {
  income: Income;
  expenses: ExpenseItem[];
  notes: string;
}

export interface BudgetDocument {
  months: Record<MonthKey, MonthRecord>;
}

/** Raw amount as it arrives from the calling layer. */
export type AmountInput = number | string | null | undefined;

export interface ExpenseInput {
  category?: unknown;
  planned?: AmountInput;
  actual?: AmountInput;
}

export interface SaveMonthBudgetInput {
  month: string;
  incomePlanned: AmountInput;
  incomeActual?: AmountInput;
  expenses?: ExpenseInput[];
  notes?: string | null;
  merge?: boolean;
}

export interface SaveResult {
  status: "ok";
  month: MonthKey;
}

export interface CategoryRow {
  category: string;
  planned: Amount;
  actual: Amount | null;
  variance: Amount | null;
}

export interface Rollup {
  income: { planned: Amount; actual: Amount | null };
  expensesTotal: { planned: Amount; actual: Amount };
  categories: CategoryRow[];
  netSavings: {
    planned: Amount;
    actual: Amount | null;
    variance: Amount | null;
  };
  savingsRate: { planned: number | null; actual: number | null };
}

export interface MonthBudget extends Rollup {
  month: MonthKey;
  notes: string;
}

export interface YearOverviewRow {
  month: MonthKey;
  incomePlanned: Amount;
  incomeActual: Amount | null;
  expensePlanned: Amount;
  expenseActual: Amount | null;
  netPlanned: Amount;
  netActual: Amount | null;
}

export interface YearOverview {
  year: number;
  months: YearOverviewRow[];
}

export interface SeriesPoint {
  month: MonthKey;
  netPlanned: Amount;
  netActual: Amount | null;
  cumulativeActual: Amount;
}

export interface Series {
  from: MonthKey;
  to: MonthKey;
  series: SeriesPoint[];
}
