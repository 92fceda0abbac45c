import {
  resolveStoreOptions,
  type BudgetStoreOptions,
  type StoreLogger,
} from "../config";
import type {
  MonthBudget,
  SaveMonthBudgetInput,
  SaveResult,
  Series,
  SeriesPoint,
  YearOverview,
  YearOverviewRow,
} from "../domain/model";
import {
  cleanAmount,
  compareCategory,
  computeRollup,
  mergeExpenses,
  monthRange,
  monthsOfYear,
  normalizeExpenseInputs,
  normalizeMonth,
  roundTo,
} from "../domain/rules";
import { BudgetError } from "../domain/errors";
import { loadDocument, saveDocument } from "./db";
import { Mutex } from "./lock";
import type { LoadedDocument } from "./schema";

export type BudgetStoreInit = Pick<BudgetStoreOptions, "filePath"> &
  Partial<Omit<BudgetStoreOptions, "filePath">>;

/**
 * Monthly budgets kept in one JSON file. Every operation holds the store
 * lock from loading the document until it has been written back.
 */
export class BudgetStore {
  readonly filePath: string;
  private readonly absoluteAmounts: boolean;
  private readonly logger: StoreLogger;
  private readonly lock = new Mutex();

  constructor(init: BudgetStoreInit) {
    this.filePath = init.filePath;
    this.absoluteAmounts = init.absoluteAmounts ?? true;
    this.logger = init.logger ?? console;
  }

  private withDocument<T>(
    task: (document: LoadedDocument) => T | Promise<T>,
  ): Promise<T> {
    return this.lock.runExclusive(async () =>
      task(await loadDocument(this.filePath, this.logger)),
    );
  }

  async saveMonthBudget(input: SaveMonthBudgetInput): Promise<SaveResult> {
    const amountOptions = { absoluteAmounts: this.absoluteAmounts };
    const month = normalizeMonth(input.month);
    const incomePlanned = cleanAmount(input.incomePlanned, amountOptions) ?? 0;
    const incomeActual = cleanAmount(input.incomeActual, amountOptions);
    const incoming = normalizeExpenseInputs(input.expenses, amountOptions);
    const merge = input.merge ?? true;
    const notes = input.notes ?? null;

    await this.withDocument(async (document) => {
      const existing = document.months[month];
      if (!existing) {
        document.months[month] = {
          income: { planned: incomePlanned, actual: incomeActual },
          expenses: merge ? mergeExpenses([], incoming, amountOptions) : incoming,
          notes: notes ?? "",
        };
      } else {
        existing.income.planned = incomePlanned;
        existing.income.actual = incomeActual;
        if (notes !== null) {
          existing.notes = notes;
        }
        existing.expenses = merge
          ? mergeExpenses(existing.expenses, incoming, amountOptions)
          : incoming;
      }
      await saveDocument(this.filePath, document);
    });

    return { status: "ok", month };
  }

  async getMonthBudget(month: string): Promise<MonthBudget> {
    const key = normalizeMonth(month);
    return this.withDocument((document) => {
      const record = document.months[key];
      if (!record) {
        throw new BudgetError("NotFound", `No budget saved for ${key}.`);
      }
      const rollup = computeRollup(record);
      return {
        month: key,
        notes: record.notes,
        ...rollup,
        categories: [...rollup.categories].sort((a, b) =>
          compareCategory(a.category, b.category),
        ),
      };
    });
  }

  async getYearOverview(year: number): Promise<YearOverview> {
    const months = monthsOfYear(year);
    return this.withDocument((document) => ({
      year,
      months: months.map((month): YearOverviewRow => {
        const record = document.months[month];
        if (!record) {
          return {
            month,
            incomePlanned: 0,
            incomeActual: null,
            expensePlanned: 0,
            expenseActual: null,
            netPlanned: 0,
            netActual: null,
          };
        }
        const rollup = computeRollup(record);
        return {
          month,
          incomePlanned: rollup.income.planned,
          incomeActual: rollup.income.actual,
          expensePlanned: rollup.expensesTotal.planned,
          expenseActual: rollup.expensesTotal.actual,
          netPlanned: rollup.netSavings.planned,
          netActual: rollup.netSavings.actual,
        };
      }),
    }));
  }

  async getSeries(fromMonth: string, toMonth: string): Promise<Series> {
    const months = monthRange(fromMonth, toMonth);
    return this.withDocument((document) => {
      let cumulative = 0;
      const series = months.map((month): SeriesPoint => {
        const record = document.months[month];
        const net = record ? computeRollup(record).netSavings : null;
        const netActual = net?.actual ?? null;
        if (netActual !== null) {
          cumulative += netActual;
        }
        return {
          month,
          netPlanned: net?.planned ?? 0,
          netActual,
          cumulativeActual: roundTo(cumulative, 2),
        };
      });
      return {
        from: months[0] ?? fromMonth,
        to: months[months.length - 1] ?? toMonth,
        series,
      };
    });
  }

  async listAllCategories(): Promise<string[]> {
    return this.withDocument((document) => {
      const categories = new Set<string>();
      for (const record of Object.values(document.months)) {
        for (const expense of record.expenses) {
          categories.add(expense.category.trim());
        }
      }
      return [...categories]
        .filter((category) => category !== "")
        .sort(compareCategory);
    });
  }
}

export function createBudgetStore(
  env: NodeJS.ProcessEnv = process.env,
): BudgetStore {
  return new BudgetStore(resolveStoreOptions(env));
}
