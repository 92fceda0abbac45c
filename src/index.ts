export { BudgetStore, createBudgetStore } from "./storage/repository";
export type { BudgetStoreInit } from "./storage/repository";
export { resolveStoreOptions, DEFAULT_DATA_FILE } from "./config";
export type { BudgetStoreOptions, StoreLogger } from "./config";
export { BudgetError, isBudgetError } from "./domain/errors";
export type { BudgetErrorKind } from "./domain/errors";
export {
  cleanAmount,
  computeRollup,
  mergeExpenses,
  monthRange,
  normalizeMonth,
} from "./domain/rules";
export type * from "./domain/model";
