export type BudgetErrorKind =
  | "InvalidFormat"
  | "InvalidAmount"
  | "AmountTooLarge"
  | "MissingCategory"
  | "NotFound"
  | "InvalidRange";

export class BudgetError extends Error {
  readonly kind: BudgetErrorKind;

  constructor(kind: BudgetErrorKind, message: string) {
    super(message);
    this.name = "BudgetError";
    this.kind = kind;
  }
}

export function isBudgetError(value: unknown): value is BudgetError {
  return value instanceof BudgetError;
}
