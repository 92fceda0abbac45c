import { z } from "zod";
import type { StoreLogger } from "../config";
import type { BudgetDocument, MonthRecord } from "../domain/model";
import { isMonthKey } from "../domain/rules";

// Hand-edited files may hold amounts as numeric strings.
const storedNumber = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite());

const plannedAmount = storedNumber.nullish().transform((value) => value ?? 0);

const actualAmount = storedNumber
  .nullish()
  .transform((value) => value ?? null);

export const incomeSchema = z.object({
  planned: plannedAmount,
  actual: actualAmount,
});

export const expenseItemSchema = z.object({
  category: z.string(),
  planned: plannedAmount,
  actual: actualAmount,
});

export const monthRecordSchema = z.object({
  income: incomeSchema.default({}),
  expenses: z.array(expenseItemSchema).default([]),
  notes: z.string().nullish().transform((value) => value ?? ""),
});

const documentEnvelopeSchema = z.object({
  months: z.record(z.string(), z.unknown()),
});

/**
 * A loaded document. `preserved` holds month entries that could not be
 * read; they are written back untouched on save.
 */
export interface LoadedDocument extends BudgetDocument {
  preserved?: Record<string, unknown>;
}

export function emptyDocument(): LoadedDocument {
  return { months: {} };
}

/**
 * Turns parsed JSON into a document. A missing or malformed `months`
 * container becomes empty.
 */
export function repairDocument(raw: unknown, logger: StoreLogger): LoadedDocument {
  const envelope = documentEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    logger.warn("Budget document has no usable 'months' mapping; resetting it.");
    return emptyDocument();
  }

  const months: Record<string, MonthRecord> = {};
  const unreadable: [string, unknown][] = [];
  for (const [key, value] of Object.entries(envelope.data.months)) {
    const record = monthRecordSchema.safeParse(value);
    if (!isMonthKey(key) || !record.success) {
      logger.warn(`Keeping unreadable budget entry '${key}' as it is.`);
      unreadable.push([key, value]);
      continue;
    }
    months[key] = record.data;
  }
  return { months, preserved: Object.fromEntries(unreadable) };
}
