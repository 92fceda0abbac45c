import { resolve } from "node:path";
import { z } from "zod";

export type StoreLogger = Pick<Console, "info" | "warn">;

export interface BudgetStoreOptions {
  /** Location of the JSON document. */
  filePath: string;
  /** Drop the sign of negative amounts instead of keeping it. */
  absoluteAmounts: boolean;
  logger: StoreLogger;
}

export const DEFAULT_DATA_FILE = "budgets.json";

const envSchema = z.object({
  BUDGET_DATA_PATH: z.string().trim().min(1).optional(),
  BUDGET_ABSOLUTE_AMOUNTS: z
    .enum(["true", "false", "1", "0"])
    .optional()
    .transform((value) => value !== "false" && value !== "0"),
});

export function resolveStoreOptions(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BudgetStoreOptions {
  const parsed = envSchema.parse(env);
  return {
    filePath: resolve(cwd, parsed.BUDGET_DATA_PATH ?? DEFAULT_DATA_FILE),
    absoluteAmounts: parsed.BUDGET_ABSOLUTE_AMOUNTS,
    logger: console,
  };
}
