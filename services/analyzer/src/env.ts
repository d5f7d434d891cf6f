import { isAbsolute, join } from "node:path";

import { assertValid } from "@market-sentinel/sdk";
import { z } from "zod";

const isoDay = z.string().regex(/^\d{4}-\d{2}-\d{2}$/u, "expected YYYY-MM-DD");

export const AnalyzerEnvSchema = z.object({
  DATASETS_DIR: z.string().min(1).default("storage/datasets"),
  REPORTS_DIR: z.string().min(1).default("storage/reports"),
  SYMBOLS: z
    .string()
    .default("SPY,EEM")
    .transform((value) =>
      Array.from(
        new Set(
          value
            .split(",")
            .map((symbol) => symbol.trim())
            .filter((symbol) => symbol.length > 0),
        ),
      ),
    )
    .refine((symbols) => symbols.length > 0, "at least one symbol is required"),
  CASH_YIELD: z.coerce.number().min(-1).max(1).default(0.03),
  AS_OF: isoDay.optional(),
});

export interface AnalyzerEnv {
  readonly datasetsDir: string;
  readonly reportsDir: string;
  readonly symbols: ReadonlyArray<string>;
  readonly cashYield: number;
  readonly asOf?: string;
}

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === "" ? undefined : value;

/**
 * Reads analyzer settings from the environment. Relative directories resolve
 * against `rootDir`.
 */
export const loadAnalyzerEnv = (
  env: NodeJS.ProcessEnv = process.env,
  rootDir: string = process.cwd(),
): AnalyzerEnv => {
  const parsed = assertValid(
    AnalyzerEnvSchema,
    {
      DATASETS_DIR: emptyToUndefined(env.DATASETS_DIR),
      REPORTS_DIR: emptyToUndefined(env.REPORTS_DIR),
      SYMBOLS: emptyToUndefined(env.SYMBOLS),
      CASH_YIELD: emptyToUndefined(env.CASH_YIELD),
      AS_OF: emptyToUndefined(env.AS_OF),
    },
    "analyzer environment",
  );
  const resolveDir = (dir: string): string => (isAbsolute(dir) ? dir : join(rootDir, dir));

  return {
    datasetsDir: resolveDir(parsed.DATASETS_DIR),
    reportsDir: resolveDir(parsed.REPORTS_DIR),
    symbols: parsed.SYMBOLS,
    cashYield: parsed.CASH_YIELD,
    ...(parsed.AS_OF === undefined ? {} : { asOf: parsed.AS_OF }),
  };
};
