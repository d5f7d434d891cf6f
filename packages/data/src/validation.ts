import {
  DegenerateInputError,
  assertChronological,
  InsufficientHistoryError,
  PriceSeriesSchema,
  type PriceSeries,
} from "@market-sentinel/sdk";

/**
 * Enforces the input-boundary contract: at least one bar, finite non-negative
 * prices and volumes, strictly increasing dates.
 *
 * @throws InsufficientHistoryError when the series is empty.
 * @throws DegenerateInputError for malformed bars or out-of-order dates.
 */
export const validatePriceSeries = (candidate: unknown): PriceSeries => {
  const parsed = PriceSeriesSchema.safeParse(candidate);
  if (!parsed.success) {
    const isEmpty = parsed.error.issues.some(
      (issue) => issue.code === "too_small" && issue.path.join(".") === "bars",
    );
    if (isEmpty) {
      throw new InsufficientHistoryError("Price series contains no bars", 1, 0);
    }
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return `${path}: ${issue.message}`;
    });
    throw new DegenerateInputError(`Malformed price series: ${issues.join("; ")}`);
  }

  const series = parsed.data;
  assertChronological(series);
  return series;
};
