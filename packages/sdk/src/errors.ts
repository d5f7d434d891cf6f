export type AnalysisErrorCode = "insufficient_history" | "degenerate_input" | "configuration";

/**
 * Base class for failures raised by the analytical pipelines.
 */
export class AnalysisError extends Error {
  public readonly code: AnalysisErrorCode;

  public constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
  }
}

/**
 * Fewer observations than an indicator or backtest needs.
 */
export class InsufficientHistoryError extends AnalysisError {
  public readonly required: number;
  public readonly available: number;

  public constructor(message: string, required: number, available: number) {
    super("insufficient_history", message);
    this.name = "InsufficientHistoryError";
    this.required = required;
    this.available = available;
  }
}

/**
 * Input that violates the series contract (ordering, signs) or cannot be simulated.
 */
export class DegenerateInputError extends AnalysisError {
  public constructor(message: string) {
    super("degenerate_input", message);
    this.name = "DegenerateInputError";
  }
}

/**
 * Threshold or option outside its valid range.
 */
export class ConfigurationError extends AnalysisError {
  public readonly issues: ReadonlyArray<string>;

  public constructor(message: string, issues: ReadonlyArray<string> = []) {
    super("configuration", message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export const isAnalysisError = (error: unknown): error is AnalysisError => {
  return error instanceof AnalysisError;
};

/**
 * Flattens any thrown value into the `{ code, message }` shape used for per-symbol reporting.
 */
export const describeError = (
  error: unknown,
): { readonly code: AnalysisErrorCode | "unknown"; readonly message: string } => {
  if (isAnalysisError(error)) {
    return { code: error.code, message: error.message };
  }
  return { code: "unknown", message: error instanceof Error ? error.message : String(error) };
};
