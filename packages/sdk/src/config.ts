import { z } from "zod";

/** -----------------------------------------------------------------------
 *  Distribution-day configuration
 *  -------------------------------------------------------------------- */

/**
 * Which down-on-higher-volume sessions qualify as distribution days.
 * With both thresholds at their defaults every such session qualifies.
 */
export const QualificationConfigSchema = z.object({
  /** Close must fall by more than this fraction (0.002 = 0.2%). */
  minPercentDecline: z.number().min(0).max(1).default(0),
  /** When set, weightedChange must also be strictly below this fraction. */
  weightedChangeThreshold: z.number().max(0).nullable().default(null),
});

export const ExpirationConfigSchema = z.object({
  /** Sessions a distribution day stays active, counting its own session. */
  timeLimitSessions: z.number().int().positive().default(25),
  /** Fractional rise above the distribution-day close that expires it. */
  recoveryThreshold: z.number().min(0).default(0.05),
});

export const ConditionConfigSchema = z
  .object({
    recentWindowSessions: z.number().int().positive().default(10),
    moderateCount: z.number().int().nonnegative().default(5),
    highCount: z.number().int().nonnegative().default(8),
    recentHighCount: z.number().int().nonnegative().default(4),
    recentModerateCount: z.number().int().nonnegative().nullable().default(null),
    /** Summed weightedChange at or below which pressure is at least moderate. */
    moderateWeightedChange: z.number().max(0).nullable().default(null),
    highWeightedChange: z.number().max(0).nullable().default(null),
  })
  .superRefine((value, ctx) => {
    if (value.moderateCount > value.highCount) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "moderateCount must not exceed highCount",
        path: ["moderateCount"],
      });
    }
    if (
      value.moderateWeightedChange !== null &&
      value.highWeightedChange !== null &&
      value.highWeightedChange > value.moderateWeightedChange
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "highWeightedChange must be at or below moderateWeightedChange",
        path: ["highWeightedChange"],
      });
    }
  });

export const DistributionConfigSchema = z.object({
  qualification: QualificationConfigSchema.default({}),
  expiration: ExpirationConfigSchema.default({}),
  condition: ConditionConfigSchema.default({}),
});

/** -----------------------------------------------------------------------
 *  Technical indicators
 *  -------------------------------------------------------------------- */

export const IndicatorConfigSchema = z
  .object({
    shortMaPeriod: z.number().int().positive().default(50),
    longMaPeriod: z.number().int().positive().default(200),
    rsiPeriod: z.number().int().positive().default(14),
    rsiOverbought: z.number().min(0).max(100).default(70),
    rsiOversold: z.number().min(0).max(100).default(30),
  })
  .superRefine((value, ctx) => {
    if (value.shortMaPeriod >= value.longMaPeriod) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "shortMaPeriod must be less than longMaPeriod",
        path: ["shortMaPeriod"],
      });
    }
    if (value.rsiOversold >= value.rsiOverbought) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "rsiOversold must be less than rsiOverbought",
        path: ["rsiOversold"],
      });
    }
  });

/** -----------------------------------------------------------------------
 *  Trend Guard
 *  -------------------------------------------------------------------- */

export const TrendGuardConfigSchema = z.object({
  smaLookbackMonths: z.number().int().min(2).default(12),
  /** Annual yield earned while in cash (0.03 for 3%). */
  cashYield: z.number().min(-1).max(1).default(0.03),
  initialCapital: z.number().finite().default(1),
});

export const AnalysisConfigSchema = z.object({
  distribution: DistributionConfigSchema.default({}),
  indicators: IndicatorConfigSchema.default({}),
  trendGuard: TrendGuardConfigSchema.default({}),
});

export type QualificationConfig = z.output<typeof QualificationConfigSchema>;
export type ExpirationConfig = z.output<typeof ExpirationConfigSchema>;
export type ConditionConfig = z.output<typeof ConditionConfigSchema>;
export type DistributionConfig = z.output<typeof DistributionConfigSchema>;
export type IndicatorConfig = z.output<typeof IndicatorConfigSchema>;
export type TrendGuardConfig = z.output<typeof TrendGuardConfigSchema>;
export type AnalysisConfig = z.output<typeof AnalysisConfigSchema>;

/** Partial configuration accepted at the public entry points. */
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type QualificationConfigInput = z.input<typeof QualificationConfigSchema>;
export type ExpirationConfigInput = z.input<typeof ExpirationConfigSchema>;
export type ConditionConfigInput = z.input<typeof ConditionConfigSchema>;
export type IndicatorConfigInput = z.input<typeof IndicatorConfigSchema>;
export type TrendGuardConfigInput = z.input<typeof TrendGuardConfigSchema>;
