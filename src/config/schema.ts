import { z } from "zod";

/**
 * One override layer of strategy thresholds. Every key is optional; absent keys fall
 * through to the previous layer. Unknown keys are rejected so typos surface at startup.
 */
export const ThresholdLayerZ = z
  .object({
    enabled: z.boolean(),
    minDte: z.number(),
    maxDte: z.number(),
    minNotional: z.number(),
    maxOtmPct: z.number(),
    volOiFactor: z.number(),
    minRvol: z.number(),
    minStrength: z.number(),
    repeatLookbackMinutes: z.number(),
    minRepeatEvents: z.number(),
    memoryCap: z.number()
  })
  .partial()
  .strict();

export type ThresholdLayer = z.infer<typeof ThresholdLayerZ>;

export const TickerOverrideZ = ThresholdLayerZ.extend({
  scalp: ThresholdLayerZ.optional(),
  day: ThresholdLayerZ.optional(),
  swing: ThresholdLayerZ.optional()
}).strict();

export type TickerOverride = z.infer<typeof TickerOverrideZ>;

/**
 * Fully resolved thresholds for one (strategy, ticker). Range checks live here so a bad
 * override is caught when the strategy runs, not only at load time.
 */
export const StrategyThresholdsZ = z
  .object({
    enabled: z.boolean(),
    minDte: z.number().int().min(0),
    maxDte: z.number().int().min(0),
    minNotional: z.number().min(0),
    maxOtmPct: z.number().min(0),
    volOiFactor: z.number().min(0),
    minRvol: z.number().min(0),
    minStrength: z.number().min(0).max(10),
    repeatLookbackMinutes: z.number().positive(),
    minRepeatEvents: z.number().int().min(1),
    memoryCap: z.number().int().min(1)
  })
  .superRefine((t, ctx) => {
    if (t.minDte > t.maxDte) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["minDte"], message: `minDte ${t.minDte} > maxDte ${t.maxDte}` });
    }
    if (t.memoryCap < t.minRepeatEvents) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["memoryCap"],
        message: `memoryCap ${t.memoryCap} < minRepeatEvents ${t.minRepeatEvents}`
      });
    }
  });

export type StrategyThresholds = z.infer<typeof StrategyThresholdsZ>;

const PaperParamsZ = z.object({
  takeProfitPct: z.number().positive(),
  stopLossPct: z.number().positive(),
  maxHoldMinutes: z.number().positive()
});

const TrendWindowZ = z
  .object({ fast: z.number().int().min(1), slow: z.number().int().min(2) })
  .refine((w) => w.fast < w.slow, { message: "fast window must be shorter than slow window" });

export const ContextConfigZ = z.object({
  shortTrend: TrendWindowZ.default({ fast: 5, slow: 20 }),
  midTrend: z
    .object({
      bucketMinutes: z.number().int().min(1).default(15),
      fast: z.number().int().min(1).default(3),
      slow: z.number().int().min(2).default(6)
    })
    .default({}),
  dailyTrend: TrendWindowZ.default({ fast: 10, slow: 30 }),
  vwapBandPct: z.number().min(0).default(0.05),
  regime: z
    .object({
      volatilityLookbackDays: z.number().int().min(2).default(20),
      lowVolatilityPct: z.number().positive().default(15),
      elevatedVolatilityPct: z.number().positive().default(30)
    })
    .default({})
});

export type ContextConfig = z.infer<typeof ContextConfigZ>;

export const FlowConfigZ = z.object({
  experimentId: z.string().min(1).default("baseline"),
  context: ContextConfigZ.default({}),
  strategies: z
    .object({
      scalp: ThresholdLayerZ.default({}),
      day: ThresholdLayerZ.default({}),
      swing: ThresholdLayerZ.default({})
    })
    .default({}),
  paper: z
    .object({
      scalp: PaperParamsZ.default({ takeProfitPct: 2, stopLossPct: 1, maxHoldMinutes: 30 }),
      day: PaperParamsZ.default({ takeProfitPct: 5, stopLossPct: 2, maxHoldMinutes: 6 * 60 }),
      swing: PaperParamsZ.default({ takeProfitPct: 15, stopLossPct: 5, maxHoldMinutes: 7 * 24 * 60 })
    })
    .default({}),
  tickers: z
    .object({
      default: ThresholdLayerZ.default({}),
      overrides: z.record(z.string(), TickerOverrideZ).default({})
    })
    .default({}),
  routing: z
    .object({
      // logical channel -> env var holding the webhook URL
      channels: z
        .record(z.string(), z.string())
        .default({ scalps: "FLOW_WEBHOOK_SCALPS", main: "FLOW_WEBHOOK_MAIN", swings: "FLOW_WEBHOOK_SWINGS" })
    })
    .default({})
});

export type FlowConfig = z.infer<typeof FlowConfigZ>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`);
}
