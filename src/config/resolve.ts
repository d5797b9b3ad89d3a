import { ConfigurationError } from "../errors.js";
import type { PaperParams, StrategyKind } from "../types.js";
import { formatIssues, StrategyThresholdsZ, type FlowConfig, type StrategyThresholds, type ThresholdLayer } from "./schema.js";

export const DEFAULT_THRESHOLDS: Record<StrategyKind, StrategyThresholds> = {
  scalp: {
    enabled: true,
    minDte: 0,
    maxDte: 2,
    minNotional: 50_000,
    maxOtmPct: 3,
    volOiFactor: 1,
    minRvol: 0,
    minStrength: 5,
    repeatLookbackMinutes: 60,
    minRepeatEvents: 1,
    memoryCap: 32
  },
  day: {
    enabled: true,
    minDte: 0,
    maxDte: 10,
    minNotional: 100_000,
    maxOtmPct: 5,
    volOiFactor: 1,
    minRvol: 1.5,
    minStrength: 6,
    repeatLookbackMinutes: 60,
    minRepeatEvents: 1,
    memoryCap: 32
  },
  swing: {
    enabled: true,
    minDte: 7,
    maxDte: 60,
    minNotional: 250_000,
    maxOtmPct: 10,
    volOiFactor: 0,
    minRvol: 0,
    minStrength: 7,
    repeatLookbackMinutes: 3 * 24 * 60,
    minRepeatEvents: 3,
    memoryCap: 32
  }
};

/**
 * Merge override layers left to right; later layers win and `undefined` never
 * overwrites. Merging [a, b, c] in one call equals merging (a, b) then c.
 */
export function mergeLayers(...layers: ReadonlyArray<Readonly<Record<string, unknown>> | undefined>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const layer of layers) {
    if (!layer) continue;
    for (const [k, v] of Object.entries(layer)) {
      if (v === undefined) continue;
      out[k] = v;
    }
  }
  return out;
}

/**
 * Ordered override layers for one ticker and strategy, lowest precedence first:
 * built-in defaults, `strategies.<kind>`, `tickers.default`, the ticker's shared keys,
 * the ticker's `<kind>` block.
 */
export function thresholdLayers(config: FlowConfig, ticker: string, kind: StrategyKind): ThresholdLayer[] {
  const override = config.tickers.overrides[ticker.toUpperCase()] ?? config.tickers.overrides[ticker];
  const layers: ThresholdLayer[] = [DEFAULT_THRESHOLDS[kind], config.strategies[kind], config.tickers.default];
  if (override) {
    const { scalp, day, swing, ...shared } = override;
    const perMode = { scalp, day, swing }[kind];
    layers.push(shared);
    if (perMode) layers.push(perMode);
  }
  return layers;
}

export function resolveStrategyConfig(config: FlowConfig, ticker: string, kind: StrategyKind): StrategyThresholds {
  const merged = mergeLayers(...thresholdLayers(config, ticker, kind));
  const parsed = StrategyThresholdsZ.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `invalid ${kind} thresholds for ${ticker}`,
      strategy: kind,
      ticker,
      issues: formatIssues(parsed.error)
    });
  }
  return parsed.data;
}

export function paperParamsFor(config: FlowConfig, kind: StrategyKind): PaperParams {
  return config.paper[kind];
}
