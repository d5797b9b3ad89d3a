import { biasOf } from "../detect/gates.js";
import type { FlowEvent, MarketContext, RuleId } from "../types.js";

// Same rule, same tag, whichever strategy triggered it.
export const RULE_TAGS: Readonly<Record<RuleId, string>> = {
  dte_window: "DTE_FIT",
  size: "SIZE",
  moneyness: "STRIKE_FIT",
  trend_aligned: "TREND_CONFIRMED",
  vwap_aligned: "VWAP_ALIGNED",
  level_break: "LEVEL_BREAK",
  volume_over_oi: "VOL>OI",
  rvol: "RVOL",
  repeat_buying: "PERSISTENT_BUYER",
  sweep: "SWEEP",
  aggressive: "AGGRESSIVE",
  cluster: "CLUSTER"
};

export const MAX_STRENGTH = 10;

export type ScoreResult = {
  strength: number;
  tags: string[];
};

export function tagsFor(rules: readonly RuleId[]): string[] {
  const tags: string[] = [];
  for (const r of rules) {
    const tag = RULE_TAGS[r];
    if (!tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

/**
 * Additive strength score, clamped to [0, 10] and rounded to hundredths:
 * - 0.5 per distinct triggered rule, at most 3
 * - size: 2 at the strategy's minNotional, scaling with notional / minNotional, at most 3
 *   (2 when there is no size threshold)
 * - trend confirmed +2, prior-session level break +1
 * - sweep +1.5, aggressive +1, cluster/split +1
 * - regime trend agreeing with the print's direction +1.5, opposing -1
 *
 * Clearing every gate of a strategy reaches its default minStrength without flow tags.
 */
export function scoreSignal(
  event: FlowEvent,
  context: MarketContext,
  triggeredRules: readonly RuleId[],
  opts: { minNotional: number }
): ScoreResult {
  const distinct = new Set(triggeredRules);
  const ruleScore = Math.min(3, distinct.size * 0.5);

  const sizeScore = opts.minNotional > 0 ? Math.min(3, (event.notional / opts.minNotional) * 2) : 2;

  let confirmationScore = 0;
  if (distinct.has("trend_aligned")) confirmationScore += 2;
  if (distinct.has("level_break")) confirmationScore += 1;

  let characterScore = 0;
  if (event.flowTags.includes("SWEEP")) characterScore += 1.5;
  if (event.flowTags.includes("AGGRESSIVE")) characterScore += 1;
  if (event.flowTags.includes("CLUSTER") || event.flowTags.includes("SPLIT")) characterScore += 1;

  const bias = biasOf(event);
  const trend = context.regime.trend;
  let regimeScore = 0;
  if ((bias === "BULLISH" && trend === "TRENDING_UP") || (bias === "BEARISH" && trend === "TRENDING_DOWN")) regimeScore = 1.5;
  else if ((bias === "BULLISH" && trend === "TRENDING_DOWN") || (bias === "BEARISH" && trend === "TRENDING_UP")) regimeScore = -1;

  const raw = ruleScore + sizeScore + confirmationScore + characterScore + regimeScore;
  const strength = Math.round(clamp(raw, 0, MAX_STRENGTH) * 100) / 100;
  return { strength, tags: tagsFor(triggeredRules) };
}

function clamp(n: number, lo: number, hi: number): number {
  if (!Number.isFinite(n)) return lo;
  return Math.min(hi, Math.max(lo, n));
}
