import type { StrategyThresholds } from "../config/schema.js";
import { daysBetween } from "../lib/time.js";
import type { Bias, EvaluationResult, FlowEvent, MarketContext, RuleId, StrategyKind, TrendFlag } from "../types.js";

export type Gate = {
  rule: RuleId;
  check: (event: FlowEvent, context: MarketContext, t: StrategyThresholds) => boolean;
};

export type StrategyEvaluator = {
  kind: StrategyKind;
  evaluate: (event: FlowEvent, context: MarketContext, t: StrategyThresholds) => EvaluationResult;
};

// Bought calls and sold puts lean bullish; bought puts and sold calls lean bearish.
export function biasOf(event: FlowEvent): Bias {
  const bullishRight = event.right === "CALL";
  const bought = event.action === "BUY";
  return bullishRight === bought ? "BULLISH" : "BEARISH";
}

export function daysToExpiry(event: FlowEvent): number {
  return daysBetween(event.eventTime.slice(0, 10), event.expiry);
}

// Unsigned distance of strike from spot, in percent.
export function moneynessPct(event: FlowEvent): number {
  return (Math.abs(event.strike - event.underlyingPrice) / event.underlyingPrice) * 100;
}

// Signed out-of-the-money distance in percent; negative when in the money.
export function otmPct(event: FlowEvent): number {
  const diff = event.right === "CALL" ? event.strike - event.underlyingPrice : event.underlyingPrice - event.strike;
  return (diff / event.underlyingPrice) * 100;
}

/**
 * Non-gating observations of the print's character. Always reported so the scorer and
 * tag mapping see them whether or not the gates passed.
 */
export function flowCharacterRules(event: FlowEvent): RuleId[] {
  const rules: RuleId[] = [];
  if (event.flowTags.includes("SWEEP")) rules.push("sweep");
  if (event.flowTags.includes("AGGRESSIVE")) rules.push("aggressive");
  if (event.flowTags.includes("CLUSTER") || event.flowTags.includes("SPLIT")) rules.push("cluster");
  return rules;
}

/**
 * Apply gates in order (logical AND). Stops at the first failure; rules satisfied before
 * it are still reported along with the failing rule.
 */
export function runGates(
  gates: readonly Gate[],
  event: FlowEvent,
  context: MarketContext,
  t: StrategyThresholds
): EvaluationResult {
  const triggered: RuleId[] = [];
  for (const gate of gates) {
    if (!gate.check(event, context, t)) {
      return { passed: false, triggeredRules: [...triggered, ...flowCharacterRules(event)], failedRule: gate.rule };
    }
    triggered.push(gate.rule);
  }
  return { passed: true, triggeredRules: [...triggered, ...flowCharacterRules(event)], failedRule: null };
}

export const dteWindowGate: Gate = {
  rule: "dte_window",
  check: (event, _ctx, t) => {
    const dte = daysToExpiry(event);
    return dte >= t.minDte && dte <= t.maxDte;
  }
};

export const sizeGate: Gate = {
  rule: "size",
  check: (event, _ctx, t) => event.notional >= t.minNotional
};

export const nearMoneyGate: Gate = {
  rule: "moneyness",
  check: (event, _ctx, t) => moneynessPct(event) <= t.maxOtmPct
};

// Swing tolerates in-the-money strikes but not deep out-of-the-money lottery tickets.
export const otmGuardGate: Gate = {
  rule: "moneyness",
  check: (event, _ctx, t) => otmPct(event) <= t.maxOtmPct
};

export function trendGate(pick: (ctx: MarketContext) => TrendFlag): Gate {
  return {
    rule: "trend_aligned",
    check: (event, ctx) => pick(ctx) === (biasOf(event) === "BULLISH" ? "UP" : "DOWN")
  };
}

export const vwapGate: Gate = {
  rule: "vwap_aligned",
  check: (event, ctx) => ctx.vwapRelation === (biasOf(event) === "BULLISH" ? "ABOVE" : "BELOW")
};

export const levelBreakGate: Gate = {
  rule: "level_break",
  check: (event, ctx) => ctx.levelBreak === (biasOf(event) === "BULLISH" ? "ABOVE_HIGH" : "BELOW_LOW")
};

// Volume above open interest means new positioning rather than closing trades.
export const volumeOverOiGate: Gate = {
  rule: "volume_over_oi",
  check: (event, _ctx, t) => event.volume >= Math.max(event.openInterest, 1) * t.volOiFactor
};

export const rvolGate: Gate = {
  rule: "rvol",
  check: (_event, ctx, t) => ctx.rvol !== null && ctx.rvol >= t.minRvol
};
