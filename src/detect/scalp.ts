import {
  dteWindowGate,
  nearMoneyGate,
  runGates,
  sizeGate,
  trendGate,
  volumeOverOiGate,
  vwapGate,
  type Gate,
  type StrategyEvaluator
} from "./gates.js";

/**
 * Scalp: short-dated, near-the-money size trading with the short-horizon trend and on
 * the right side of VWAP, opening fresh contracts. No regime gate.
 */
export const SCALP_GATES: readonly Gate[] = [
  dteWindowGate,
  sizeGate,
  nearMoneyGate,
  trendGate((ctx) => ctx.shortTrend),
  vwapGate,
  volumeOverOiGate
];

export function createScalpEvaluator(): StrategyEvaluator {
  return {
    kind: "scalp",
    evaluate: (event, context, t) => runGates(SCALP_GATES, event, context, t)
  };
}
