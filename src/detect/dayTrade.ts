import {
  dteWindowGate,
  levelBreakGate,
  nearMoneyGate,
  runGates,
  rvolGate,
  sizeGate,
  trendGate,
  volumeOverOiGate,
  type Gate,
  type StrategyEvaluator
} from "./gates.js";

// 15-minute trend confirmation plus a break of the prior session's range, on heavy volume.
export const DAY_TRADE_GATES: readonly Gate[] = [
  dteWindowGate,
  sizeGate,
  nearMoneyGate,
  trendGate((ctx) => ctx.midTrend),
  levelBreakGate,
  volumeOverOiGate,
  rvolGate
];

export function createDayTradeEvaluator(): StrategyEvaluator {
  return {
    kind: "day",
    evaluate: (event, context, t) => runGates(DAY_TRADE_GATES, event, context, t)
  };
}
