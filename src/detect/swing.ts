import { biasOf, dteWindowGate, otmGuardGate, runGates, sizeGate, trendGate, type Gate, type StrategyEvaluator } from "./gates.js";
import { RepeatBuyingMemory } from "./memory.js";

/**
 * Accumulation: the same ticker and direction printed repeatedly inside the lookback
 * window. The print under evaluation is recorded first, so the Nth qualifying print in
 * the window is the one that satisfies the gate.
 *
 * Only prints that reach this gate (every earlier gate passed) are remembered.
 */
export function repeatBuyingGate(memory: RepeatBuyingMemory): Gate {
  return {
    rule: "repeat_buying",
    check: (event, _ctx, t) => {
      const key = RepeatBuyingMemory.keyFor(event.ticker, biasOf(event));
      const count = memory.record(
        key,
        { atMs: Date.parse(event.eventTime), notional: event.notional },
        { lookbackMs: t.repeatLookbackMinutes * 60_000, cap: t.memoryCap }
      );
      return count >= t.minRepeatEvents;
    }
  };
}

export function swingGates(memory: RepeatBuyingMemory): readonly Gate[] {
  return [dteWindowGate, sizeGate, otmGuardGate, trendGate((ctx) => ctx.dailyTrend), repeatBuyingGate(memory)];
}

export function createSwingEvaluator(memory: RepeatBuyingMemory): StrategyEvaluator {
  const gates = swingGates(memory);
  return {
    kind: "swing",
    evaluate: (event, context, t) => runGates(gates, event, context, t)
  };
}
