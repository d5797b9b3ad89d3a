import crypto from "node:crypto";
import { resolveStrategyConfig } from "../config/resolve.js";
import type { FlowConfig } from "../config/schema.js";
import { createDayTradeEvaluator } from "../detect/dayTrade.js";
import { biasOf, type StrategyEvaluator } from "../detect/gates.js";
import { RepeatBuyingMemory } from "../detect/memory.js";
import { createScalpEvaluator } from "../detect/scalp.js";
import { createSwingEvaluator } from "../detect/swing.js";
import { scoreSignal } from "../score/scoreSignal.js";
import { STRATEGY_KINDS, type EvaluationResult, type FlowEvent, type MarketContext, type Signal, type StrategyKind } from "../types.js";

export type StrategyFailure = {
  kind: StrategyKind;
  error: unknown;
};

export type DroppedSignal = {
  kind: StrategyKind;
  strength: number;
  minStrength: number;
};

export type EmitResult = {
  signals: Signal[];
  failures: StrategyFailure[];
  dropped: DroppedSignal[];
  evaluations: Partial<Record<StrategyKind, EvaluationResult>>;
};

export type SignalEmitter = {
  readonly memory: RepeatBuyingMemory;
  run: (event: FlowEvent, context: MarketContext, config: FlowConfig) => EmitResult;
};

export type EmitterOptions = {
  memory?: RepeatBuyingMemory;
  idFactory?: () => string;
  evaluators?: Partial<Record<StrategyKind, StrategyEvaluator>>;
};

/**
 * Runs scalp, day and swing independently over one enriched event, in that order, and
 * builds at most one Signal per strategy. A strategy whose config is invalid or whose
 * evaluator throws is reported in `failures` and the others still run. Gates passing is
 * not enough: the scored strength must also reach the strategy's `minStrength`.
 *
 * The emitter owns the swing strategy's repeated-buying memory.
 */
export function createSignalEmitter(opts: EmitterOptions = {}): SignalEmitter {
  const memory = opts.memory ?? new RepeatBuyingMemory();
  const idFactory = opts.idFactory ?? (() => crypto.randomUUID());
  const evaluators: Record<StrategyKind, StrategyEvaluator> = {
    scalp: opts.evaluators?.scalp ?? createScalpEvaluator(),
    day: opts.evaluators?.day ?? createDayTradeEvaluator(),
    swing: opts.evaluators?.swing ?? createSwingEvaluator(memory)
  };

  function run(event: FlowEvent, context: MarketContext, config: FlowConfig): EmitResult {
    const out: EmitResult = { signals: [], failures: [], dropped: [], evaluations: {} };

    for (const kind of STRATEGY_KINDS) {
      try {
        const t = resolveStrategyConfig(config, event.ticker, kind);
        if (!t.enabled) continue;

        const result = evaluators[kind].evaluate(event, context, t);
        out.evaluations[kind] = result;
        if (!result.passed) continue;

        const { strength, tags } = scoreSignal(event, context, result.triggeredRules, { minNotional: t.minNotional });
        if (strength < t.minStrength) {
          out.dropped.push({ kind, strength, minStrength: t.minStrength });
          continue;
        }

        out.signals.push(
          Object.freeze({
            id: idFactory(),
            kind,
            ticker: event.ticker,
            direction: biasOf(event),
            event,
            context,
            triggeredRules: Object.freeze([...result.triggeredRules]),
            tags: Object.freeze(tags),
            strength,
            createdAt: event.eventTime,
            experimentId: config.experimentId
          })
        );
      } catch (error) {
        out.failures.push({ kind, error });
      }
    }

    return out;
  }

  return { memory, run };
}
