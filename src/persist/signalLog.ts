import path from "node:path";
import { appendJsonLines } from "../lib/fs.js";
import type { Bias, MarketContext, RuleId, Signal, StrategyKind } from "../types.js";

// One row per emitted signal; flat enough to grep and to load into a notebook.
export type SignalRow = {
  ts: string;
  signalId: string;
  experimentId: string;
  kind: StrategyKind;
  ticker: string;
  direction: Bias;
  strength: number;
  tags: string[];
  rules: RuleId[];
  eventId: string;
  contract: string;
  notional: number;
  underlyingPrice: number;
  context: {
    rvol: number | null;
    vwap: number | null;
    vwapRelation: MarketContext["vwapRelation"];
    shortTrend: MarketContext["shortTrend"];
    midTrend: MarketContext["midTrend"];
    dailyTrend: MarketContext["dailyTrend"];
    levelBreak: MarketContext["levelBreak"];
    regime: string;
  };
};

export function defaultSignalLogPath(): string {
  return path.resolve(process.cwd(), "data/db/signals.jsonl");
}

export function contractLabel(signal: Signal): string {
  const e = signal.event;
  return `${e.ticker} ${e.expiry} ${e.strike}${e.right === "CALL" ? "C" : "P"}`;
}

export function toSignalRow(signal: Signal): SignalRow {
  const ctx = signal.context;
  return {
    ts: signal.createdAt,
    signalId: signal.id,
    experimentId: signal.experimentId,
    kind: signal.kind,
    ticker: signal.ticker,
    direction: signal.direction,
    strength: signal.strength,
    tags: [...signal.tags],
    rules: [...signal.triggeredRules],
    eventId: signal.event.id,
    contract: contractLabel(signal),
    notional: signal.event.notional,
    underlyingPrice: signal.event.underlyingPrice,
    context: {
      rvol: ctx.rvol,
      vwap: ctx.vwap,
      vwapRelation: ctx.vwapRelation,
      shortTrend: ctx.shortTrend,
      midTrend: ctx.midTrend,
      dailyTrend: ctx.dailyTrend,
      levelBreak: ctx.levelBreak,
      regime: `${ctx.regime.trend}/${ctx.regime.volatility}`
    }
  };
}

export async function appendSignalRows(signals: readonly Signal[], filePath = defaultSignalLogPath()): Promise<void> {
  await appendJsonLines(filePath, signals.map(toSignalRow));
}
