import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { toFlowEvent } from "../src/ingest/flowEvents.js";
import type { Bar, FlowEvent, MarketContext, MarketSnapshot, Signal } from "../src/types.js";

export const T0 = "2026-03-05T15:00:00.000Z";

// A bullish 1-DTE SPY call sweep worth $185,000.
export function rawPrint(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: "evt-1",
    ticker: "SPY",
    right: "CALL",
    action: "BUY",
    strike: 485,
    expiry: "2026-03-06",
    event_time: T0,
    contracts: 500,
    option_price: 3.7,
    volume: 1200,
    open_interest: 300,
    underlying_price: 483.2,
    tags: ["SWEEP", "AGGRESSIVE"],
    ...overrides
  };
}

export function print(overrides: Record<string, unknown> = {}): FlowEvent {
  return toFlowEvent(rawPrint(overrides));
}

export function context(overrides: Partial<MarketContext> = {}): MarketContext {
  return {
    rvol: 2,
    vwap: 482,
    vwapRelation: "ABOVE",
    shortTrend: "UP",
    midTrend: "UP",
    dailyTrend: "UP",
    levelBreak: "ABOVE_HIGH",
    regime: { trend: "UNKNOWN", volatility: "UNKNOWN", realizedVolPct: null },
    missing: [],
    ...overrides
  };
}

export function signal(overrides: Partial<Signal> = {}): Signal {
  const event = overrides.event ?? print();
  return {
    id: "sig-1",
    kind: "scalp",
    ticker: event.ticker,
    direction: "BULLISH",
    event,
    context: context(),
    triggeredRules: ["dte_window", "size", "sweep"],
    tags: ["SIZE", "SWEEP"],
    strength: 8.35,
    createdAt: event.eventTime,
    experimentId: "test",
    ...overrides
  };
}

export function bar(ts: string, close: number, volume = 1000): Bar {
  return { ts, open: close, high: close + 0.1, low: close - 0.1, close, volume };
}

/**
 * 20 one-minute bars from 14:30Z rising 480.0 -> 481.9: short trend UP, VWAP below
 * 483.2, too few 15-minute buckets for a mid trend, no daily history.
 */
export function risingSnapshot(ticker = "SPY"): MarketSnapshot {
  const start = Date.parse("2026-03-05T14:30:00.000Z");
  const intradayBars = Array.from({ length: 20 }, (_, i) => bar(new Date(start + i * 60_000).toISOString(), 480 + i / 10));
  return { ticker, asOf: T0, intradayBars, dailyBars: [], volumeBaseline: [] };
}

export function counter(prefix: string): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export async function tempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "flow-desk-"));
}
