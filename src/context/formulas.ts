import { isoDate } from "../lib/time.js";
import type { Bar, LevelBreak, MarketSnapshot, TrendFlag, VolatilityBucket, VwapRelation } from "../types.js";

export type TrendWindow = { fast: number; slow: number };

/**
 * Replaceable metric formulas behind the context attacher. Each returns null / UNKNOWN
 * when the snapshot does not carry enough history.
 */
export interface ContextFormulas {
  relativeVolume(snapshot: MarketSnapshot): number | null;
  vwap(snapshot: MarketSnapshot): number | null;
  trend(closes: readonly number[], window: TrendWindow): TrendFlag;
  realizedVolPct(dailyBars: readonly Bar[], lookbackDays: number): number | null;
}

export const DEFAULT_FORMULAS: ContextFormulas = {
  relativeVolume,
  vwap,
  trend: trendFlag,
  realizedVolPct
};

/**
 * RVOL = session volume so far / mean same-time-of-day volume of prior sessions.
 */
export function relativeVolume(snapshot: MarketSnapshot): number | null {
  if (snapshot.intradayBars.length === 0) return null;
  const baseline = mean(snapshot.volumeBaseline);
  if (baseline === null || baseline <= 0) return null;
  const session = snapshot.intradayBars.reduce((acc, b) => acc + b.volume, 0);
  return session / baseline;
}

// Session VWAP from typical price (H+L+C)/3.
export function vwap(snapshot: MarketSnapshot): number | null {
  let pv = 0;
  let vol = 0;
  for (const b of snapshot.intradayBars) {
    pv += ((b.high + b.low + b.close) / 3) * b.volume;
    vol += b.volume;
  }
  return vol > 0 ? pv / vol : null;
}

export function vwapRelation(price: number, vwapValue: number | null, bandPct: number): VwapRelation {
  if (vwapValue === null || vwapValue <= 0) return "UNKNOWN";
  const diffPct = ((price - vwapValue) / vwapValue) * 100;
  if (Math.abs(diffPct) <= bandPct) return "AT";
  return diffPct > 0 ? "ABOVE" : "BELOW";
}

/**
 * Fast vs slow simple moving average of closes. UP needs fast > slow with the last
 * close at or above fast; DOWN is the mirror; anything else is FLAT.
 */
export function trendFlag(closes: readonly number[], window: TrendWindow): TrendFlag {
  if (closes.length < window.slow) return "UNKNOWN";
  const fast = mean(closes.slice(-window.fast));
  const slow = mean(closes.slice(-window.slow));
  const last = closes[closes.length - 1];
  if (fast === null || slow === null || last === undefined) return "UNKNOWN";
  if (fast > slow && last >= fast) return "UP";
  if (fast < slow && last <= fast) return "DOWN";
  return "FLAT";
}

// Close of each `minutes`-wide bucket, in bar order.
export function bucketCloses(bars: readonly Bar[], minutes: number): number[] {
  const widthMs = minutes * 60_000;
  const out: number[] = [];
  let current: number | null = null;
  for (const b of bars) {
    const t = Date.parse(b.ts);
    if (!Number.isFinite(t)) continue;
    const bucket = Math.floor(t / widthMs);
    if (bucket === current) out[out.length - 1] = b.close;
    else {
      out.push(b.close);
      current = bucket;
    }
  }
  return out;
}

/**
 * Annualized stdev of daily log returns over the last `lookbackDays` returns, in percent.
 */
export function realizedVolPct(dailyBars: readonly Bar[], lookbackDays: number): number | null {
  const closes = dailyBars.slice(-(lookbackDays + 1)).map((b) => b.close);
  if (closes.length < lookbackDays + 1 || closes.some((c) => !(c > 0))) return null;
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    const prev = closes[i - 1];
    const cur = closes[i];
    if (prev === undefined || cur === undefined) return null;
    returns.push(Math.log(cur / prev));
  }
  const avg = mean(returns);
  if (avg === null || returns.length < 2) return null;
  const variance = returns.reduce((acc, r) => acc + (r - avg) ** 2, 0) / (returns.length - 1);
  return Math.sqrt(variance) * Math.sqrt(252) * 100;
}

export function volatilityBucket(
  volPct: number | null,
  thresholds: { lowVolatilityPct: number; elevatedVolatilityPct: number }
): VolatilityBucket {
  if (volPct === null) return "UNKNOWN";
  if (volPct < thresholds.lowVolatilityPct) return "LOW";
  if (volPct >= thresholds.elevatedVolatilityPct) return "ELEVATED";
  return "NORMAL";
}

// Last completed session strictly before the trade date.
export function priorSession(dailyBars: readonly Bar[], tradeDate: string): Bar | null {
  let prior: Bar | null = null;
  for (const b of dailyBars) {
    const d = isoDate(b.ts);
    if (d !== null && d < tradeDate) prior = b;
  }
  return prior;
}

export function levelBreak(price: number, prior: Bar | null): LevelBreak {
  if (!prior) return "UNKNOWN";
  if (price > prior.high) return "ABOVE_HIGH";
  if (price < prior.low) return "BELOW_LOW";
  return "NONE";
}

function mean(xs: readonly number[]): number | null {
  if (xs.length === 0) return null;
  return xs.reduce((a, b) => a + b, 0) / xs.length;
}
