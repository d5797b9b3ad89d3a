import type { ContextConfig } from "../config/schema.js";
import type { ContextMetric, FlowEvent, MarketContext, MarketSnapshot, TrendFlag, TrendRegime } from "../types.js";
import { bucketCloses, DEFAULT_FORMULAS, levelBreak, priorSession, volatilityBucket, vwapRelation, type ContextFormulas } from "./formulas.js";

/**
 * Derive the market context for one flow event. Pure: the same event, snapshot and
 * thresholds always give the same context. Metrics the snapshot cannot support come back
 * as null / UNKNOWN and are listed in `missing`; nothing here throws on thin history.
 */
export function attachContext(
  event: FlowEvent,
  snapshot: MarketSnapshot,
  cfg: ContextConfig,
  formulas: ContextFormulas = DEFAULT_FORMULAS
): MarketContext {
  const intradayCloses = snapshot.intradayBars.map((b) => b.close);
  const dailyCloses = snapshot.dailyBars.map((b) => b.close);

  const rvol = finiteOrNull(formulas.relativeVolume(snapshot));
  const vwapValue = finiteOrNull(formulas.vwap(snapshot));
  const shortTrend = formulas.trend(intradayCloses, cfg.shortTrend);
  const midTrend = formulas.trend(bucketCloses(snapshot.intradayBars, cfg.midTrend.bucketMinutes), cfg.midTrend);
  const dailyTrend = formulas.trend(dailyCloses, cfg.dailyTrend);
  const level = levelBreak(event.underlyingPrice, priorSession(snapshot.dailyBars, event.eventTime.slice(0, 10)));
  const realizedVolPct = finiteOrNull(formulas.realizedVolPct(snapshot.dailyBars, cfg.regime.volatilityLookbackDays));

  const missing: ContextMetric[] = [];
  if (rvol === null) missing.push("rvol");
  if (vwapValue === null) missing.push("vwap");
  if (shortTrend === "UNKNOWN") missing.push("shortTrend");
  if (midTrend === "UNKNOWN") missing.push("midTrend");
  if (dailyTrend === "UNKNOWN") missing.push("dailyTrend");
  if (level === "UNKNOWN") missing.push("levelBreak");
  if (realizedVolPct === null) missing.push("volatility");

  return Object.freeze({
    rvol,
    vwap: vwapValue,
    vwapRelation: vwapRelation(event.underlyingPrice, vwapValue, cfg.vwapBandPct),
    shortTrend,
    midTrend,
    dailyTrend,
    levelBreak: level,
    regime: Object.freeze({
      trend: trendRegime(dailyTrend),
      volatility: volatilityBucket(realizedVolPct, cfg.regime),
      realizedVolPct
    }),
    missing: Object.freeze(missing)
  });
}

function trendRegime(flag: TrendFlag): TrendRegime {
  switch (flag) {
    case "UP":
      return "TRENDING_UP";
    case "DOWN":
      return "TRENDING_DOWN";
    case "FLAT":
      return "CHOP";
    default:
      return "UNKNOWN";
  }
}

function finiteOrNull(n: number | null): number | null {
  return n !== null && Number.isFinite(n) ? n : null;
}
