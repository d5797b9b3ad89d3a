import { daysToExpiry, otmPct } from "../detect/gates.js";
import { fmtNum, fmtPct, fmtUsd } from "../lib/pretty.js";
import { exitLevels } from "../paper/engine.js";
import { contractLabel } from "../persist/signalLog.js";
import type { PaperParams, Signal } from "../types.js";
import type { AlertMode } from "./route.js";

function header(signal: Signal): string {
  return `[${signal.kind.toUpperCase()}] ${signal.ticker} ${signal.direction} | strength ${fmtNum(signal.strength)}`;
}

function printLine(signal: Signal): string {
  const e = signal.event;
  return `${contractLabel(signal)} ${e.action} ${e.contracts.toLocaleString("en-US")} @ ${fmtNum(e.optionPrice)} = ${fmtUsd(e.notional, 0)}`;
}

function tagsLine(signal: Signal): string {
  return `tags: ${signal.tags.length ? signal.tags.join(", ") : "none"}`;
}

function paperLine(signal: Signal, paper: PaperParams): string {
  const { takeProfitPrice, stopLossPrice } = exitLevels(signal.direction, signal.event.underlyingPrice, paper);
  return `paper: entry ${fmtNum(signal.event.underlyingPrice)} TP ${fmtNum(takeProfitPrice)} SL ${fmtNum(stopLossPrice)} hold ${paper.maxHoldMinutes}m`;
}

// Scalps: what, how big, when. Read in seconds.
export function formatShortAlert(signal: Signal): string {
  return [header(signal), printLine(signal), tagsLine(signal), `time: ${signal.createdAt}`].join("\n");
}

export function formatMediumAlert(signal: Signal, paper: PaperParams): string {
  const e = signal.event;
  const ctx = signal.context;
  return [
    header(signal),
    printLine(signal),
    `vol/OI: ${e.volume.toLocaleString("en-US")} / ${e.openInterest.toLocaleString("en-US")}`,
    tagsLine(signal),
    `context: VWAP ${ctx.vwapRelation} | trend ${ctx.shortTrend}/${ctx.midTrend} | RVOL ${fmtNum(ctx.rvol)} | regime ${ctx.regime.trend}`,
    paperLine(signal, paper),
    `time: ${signal.createdAt}`
  ].join("\n");
}

export function formatDeepDiveAlert(signal: Signal, paper: PaperParams): string {
  const e = signal.event;
  const ctx = signal.context;
  return [
    header(signal),
    printLine(signal),
    `expiry: ${e.expiry} (${daysToExpiry(e)} DTE) | OTM ${fmtPct(otmPct(e))} | spot ${fmtNum(e.underlyingPrice)}`,
    `vol/OI: ${e.volume.toLocaleString("en-US")} / ${e.openInterest.toLocaleString("en-US")}`,
    tagsLine(signal),
    `rules: ${signal.triggeredRules.join(", ")}`,
    `context: VWAP ${ctx.vwapRelation} | daily trend ${ctx.dailyTrend} | level ${ctx.levelBreak} | RVOL ${fmtNum(ctx.rvol)}`,
    `regime: ${ctx.regime.trend} / ${ctx.regime.volatility} (realized vol ${fmtNum(ctx.regime.realizedVolPct, 1)})`,
    paperLine(signal, paper),
    `time: ${signal.createdAt} | experiment ${signal.experimentId}`
  ].join("\n");
}

export function formatAlert(signal: Signal, mode: AlertMode, paper: PaperParams): string {
  switch (mode) {
    case "short":
      return formatShortAlert(signal);
    case "medium":
      return formatMediumAlert(signal, paper);
    case "deep_dive":
      return formatDeepDiveAlert(signal, paper);
  }
}
