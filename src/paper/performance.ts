import fs from "node:fs";
import readline from "node:readline";
import { STRATEGY_KINDS, type StrategyKind } from "../types.js";
import { PaperExitEventZ, type PaperExitEvent } from "./types.js";

export type KindPerformance = {
  kind: StrategyKind;
  trades: number;
  takeProfit: number;
  stopLoss: number;
  timeout: number;
  winRate: number | null; // share of trades with a positive return
  avgReturnPct: number | null;
  bestReturnPct: number | null;
  worstReturnPct: number | null;
  avgHoldMinutes: number | null;
};

/**
 * EXIT rows of the paper trade log, in file order. ENTRY rows and lines that do not parse
 * are skipped.
 */
export async function readExits(filePath: string): Promise<PaperExitEvent[]> {
  if (!fs.existsSync(filePath)) return [];

  const input = fs.createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  const rows: PaperExitEvent[] = [];
  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    let obj: unknown;
    try {
      obj = JSON.parse(trimmed);
    } catch {
      continue;
    }
    const r = PaperExitEventZ.safeParse(obj);
    if (!r.success || !Number.isFinite(Date.parse(r.data.ts))) continue;
    rows.push(r.data);
  }
  return rows;
}

export type ExitWindow = {
  rows: PaperExitEvent[];
  // newest exit timestamp; null when there are no rows
  endTs: string | null;
};

/**
 * Exits within `days` of the newest exit. Exit timestamps are event time, so a replay of
 * older prints is windowed around its own data rather than the wall clock.
 */
export function exitsWithin(rows: readonly PaperExitEvent[], days: number): ExitWindow {
  let endMs = -Infinity;
  let endTs: string | null = null;
  for (const r of rows) {
    const t = Date.parse(r.ts);
    if (t > endMs) {
      endMs = t;
      endTs = r.ts;
    }
  }
  if (endTs === null) return { rows: [], endTs: null };
  const sinceMs = endMs - days * 24 * 60 * 60 * 1000;
  return { rows: rows.filter((r) => Date.parse(r.ts) >= sinceMs), endTs };
}

// One row per strategy kind, in scalp/day/swing order, including kinds with no trades.
export function aggregateExits(rows: readonly PaperExitEvent[]): KindPerformance[] {
  return STRATEGY_KINDS.map((kind) => {
    const mine = rows.filter((r) => r.kind === kind);
    const returns = mine.map((r) => r.returnPct);
    const n = mine.length;
    return {
      kind,
      trades: n,
      takeProfit: mine.filter((r) => r.status === "CLOSED_TP").length,
      stopLoss: mine.filter((r) => r.status === "CLOSED_SL").length,
      timeout: mine.filter((r) => r.status === "CLOSED_TIMEOUT").length,
      winRate: n ? returns.filter((x) => x > 0).length / n : null,
      avgReturnPct: n ? returns.reduce((a, b) => a + b, 0) / n : null,
      bestReturnPct: n ? Math.max(...returns) : null,
      worstReturnPct: n ? Math.min(...returns) : null,
      avgHoldMinutes: n ? mine.reduce((a, r) => a + r.holdMinutes, 0) / n : null
    };
  });
}
