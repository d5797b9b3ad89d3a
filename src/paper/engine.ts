import crypto from "node:crypto";
import { addMinutes } from "../lib/time.js";
import type { PaperParams, PriceUpdate, Signal, StrategyKind } from "../types.js";
import type { PaperEntryEvent, PaperExitEvent, PaperPosition, PaperState, PaperSummary } from "./types.js";

type ClosedStatus = Exclude<PaperPosition["status"], "OPEN">;

/**
 * Hypothetical positions opened from signals.
 *
 * Lifecycle: OPEN -> CLOSED_TP | CLOSED_SL | CLOSED_TIMEOUT, once. Closed positions stay
 * in the book for reporting and are never touched again. Positions are immutable
 * records; a transition swaps in a new record.
 */
export class PaperTradingEngine {
  private readonly params: Record<StrategyKind, PaperParams>;
  private readonly idFactory: () => string;
  private positions: PaperPosition[];

  constructor(params: Record<StrategyKind, PaperParams>, opts?: { state?: PaperState | null; idFactory?: () => string }) {
    this.params = params;
    this.idFactory = opts?.idFactory ?? (() => crypto.randomUUID());
    this.positions = (opts?.state?.positions ?? []).map((p) => Object.freeze({ ...p }));
  }

  /**
   * Open one position at the underlying price the signal saw. Never rejects, including
   * repeats on a ticker that already has an open position.
   */
  open(signal: Signal): PaperPosition {
    const p = this.params[signal.kind];
    const entryPrice = signal.event.underlyingPrice;
    const levels = exitLevels(signal.direction, entryPrice, p);

    const pos: PaperPosition = Object.freeze({
      id: this.idFactory(),
      signal: {
        id: signal.id,
        kind: signal.kind,
        ticker: signal.ticker,
        direction: signal.direction,
        strength: signal.strength,
        tags: [...signal.tags],
        createdAt: signal.createdAt
      },
      ticker: signal.ticker,
      direction: signal.direction,
      entryTs: signal.createdAt,
      entryPrice,
      takeProfitPrice: levels.takeProfitPrice,
      stopLossPrice: levels.stopLossPrice,
      deadlineTs: addMinutes(signal.createdAt, p.maxHoldMinutes),
      status: "OPEN",
      lastMarkTs: null,
      lastMarkPrice: null,
      exitTs: null,
      exitPrice: null,
      returnPct: null
    });
    this.positions.push(pos);
    return pos;
  }

  /**
   * Apply a batch of underlying prices at time `now`; returns positions closed by it.
   *
   * Per OPEN position, in book order, using this batch's prices for its ticker:
   * 1. now >= deadline: CLOSED_TIMEOUT at the ticker's last price in the batch
   * 2. a price reached take profit: CLOSED_TP at the first such price
   * 3. a price reached stop loss: CLOSED_SL at the first such price
   * Both 2 and 3 in one batch resolve per `resolveThresholdExit`. A position whose
   * ticker has no price in the batch is left exactly as it was.
   */
  update(priceUpdates: readonly PriceUpdate[], now: string): PaperPosition[] {
    const nowMs = Date.parse(now);
    const byTicker = new Map<string, number[]>();
    for (const u of priceUpdates) {
      if (!Number.isFinite(u.price) || u.price <= 0) continue;
      const key = u.ticker.toUpperCase();
      const list = byTicker.get(key) ?? [];
      list.push(u.price);
      byTicker.set(key, list);
    }

    const closed: PaperPosition[] = [];
    this.positions = this.positions.map((pos) => {
      if (pos.status !== "OPEN") return pos;
      const prices = byTicker.get(pos.ticker.toUpperCase());
      const last = prices?.[prices.length - 1];
      if (!prices || last === undefined) return pos;

      let next: PaperPosition;
      if (nowMs >= Date.parse(pos.deadlineTs)) {
        next = closePosition(pos, "CLOSED_TIMEOUT", last, now);
      } else {
        const exit = resolveThresholdExit(
          prices.find((px) => reachedTakeProfit(pos, px)),
          prices.find((px) => reachedStopLoss(pos, px))
        );
        next = exit
          ? closePosition(pos, exit.status, exit.price, now)
          : Object.freeze({ ...pos, lastMarkTs: now, lastMarkPrice: last });
      }
      if (next.status !== "OPEN") closed.push(next);
      return next;
    });
    return closed;
  }

  openPositions(): PaperPosition[] {
    return this.positions.filter((p) => p.status === "OPEN");
  }

  allPositions(): PaperPosition[] {
    return [...this.positions];
  }

  summary(): PaperSummary {
    return summarizePositions(this.positions);
  }

  toState(updatedAt = new Date().toISOString()): PaperState {
    return { version: 1, updatedAt, positions: this.positions.map((p) => ({ ...p, signal: { ...p.signal, tags: [...p.signal.tags] } })) };
  }
}

export function summarizePositions(positions: readonly PaperPosition[]): PaperSummary {
  const closed = positions.filter((p) => p.status !== "OPEN");
  const returns = closed.map((p) => p.returnPct).filter((r): r is number => r !== null);
  return {
    open: positions.length - closed.length,
    closedTp: closed.filter((p) => p.status === "CLOSED_TP").length,
    closedSl: closed.filter((p) => p.status === "CLOSED_SL").length,
    closedTimeout: closed.filter((p) => p.status === "CLOSED_TIMEOUT").length,
    avgReturnPct: returns.length ? returns.reduce((a, b) => a + b, 0) / returns.length : null
  };
}

// Levels follow the signal's direction, not the option right: a sold call or a bought put
// is BEARISH and profits on a fall, so its levels mirror a bullish position's.
export function exitLevels(
  direction: PaperPosition["direction"],
  entryPrice: number,
  params: PaperParams
): { takeProfitPrice: number; stopLossPrice: number } {
  const tp = params.takeProfitPct / 100;
  const sl = params.stopLossPct / 100;
  return direction === "BULLISH"
    ? { takeProfitPrice: entryPrice * (1 + tp), stopLossPrice: entryPrice * (1 - sl) }
    : { takeProfitPrice: entryPrice * (1 - tp), stopLossPrice: entryPrice * (1 + sl) };
}

export function returnPct(direction: PaperPosition["direction"], entry: number, exit: number): number {
  const raw = ((exit - entry) / entry) * 100;
  return direction === "BULLISH" ? raw : -raw;
}

export function entryEvent(pos: PaperPosition): PaperEntryEvent {
  return {
    ts: pos.entryTs,
    type: "ENTRY",
    positionId: pos.id,
    signalId: pos.signal.id,
    kind: pos.signal.kind,
    ticker: pos.ticker,
    direction: pos.direction,
    price: pos.entryPrice,
    takeProfitPrice: pos.takeProfitPrice,
    stopLossPrice: pos.stopLossPrice,
    deadlineTs: pos.deadlineTs
  };
}

// null for positions that are still open.
export function exitEvent(pos: PaperPosition): PaperExitEvent | null {
  if (pos.status === "OPEN" || pos.exitTs === null || pos.exitPrice === null || pos.returnPct === null) return null;
  return {
    ts: pos.exitTs,
    type: "EXIT",
    positionId: pos.id,
    signalId: pos.signal.id,
    kind: pos.signal.kind,
    ticker: pos.ticker,
    direction: pos.direction,
    status: pos.status,
    entryPrice: pos.entryPrice,
    price: pos.exitPrice,
    returnPct: pos.returnPct,
    holdMinutes: (Date.parse(pos.exitTs) - Date.parse(pos.entryTs)) / 60_000
  };
}

/**
 * Exit policy for one batch. When prices reached both thresholds (a wick through the stop
 * and a print through the target), the position closes at take profit. Realized-return
 * reporting depends on this, so it is a named rule rather than an accident of check order.
 */
export function resolveThresholdExit(
  tpHit: number | undefined,
  slHit: number | undefined
): { status: "CLOSED_TP" | "CLOSED_SL"; price: number } | null {
  if (tpHit !== undefined) return { status: "CLOSED_TP", price: tpHit };
  if (slHit !== undefined) return { status: "CLOSED_SL", price: slHit };
  return null;
}

function reachedTakeProfit(pos: PaperPosition, px: number): boolean {
  return pos.direction === "BULLISH" ? px >= pos.takeProfitPrice : px <= pos.takeProfitPrice;
}

function reachedStopLoss(pos: PaperPosition, px: number): boolean {
  return pos.direction === "BULLISH" ? px <= pos.stopLossPrice : px >= pos.stopLossPrice;
}

function closePosition(pos: PaperPosition, status: ClosedStatus, exitPrice: number, now: string): PaperPosition {
  return Object.freeze({
    ...pos,
    status,
    lastMarkTs: now,
    lastMarkPrice: exitPrice,
    exitTs: now,
    exitPrice,
    returnPct: returnPct(pos.direction, pos.entryPrice, exitPrice)
  });
}
