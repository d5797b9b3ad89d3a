import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { readFile, writeFile } from "node:fs/promises";
import { parseConfig } from "../src/config/load.js";
import { biasOf } from "../src/detect/gates.js";
import { entryEvent, exitEvent, exitLevels, PaperTradingEngine, resolveThresholdExit, returnPct } from "../src/paper/engine.js";
import { appendPaperEvents, loadPaperState, savePaperState } from "../src/paper/storage.js";
import { counter, print, signal, T0, tempDir } from "./fixtures.js";

const params = parseConfig({}).paper;
const at = (minutes: number) => new Date(Date.parse(T0) + minutes * 60_000).toISOString();

function scalpAt(price: number) {
  return signal({ event: print({ underlying_price: price }) });
}

test("open places mirrored levels for bullish and bearish signals", () => {
  const engine = new PaperTradingEngine(params, { idFactory: counter("pos") });
  const long = engine.open(scalpAt(243.4));
  assert.equal(long.id, "pos-1");
  assert.equal(long.status, "OPEN");
  assert.equal(long.entryPrice, 243.4);
  assert.ok(Math.abs(long.takeProfitPrice - 248.268) < 1e-9);
  assert.ok(Math.abs(long.stopLossPrice - 240.966) < 1e-9);
  assert.equal(long.deadlineTs, at(30));

  assert.deepEqual(exitLevels("BEARISH", 100, params.day), { takeProfitPrice: 95, stopLossPrice: 102 });
});

test("take profit closes at the first price that reaches it", () => {
  const engine = new PaperTradingEngine(params);
  engine.open(scalpAt(243.4));
  const closed = engine.update(
    [
      { ticker: "SPY", price: 245 },
      { ticker: "SPY", price: 248.5 },
      { ticker: "SPY", price: 250 }
    ],
    at(5)
  );
  assert.equal(closed.length, 1);
  assert.equal(closed[0]?.status, "CLOSED_TP");
  assert.equal(closed[0]?.exitPrice, 248.5);
  assert.ok(Math.abs((closed[0]?.returnPct ?? 0) - 2.0953163516844677) < 1e-9);
  assert.equal(engine.openPositions().length, 0);
});

test("a batch crossing both levels resolves to take profit", () => {
  assert.deepEqual(resolveThresholdExit(249, 240), { status: "CLOSED_TP", price: 249 });
  assert.deepEqual(resolveThresholdExit(undefined, 240), { status: "CLOSED_SL", price: 240 });
  assert.equal(resolveThresholdExit(undefined, undefined), null);

  const engine = new PaperTradingEngine(params);
  engine.open(scalpAt(243.4));
  const [pos] = engine.update(
    [
      { ticker: "SPY", price: 240 },
      { ticker: "SPY", price: 249 }
    ],
    at(5)
  );
  assert.equal(pos?.status, "CLOSED_TP");
  assert.equal(pos?.exitPrice, 249);
});

test("bearish positions stop out on a rise", () => {
  const engine = new PaperTradingEngine(params);
  engine.open(signal({ kind: "day", direction: "BEARISH", event: print({ right: "PUT", underlying_price: 100, strike: 99 }) }));
  assert.deepEqual(engine.update([{ ticker: "SPY", price: 101 }], at(10)), []);
  const open = engine.openPositions()[0];
  assert.equal(open?.lastMarkPrice, 101);
  assert.equal(open?.lastMarkTs, at(10));

  const [stopped] = engine.update([{ ticker: "SPY", price: 103 }], at(20));
  assert.equal(stopped?.status, "CLOSED_SL");
  assert.ok(Math.abs((stopped?.returnPct ?? 0) + 3) < 1e-9);
});

test("a sold call is paper traded as a bearish position", () => {
  const sold = print({ action: "SELL", underlying_price: 100, strike: 101 });
  const engine = new PaperTradingEngine(params);
  const pos = engine.open(signal({ kind: "day", direction: biasOf(sold), event: sold }));
  assert.equal(pos.direction, "BEARISH");
  assert.equal(pos.takeProfitPrice, 95);
  assert.equal(pos.stopLossPrice, 102);
});

test("expiry closes at the last price of the batch", () => {
  const engine = new PaperTradingEngine(params);
  engine.open(scalpAt(243.4));
  const [pos] = engine.update(
    [
      { ticker: "SPY", price: 260 },
      { ticker: "SPY", price: 244 }
    ],
    at(31)
  );
  assert.equal(pos?.status, "CLOSED_TIMEOUT");
  assert.equal(pos?.exitPrice, 244);
});

test("positions without a price in the batch are left alone", () => {
  const engine = new PaperTradingEngine(params);
  const opened = engine.open(scalpAt(243.4));
  assert.deepEqual(engine.update([{ ticker: "QQQ", price: 410 }], at(90)), []);
  assert.deepEqual(engine.openPositions(), [opened]);
});

test("closed positions never transition again", () => {
  const engine = new PaperTradingEngine(params);
  engine.open(scalpAt(243.4));
  engine.update([{ ticker: "SPY", price: 250 }], at(1));
  assert.deepEqual(engine.update([{ ticker: "SPY", price: 200 }], at(2)), []);
  assert.equal(engine.allPositions()[0]?.exitPrice, 250);
  assert.deepEqual(engine.summary(), { open: 0, closedTp: 1, closedSl: 0, closedTimeout: 0, avgReturnPct: returnPct("BULLISH", 243.4, 250) });
});

test("repeat signals on one ticker open separate positions", () => {
  const engine = new PaperTradingEngine(params);
  engine.open(scalpAt(243.4));
  engine.open(scalpAt(243.4));
  assert.equal(engine.openPositions().length, 2);
});

test("trade events describe entries and exits", () => {
  const engine = new PaperTradingEngine(params, { idFactory: counter("pos") });
  const opened = engine.open(scalpAt(200));
  const entry = entryEvent(opened);
  assert.equal(entry.type, "ENTRY");
  assert.equal(entry.ts, T0);
  assert.equal(exitEvent(opened), null);

  const [closed] = engine.update([{ ticker: "SPY", price: 190 }], at(12));
  assert.ok(closed);
  assert.deepEqual(exitEvent(closed), {
    ts: at(12),
    type: "EXIT",
    positionId: "pos-1",
    signalId: "sig-1",
    kind: "scalp",
    ticker: "SPY",
    direction: "BULLISH",
    status: "CLOSED_SL",
    entryPrice: 200,
    price: 190,
    returnPct: -5,
    holdMinutes: 12
  });
});

test("state survives a save and reload", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "paper_state.json");
  const engine = new PaperTradingEngine(params);
  engine.open(scalpAt(243.4));
  await savePaperState(engine.toState("2026-03-05T15:01:00.000Z"), file);

  const state = await loadPaperState(file);
  assert.ok(state);
  const restored = new PaperTradingEngine(params, { state });
  assert.deepEqual(restored.allPositions(), engine.allPositions());

  const [closed] = restored.update([{ ticker: "SPY", price: 249 }], at(3));
  assert.equal(closed?.status, "CLOSED_TP");
});

test("loadPaperState ignores missing and foreign files", async () => {
  const dir = await tempDir();
  assert.equal(await loadPaperState(path.join(dir, "none.json")), null);
  const foreign = path.join(dir, "other.json");
  await writeFile(foreign, JSON.stringify({ version: 2, positions: [] }), "utf8");
  assert.equal(await loadPaperState(foreign), null);
});

test("appendPaperEvents writes one JSON line per event", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "trades.jsonl");
  const engine = new PaperTradingEngine(params);
  const pos = engine.open(scalpAt(243.4));
  await appendPaperEvents([entryEvent(pos)], file);
  await appendPaperEvents([], file);
  await appendPaperEvents([entryEvent(pos)], file);
  const lines = (await readFile(file, "utf8")).trim().split("\n");
  assert.equal(lines.length, 2);
  assert.equal(JSON.parse(lines[0] ?? "").type, "ENTRY");
});

