import test from "node:test";
import assert from "node:assert/strict";
import { attachContext } from "../src/context/attach.js";
import {
  bucketCloses,
  levelBreak,
  realizedVolPct,
  relativeVolume,
  trendFlag,
  volatilityBucket,
  vwap,
  vwapRelation
} from "../src/context/formulas.js";
import { parseConfig } from "../src/config/load.js";
import { emptySnapshot } from "../src/ingest/marketSnapshots.js";
import type { MarketSnapshot } from "../src/types.js";
import { bar, print, risingSnapshot } from "./fixtures.js";

const cfg = parseConfig({}).context;
const ramp = Array.from({ length: 20 }, (_, i) => i + 1);

test("trendFlag compares fast and slow averages", () => {
  assert.equal(trendFlag(ramp, { fast: 5, slow: 20 }), "UP");
  assert.equal(trendFlag([...ramp].reverse(), { fast: 5, slow: 20 }), "DOWN");
  assert.equal(trendFlag(Array.from({ length: 20 }, () => 7), { fast: 5, slow: 20 }), "FLAT");
  assert.equal(trendFlag(ramp.slice(0, 19), { fast: 5, slow: 20 }), "UNKNOWN");
});

test("vwap weights typical price by volume", () => {
  const snap: MarketSnapshot = {
    ...emptySnapshot("SPY"),
    intradayBars: [
      { ts: "2026-03-05T14:30:00Z", open: 10, high: 11, low: 9, close: 10, volume: 100 },
      { ts: "2026-03-05T14:31:00Z", open: 12, high: 13, low: 11, close: 12, volume: 300 }
    ],
    volumeBaseline: [100, 300]
  };
  assert.equal(vwap(snap), 11.5);
  assert.equal(relativeVolume(snap), 2);
  assert.equal(vwapRelation(11.6, 11.5, 0.05), "ABOVE");
  assert.equal(vwapRelation(11.4, 11.5, 0.05), "BELOW");
  assert.equal(vwapRelation(11.5, 11.5, 0.05), "AT");
  assert.equal(vwapRelation(11.5, null, 0.05), "UNKNOWN");
});

test("relativeVolume is unknown without a baseline", () => {
  assert.equal(relativeVolume(risingSnapshot()), null);
});

test("bucketCloses keeps the last close of each window", () => {
  const bars = [
    bar("2026-03-05T14:30:00Z", 1),
    bar("2026-03-05T14:35:00Z", 2),
    bar("2026-03-05T14:44:00Z", 3),
    bar("2026-03-05T14:45:00Z", 4)
  ];
  assert.deepEqual(bucketCloses(bars, 15), [3, 4]);
});

test("realized volatility needs lookback + 1 closes", () => {
  const flat = Array.from({ length: 21 }, (_, i) => bar(`2026-02-${String(i + 1).padStart(2, "0")}T21:00:00Z`, 100));
  assert.equal(realizedVolPct(flat, 20), 0);
  assert.equal(realizedVolPct(flat.slice(1), 20), null);
  assert.equal(volatilityBucket(0, cfg.regime), "LOW");
  assert.equal(volatilityBucket(20, cfg.regime), "NORMAL");
  assert.equal(volatilityBucket(30, cfg.regime), "ELEVATED");
  assert.equal(volatilityBucket(null, cfg.regime), "UNKNOWN");
});

test("levelBreak compares with the prior session range", () => {
  const prior = { ts: "2026-03-04T21:00:00Z", open: 480, high: 482, low: 478, close: 481, volume: 1 };
  assert.equal(levelBreak(483.2, prior), "ABOVE_HIGH");
  assert.equal(levelBreak(477, prior), "BELOW_LOW");
  assert.equal(levelBreak(480, prior), "NONE");
  assert.equal(levelBreak(480, null), "UNKNOWN");
});

test("attachContext degrades every metric on an empty snapshot", () => {
  const ctx = attachContext(print(), emptySnapshot("SPY"), cfg);
  assert.equal(ctx.rvol, null);
  assert.equal(ctx.vwapRelation, "UNKNOWN");
  assert.equal(ctx.shortTrend, "UNKNOWN");
  assert.equal(ctx.levelBreak, "UNKNOWN");
  assert.deepEqual(ctx.regime, { trend: "UNKNOWN", volatility: "UNKNOWN", realizedVolPct: null });
  assert.deepEqual(ctx.missing, ["rvol", "vwap", "shortTrend", "midTrend", "dailyTrend", "levelBreak", "volatility"]);
});

test("attachContext uses only sessions before the trade date for level breaks", () => {
  const snap: MarketSnapshot = {
    ...risingSnapshot(),
    dailyBars: [
      { ts: "2026-03-04T21:00:00Z", open: 480, high: 482, low: 478, close: 481, volume: 1 },
      { ts: "2026-03-05T21:00:00Z", open: 481, high: 490, low: 470, close: 485, volume: 1 }
    ]
  };
  const ctx = attachContext(print(), snap, cfg);
  assert.equal(ctx.levelBreak, "ABOVE_HIGH");
  assert.equal(ctx.shortTrend, "UP");
  assert.equal(ctx.vwapRelation, "ABOVE");
  assert.equal(ctx.midTrend, "UNKNOWN");
  assert.ok(Object.isFrozen(ctx));
});

test("attachContext is deterministic", () => {
  const a = attachContext(print(), risingSnapshot(), cfg);
  const b = attachContext(print(), risingSnapshot(), cfg);
  assert.deepEqual(a, b);
});
