import test from "node:test";
import assert from "node:assert/strict";
import { MAX_STRENGTH, scoreSignal, tagsFor } from "../src/score/scoreSignal.js";
import type { RuleId } from "../src/types.js";
import { context, print } from "./fixtures.js";

const neutral = context();

test("scoreSignal adds rule, size, character and regime components", () => {
  const res = scoreSignal(print(), neutral, ["dte_window", "size"], { minNotional: 50_000 });
  // 2 rules 1.0 + size 3 (capped) + sweep 1.5 + aggressive 1
  assert.equal(res.strength, 6.5);
  assert.deepEqual(res.tags, ["DTE_FIT", "SIZE"]);
});

test("regime agreeing with the print adds, opposing subtracts", () => {
  const up = context({ regime: { trend: "TRENDING_UP", volatility: "NORMAL", realizedVolPct: 18 } });
  const down = context({ regime: { trend: "TRENDING_DOWN", volatility: "NORMAL", realizedVolPct: 18 } });
  assert.equal(scoreSignal(print(), up, ["dte_window", "size"], { minNotional: 50_000 }).strength, 8);
  assert.equal(scoreSignal(print(), down, ["dte_window", "size"], { minNotional: 50_000 }).strength, 5.5);
  assert.equal(scoreSignal(print({ right: "PUT" }), down, ["dte_window", "size"], { minNotional: 50_000 }).strength, 8);
});

test("scoreSignal caps each component and clamps the total", () => {
  const rules: RuleId[] = [
    "dte_window",
    "size",
    "moneyness",
    "trend_aligned",
    "vwap_aligned",
    "level_break",
    "volume_over_oi",
    "rvol",
    "repeat_buying",
    "sweep",
    "aggressive",
    "cluster"
  ];
  const whale = print({ contracts: 50_000, tags: ["SWEEP", "AGGRESSIVE", "CLUSTER"] });
  const up = context({ regime: { trend: "TRENDING_UP", volatility: "LOW", realizedVolPct: 10 } });
  assert.equal(scoreSignal(whale, up, rules, { minNotional: 50_000 }).strength, MAX_STRENGTH);
});

test("scoreSignal uses a neutral size score without a size threshold", () => {
  const plain = print({ tags: [] });
  assert.equal(scoreSignal(plain, neutral, [], { minNotional: 0 }).strength, 2);
});

test("size scales with notional over the threshold", () => {
  const plain = print({ tags: [] });
  // $185,000 against 148,000 is 1.25x the threshold
  assert.equal(scoreSignal(plain, neutral, [], { minNotional: 148_000 }).strength, 2.5);
  assert.equal(scoreSignal(plain, neutral, [], { minNotional: 185_000 }).strength, 2);
  assert.equal(scoreSignal(plain, neutral, [], { minNotional: 50_000 }).strength, 3);
});

test("trend confirmation and level breaks add on top of the rule count", () => {
  const plain = print({ tags: [] });
  // 2 rules 1.0 + size 2 + trend 2 + level 1
  assert.equal(scoreSignal(plain, neutral, ["trend_aligned", "level_break"], { minNotional: 0 }).strength, 6);
});

test("repeated rules count once", () => {
  const plain = print({ tags: [] });
  const res = scoreSignal(plain, neutral, ["size", "size", "dte_window"], { minNotional: 0 });
  assert.equal(res.strength, 3);
  assert.deepEqual(res.tags, ["SIZE", "DTE_FIT"]);
});

test("tagsFor maps rules through a fixed table", () => {
  assert.deepEqual(tagsFor(["volume_over_oi", "trend_aligned", "repeat_buying"]), ["VOL>OI", "TREND_CONFIRMED", "PERSISTENT_BUYER"]);
});
