import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { writeFile } from "node:fs/promises";
import { DataQualityError } from "../src/errors.js";
import { loadFlowEvents, toFlowEvent } from "../src/ingest/flowEvents.js";
import { batchPriceUpdates, loadPriceUpdates } from "../src/ingest/priceUpdates.js";
import { loadMarketSnapshots, snapshotFor } from "../src/ingest/marketSnapshots.js";
import { rawPrint, T0, tempDir } from "./fixtures.js";

function issuesOf(raw: unknown): string[] {
  try {
    toFlowEvent(raw);
  } catch (e) {
    if (e instanceof DataQualityError) return e.issues;
    throw e;
  }
  return [];
}

test("toFlowEvent computes notional and normalizes fields", () => {
  const ev = toFlowEvent(rawPrint());
  assert.equal(ev.id, "evt-1");
  assert.equal(ev.right, "CALL");
  assert.equal(ev.action, "BUY");
  assert.equal(ev.notional, 185_000);
  assert.equal(ev.eventTime, T0);
  assert.deepEqual(ev.flowTags, ["SWEEP", "AGGRESSIVE"]);
  assert.ok(Object.isFrozen(ev));
});

test("toFlowEvent accepts provider aliases and string numbers", () => {
  const ev = toFlowEvent({
    symbol: "qqq",
    call_put: "P",
    strike: "410",
    expiration: "2026-03-20",
    timestamp: "2026-03-05T16:30:00Z",
    size: "200",
    premium: "$2.50",
    underlying_price: 415,
    is_sweep: true
  });
  assert.equal(ev.ticker, "QQQ");
  assert.equal(ev.right, "PUT");
  assert.equal(ev.action, "BUY");
  assert.equal(ev.notional, 50_000);
  assert.equal(ev.volume, 0);
  assert.equal(ev.openInterest, 0);
  assert.deepEqual(ev.flowTags, ["SWEEP"]);
  assert.equal(ev.id, "QQQ-2026-03-20-410P-1772728200000");
});

test("toFlowEvent rejects non-positive size and strike", () => {
  const issues = issuesOf(rawPrint({ contracts: 0, strike: -1 }));
  assert.ok(issues.includes("contracts must be positive"));
  assert.ok(issues.includes("strike must be positive"));
});

test("toFlowEvent rejects an expiry before the trade date", () => {
  assert.deepEqual(issuesOf(rawPrint({ expiry: "2026-03-04" })), ["expiry 2026-03-04 before trade date 2026-03-05"]);
});

test("toFlowEvent rejects unparseable timestamps and unknown rights", () => {
  const issues = issuesOf(rawPrint({ event_time: "yesterday", right: "STRADDLE" }));
  assert.ok(issues.includes("unparseable event time"));
  assert.ok(issues.includes('unknown option right "STRADDLE"'));
});

test("toFlowEvent rejects a negative supplied notional", () => {
  assert.deepEqual(issuesOf(rawPrint({ notional: -5 })), ["negative notional"]);
});

test("DataQualityError names the event id", () => {
  assert.throws(() => toFlowEvent(rawPrint({ id: "bad-1", underlying_price: 0 })), {
    name: "DataQualityError",
    message: "rejected flow event bad-1: underlying price must be positive"
  });
});

test("loadFlowEvents orders JSON-lines records by event time", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "events.jsonl");
  const lines = [
    rawPrint({ id: "late", event_time: "2026-03-05T15:05:00Z" }),
    rawPrint({ id: "early", event_time: "2026-03-05T14:55:00Z" }),
    rawPrint({ id: "tie", event_time: "2026-03-05T15:05:00Z" })
  ].map((r) => JSON.stringify(r));
  await writeFile(file, lines.join("\n") + "\nnot json\n", "utf8");

  const records = await loadFlowEvents(file);
  assert.deepEqual(
    records.map((r) => toFlowEvent(r).id),
    ["early", "late", "tie"]
  );
});

test("loadMarketSnapshots keys by upper-case ticker and counts invalid entries", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "snapshots.json");
  await writeFile(file, JSON.stringify({ snapshots: [{ ticker: "spy", volumeBaseline: [10] }, { ticker: "" }] }), "utf8");

  const { snapshots, rejected } = await loadMarketSnapshots(file);
  assert.equal(rejected, 1);
  assert.deepEqual(snapshotFor(snapshots, "SPY").volumeBaseline, [10]);
  assert.deepEqual(snapshotFor(snapshots, "IWM").intradayBars, []);

  const missing = await loadMarketSnapshots(path.join(dir, "none.json"));
  assert.equal(missing.snapshots.size, 0);
});

test("loadPriceUpdates drops malformed rows and batchPriceUpdates orders by time", async () => {
  const dir = await tempDir();
  const file = path.join(dir, "prices.json");
  await writeFile(
    file,
    JSON.stringify([
      { ticker: "spy", price: 484, ts: "2026-03-05T15:10:00Z" },
      { ticker: "SPY", price: -1 },
      { ticker: "QQQ", price: 410 },
      { ticker: "SPY", price: 483, ts: "2026-03-05T15:05:00Z" }
    ]),
    "utf8"
  );

  const updates = await loadPriceUpdates(file);
  assert.equal(updates.length, 3);
  assert.equal(updates[0]?.ticker, "SPY");

  const batches = batchPriceUpdates(updates, "2026-03-05T16:00:00.000Z");
  assert.deepEqual(
    batches.map((b) => [b.now, b.updates.map((u) => u.price)]),
    [
      ["2026-03-05T15:05:00.000Z", [483]],
      ["2026-03-05T15:10:00.000Z", [484]],
      ["2026-03-05T16:00:00.000Z", [410]]
    ]
  );
});
