import path from "node:path";
import { createAlertSink } from "./alerts/send.js";
import { loadConfig } from "./config/load.js";
import type { FlowConfig } from "./config/schema.js";
import { describeError } from "./errors.js";
import { loadFlowEvents } from "./ingest/flowEvents.js";
import { loadMarketSnapshots, snapshotFor } from "./ingest/marketSnapshots.js";
import { batchPriceUpdates, loadPriceUpdates } from "./ingest/priceUpdates.js";
import { createFileLogger } from "./lib/logger.js";
import { fmtNum, fmtUsd, renderTable, truncate } from "./lib/pretty.js";
import { PaperTradingEngine } from "./paper/engine.js";
import { appendPaperEvents, loadPaperState, savePaperState } from "./paper/storage.js";
import { renderHeartbeat, writeHeartbeat } from "./persist/heartbeat.js";
import { appendSignalRows, contractLabel } from "./persist/signalLog.js";
import { createPipeline } from "./pipeline.js";
import type { Signal } from "./types.js";

function inputPath(envVar: string, fallback: string): string {
  return path.resolve(process.cwd(), process.env[envVar] ?? fallback);
}

async function main(): Promise<void> {
  const log = await createFileLogger();

  let config: FlowConfig;
  try {
    config = await loadConfig();
  } catch (e) {
    await log.error(`FATAL: ${describeError(e)}`);
    process.exitCode = 2;
    return;
  }

  const eventsPath = inputPath("FLOW_EVENTS_PATH", "data/raw/flow_events.json");
  const rawEvents = await loadFlowEvents(eventsPath);
  if (rawEvents.length === 0) {
    await log.error(`FATAL: no flow events in ${eventsPath}`);
    process.exitCode = 3;
    return;
  }

  const { snapshots, rejected: badSnapshots } = await loadMarketSnapshots(
    inputPath("MARKET_SNAPSHOTS_PATH", "data/raw/market_snapshots.json")
  );
  if (badSnapshots) await log.warn(`snapshots: skipped ${badSnapshots} invalid entr${badSnapshots === 1 ? "y" : "ies"}`);

  const paper = process.env.PAPER_TRADE === "1" ? new PaperTradingEngine(config.paper, { state: await loadPaperState() }) : null;

  const pipeline = createPipeline({
    config,
    log,
    paper,
    recordPaperEvents: (events) => appendPaperEvents(events),
    sinks: [{ name: "signal-log", accept: (signals) => appendSignalRows(signals) }],
    alerts: process.env.ALERTS === "1" ? createAlertSink({ config, log }) : null
  });

  const signals: Signal[] = [];
  for (const raw of rawEvents) {
    const res = await pipeline.processEvent(raw, (ticker) => snapshotFor(snapshots, ticker));
    if (res.status === "PROCESSED") signals.push(...res.emitted.signals);
  }

  if (paper) {
    const pricesPath = process.env.PRICE_UPDATES_PATH;
    if (pricesPath) {
      const updates = await loadPriceUpdates(path.resolve(process.cwd(), pricesPath));
      for (const batch of batchPriceUpdates(updates, new Date().toISOString())) {
        await pipeline.updatePrices(batch.updates, batch.now);
      }
    }
    await savePaperState(paper.toState());
  }

  const hb = pipeline.heartbeat();
  await writeHeartbeat(hb);

  const lines: string[] = [];
  lines.push("=== Flow Scan ===");
  lines.push(`experiment: ${config.experimentId}`);
  lines.push(`events: ${eventsPath} (${rawEvents.length} records)`);
  lines.push(renderHeartbeat(hb));
  lines.push(`outputs: data/db/signals.jsonl data/db/heartbeat.json${paper ? " data/db/paper_state.json" : ""}`);
  lines.push("");
  lines.push("Top signals:");
  const rows: string[][] = [["kind", "dir", "strength", "notional", "contract", "tags"]];
  for (const s of [...signals].sort((a, b) => b.strength - a.strength).slice(0, 20)) {
    rows.push([s.kind, s.direction, fmtNum(s.strength), fmtUsd(s.event.notional, 0), contractLabel(s), truncate(s.tags.join(","), 50)]);
  }
  lines.push(renderTable(rows));

  await log.info(lines.join("\n"));
  await log.flush();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
