import path from "node:path";
import { loadConfig } from "./config/load.js";
import { batchPriceUpdates, loadPriceUpdates } from "./ingest/priceUpdates.js";
import { createFileLogger } from "./lib/logger.js";
import { fmtPct } from "./lib/pretty.js";
import { PaperTradingEngine } from "./paper/engine.js";
import { appendPaperEvents, loadPaperState, savePaperState } from "./paper/storage.js";
import { createPipeline } from "./pipeline.js";

async function main(): Promise<void> {
  const log = await createFileLogger();
  const config = await loadConfig();
  const state = await loadPaperState();
  if (!state) {
    await log.warn("paper: no saved positions (run a scan with PAPER_TRADE=1 first)");
    await log.flush();
    return;
  }

  const engine = new PaperTradingEngine(config.paper, { state });
  const pipeline = createPipeline({ config, log, paper: engine, recordPaperEvents: (events) => appendPaperEvents(events) });

  const pricesPath = path.resolve(process.cwd(), process.env.PRICE_UPDATES_PATH ?? "data/raw/price_updates.json");
  const updates = await loadPriceUpdates(pricesPath);
  let closed = 0;
  for (const batch of batchPriceUpdates(updates, new Date().toISOString())) {
    closed += (await pipeline.updatePrices(batch.updates, batch.now)).length;
  }
  await savePaperState(engine.toState());

  const s = engine.summary();
  await log.info(
    [
      "",
      "Paper trading (simulation)",
      `prices: ${pricesPath} (${updates.length} marks)`,
      `closed this pass=${closed} open=${s.open}`,
      `totals: tp=${s.closedTp} sl=${s.closedSl} timeout=${s.closedTimeout} avgReturn=${fmtPct(s.avgReturnPct)}`,
      ""
    ].join("\n")
  );
  await log.flush();
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
