import { fmtNum, fmtPct, renderTable } from "./lib/pretty.js";
import { summarizePositions } from "./paper/engine.js";
import { defaultPaperStatePath, loadPaperState } from "./paper/storage.js";
import { defaultHeartbeatPath, readHeartbeat, renderHeartbeat } from "./persist/heartbeat.js";

async function main(): Promise<void> {
  const hbPath = defaultHeartbeatPath();
  const hb = await readHeartbeat(hbPath);

  console.log("");
  console.log("=== Status ===");
  console.log(`heartbeat: ${hbPath}`);
  console.log(hb ? renderHeartbeat(hb) : "missing heartbeat.json (run scan first)");

  const statePath = defaultPaperStatePath();
  const state = await loadPaperState(statePath);
  console.log("");
  console.log(`paper: ${statePath}`);
  if (!state) {
    console.log("no paper state (run scan with PAPER_TRADE=1)");
    console.log("");
    return;
  }

  const s = summarizePositions(state.positions);
  console.log(`updated=${state.updatedAt} open=${s.open} tp=${s.closedTp} sl=${s.closedSl} timeout=${s.closedTimeout} avgReturn=${fmtPct(s.avgReturnPct)}`);

  const open = state.positions.filter((p) => p.status === "OPEN");
  if (open.length) {
    console.log("");
    console.log("Open positions:");
    const rows: string[][] = [["kind", "ticker", "dir", "entry", "mark", "tp", "sl", "deadline"]];
    for (const p of open.slice(0, 25)) {
      rows.push([
        p.signal.kind,
        p.ticker,
        p.direction,
        fmtNum(p.entryPrice),
        fmtNum(p.lastMarkPrice),
        fmtNum(p.takeProfitPrice),
        fmtNum(p.stopLossPrice),
        p.deadlineTs.slice(0, 16)
      ]);
    }
    console.log(renderTable(rows));
  }
  console.log("");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
