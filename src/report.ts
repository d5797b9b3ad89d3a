import { fmtNum, fmtPct, renderTable } from "./lib/pretty.js";
import { aggregateExits, exitsWithin, readExits } from "./paper/performance.js";
import { defaultPaperTradesPath } from "./paper/storage.js";

type ReportArgs = {
  days: number;
};

function parseArgs(argv: string[]): ReportArgs {
  // Example:
  //   npm run report -- --days=7
  const args: ReportArgs = { days: 7 };
  for (const raw of argv) {
    if (!raw.startsWith("--")) continue;
    const [k, v] = raw.slice(2).split("=");
    if (!k || v === undefined) continue;
    if (k === "days" && Number.isFinite(Number(v)) && Number(v) > 0) args.days = Number(v);
  }
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const filePath = defaultPaperTradesPath();
  const { rows: exits, endTs } = exitsWithin(await readExits(filePath), args.days);

  console.log("");
  console.log("Paper performance report (local, read-only)");
  console.log(`Log: ${filePath}`);
  console.log(`Window: ${args.days} day(s) up to ${endTs ?? "n/a"} | closed trades: ${exits.length}`);
  console.log("");

  const rows: string[][] = [["kind", "trades", "tp", "sl", "timeout", "win%", "avg", "best", "worst", "hold(min)"]];
  for (const p of aggregateExits(exits)) {
    rows.push([
      p.kind,
      String(p.trades),
      String(p.takeProfit),
      String(p.stopLoss),
      String(p.timeout),
      p.winRate === null ? "n/a" : fmtNum(p.winRate * 100, 1),
      fmtPct(p.avgReturnPct),
      fmtPct(p.bestReturnPct),
      fmtPct(p.worstReturnPct),
      fmtNum(p.avgHoldMinutes, 0)
    ]);
  }
  console.log(renderTable(rows));
  console.log("");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
