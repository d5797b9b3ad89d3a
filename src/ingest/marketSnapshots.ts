import { z } from "zod";
import { readJsonFile } from "../lib/fs.js";
import type { MarketSnapshot } from "../types.js";

export const BarZ = z.object({
  ts: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().min(0)
});

export const MarketSnapshotZ = z.object({
  ticker: z.string().min(1),
  asOf: z.string().nullable().default(null),
  intradayBars: z.array(BarZ).default([]),
  dailyBars: z.array(BarZ).default([]),
  volumeBaseline: z.array(z.number().min(0)).default([])
});

export function emptySnapshot(ticker: string): MarketSnapshot {
  return { ticker, asOf: null, intradayBars: [], dailyBars: [], volumeBaseline: [] };
}

/**
 * Load per-ticker snapshots from a JSON array (or `{ snapshots: [...] }`).
 * Invalid entries are skipped; `rejected` counts them. A missing file yields an empty map.
 */
export async function loadMarketSnapshots(filePath: string): Promise<{ snapshots: Map<string, MarketSnapshot>; rejected: number }> {
  const doc = await readJsonFile(filePath);
  const list: unknown[] = Array.isArray(doc)
    ? doc
    : doc && typeof doc === "object" && "snapshots" in doc && Array.isArray(doc.snapshots)
      ? doc.snapshots
      : [];

  const snapshots = new Map<string, MarketSnapshot>();
  let rejected = 0;
  for (const item of list) {
    const r = MarketSnapshotZ.safeParse(item);
    if (!r.success) {
      rejected += 1;
      continue;
    }
    const ticker = r.data.ticker.toUpperCase();
    snapshots.set(ticker, { ...r.data, ticker });
  }
  return { snapshots, rejected };
}

export function snapshotFor(snapshots: ReadonlyMap<string, MarketSnapshot>, ticker: string): MarketSnapshot {
  return snapshots.get(ticker.toUpperCase()) ?? emptySnapshot(ticker);
}
