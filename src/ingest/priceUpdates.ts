import { z } from "zod";
import { readJsonFile } from "../lib/fs.js";
import type { PriceUpdate } from "../types.js";

export const PriceUpdateZ = z.object({
  ticker: z.string().min(1).transform((s) => s.toUpperCase()),
  price: z.number().positive(),
  ts: z.string().optional()
});

/**
 * Underlying price marks for the paper engine, in file order. Malformed rows are dropped.
 */
export async function loadPriceUpdates(filePath: string): Promise<PriceUpdate[]> {
  const doc = await readJsonFile(filePath);
  if (!Array.isArray(doc)) return [];
  const out: PriceUpdate[] = [];
  for (const row of doc) {
    const r = PriceUpdateZ.safeParse(row);
    if (r.success) out.push(r.data);
  }
  return out;
}

export type PriceBatch = {
  now: string;
  updates: PriceUpdate[];
};

/**
 * Group marks into engine calls by timestamp, oldest first, so a replay sees prices in
 * the order they happened. Undated marks form a final batch at `fallbackNow`.
 */
export function batchPriceUpdates(updates: readonly PriceUpdate[], fallbackNow: string): PriceBatch[] {
  const dated = new Map<number, PriceUpdate[]>();
  const undated: PriceUpdate[] = [];
  for (const u of updates) {
    const t = u.ts ? Date.parse(u.ts) : NaN;
    if (!Number.isFinite(t)) {
      undated.push(u);
      continue;
    }
    const list = dated.get(t) ?? [];
    list.push(u);
    dated.set(t, list);
  }

  const batches: PriceBatch[] = [...dated.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([t, list]) => ({ now: new Date(t).toISOString(), updates: list }));
  if (undated.length) batches.push({ now: fallbackNow, updates: undated });
  return batches;
}
