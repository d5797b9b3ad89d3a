import path from "node:path";
import { z } from "zod";
import { DataQualityError } from "../errors.js";
import { readJsonFile, readJsonLines } from "../lib/fs.js";
import { daysBetween, isoDate } from "../lib/time.js";
import type { FlowEvent, FlowTag, OptionRight, OrderAction } from "../types.js";

const NumLike = z.union([z.number(), z.string()]);

/**
 * Loose schema for one raw flow print. Providers disagree on field names and on
 * whether numbers arrive as strings, so aliases are accepted and unknown keys pass through.
 */
export const RawFlowEventZ = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    ticker: z.string().optional(),
    symbol: z.string().optional(),

    right: z.string().optional(),
    call_put: z.string().optional(),
    side: z.string().optional(),
    action: z.string().optional(),

    strike: NumLike.optional(),
    expiry: z.string().optional(),
    expiration: z.string().optional(),
    event_time: z.string().optional(),
    eventTime: z.string().optional(),
    timestamp: z.string().optional(),

    contracts: NumLike.optional(),
    size: NumLike.optional(),
    option_price: NumLike.optional(),
    optionPrice: NumLike.optional(),
    premium: NumLike.optional(),
    notional: NumLike.optional(),

    volume: NumLike.optional(),
    open_interest: NumLike.optional(),
    openInterest: NumLike.optional(),
    underlying_price: NumLike.optional(),
    underlyingPrice: NumLike.optional(),
    iv: NumLike.nullable().optional(),

    is_sweep: z.boolean().optional(),
    is_aggressive: z.boolean().optional(),
    tags: z.array(z.string()).optional()
  })
  .passthrough();

export type RawFlowEvent = z.infer<typeof RawFlowEventZ>;

const KNOWN_TAGS: readonly FlowTag[] = ["SWEEP", "AGGRESSIVE", "CLUSTER", "SPLIT", "BLOCK"];

/**
 * Validate and normalize one raw print into an immutable FlowEvent.
 * Throws DataQualityError listing every problem found.
 */
export function toFlowEvent(input: unknown): FlowEvent {
  const parsed = RawFlowEventZ.safeParse(input);
  if (!parsed.success) {
    throw new DataQualityError({ issues: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`) });
  }
  const r = parsed.data;
  const issues: string[] = [];

  const ticker = (r.ticker ?? r.symbol ?? "").trim().toUpperCase();
  if (!ticker) issues.push("missing ticker");

  const right = parseRight(r.right ?? r.call_put ?? r.side);
  if (!right) issues.push(`unknown option right ${JSON.stringify(r.right ?? r.call_put ?? r.side ?? null)}`);

  const action = parseAction(r.action);
  if (!action) issues.push(`unknown order action ${JSON.stringify(r.action)}`);

  const strike = toNum(r.strike);
  if (strike === null || strike <= 0) issues.push("strike must be positive");

  const rawTime = r.event_time ?? r.eventTime ?? r.timestamp;
  const eventMs = rawTime ? Date.parse(rawTime) : NaN;
  const eventTime = Number.isFinite(eventMs) ? new Date(eventMs).toISOString() : null;
  if (!eventTime) issues.push("unparseable event time");

  const rawExpiry = r.expiry ?? r.expiration;
  const expiry = rawExpiry ? isoDate(rawExpiry) : null;
  if (!expiry) issues.push("unparseable expiry");
  if (expiry && eventTime) {
    const tradeDate = eventTime.slice(0, 10);
    if (daysBetween(tradeDate, expiry) < 0) issues.push(`expiry ${expiry} before trade date ${tradeDate}`);
  }

  const contracts = toNum(r.contracts ?? r.size);
  if (contracts === null || contracts <= 0) issues.push("contracts must be positive");

  const optionPrice = toNum(r.option_price ?? r.optionPrice ?? r.premium);
  if (optionPrice === null || optionPrice < 0) issues.push("option price must be non-negative");

  const suppliedNotional = toNum(r.notional);
  if (suppliedNotional !== null && suppliedNotional < 0) issues.push("negative notional");
  const notional = contracts !== null && optionPrice !== null ? round2(contracts * optionPrice * 100) : null;
  if (notional !== null && notional <= 0) issues.push("notional must be positive");

  const volume = toNum(r.volume) ?? 0;
  const openInterest = toNum(r.open_interest ?? r.openInterest) ?? 0;
  if (volume < 0) issues.push("negative volume");
  if (openInterest < 0) issues.push("negative open interest");

  const underlyingPrice = toNum(r.underlying_price ?? r.underlyingPrice);
  if (underlyingPrice === null || underlyingPrice <= 0) issues.push("underlying price must be positive");

  const suppliedId = r.id === undefined ? undefined : String(r.id);
  if (
    issues.length ||
    !right ||
    !action ||
    strike === null ||
    !eventTime ||
    !expiry ||
    contracts === null ||
    optionPrice === null ||
    notional === null ||
    underlyingPrice === null
  ) {
    throw new DataQualityError({ eventId: suppliedId, issues: issues.length ? issues : ["incomplete event"] });
  }

  const flowTags = new Set<FlowTag>();
  if (r.is_sweep) flowTags.add("SWEEP");
  if (r.is_aggressive) flowTags.add("AGGRESSIVE");
  for (const t of r.tags ?? []) {
    const tag = KNOWN_TAGS.find((k) => k === t.trim().toUpperCase());
    if (tag) flowTags.add(tag);
  }

  return Object.freeze({
    id: suppliedId ?? `${ticker}-${expiry}-${strike}${right[0]}-${eventMs}`,
    ticker,
    right,
    action,
    strike,
    expiry,
    eventTime,
    contracts,
    optionPrice,
    notional,
    volume,
    openInterest,
    underlyingPrice,
    iv: toNum(r.iv),
    flowTags: Object.freeze([...flowTags])
  });
}

/**
 * Load raw prints for replay from a JSON array (optionally `{ events: [...] }`) or a
 * `.jsonl` file. Records are returned unvalidated, ordered by readable event time.
 */
export async function loadFlowEvents(filePath: string): Promise<unknown[]> {
  let records: unknown[];
  if (path.extname(filePath).toLowerCase() === ".jsonl") {
    records = await readJsonLines(filePath);
  } else {
    const doc = await readJsonFile(filePath);
    if (Array.isArray(doc)) records = doc;
    else if (doc && typeof doc === "object" && "events" in doc && Array.isArray(doc.events)) records = doc.events;
    else records = [];
  }

  return records
    .map((rec, idx) => ({ rec, idx, t: eventTimeOf(rec) }))
    .sort((a, b) => a.t - b.t || a.idx - b.idx)
    .map((x) => x.rec);
}

function eventTimeOf(rec: unknown): number {
  const r = RawFlowEventZ.safeParse(rec);
  if (!r.success) return Number.POSITIVE_INFINITY;
  const raw = r.data.event_time ?? r.data.eventTime ?? r.data.timestamp;
  const t = raw ? Date.parse(raw) : NaN;
  return Number.isFinite(t) ? t : Number.POSITIVE_INFINITY;
}

function parseRight(v: string | undefined): OptionRight | null {
  const s = v?.trim().toUpperCase();
  if (s === "CALL" || s === "C") return "CALL";
  if (s === "PUT" || s === "P") return "PUT";
  return null;
}

function parseAction(v: string | undefined): OrderAction | null {
  const s = v?.trim().toUpperCase();
  if (s === undefined || s === "" || s === "BUY" || s === "B") return "BUY";
  if (s === "SELL" || s === "S") return "SELL";
  return null;
}

function toNum(v: number | string | null | undefined): number | null {
  if (v === null || v === undefined) return null;
  const n = typeof v === "number" ? v : Number(v.replace(/[$,]/g, ""));
  return Number.isFinite(n) ? n : null;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
