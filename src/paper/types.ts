import { z } from "zod";

export const SignalRefZ = z.object({
  id: z.string(),
  kind: z.enum(["scalp", "day", "swing"]),
  ticker: z.string(),
  direction: z.enum(["BULLISH", "BEARISH"]),
  strength: z.number(),
  tags: z.array(z.string()),
  createdAt: z.string()
});

// Read-only pointer back to the signal that opened a position; survives persistence.
export type SignalRef = z.infer<typeof SignalRefZ>;

export const PaperPositionZ = z.object({
  id: z.string(),
  signal: SignalRefZ,
  ticker: z.string(),
  direction: z.enum(["BULLISH", "BEARISH"]),

  entryTs: z.string(), // ISO
  entryPrice: z.number().positive(), // underlying price
  takeProfitPrice: z.number(),
  stopLossPrice: z.number(),
  deadlineTs: z.string(),

  status: z.enum(["OPEN", "CLOSED_TP", "CLOSED_SL", "CLOSED_TIMEOUT"]),

  lastMarkTs: z.string().nullable(),
  lastMarkPrice: z.number().nullable(),

  exitTs: z.string().nullable(),
  exitPrice: z.number().nullable(),
  returnPct: z.number().nullable() // signed by direction
});

export type PaperPosition = Readonly<z.infer<typeof PaperPositionZ>>;

export const PaperStateZ = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  positions: z.array(PaperPositionZ)
});

export type PaperState = z.infer<typeof PaperStateZ>;

export type PaperSummary = {
  open: number;
  closedTp: number;
  closedSl: number;
  closedTimeout: number;
  avgReturnPct: number | null;
};

const ClosedStatusZ = z.enum(["CLOSED_TP", "CLOSED_SL", "CLOSED_TIMEOUT"]);

export const PaperEntryEventZ = z.object({
  ts: z.string(),
  type: z.literal("ENTRY"),
  positionId: z.string(),
  signalId: z.string(),
  kind: SignalRefZ.shape.kind,
  ticker: z.string(),
  direction: SignalRefZ.shape.direction,
  price: z.number(),
  takeProfitPrice: z.number(),
  stopLossPrice: z.number(),
  deadlineTs: z.string()
});

export const PaperExitEventZ = z.object({
  ts: z.string(),
  type: z.literal("EXIT"),
  positionId: z.string(),
  signalId: z.string(),
  kind: SignalRefZ.shape.kind,
  ticker: z.string(),
  direction: SignalRefZ.shape.direction,
  status: ClosedStatusZ,
  entryPrice: z.number(),
  price: z.number(),
  returnPct: z.number(),
  holdMinutes: z.number()
});

export type PaperEntryEvent = z.infer<typeof PaperEntryEventZ>;
export type PaperExitEvent = z.infer<typeof PaperExitEventZ>;

// One line of data/db/paper_trades.jsonl.
export type PaperTradeEvent = PaperEntryEvent | PaperExitEvent;
