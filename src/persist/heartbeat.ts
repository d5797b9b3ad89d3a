import path from "node:path";
import { z } from "zod";
import { readJsonFile, writeJsonFile } from "../lib/fs.js";
import { STRATEGY_KINDS, type StrategyKind } from "../types.js";

export const HeartbeatZ = z.object({
  timestamp: z.string(),
  startedAt: z.string(),
  eventsProcessed: z.number(),
  eventsRejected: z.number(),
  signalsEmitted: z.number(),
  signalsByKind: z.object({ scalp: z.number(), day: z.number(), swing: z.number() }),
  strategyFailures: z.number(),
  droppedBelowStrength: z.number(),
  positionsOpened: z.number(),
  positionsClosed: z.number(),
  openPositions: z.number(),
  alertsSent: z.number(),
  alertsFailed: z.number()
});

export type Heartbeat = z.infer<typeof HeartbeatZ>;

/**
 * Running totals for one process. Mutated only by the pipeline, which serializes its
 * calls, so plain increments are safe.
 */
export class PipelineCounters {
  readonly startedAt: string;
  eventsProcessed = 0;
  eventsRejected = 0;
  signalsEmitted = 0;
  readonly signalsByKind: Record<StrategyKind, number> = { scalp: 0, day: 0, swing: 0 };
  strategyFailures = 0;
  droppedBelowStrength = 0;
  positionsOpened = 0;
  positionsClosed = 0;
  alertsSent = 0;
  alertsFailed = 0;

  constructor(startedAt = new Date().toISOString()) {
    this.startedAt = startedAt;
  }

  recordSignal(kind: StrategyKind): void {
    this.signalsEmitted += 1;
    this.signalsByKind[kind] += 1;
  }

  snapshot(openPositions: number, timestamp = new Date().toISOString()): Heartbeat {
    return {
      timestamp,
      startedAt: this.startedAt,
      eventsProcessed: this.eventsProcessed,
      eventsRejected: this.eventsRejected,
      signalsEmitted: this.signalsEmitted,
      signalsByKind: { ...this.signalsByKind },
      strategyFailures: this.strategyFailures,
      droppedBelowStrength: this.droppedBelowStrength,
      positionsOpened: this.positionsOpened,
      positionsClosed: this.positionsClosed,
      openPositions,
      alertsSent: this.alertsSent,
      alertsFailed: this.alertsFailed
    };
  }
}

export function renderHeartbeat(hb: Heartbeat): string {
  const byKind = STRATEGY_KINDS.map((k) => `${k}=${hb.signalsByKind[k]}`).join(" ");
  return [
    `ts=${hb.timestamp} since=${hb.startedAt}`,
    `events: processed=${hb.eventsProcessed} rejected=${hb.eventsRejected}`,
    `signals: total=${hb.signalsEmitted} ${byKind} dropped=${hb.droppedBelowStrength} failures=${hb.strategyFailures}`,
    `paper: opened=${hb.positionsOpened} closed=${hb.positionsClosed} open=${hb.openPositions}`,
    `alerts: sent=${hb.alertsSent} failed=${hb.alertsFailed}`
  ].join("\n");
}

export function defaultHeartbeatPath(): string {
  return path.resolve(process.cwd(), "data/db/heartbeat.json");
}

export async function writeHeartbeat(hb: Heartbeat, filePath = defaultHeartbeatPath()): Promise<void> {
  await writeJsonFile(filePath, hb);
}

// null when no scan has written one yet.
export async function readHeartbeat(filePath = defaultHeartbeatPath()): Promise<Heartbeat | null> {
  const parsed = HeartbeatZ.safeParse(await readJsonFile(filePath));
  return parsed.success ? parsed.data : null;
}
