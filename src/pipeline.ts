import { attachContext } from "./context/attach.js";
import type { FlowConfig } from "./config/schema.js";
import { DataQualityError, describeError } from "./errors.js";
import { toFlowEvent } from "./ingest/flowEvents.js";
import type { Logger } from "./lib/logger.js";
import { fmtNum, fmtPct } from "./lib/pretty.js";
import type { AlertSink } from "./alerts/send.js";
import { entryEvent, exitEvent, type PaperTradingEngine } from "./paper/engine.js";
import type { PaperPosition, PaperTradeEvent } from "./paper/types.js";
import { PipelineCounters, type Heartbeat } from "./persist/heartbeat.js";
import { createSignalEmitter, type EmitResult, type SignalEmitter } from "./signals/emitter.js";
import type { FlowEvent, MarketContext, MarketSnapshot, PriceUpdate, Signal } from "./types.js";

// Downstream consumer of emitted signals (signal log, dashboards, ...).
export type SignalSink = {
  name: string;
  accept: (signals: readonly Signal[]) => Promise<void>;
};

export type PipelineDeps = {
  config: FlowConfig;
  log: Logger;
  emitter?: SignalEmitter;
  // null or absent: signals are not paper traded
  paper?: PaperTradingEngine | null;
  recordPaperEvents?: (events: readonly PaperTradeEvent[]) => Promise<void>;
  sinks?: readonly SignalSink[];
  alerts?: AlertSink | null;
  counters?: PipelineCounters;
};

export type ProcessResult =
  | { status: "REJECTED"; error: DataQualityError }
  | {
      status: "PROCESSED";
      event: FlowEvent;
      context: MarketContext;
      emitted: EmitResult;
      opened: PaperPosition[];
    };

export type Pipeline = {
  processEvent: (raw: unknown, snapshotFor: (ticker: string) => MarketSnapshot) => Promise<ProcessResult>;
  updatePrices: (updates: readonly PriceUpdate[], now: string) => Promise<PaperPosition[]>;
  heartbeat: (timestamp?: string) => Heartbeat;
  readonly counters: PipelineCounters;
};

/**
 * One event at a time, start to finish: validate, attach context, run the strategies,
 * open paper positions, then hand signals to the sinks. Calls are queued so that swing
 * memory and the paper book only ever see one writer, even if callers do not await.
 *
 * Sink and alert failures are logged and counted; they never stop the pipeline.
 */
export function createPipeline(deps: PipelineDeps): Pipeline {
  const { config, log } = deps;
  const emitter = deps.emitter ?? createSignalEmitter();
  const paper = deps.paper ?? null;
  const counters = deps.counters ?? new PipelineCounters();

  let queue: Promise<unknown> = Promise.resolve();
  function serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = queue.then(task);
    // the caller observes failures through `run`; the queue itself keeps going
    queue = run.catch(() => undefined);
    return run;
  }

  async function recordPaper(events: PaperTradeEvent[]): Promise<void> {
    if (!deps.recordPaperEvents || events.length === 0) return;
    try {
      await deps.recordPaperEvents(events);
    } catch (e) {
      await log.error(`paper: cannot record ${events.length} trade event(s): ${describeError(e)}`);
    }
  }

  async function deliver(signals: readonly Signal[]): Promise<void> {
    for (const sink of deps.sinks ?? []) {
      try {
        await sink.accept(signals);
      } catch (e) {
        await log.error(`sink ${sink.name} failed: ${describeError(e)}`);
      }
    }
    if (!deps.alerts) return;
    for (const signal of signals) {
      try {
        const delivery = await deps.alerts(signal);
        if (delivery.status === "SENT") counters.alertsSent += 1;
        if (delivery.status === "FAILED") counters.alertsFailed += 1;
      } catch (e) {
        counters.alertsFailed += 1;
        await log.error(`alert ${signal.kind} ${signal.ticker} failed: ${describeError(e)}`);
      }
    }
  }

  async function handleEvent(raw: unknown, snapshotFor: (ticker: string) => MarketSnapshot): Promise<ProcessResult> {
    let event: FlowEvent;
    try {
      event = toFlowEvent(raw);
    } catch (e) {
      if (!(e instanceof DataQualityError)) throw e;
      counters.eventsRejected += 1;
      await log.warn(e.message);
      return { status: "REJECTED", error: e };
    }
    counters.eventsProcessed += 1;

    const context = attachContext(event, snapshotFor(event.ticker), config.context);
    const emitted = emitter.run(event, context, config);

    for (const f of emitted.failures) {
      counters.strategyFailures += 1;
      await log.warn(`strategy ${f.kind} skipped for ${event.id}: ${describeError(f.error)}`);
    }
    for (const d of emitted.dropped) {
      counters.droppedBelowStrength += 1;
      await log.info(`drop ${d.kind} ${event.ticker}: strength ${fmtNum(d.strength)} < ${fmtNum(d.minStrength)}`);
    }

    const opened: PaperPosition[] = [];
    for (const signal of emitted.signals) {
      counters.recordSignal(signal.kind);
      await log.info(
        `signal ${signal.kind} ${signal.ticker} ${signal.direction} strength=${fmtNum(signal.strength)} tags=${signal.tags.join(",")}`
      );
      if (paper) {
        const pos = paper.open(signal);
        opened.push(pos);
        counters.positionsOpened += 1;
        await log.info(
          `paper open ${signal.kind} ${pos.ticker} ${pos.direction} @ ${fmtNum(pos.entryPrice)} tp=${fmtNum(pos.takeProfitPrice)} sl=${fmtNum(pos.stopLossPrice)}`
        );
      }
    }
    await recordPaper(opened.map(entryEvent));

    if (emitted.signals.length) await deliver(emitted.signals);
    return { status: "PROCESSED", event, context, emitted, opened };
  }

  async function applyPrices(updates: readonly PriceUpdate[], now: string): Promise<PaperPosition[]> {
    if (!paper) return [];
    const closed = paper.update(updates, now);
    const events: PaperTradeEvent[] = [];
    for (const pos of closed) {
      counters.positionsClosed += 1;
      await log.info(`paper close ${pos.status} ${pos.ticker} @ ${fmtNum(pos.exitPrice)} return=${fmtPct(pos.returnPct)}`);
      const ev = exitEvent(pos);
      if (ev) events.push(ev);
    }
    await recordPaper(events);
    return closed;
  }

  return {
    processEvent: (raw, snapshotFor) => serialized(() => handleEvent(raw, snapshotFor)),
    updatePrices: (updates, now) => serialized(() => applyPrices(updates, now)),
    heartbeat: (timestamp) => counters.snapshot(paper ? paper.openPositions().length : 0, timestamp),
    counters
  };
}
