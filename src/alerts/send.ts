import { paperParamsFor } from "../config/resolve.js";
import type { FlowConfig } from "../config/schema.js";
import { describeError } from "../errors.js";
import { postJson } from "../lib/http.js";
import type { Logger } from "../lib/logger.js";
import type { Signal } from "../types.js";
import { formatAlert } from "./format.js";
import { routeSignal, type AlertRoute } from "./route.js";

export type AlertDelivery = {
  channel: string;
  status: "SENT" | "DRY_RUN" | "FAILED";
  detail: string;
};

export type SendOptions = {
  env?: Readonly<Record<string, string | undefined>>;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

// Unset, blank and template values ("https://...PLACEHOLDER...") are not deliverable.
export function resolveWebhook(route: AlertRoute, config: FlowConfig, env: Readonly<Record<string, string | undefined>>): string | null {
  const envVar = config.routing.channels[route.channel];
  if (!envVar) return null;
  const url = env[envVar]?.trim();
  if (!url || url.includes("PLACEHOLDER")) return null;
  return url;
}

/**
 * Deliver one alert. Never throws: a failed POST comes back as `FAILED` with the reason.
 */
export async function sendAlert(route: AlertRoute, text: string, config: FlowConfig, opts?: SendOptions): Promise<AlertDelivery> {
  const url = resolveWebhook(route, config, opts?.env ?? process.env);
  if (!url) return { channel: route.channel, status: "DRY_RUN", detail: "no webhook configured" };

  try {
    const status = await postJson(url, { text }, { timeoutMs: opts?.timeoutMs, fetchImpl: opts?.fetchImpl });
    return { channel: route.channel, status: "SENT", detail: `HTTP ${status}` };
  } catch (e) {
    return { channel: route.channel, status: "FAILED", detail: describeError(e) };
  }
}

export type AlertSink = (signal: Signal) => Promise<AlertDelivery>;

export function createAlertSink(args: { config: FlowConfig; log: Logger } & SendOptions): AlertSink {
  const { config, log, ...opts } = args;
  return async (signal) => {
    const route = routeSignal(signal);
    const text = formatAlert(signal, route.mode, paperParamsFor(config, signal.kind));
    const delivery = await sendAlert(route, text, config, opts);
    if (delivery.status === "FAILED") {
      await log.error(`alert: ${signal.kind} ${signal.ticker} -> ${route.channel} failed: ${delivery.detail}`);
    } else if (delivery.status === "DRY_RUN") {
      await log.info(`alert (dry-run, ${route.channel}):\n${text}`);
    }
    return delivery;
  };
}
