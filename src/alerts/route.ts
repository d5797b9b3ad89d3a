import type { Signal, StrategyKind } from "../types.js";

export type AlertMode = "short" | "medium" | "deep_dive";

export type AlertRoute = {
  kind: StrategyKind;
  mode: AlertMode;
  // logical channel name; resolved to a webhook through `routing.channels`
  channel: string;
};

const ROUTES: Record<StrategyKind, Omit<AlertRoute, "kind">> = {
  scalp: { mode: "short", channel: "scalps" },
  day: { mode: "medium", channel: "main" },
  swing: { mode: "deep_dive", channel: "swings" }
};

export function routeSignal(signal: Pick<Signal, "kind">): AlertRoute {
  return { kind: signal.kind, ...ROUTES[signal.kind] };
}
