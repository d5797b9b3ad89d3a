import type { StrategyKind } from "./types.js";

/**
 * Missing or invalid threshold for a strategy. Fatal for that strategy's run on the
 * current event only; the emitter records it and moves on.
 */
export class ConfigurationError extends Error {
  public readonly strategy: StrategyKind | undefined;
  public readonly ticker: string | undefined;
  public readonly issues: string[];

  constructor(args: { message: string; strategy?: StrategyKind; ticker?: string; issues?: string[] }) {
    super(args.message);
    this.name = "ConfigurationError";
    this.strategy = args.strategy;
    this.ticker = args.ticker;
    this.issues = args.issues ?? [];
  }
}

/**
 * Malformed flow event. The event is rejected before context attachment.
 */
export class DataQualityError extends Error {
  public readonly eventId: string | undefined;
  public readonly issues: string[];

  constructor(args: { eventId?: string; issues: string[] }) {
    super(`rejected flow event${args.eventId ? ` ${args.eventId}` : ""}: ${args.issues.join("; ")}`);
    this.name = "DataQualityError";
    this.eventId = args.eventId;
    this.issues = args.issues;
  }
}

export function describeError(e: unknown): string {
  if (e instanceof ConfigurationError && e.issues.length) return `${e.message} (${e.issues.join("; ")})`;
  if (e instanceof Error) return e.message;
  return String(e);
}
