export type OptionRight = "CALL" | "PUT";
export type OrderAction = "BUY" | "SELL";
export type Bias = "BULLISH" | "BEARISH";

// Flow character as reported by the feed.
export type FlowTag = "SWEEP" | "AGGRESSIVE" | "CLUSTER" | "SPLIT" | "BLOCK";

/**
 * One observed options print. Created by ingestion (`toFlowEvent`) and never mutated.
 * Dates are ISO strings: `expiry` is `YYYY-MM-DD`, `eventTime` a full timestamp.
 */
export type FlowEvent = Readonly<{
  id: string;
  ticker: string;
  right: OptionRight;
  action: OrderAction;
  strike: number;
  expiry: string;
  eventTime: string;
  contracts: number;
  optionPrice: number;
  notional: number; // contracts * optionPrice * 100
  volume: number;
  openInterest: number;
  underlyingPrice: number;
  iv: number | null;
  flowTags: readonly FlowTag[];
}>;

export type Bar = {
  ts: string; // bar open, ISO
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/**
 * Provider-agnostic market data for one ticker as of an event.
 * - `intradayBars`: current session, oldest first (any bar size; 1-minute is typical)
 * - `dailyBars`: completed sessions, oldest first
 * - `volumeBaseline`: cumulative volume at this time of day in prior sessions
 */
export type MarketSnapshot = {
  ticker: string;
  asOf: string | null;
  intradayBars: Bar[];
  dailyBars: Bar[];
  volumeBaseline: number[];
};

export type TrendFlag = "UP" | "DOWN" | "FLAT" | "UNKNOWN";
export type VwapRelation = "ABOVE" | "BELOW" | "AT" | "UNKNOWN";
export type LevelBreak = "ABOVE_HIGH" | "BELOW_LOW" | "NONE" | "UNKNOWN";
export type TrendRegime = "TRENDING_UP" | "TRENDING_DOWN" | "CHOP" | "UNKNOWN";
export type VolatilityBucket = "LOW" | "NORMAL" | "ELEVATED" | "UNKNOWN";

export type MarketRegime = {
  trend: TrendRegime;
  volatility: VolatilityBucket;
  realizedVolPct: number | null;
};

export type ContextMetric = "rvol" | "vwap" | "shortTrend" | "midTrend" | "dailyTrend" | "levelBreak" | "volatility";

export type MarketContext = Readonly<{
  rvol: number | null;
  vwap: number | null;
  vwapRelation: VwapRelation;
  shortTrend: TrendFlag;
  midTrend: TrendFlag;
  dailyTrend: TrendFlag;
  levelBreak: LevelBreak;
  regime: MarketRegime;
  // Metrics that degraded to unknown because the snapshot lacked history.
  missing: readonly ContextMetric[];
}>;

export const STRATEGY_KINDS = ["scalp", "day", "swing"] as const;
export type StrategyKind = (typeof STRATEGY_KINDS)[number];

export type RuleId =
  | "dte_window"
  | "size"
  | "moneyness"
  | "trend_aligned"
  | "vwap_aligned"
  | "level_break"
  | "volume_over_oi"
  | "rvol"
  | "repeat_buying"
  | "sweep"
  | "aggressive"
  | "cluster";

export type EvaluationResult = {
  passed: boolean;
  triggeredRules: RuleId[];
  failedRule: RuleId | null;
};

export type PaperParams = {
  takeProfitPct: number;
  stopLossPct: number;
  maxHoldMinutes: number;
};

export type Signal = Readonly<{
  id: string;
  kind: StrategyKind;
  ticker: string;
  direction: Bias;
  event: FlowEvent;
  context: MarketContext;
  triggeredRules: readonly RuleId[];
  tags: readonly string[];
  strength: number; // 0..10
  createdAt: string;
  experimentId: string;
}>;

export type PriceUpdate = {
  ticker: string;
  price: number;
  ts?: string;
};
