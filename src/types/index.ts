/**
 * Core type definitions for stock-signal-lab
 */

export interface PricePoint {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Ascending by timestamp, no duplicates. Never mutated once built. */
export type PriceSeries = ReadonlyArray<PricePoint>;

/** Aligned to a PriceSeries; undefined until the window has enough history. */
export type MovingAverageSeries = ReadonlyArray<number | undefined>;

export type SignalState = "Bullish" | "Bearish";

export interface CrossingEvent {
  kind: "BuyCrossing" | "SellCrossing";
  index: number;
  timestamp: number;
  close: number;
}

export interface SignalResult {
  shortWindow: number;
  longWindow: number;
  shortMA: MovingAverageSeries;
  longMA: MovingAverageSeries;
  states: ReadonlyArray<SignalState | undefined>;
  crossings: ReadonlyArray<CrossingEvent>;
}

export type Recommendation =
  | { kind: "Buy" | "Sell"; price: number; index: number; timestamp: number }
  | { kind: "NoSignal" };

export type SignalAlert =
  | { kind: "BuyAlert" | "SellAlert"; price: number; timestamp: number }
  | { kind: "NoAlert" };

export interface DateRange {
  start: Date;
  end: Date;
}

export interface Fundamentals {
  ticker: string;
  operatingCashFlow?: number;
  capitalExpenditures?: number;
  netIncome?: number;
  totalRevenue?: number;
  sharesOutstanding?: number;
  currentPrice?: number;
  currency?: string;
}

export interface DcfAssumptions {
  growthRate: number;
  discountRate: number;
  terminalGrowthRate: number;
  projectionYears: number;
}

export interface DcfInputs extends DcfAssumptions {
  freeCashFlow: number;
  sharesOutstanding: number;
  currentPrice?: number;
}

export interface DcfProjectionYear {
  year: number;
  freeCashFlow: number;
  discountedCashFlow: number;
}

export interface DcfResult {
  projections: DcfProjectionYear[];
  terminalValue: number;
  discountedTerminalValue: number;
  enterpriseValue: number;
  intrinsicValuePerShare: number;
  currentPrice?: number;
  upsidePercent?: number;
}

export type NarrativeResult =
  | { status: "ok"; text: string }
  | { status: "failed"; error: string }
  | { status: "disabled"; reason: string };
