import { DateRange, Fundamentals, PricePoint, PriceSeries } from "../types";

/**
 * Source of price history (and optionally fundamentals) for a ticker.
 * An empty series is a valid answer; transport failures reject with
 * UpstreamDataError.
 */
export interface MarketDataProvider {
  readonly id: string;
  fetchPriceSeries(ticker: string, range: DateRange): Promise<PriceSeries>;
  fetchFundamentals?(ticker: string): Promise<Fundamentals>;
}

/**
 * Sorts ascending, drops duplicate timestamps (last one wins) and keeps
 * only points inside the range, end inclusive.
 */
export function normalizeSeries(points: PricePoint[], range?: DateRange): PriceSeries {
  const byTimestamp = new Map<number, PricePoint>();
  for (const point of points) {
    if (range) {
      if (point.timestamp < range.start.getTime()) continue;
      if (point.timestamp > range.end.getTime()) continue;
    }
    byTimestamp.set(point.timestamp, point);
  }
  return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
}
