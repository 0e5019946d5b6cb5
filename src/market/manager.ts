import { DateRange, PricePoint, PriceSeries } from "../types";
import { UpstreamDataError, formatError } from "../utils/errors";
import { logger } from "../utils/logger";
import { MarketDataProvider, normalizeSeries } from "./provider";

/** The slice of a ccxt Exchange this provider needs. */
export interface OhlcvSource {
  fetchOHLCV(
    symbol: string,
    timeframe?: string,
    since?: number,
    limit?: number
  ): Promise<ReadonlyArray<ReadonlyArray<number | undefined>>>;
}

/**
 * Daily candles from a crypto exchange through ccxt, e.g. "BTC/USDT".
 * Pages forward from the range start because exchanges cap each response.
 */
export class ExchangeDataProvider implements MarketDataProvider {
  public readonly id = "exchange";

  constructor(
    private readonly source: OhlcvSource,
    private readonly pageSize: number = 500,
    private readonly timeframe: string = "1d"
  ) {}

  public async fetchPriceSeries(symbol: string, range: DateRange): Promise<PriceSeries> {
    const endMs = range.end.getTime();
    const points: PricePoint[] = [];
    let since = range.start.getTime();

    try {
      for (;;) {
        // ccxt returns [timestamp, open, high, low, close, volume]
        const page = await this.source.fetchOHLCV(symbol, this.timeframe, since, this.pageSize);
        if (page.length === 0) break;

        let lastTimestamp = since - 1;
        for (const c of page) {
          const [timestamp, open, high, low, close, volume] = c;
          if (timestamp === undefined || close === undefined) continue;
          lastTimestamp = Math.max(lastTimestamp, timestamp);
          points.push({
            timestamp,
            open: open ?? close,
            high: high ?? close,
            low: low ?? close,
            close,
            volume: volume ?? 0,
          });
        }

        // Stop on a short page, on reaching the end, or when the cursor stalls
        if (page.length < this.pageSize || lastTimestamp >= endMs || lastTimestamp < since) {
          break;
        }
        since = lastTimestamp + 1;
      }
    } catch (error) {
      logger.error(`[Market Data] Failed to fetch OHLCV for ${symbol}: ${formatError(error)}`);
      throw new UpstreamDataError(this.id, `fetchOHLCV ${symbol} failed: ${formatError(error)}`, {
        cause: error,
      });
    }

    return normalizeSeries(points, range);
  }
}
