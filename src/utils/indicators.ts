import { MovingAverageSeries, PriceSeries } from "../types";
import { SignalEngine } from "../signals/signal-engine";
import { logger } from "./logger";

export type CorrelationMatrix = {
  tickers: string[];
  values: (number | undefined)[][];
};

export class TechnicalIndicators {
  /**
   * Percent change of close against the previous bar, times 100.
   * @returns Array matching the input length. Index 0, and any bar whose
   *          previous close is 0, is undefined.
   */
  public static dailyReturns(series: PriceSeries): (number | undefined)[] {
    return series.map((point, i) => {
      if (i === 0) return undefined;
      const prev = series[i - 1].close;
      if (prev === 0) return undefined;
      return (point.close / prev - 1) * 100;
    });
  }

  /**
   * Compounded return since the first bar: running product of (1 + r) - 1.
   * Bars without a return are skipped by the product and stay undefined.
   */
  public static cumulativeReturns(series: PriceSeries): (number | undefined)[] {
    const daily = this.dailyReturns(series);
    let growth = 1;
    return daily.map(pct => {
      if (pct === undefined) return undefined;
      growth *= 1 + pct / 100;
      return growth - 1;
    });
  }

  /**
   * Moving averages for several windows at once. Windows the series cannot
   * fill are left out instead of failing the whole batch.
   */
  public static movingAverages(
    series: PriceSeries,
    windows: number[]
  ): Map<number, MovingAverageSeries> {
    const result = new Map<number, MovingAverageSeries>();
    for (const window of windows) {
      if (result.has(window)) continue;
      if (!Number.isInteger(window) || window <= 0 || window > series.length) {
        logger.warn(
          `[Indicators] Skipping MA${window}: series has ${series.length} bars`
        );
        continue;
      }
      result.set(window, SignalEngine.computeMovingAverage(series, window));
    }
    return result;
  }

  /**
   * Pairwise Pearson correlation of closes. Series are aligned on the UTC
   * calendar day; each pair only uses the days both tickers traded.
   */
  public static correlationMatrix(
    closesByTicker: Map<string, PriceSeries>
  ): CorrelationMatrix {
    const tickers = Array.from(closesByTicker.keys());
    const byDay = tickers.map(ticker => {
      const days = new Map<string, number>();
      for (const point of closesByTicker.get(ticker) ?? []) {
        days.set(new Date(point.timestamp).toISOString().slice(0, 10), point.close);
      }
      return days;
    });

    const values = tickers.map((_, i) =>
      tickers.map((__, j) => this.pearson(byDay[i], byDay[j]))
    );

    return { tickers, values };
  }

  private static pearson(
    a: Map<string, number>,
    b: Map<string, number>
  ): number | undefined {
    const xs: number[] = [];
    const ys: number[] = [];
    for (const [day, x] of a) {
      const y = b.get(day);
      if (y === undefined) continue;
      xs.push(x);
      ys.push(y);
    }
    if (xs.length < 2) return undefined;

    const meanX = xs.reduce((s, v) => s + v, 0) / xs.length;
    const meanY = ys.reduce((s, v) => s + v, 0) / ys.length;

    let cov = 0;
    let varX = 0;
    let varY = 0;
    for (let i = 0; i < xs.length; i++) {
      const dx = xs[i] - meanX;
      const dy = ys[i] - meanY;
      cov += dx * dy;
      varX += dx * dx;
      varY += dy * dy;
    }
    if (varX === 0 || varY === 0) return undefined;

    // Clamp rounding noise so a perfect fit reads as exactly +/-1.
    return Math.max(-1, Math.min(1, cov / Math.sqrt(varX * varY)));
  }
}
