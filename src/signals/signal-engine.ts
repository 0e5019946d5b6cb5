import {
  CrossingEvent,
  MovingAverageSeries,
  PriceSeries,
  Recommendation,
  SignalAlert,
  SignalResult,
  SignalState,
} from "../types";
import { SignalEngineError } from "../utils/errors";

/**
 * Moving-average crossover engine.
 *
 * Every method is a pure function of its arguments: the input series is
 * only read, results are new arrays, and nothing is remembered between
 * calls.
 */
export class SignalEngine {
  /**
   * Simple moving average of `close` over a trailing window, summed per
   * point in index order.
   * @returns One entry per point. The first `window - 1` entries are
   *          undefined (not 0) because there is not enough history yet.
   */
  public static computeMovingAverage(
    series: PriceSeries,
    window: number
  ): MovingAverageSeries {
    if (!Number.isInteger(window) || window <= 0) {
      throw new SignalEngineError(
        "InvalidWindow",
        `window must be a positive integer, got ${window}`
      );
    }
    if (window > series.length) {
      throw new SignalEngineError(
        "InvalidWindow",
        `insufficient history: window ${window} exceeds series length ${series.length}`
      );
    }

    const averages: (number | undefined)[] = [];
    // Length of the run of identical closes ending at i
    let sameRun = 0;
    for (let i = 0; i < series.length; i++) {
      const close = series[i].close;
      sameRun = i > 0 && close === series[i - 1].close ? sameRun + 1 : 1;

      if (i < window - 1) {
        averages.push(undefined);
        continue;
      }
      // A flat window averages to its value exactly, so equal flats tie
      if (sameRun >= window) {
        averages.push(close);
        continue;
      }
      // Summed afresh per bar in index order; a running sum drifts
      let sum = 0;
      for (let j = i - window + 1; j <= i; j++) {
        sum += series[j].close;
      }
      averages.push(sum / window);
    }
    return averages;
  }

  /**
   * Classifies each point as Bullish (short MA strictly above long MA) or
   * Bearish (everything else, ties included) and extracts the crossings.
   */
  public static computeSignals(
    series: PriceSeries,
    shortWindow: number,
    longWindow: number
  ): SignalResult {
    // Order is checked before anything else is computed.
    if (longWindow < shortWindow) {
      throw new SignalEngineError(
        "InvalidWindowOrder",
        `short window ${shortWindow} is longer than long window ${longWindow}`
      );
    }

    const shortMA = this.computeMovingAverage(series, shortWindow);
    const longMA = this.computeMovingAverage(series, longWindow);

    const states: (SignalState | undefined)[] = [];
    const crossings: CrossingEvent[] = [];
    let previous: SignalState | undefined;

    for (let i = 0; i < series.length; i++) {
      const s = shortMA[i];
      const l = longMA[i];
      if (s === undefined || l === undefined) {
        states.push(undefined);
        continue;
      }

      const state: SignalState = s > l ? "Bullish" : "Bearish";
      states.push(state);

      // Undefined -> defined never emits; only Bullish <-> Bearish does.
      if (previous !== undefined && previous !== state) {
        crossings.push({
          kind: state === "Bullish" ? "BuyCrossing" : "SellCrossing",
          index: i,
          timestamp: series[i].timestamp,
          close: series[i].close,
        });
      }
      previous = state;
    }

    return { shortWindow, longWindow, shortMA, longMA, states, crossings };
  }

  /**
   * The most recent crossing, however old, is the standing recommendation.
   */
  public static latestRecommendation(
    crossings: ReadonlyArray<CrossingEvent>
  ): Recommendation {
    if (crossings.length === 0) {
      return { kind: "NoSignal" };
    }
    const latest = crossings[crossings.length - 1];
    return {
      kind: latest.kind === "BuyCrossing" ? "Buy" : "Sell",
      price: latest.close,
      index: latest.index,
      timestamp: latest.timestamp,
    };
  }

  /**
   * An alert fires only when the signal flipped on the last bar itself.
   */
  public static lastBarAlert(
    series: PriceSeries,
    crossings: ReadonlyArray<CrossingEvent>
  ): SignalAlert {
    if (series.length === 0 || crossings.length === 0) {
      return { kind: "NoAlert" };
    }
    const latest = crossings[crossings.length - 1];
    if (latest.index !== series.length - 1) {
      return { kind: "NoAlert" };
    }
    return {
      kind: latest.kind === "BuyCrossing" ? "BuyAlert" : "SellAlert",
      price: latest.close,
      timestamp: latest.timestamp,
    };
  }
}
