import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { CsvDataProvider } from "../src/market/csv-provider";
import { ExchangeDataProvider, OhlcvSource } from "../src/market/manager";
import { normalizeSeries } from "../src/market/provider";
import { createMarketDataProvider } from "../src/market/provider-factory";
import {
  YahooFinanceProvider,
  parseChartQuotes,
  parseQuoteSummary,
} from "../src/market/yahoo-provider";
import { UpstreamDataError } from "../src/utils/errors";
import { DAY_MS, JAN_1_2024, makeSeries, makeTempDir } from "./helpers";

const JAN_1 = new Date(JAN_1_2024);
const JAN_10 = new Date(JAN_1_2024 + 9 * DAY_MS);

describe("normalizeSeries", () => {
  it("sorts, removes duplicates and keeps the inclusive range", () => {
    const [a, b, c, d] = makeSeries([1, 2, 3, 4]);
    const duplicate = { ...b, close: 20 };

    const series = normalizeSeries([d, b, a, c, duplicate], {
      start: new Date(b.timestamp),
      end: new Date(d.timestamp),
    });

    assert.deepEqual(
      series.map(p => p.close),
      [20, 3, 4]
    );
  });
});

describe("CsvDataProvider", () => {
  it("loads <TICKER>.csv from its directory and filters the range", async () => {
    const dir = makeTempDir("csv-provider");
    fs.writeFileSync(
      path.join(dir, "TEST.csv"),
      "date,close\n2023-12-31,9\n2024-01-02,10\n2024-01-10,11\n2024-01-11,12\n"
    );

    const series = await new CsvDataProvider(dir).fetchPriceSeries("TEST", {
      start: JAN_1,
      end: JAN_10,
    });
    assert.deepEqual(
      series.map(p => p.close),
      [10, 11]
    );
  });

  it("wraps a missing file in UpstreamDataError", async () => {
    const provider = new CsvDataProvider(makeTempDir("csv-provider"));
    await assert.rejects(
      provider.fetchPriceSeries("NOPE", { start: JAN_1, end: JAN_10 }),
      (error: unknown) => {
        assert.ok(error instanceof UpstreamDataError);
        assert.equal(error.source, "csv");
        assert.match(error.message, /^\[csv\] failed to load NOPE: File not found/);
        return true;
      }
    );
  });

  it("keeps path separators out of file names", () => {
    const provider = new CsvDataProvider("/data");
    assert.equal(path.basename(provider.filePathFor("BTC/USDT")), "BTC_USDT.csv");
  });
});

class FakeOhlcvSource implements OhlcvSource {
  public calls: Array<{ since?: number; limit?: number }> = [];

  constructor(private candles: number[][]) {}

  async fetchOHLCV(_symbol: string, _timeframe?: string, since?: number, limit?: number) {
    this.calls.push({ since, limit });
    return this.candles
      .filter(c => since === undefined || c[0] >= since)
      .slice(0, limit ?? this.candles.length);
  }
}

describe("ExchangeDataProvider", () => {
  const candles = Array.from({ length: 5 }, (_, i) => {
    const ts = JAN_1_2024 + i * DAY_MS;
    return [ts, 10 + i, 11 + i, 9 + i, 10.5 + i, 100 * (i + 1)];
  });

  it("pages until a short page comes back", async () => {
    const source = new FakeOhlcvSource(candles);
    const provider = new ExchangeDataProvider(source, 2);

    const series = await provider.fetchPriceSeries("BTC/USDT", { start: JAN_1, end: JAN_10 });

    assert.deepEqual(
      series.map(p => p.close),
      [10.5, 11.5, 12.5, 13.5, 14.5]
    );
    assert.deepEqual(
      source.calls.map(c => c.since),
      [JAN_1_2024, JAN_1_2024 + DAY_MS + 1, JAN_1_2024 + 3 * DAY_MS + 1]
    );
    assert.deepEqual(series[0], {
      timestamp: JAN_1_2024,
      open: 10,
      high: 11,
      low: 9,
      close: 10.5,
      volume: 100,
    });
  });

  it("stops once the end of the range is reached", async () => {
    const source = new FakeOhlcvSource(candles);
    const provider = new ExchangeDataProvider(source, 2);

    const series = await provider.fetchPriceSeries("BTC/USDT", {
      start: JAN_1,
      end: new Date(JAN_1_2024 + DAY_MS),
    });

    assert.equal(series.length, 2);
    assert.equal(source.calls.length, 1);
  });

  it("wraps source failures in UpstreamDataError", async () => {
    const provider = new ExchangeDataProvider({
      fetchOHLCV: async () => {
        throw new Error("rate limited");
      },
    });
    await assert.rejects(provider.fetchPriceSeries("BTC/USDT", { start: JAN_1, end: JAN_10 }), {
      name: "UpstreamDataError",
      message: "[exchange] fetchOHLCV BTC/USDT failed: rate limited",
    });
  });
});

describe("Yahoo parsing", () => {
  it("converts chart quotes and drops rows without a close", () => {
    const points = parseChartQuotes([
      { date: new Date(JAN_1_2024), open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 },
      { date: new Date(JAN_1_2024 + DAY_MS), open: 1, high: 2, low: 0.5, close: null, volume: 0 },
      { date: new Date(JAN_1_2024 + 2 * DAY_MS), close: 3 },
    ]);

    assert.deepEqual(points, [
      { timestamp: JAN_1_2024, open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 },
      { timestamp: JAN_1_2024 + 2 * DAY_MS, open: 3, high: 3, low: 3, close: 3, volume: 0 },
    ]);
    assert.deepEqual(parseChartQuotes(undefined), []);
  });

  it("prefers statement history and accepts { raw } numbers", () => {
    const fundamentals = parseQuoteSummary("TEST", {
      price: { regularMarketPrice: 99, sharesOutstanding: 1, currency: "USD" },
      financialData: { currentPrice: { raw: 101.5 }, operatingCashflow: 7 },
      defaultKeyStatistics: { sharesOutstanding: 2000 },
      cashflowStatementHistory: {
        cashflowStatements: [
          { totalCashFromOperatingActivities: 500, capitalExpenditures: -120, netIncome: 5 },
          { totalCashFromOperatingActivities: 1, capitalExpenditures: -1 },
        ],
      },
      incomeStatementHistory: {
        incomeStatementHistory: [{ netIncome: 300, totalRevenue: 900 }],
      },
    });

    assert.deepEqual(fundamentals, {
      ticker: "TEST",
      operatingCashFlow: 500,
      capitalExpenditures: -120,
      netIncome: 300,
      totalRevenue: 900,
      sharesOutstanding: 2000,
      currentPrice: 101.5,
      currency: "USD",
    });
  });

  it("falls back to financialData and price when statements are missing", () => {
    const fundamentals = parseQuoteSummary("TEST", {
      price: { regularMarketPrice: 99, sharesOutstanding: 10 },
      financialData: { operatingCashflow: 7 },
    });

    assert.equal(fundamentals.operatingCashFlow, 7);
    assert.equal(fundamentals.capitalExpenditures, undefined);
    assert.equal(fundamentals.sharesOutstanding, 10);
    assert.equal(fundamentals.currentPrice, 99);
  });
});

describe("createMarketDataProvider", () => {
  it("builds the configured provider", () => {
    assert.ok(
      createMarketDataProvider({ provider: "yahoo", csvDir: "data", exchangeId: "binance" }) instanceof
        YahooFinanceProvider
    );
    assert.ok(
      createMarketDataProvider({ provider: "csv", csvDir: "data", exchangeId: "binance" }) instanceof
        CsvDataProvider
    );
    assert.ok(
      createMarketDataProvider({ provider: "exchange", csvDir: "data", exchangeId: "binance" }) instanceof
        ExchangeDataProvider
    );
  });

  it("rejects an exchange ccxt does not know", () => {
    assert.throws(
      () => createMarketDataProvider({ provider: "exchange", csvDir: "data", exchangeId: "nope" }),
      { message: "Exchange nope not found in CCXT" }
    );
  });
});
