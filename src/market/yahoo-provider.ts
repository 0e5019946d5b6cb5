// Yahoo Finance provider built on yahoo-finance2.
// Daily bars come from chart(), fundamentals from quoteSummary().

import yahooFinance from "yahoo-finance2";
import { DateRange, Fundamentals, PricePoint, PriceSeries } from "../types";
import { UpstreamDataError, formatError, isRecord } from "../utils/errors";
import { logger } from "../utils/logger";
import { MarketDataProvider, normalizeSeries } from "./provider";

const DAY_MS = 24 * 60 * 60 * 1000;

/** Reads a numeric field that may arrive as a number or as `{ raw }`. */
function pickNumber(source: unknown, key: string): number | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  const raw = isRecord(value) ? value.raw : undefined;
  return typeof raw === "number" && Number.isFinite(raw) ? raw : undefined;
}

function pickString(source: unknown, key: string): string | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  return typeof value === "string" && value ? value : undefined;
}

function firstEntry(source: unknown, listKey: string): unknown {
  if (!isRecord(source)) return undefined;
  const list = source[listKey];
  return Array.isArray(list) && list.length > 0 ? list[0] : undefined;
}

function toTimestamp(value: unknown): number | undefined {
  if (value instanceof Date) return value.getTime();
  if (typeof value === "number" && Number.isFinite(value)) {
    // chart() meta uses epoch seconds
    return value < 1e12 ? value * 1000 : value;
  }
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Converts chart() quote rows to price points. Rows without a close (halts,
 * holidays Yahoo still lists) are dropped.
 */
export function parseChartQuotes(quotes: unknown): PricePoint[] {
  if (!Array.isArray(quotes)) return [];
  const out: PricePoint[] = [];
  for (const row of quotes) {
    if (!isRecord(row)) continue;
    const timestamp = toTimestamp(row.date);
    const close = pickNumber(row, "close");
    if (timestamp === undefined || close === undefined) continue;
    out.push({
      timestamp,
      open: pickNumber(row, "open") ?? close,
      high: pickNumber(row, "high") ?? close,
      low: pickNumber(row, "low") ?? close,
      close,
      volume: pickNumber(row, "volume") ?? 0,
    });
  }
  return out;
}

/**
 * Extracts DCF inputs from a quoteSummary() result. Statement history wins
 * over the trailing figures in financialData when both exist.
 */
export function parseQuoteSummary(ticker: string, summary: unknown): Fundamentals {
  const root: Record<string, unknown> = isRecord(summary) ? summary : {};
  const price = root.price;
  const financialData = root.financialData;
  const keyStats = root.defaultKeyStatistics;
  const cashflow = firstEntry(root.cashflowStatementHistory, "cashflowStatements");
  const income = firstEntry(root.incomeStatementHistory, "incomeStatementHistory");

  return {
    ticker,
    operatingCashFlow:
      pickNumber(cashflow, "totalCashFromOperatingActivities") ??
      pickNumber(financialData, "operatingCashflow"),
    capitalExpenditures: pickNumber(cashflow, "capitalExpenditures"),
    netIncome: pickNumber(income, "netIncome") ?? pickNumber(cashflow, "netIncome"),
    totalRevenue:
      pickNumber(income, "totalRevenue") ?? pickNumber(financialData, "totalRevenue"),
    sharesOutstanding:
      pickNumber(keyStats, "sharesOutstanding") ?? pickNumber(price, "sharesOutstanding"),
    currentPrice:
      pickNumber(financialData, "currentPrice") ?? pickNumber(price, "regularMarketPrice"),
    currency: pickString(financialData, "financialCurrency") ?? pickString(price, "currency"),
  };
}

export class YahooFinanceProvider implements MarketDataProvider {
  public readonly id = "yahoo";

  public async fetchPriceSeries(ticker: string, range: DateRange): Promise<PriceSeries> {
    try {
      // period2 is exclusive on Yahoo's side; add a day so the end date is included
      const result = await yahooFinance.chart(ticker, {
        period1: range.start,
        period2: new Date(range.end.getTime() + DAY_MS),
        interval: "1d",
      });
      const series = normalizeSeries(parseChartQuotes(result.quotes), {
        start: range.start,
        end: new Date(range.end.getTime() + DAY_MS - 1),
      });
      logger.info(`[Yahoo] ${ticker}: ${series.length} daily bars`);
      return series;
    } catch (error) {
      throw new UpstreamDataError(this.id, `chart ${ticker} failed: ${formatError(error)}`, {
        cause: error,
      });
    }
  }

  public async fetchFundamentals(ticker: string): Promise<Fundamentals> {
    try {
      const summary = await yahooFinance.quoteSummary(ticker, {
        modules: [
          "price",
          "financialData",
          "defaultKeyStatistics",
          "cashflowStatementHistory",
          "incomeStatementHistory",
        ],
      });
      return parseQuoteSummary(ticker, summary);
    } catch (error) {
      throw new UpstreamDataError(
        this.id,
        `quoteSummary ${ticker} failed: ${formatError(error)}`,
        { cause: error }
      );
    }
  }
}
