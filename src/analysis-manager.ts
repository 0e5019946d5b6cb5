import fs from "fs";
import path from "path";
import { ChartSize } from "./charts/canvas-utils";
import { renderSignalChart } from "./charts/signal-chart";
import {
  renderCorrelationHeatmap,
  renderLineChart,
  renderVolumeChart,
} from "./charts/analytics-charts";
import { MarketDataProvider } from "./market/provider";
import { buildAnalysisReport, writeReport } from "./report/signal-report";
import { SignalEngine } from "./signals/signal-engine";
import {
  DateRange,
  PriceSeries,
  Recommendation,
  SignalAlert,
  SignalResult,
} from "./types";
import { ChartUtils } from "./utils/chart-utils";
import { SignalEngineError, formatError } from "./utils/errors";
import { CorrelationMatrix, TechnicalIndicators } from "./utils/indicators";
import { logger } from "./utils/logger";

export interface AnalysisManagerSettings {
  provider: MarketDataProvider;
  outputDir: string;
  chartSize: ChartSize;
  asciiChartBars: number;
  asciiChartHeight: number;
}

export interface AnalysisOptions {
  ticker: string;
  range: DateRange;
  shortWindow: number;
  longWindow: number;
  extraMovingAverages?: number[];
  portfolio?: string[];
}

export interface PortfolioCorrelation {
  matrix: CorrelationMatrix;
  skippedTickers: string[];
  chartFile?: string;
}

export type AnalysisOutcome =
  | { status: "no-data"; ticker: string }
  | { status: "insufficient-history"; ticker: string; bars: number; message: string }
  | {
      status: "ok";
      ticker: string;
      bars: number;
      signals: SignalResult;
      recommendation: Recommendation;
      alert: SignalAlert;
      asciiChart: string;
      charts: Record<string, string>;
      correlation?: PortfolioCorrelation;
      reportPath: string;
    };

export class StockAnalysisManager {
  constructor(private settings: AnalysisManagerSettings) {}

  public async run(options: AnalysisOptions): Promise<AnalysisOutcome> {
    const { ticker, range } = options;
    const { provider } = this.settings;

    logger.info(
      `[Analysis] ${ticker}: loading ${range.start.toISOString().slice(0, 10)} ~ ${range.end
        .toISOString()
        .slice(0, 10)} from ${provider.id}`
    );
    const series = await provider.fetchPriceSeries(ticker, range);

    if (series.length === 0) {
      logger.warn(`[Analysis] ${ticker}: no data found for the given ticker and date range`);
      return { status: "no-data", ticker };
    }

    let signals: SignalResult;
    try {
      signals = SignalEngine.computeSignals(series, options.shortWindow, options.longWindow);
    } catch (error) {
      // Only well-formed windows that outgrow the data count as short history
      const wellFormed = [options.shortWindow, options.longWindow].every(
        w => Number.isInteger(w) && w > 0
      );
      if (
        error instanceof SignalEngineError &&
        error.kind === "InvalidWindow" &&
        wellFormed &&
        options.longWindow > series.length
      ) {
        logger.warn(`[Analysis] ${ticker}: ${error.message}`);
        return {
          status: "insufficient-history",
          ticker,
          bars: series.length,
          message: error.message,
        };
      }
      throw error;
    }

    const recommendation = SignalEngine.latestRecommendation(signals.crossings);
    const alert = SignalEngine.lastBarAlert(series, signals.crossings);
    logger.info(
      `[Analysis] ${ticker}: ${series.length} bars, ${signals.crossings.length} crossings`
    );

    const tickerDir = path.join(this.settings.outputDir, ticker);
    await fs.promises.mkdir(tickerDir, { recursive: true });

    const charts = await this.renderTickerCharts(ticker, series, signals, tickerDir, options);

    let correlation: PortfolioCorrelation | undefined;
    const portfolio = Array.from(new Set(options.portfolio ?? []));
    if (portfolio.length > 0) {
      correlation = await this.analyzePortfolio(portfolio, range, tickerDir);
      if (correlation.chartFile) {
        charts["Portfolio correlation"] = correlation.chartFile;
      }
    }

    const cumulative = TechnicalIndicators.cumulativeReturns(series);
    const report = buildAnalysisReport({
      ticker,
      generatedAt: new Date(),
      bars: series.length,
      firstTimestamp: series[0].timestamp,
      lastTimestamp: series[series.length - 1].timestamp,
      lastClose: series[series.length - 1].close,
      signals,
      recommendation,
      alert,
      cumulativeReturn: cumulative[cumulative.length - 1],
      charts,
    });
    const reportPath = await writeReport(path.join(tickerDir, "report.md"), report);

    return {
      status: "ok",
      ticker,
      bars: series.length,
      signals,
      recommendation,
      alert,
      asciiChart: ChartUtils.generateSignalChart(
        series,
        signals,
        this.settings.asciiChartHeight,
        this.settings.asciiChartBars
      ),
      charts,
      correlation,
      reportPath,
    };
  }

  /**
   * Writes the per-ticker PNGs. A chart that fails to render is logged and
   * left out; the rest still go out.
   * @returns Chart title -> file name relative to the ticker directory
   */
  private async renderTickerCharts(
    ticker: string,
    series: PriceSeries,
    signals: SignalResult,
    dir: string,
    options: AnalysisOptions
  ): Promise<Record<string, string>> {
    const size = this.settings.chartSize;
    const timestamps = series.map(p => p.timestamp);
    const written: Record<string, string> = {};

    const movingAverages = TechnicalIndicators.movingAverages(
      series,
      options.extraMovingAverages ?? []
    );

    const jobs: Array<[string, string, () => Buffer]> = [
      ["Signals", "signals.png", () => renderSignalChart(ticker, series, signals, size)],
      ["Volume", "volume.png", () => renderVolumeChart(ticker, series, size)],
      [
        "Daily returns",
        "daily-returns.png",
        () =>
          renderLineChart(
            `${ticker} daily returns`,
            timestamps,
            [{ label: "Daily return %", values: TechnicalIndicators.dailyReturns(series) }],
            size,
            v => `${v.toFixed(1)}%`
          ),
      ],
      [
        "Cumulative returns",
        "cumulative-returns.png",
        () =>
          renderLineChart(
            `${ticker} cumulative returns`,
            timestamps,
            [
              {
                label: "Cumulative return",
                values: TechnicalIndicators.cumulativeReturns(series),
              },
            ],
            size,
            v => `${(v * 100).toFixed(0)}%`
          ),
      ],
      [
        "Moving averages",
        "moving-averages.png",
        () =>
          renderLineChart(
            `${ticker} moving averages`,
            timestamps,
            [
              { label: "Close", values: series.map(p => p.close) },
              ...Array.from(movingAverages.entries()).map(([window, values]) => ({
                label: `MA${window}`,
                values,
              })),
            ],
            size
          ),
      ],
    ];

    for (const [title, file, render] of jobs) {
      try {
        await fs.promises.writeFile(path.join(dir, file), render());
        written[title] = file;
      } catch (error) {
        logger.error(`[Analysis] ${ticker}: failed to render ${file}: ${formatError(error)}`);
      }
    }

    logger.info(`[Analysis] ${ticker}: ${Object.keys(written).length} charts written to ${dir}`);
    return written;
  }

  private async analyzePortfolio(
    tickers: string[],
    range: DateRange,
    dir: string
  ): Promise<PortfolioCorrelation> {
    const loaded = new Map<string, PriceSeries>();
    const skippedTickers: string[] = [];

    // 逐个拉取，失败的股票跳过，不影响其余
    for (const symbol of tickers) {
      try {
        const series = await this.settings.provider.fetchPriceSeries(symbol, range);
        if (series.length === 0) {
          logger.warn(`[Analysis] Portfolio ticker ${symbol} returned no data, skipping`);
          skippedTickers.push(symbol);
          continue;
        }
        loaded.set(symbol, series);
      } catch (error) {
        logger.warn(`[Analysis] Portfolio ticker ${symbol} failed: ${formatError(error)}`);
        skippedTickers.push(symbol);
      }
    }

    const matrix = TechnicalIndicators.correlationMatrix(loaded);
    if (matrix.tickers.length < 2) {
      logger.warn("[Analysis] Fewer than two portfolio tickers loaded, no correlation heatmap");
      return { matrix, skippedTickers };
    }

    const chartFile = "correlation.png";
    try {
      await fs.promises.writeFile(
        path.join(dir, chartFile),
        renderCorrelationHeatmap(matrix, this.settings.chartSize)
      );
    } catch (error) {
      logger.error(`[Analysis] Failed to render correlation heatmap: ${formatError(error)}`);
      return { matrix, skippedTickers };
    }
    return { matrix, skippedTickers, chartFile };
  }
}
