#!/usr/bin/env node
import path from "path";
import { AppConfig, ConfigLoader } from "./config/config";
import { StockAnalysisManager } from "./analysis-manager";
import { ValuationManager } from "./valuation-manager";
import { NarrativeSummarizer } from "./llm/llm-service";
import { createMarketDataProvider } from "./market/provider-factory";
import { describeAlert, describeRecommendation } from "./report/signal-report";
import { describeNarrative, describeUpside } from "./report/valuation-report";
import { CliOptions, USAGE, parseArgs, resolveDateRange } from "./utils/cli-args";
import { formatUsd } from "./utils/format";
import { logger } from "./utils/logger";

async function runAnalyze(config: AppConfig, opts: CliOptions) {
  const analyzer = config.analyzer;
  const ticker = opts.ticker ?? analyzer.ticker;
  const market = { ...config.market, provider: opts.provider ?? config.market.provider };

  const manager = new StockAnalysisManager({
    provider: createMarketDataProvider(market),
    outputDir: path.resolve(config.output.dir),
    chartSize: { width: config.output.chartWidth, height: config.output.chartHeight },
    asciiChartBars: analyzer.asciiChartBars,
    asciiChartHeight: analyzer.asciiChartHeight,
  });

  const outcome = await manager.run({
    ticker,
    range: resolveDateRange(opts.start ?? analyzer.startDate, opts.end ?? analyzer.endDate),
    shortWindow: opts.shortWindow ?? analyzer.shortWindow,
    longWindow: opts.longWindow ?? analyzer.longWindow,
    extraMovingAverages: analyzer.extraMovingAverages,
    portfolio: opts.portfolio ?? analyzer.portfolio,
  });

  switch (outcome.status) {
    case "no-data":
      console.log(`No data found for ${ticker} in the given date range.`);
      return;
    case "insufficient-history":
      console.log(`Not enough history for ${ticker} (${outcome.bars} bars): ${outcome.message}`);
      return;
    case "ok":
      console.log(outcome.asciiChart);
      console.log("");
      console.log(describeAlert(outcome.alert));
      console.log(describeRecommendation(outcome.recommendation));
      console.log(`Report: ${outcome.reportPath}`);
      return;
  }
}

async function runDcf(config: AppConfig, opts: CliOptions) {
  const valuation = config.valuation;
  const ticker = opts.ticker ?? valuation.ticker;
  const market = { ...config.market, provider: opts.provider ?? config.market.provider };
  const outputDir = path.resolve(config.output.dir);

  const manager = new ValuationManager({
    provider: createMarketDataProvider(market),
    summarizer: new NarrativeSummarizer({ llm: config.llm, outputDir }),
    outputDir,
    chartSize: { width: config.output.chartWidth, height: config.output.chartHeight },
    fallbacks: {
      freeCashFlow: valuation.fallbackFreeCashFlow,
      sharesOutstanding: valuation.fallbackSharesOutstanding,
    },
  });

  // 命令行参数为百分数，模型使用小数
  const outcome = await manager.run({
    ticker,
    assumptions: {
      growthRate: (opts.growthPercent ?? valuation.growthRatePercent) / 100,
      discountRate: (opts.discountPercent ?? valuation.discountRatePercent) / 100,
      terminalGrowthRate: (opts.terminalPercent ?? valuation.terminalGrowthRatePercent) / 100,
      projectionYears: opts.years ?? valuation.projectionYears,
    },
    useLlm: !opts.noLlm,
  });

  const { result } = outcome;
  console.log(`Enterprise Value: ${formatUsd(result.enterpriseValue)}`);
  console.log(`Intrinsic Value per Share: ${formatUsd(result.intrinsicValuePerShare)}`);
  console.log(`Current Market Price per Share: ${formatUsd(result.currentPrice)}`);
  console.log(describeUpside(result));
  console.log("");
  console.log(describeNarrative(outcome.narrative));
  console.log(`Report: ${outcome.reportPath}`);
}

async function main() {
  const opts = parseArgs(process.argv.slice(2));
  if (opts.command === "help") {
    console.log(USAGE);
    return;
  }

  const config = ConfigLoader.getInstance();
  logger.info(`stock-signal-lab ${opts.command} (provider: ${opts.provider ?? config.market.provider})`);

  if (opts.command === "dcf") {
    await runDcf(config, opts);
  } else {
    await runAnalyze(config, opts);
  }
}

main().catch(error => {
  logger.error("Fatal error:", error);
  process.exitCode = 1;
});
