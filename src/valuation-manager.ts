import fs from "fs";
import path from "path";
import { ChartSize } from "./charts/canvas-utils";
import { renderDcfChart } from "./charts/dcf-chart";
import { NarrativeSummarizer } from "./llm/llm-service";
import { MarketDataProvider } from "./market/provider";
import { buildValuationReport } from "./report/valuation-report";
import { writeReport } from "./report/signal-report";
import { DcfAssumptions, DcfResult, Fundamentals, NarrativeResult } from "./types";
import { formatError } from "./utils/errors";
import { logger } from "./utils/logger";
import { DcfModel } from "./valuation/dcf";
import {
  FundamentalsFallbacks,
  ResolvedFundamentals,
  resolveFundamentals,
} from "./valuation/fundamentals";

export interface ValuationManagerSettings {
  provider: MarketDataProvider;
  summarizer: NarrativeSummarizer;
  outputDir: string;
  chartSize: ChartSize;
  fallbacks: FundamentalsFallbacks;
}

export interface ValuationOptions {
  ticker: string;
  assumptions: DcfAssumptions;
  useLlm?: boolean;
}

export interface ValuationOutcome {
  ticker: string;
  inputs: ResolvedFundamentals;
  result: DcfResult;
  narrative: NarrativeResult;
  chartFile?: string;
  reportPath: string;
}

export class ValuationManager {
  constructor(private settings: ValuationManagerSettings) {}

  /**
   * Fundamentals -> DCF -> chart -> commentary -> report. Only invalid
   * assumptions (ValuationError) abort the run; missing data falls back to
   * defaults and a failed commentary is reported in place of the text.
   */
  public async run(options: ValuationOptions): Promise<ValuationOutcome> {
    const { ticker, assumptions } = options;

    const fundamentals = await this.loadFundamentals(ticker);
    const inputs = resolveFundamentals(fundamentals, this.settings.fallbacks);
    logger.info(
      `[Valuation] ${ticker}: base FCF ${inputs.freeCashFlow} (${inputs.freeCashFlowSource}), shares ${inputs.sharesOutstanding}`
    );

    const result = DcfModel.project({
      ...assumptions,
      freeCashFlow: inputs.freeCashFlow,
      sharesOutstanding: inputs.sharesOutstanding,
      currentPrice: inputs.currentPrice,
    });
    logger.info(
      `[Valuation] ${ticker}: intrinsic value/share ${result.intrinsicValuePerShare.toFixed(2)}`
    );

    const tickerDir = path.join(this.settings.outputDir, ticker);
    await fs.promises.mkdir(tickerDir, { recursive: true });

    let chartFile: string | undefined;
    try {
      await fs.promises.writeFile(
        path.join(tickerDir, "dcf.png"),
        renderDcfChart(ticker, result, this.settings.chartSize)
      );
      chartFile = "dcf.png";
    } catch (error) {
      logger.error(`[Valuation] ${ticker}: failed to render DCF chart: ${formatError(error)}`);
    }

    const narrative: NarrativeResult =
      options.useLlm === false
        ? { status: "disabled", reason: "AI commentary turned off (--no-llm)" }
        : await this.settings.summarizer.summarizeValuation(ticker, assumptions, result);

    const report = buildValuationReport({
      ticker,
      generatedAt: new Date(),
      freeCashFlow: inputs.freeCashFlow,
      freeCashFlowSource: inputs.freeCashFlowSource,
      sharesOutstanding: inputs.sharesOutstanding,
      sharesFromFallback: inputs.sharesFromFallback,
      assumptions,
      result,
      narrative,
      chartFile,
    });
    const reportPath = await writeReport(path.join(tickerDir, "valuation.md"), report);

    return { ticker, inputs, result, narrative, chartFile, reportPath };
  }

  private async loadFundamentals(ticker: string): Promise<Fundamentals> {
    const { provider } = this.settings;
    if (!provider.fetchFundamentals) {
      logger.warn(
        `[Valuation] Provider ${provider.id} has no fundamentals, using default estimates for ${ticker}`
      );
      return { ticker };
    }
    try {
      return await provider.fetchFundamentals(ticker);
    } catch (error) {
      logger.warn(
        `[Valuation] ${ticker}: fundamentals unavailable (${formatError(error)}), using default estimates`
      );
      return { ticker };
    }
  }
}
