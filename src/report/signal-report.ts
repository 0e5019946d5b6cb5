import * as fs from "fs";
import * as path from "path";
import { Recommendation, SignalAlert, SignalResult } from "../types";
import { formatDate, formatPercent, formatPrice } from "../utils/format";
import { logger } from "../utils/logger";

export function describeAlert(alert: SignalAlert): string {
  switch (alert.kind) {
    case "BuyAlert":
      return `ALERT: BUY signal detected at ${formatPrice(alert.price)} (${formatDate(alert.timestamp)})`;
    case "SellAlert":
      return `ALERT: SELL signal detected at ${formatPrice(alert.price)} (${formatDate(alert.timestamp)})`;
    case "NoAlert":
      return "No new signal on the latest bar.";
  }
}

export function describeRecommendation(recommendation: Recommendation): string {
  switch (recommendation.kind) {
    case "Buy":
      return `Recommendation: BUY at ${formatPrice(recommendation.price)}`;
    case "Sell":
      return `Recommendation: SELL at ${formatPrice(recommendation.price)}`;
    case "NoSignal":
      return "No strong recommendation at the moment.";
  }
}

export interface AnalysisReportInput {
  ticker: string;
  generatedAt: Date;
  bars: number;
  firstTimestamp: number;
  lastTimestamp: number;
  lastClose: number;
  signals: SignalResult;
  recommendation: Recommendation;
  alert: SignalAlert;
  cumulativeReturn?: number;
  charts: Record<string, string>;
}

export function buildAnalysisReport(input: AnalysisReportInput): string {
  const { signals } = input;
  const crossingRows = signals.crossings
    .slice(-10)
    .map(
      c =>
        `| ${formatDate(c.timestamp)} | ${c.kind === "BuyCrossing" ? "BUY" : "SELL"} | ${formatPrice(c.close)} |`
    );

  const lines = [
    `# ${input.ticker} signal report`,
    "",
    `Generated: ${input.generatedAt.toISOString()}`,
    "",
    `- Bars: ${input.bars} (${formatDate(input.firstTimestamp)} ~ ${formatDate(input.lastTimestamp)})`,
    `- Last close: ${formatPrice(input.lastClose)}`,
    `- Strategy: MA${signals.shortWindow} vs MA${signals.longWindow}`,
    `- Crossings: ${signals.crossings.length}`,
  ];
  if (input.cumulativeReturn !== undefined) {
    lines.push(`- Cumulative return: ${formatPercent(input.cumulativeReturn)}`);
  }
  lines.push(
    "",
    "## Signal",
    "",
    describeAlert(input.alert),
    "",
    describeRecommendation(input.recommendation),
    ""
  );

  if (crossingRows.length > 0) {
    lines.push("## Recent crossings", "", "| Date | Signal | Close |", "| --- | --- | --- |");
    lines.push(...crossingRows, "");
  }

  const chartEntries = Object.entries(input.charts);
  if (chartEntries.length > 0) {
    lines.push("## Charts", "");
    for (const [name, file] of chartEntries) {
      lines.push(`![${name}](${file})`, "");
    }
  }

  return lines.join("\n");
}

export async function writeReport(filePath: string, content: string): Promise<string> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, "utf-8");
  logger.info(`Report written: ${filePath}`);
  return filePath;
}
