import { DcfAssumptions, DcfResult } from "../../types";
import { formatPercent, formatUsd } from "../../utils/format";

export const VALUATION_SYSTEM_PROMPT =
  "You are an AI financial analyst providing insights on DCF models.";

/**
 * Fixed-shape DCF summary sent as the user message. Rates are fractions
 * and are printed as percentages.
 */
export function buildValuationUserPrompt(
  ticker: string,
  assumptions: DcfAssumptions,
  result: DcfResult
): string {
  return [
    `Here is the DCF summary for ${ticker}:`,
    `Revenue Growth Rate: ${formatPercent(assumptions.growthRate)}`,
    `Discount Rate: ${formatPercent(assumptions.discountRate)}`,
    `Terminal Growth Rate: ${formatPercent(assumptions.terminalGrowthRate)}`,
    `Enterprise Value: ${formatUsd(result.enterpriseValue)}`,
    `Intrinsic Value/Share: ${formatUsd(result.intrinsicValuePerShare)}`,
    `Current Price: ${formatUsd(result.currentPrice)}`,
    "",
  ].join("\n");
}
