import { DcfAssumptions, DcfResult, NarrativeResult } from "../types";
import { FreeCashFlowSource } from "../valuation/fundamentals";
import { formatPercent, formatUsd } from "../utils/format";

const FCF_SOURCE_LABEL: Record<FreeCashFlowSource, string> = {
  "cash-flow": "operating cash flow minus capital expenditures",
  "net-income": "net income (cash flow data missing)",
  fallback: "default estimate (no cash flow or net income data)",
};

/** Upside line as shown to the user. */
export function describeUpside(result: DcfResult): string {
  if (result.upsidePercent === undefined) {
    return "Upside/Downside Potential: N/A (no current price data)";
  }
  return `Upside/Downside Potential: ${result.upsidePercent.toFixed(2)}%`;
}

export function describeNarrative(narrative: NarrativeResult): string {
  switch (narrative.status) {
    case "ok":
      return narrative.text;
    case "failed":
      return `AI insights unavailable: ${narrative.error}`;
    case "disabled":
      return `AI insights disabled: ${narrative.reason}`;
  }
}

export interface ValuationReportInput {
  ticker: string;
  generatedAt: Date;
  freeCashFlow: number;
  freeCashFlowSource: FreeCashFlowSource;
  sharesOutstanding: number;
  sharesFromFallback: boolean;
  assumptions: DcfAssumptions;
  result: DcfResult;
  narrative: NarrativeResult;
  chartFile?: string;
}

export function buildValuationReport(input: ValuationReportInput): string {
  const { assumptions, result } = input;

  const lines = [
    `# ${input.ticker} DCF valuation`,
    "",
    `Generated: ${input.generatedAt.toISOString()}`,
    "",
    "## Assumptions",
    "",
    `- Base free cash flow: ${formatUsd(input.freeCashFlow)} (${FCF_SOURCE_LABEL[input.freeCashFlowSource]})`,
    `- Shares outstanding: ${input.sharesOutstanding.toLocaleString("en-US")}${
      input.sharesFromFallback ? " (default)" : ""
    }`,
    `- Revenue growth rate: ${formatPercent(assumptions.growthRate)}`,
    `- Discount rate (WACC): ${formatPercent(assumptions.discountRate)}`,
    `- Terminal growth rate: ${formatPercent(assumptions.terminalGrowthRate)}`,
    `- Projection period: ${assumptions.projectionYears} years`,
    "",
    "## Projection",
    "",
    "| Year | Free cash flow | Discounted |",
    "| --- | --- | --- |",
    ...result.projections.map(
      p => `| ${p.year} | ${formatUsd(p.freeCashFlow)} | ${formatUsd(p.discountedCashFlow)} |`
    ),
    "",
    `- Terminal value: ${formatUsd(result.terminalValue)} (discounted ${formatUsd(
      result.discountedTerminalValue
    )})`,
    "",
    "## Results",
    "",
    `- Enterprise Value: ${formatUsd(result.enterpriseValue)}`,
    `- Intrinsic Value per Share: ${formatUsd(result.intrinsicValuePerShare)}`,
    `- Current Market Price per Share: ${formatUsd(result.currentPrice)}`,
    `- ${describeUpside(result)}`,
    "",
  ];

  if (input.chartFile) {
    lines.push(`![Projected free cash flows](${input.chartFile})`, "");
  }

  lines.push("## AI-powered valuation insights", "", describeNarrative(input.narrative), "");
  return lines.join("\n");
}
