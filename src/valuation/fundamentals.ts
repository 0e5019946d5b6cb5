import { Fundamentals } from "../types";
import { logger } from "../utils/logger";

export type FreeCashFlowSource = "cash-flow" | "net-income" | "fallback";

export interface ResolvedFundamentals {
  freeCashFlow: number;
  freeCashFlowSource: FreeCashFlowSource;
  sharesOutstanding: number;
  sharesFromFallback: boolean;
  currentPrice?: number;
}

export interface FundamentalsFallbacks {
  freeCashFlow: number;
  sharesOutstanding: number;
}

function usable(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value);
}

/**
 * Picks the cash flow base for the DCF, falling back from the cash flow
 * statement to net income to a fixed default.
 */
export function resolveFundamentals(
  fundamentals: Fundamentals,
  fallbacks: FundamentalsFallbacks
): ResolvedFundamentals {
  const { operatingCashFlow, capitalExpenditures, netIncome } = fundamentals;

  let freeCashFlow: number;
  let freeCashFlowSource: FreeCashFlowSource;

  if (usable(operatingCashFlow) && usable(capitalExpenditures)) {
    // Providers disagree on the sign of capex; it is always an outflow.
    freeCashFlow = operatingCashFlow - Math.abs(capitalExpenditures);
    freeCashFlowSource = "cash-flow";
  } else if (usable(netIncome)) {
    logger.warn(
      `[Fundamentals] ${fundamentals.ticker}: missing cash flow data, estimating FCF from net income`
    );
    freeCashFlow = netIncome;
    freeCashFlowSource = "net-income";
  } else {
    logger.warn(
      `[Fundamentals] ${fundamentals.ticker}: no cash flow or net income, using default FCF ${fallbacks.freeCashFlow}`
    );
    freeCashFlow = fallbacks.freeCashFlow;
    freeCashFlowSource = "fallback";
  }

  const reportedShares = fundamentals.sharesOutstanding;
  const shares =
    usable(reportedShares) && reportedShares > 0 ? reportedShares : undefined;
  if (shares === undefined) {
    logger.warn(
      `[Fundamentals] ${fundamentals.ticker}: shares outstanding unknown, using ${fallbacks.sharesOutstanding}`
    );
  }

  return {
    freeCashFlow,
    freeCashFlowSource,
    sharesOutstanding: shares ?? fallbacks.sharesOutstanding,
    sharesFromFallback: shares === undefined,
    currentPrice: usable(fundamentals.currentPrice)
      ? fundamentals.currentPrice
      : undefined,
  };
}
