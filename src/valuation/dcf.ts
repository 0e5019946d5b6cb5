import { DcfInputs, DcfProjectionYear, DcfResult } from "../types";
import { ValuationError } from "../utils/errors";

export class DcfModel {
  /**
   * Discounted cash flow projection.
   *
   * Each year the cash flow is grown first and then discounted:
   *   fcf_t = fcf_{t-1} * (1 + g),  pv_t = fcf_t / (1 + r)^t
   * The terminal value uses the Gordon growth formula on the final year:
   *   TV = fcf_N * (1 + g_term) / (r - g_term),  pv_TV = TV / (1 + r)^N
   */
  public static project(inputs: DcfInputs): DcfResult {
    this.validate(inputs);

    const {
      freeCashFlow,
      growthRate,
      discountRate,
      terminalGrowthRate,
      projectionYears,
      sharesOutstanding,
      currentPrice,
    } = inputs;

    const projections: DcfProjectionYear[] = [];
    let fcf = freeCashFlow;
    for (let year = 1; year <= projectionYears; year++) {
      fcf *= 1 + growthRate;
      projections.push({
        year,
        freeCashFlow: fcf,
        discountedCashFlow: fcf / Math.pow(1 + discountRate, year),
      });
    }

    const terminalValue =
      (fcf * (1 + terminalGrowthRate)) / (discountRate - terminalGrowthRate);
    const discountedTerminalValue =
      terminalValue / Math.pow(1 + discountRate, projectionYears);

    const enterpriseValue =
      projections.reduce((sum, p) => sum + p.discountedCashFlow, 0) +
      discountedTerminalValue;
    const intrinsicValuePerShare = enterpriseValue / sharesOutstanding;

    const price =
      currentPrice !== undefined && Number.isFinite(currentPrice) && currentPrice > 0
        ? currentPrice
        : undefined;

    return {
      projections,
      terminalValue,
      discountedTerminalValue,
      enterpriseValue,
      intrinsicValuePerShare,
      currentPrice: price,
      upsidePercent:
        price !== undefined ? (intrinsicValuePerShare / price - 1) * 100 : undefined,
    };
  }

  private static validate(inputs: DcfInputs) {
    const numeric: Array<[string, number]> = [
      ["freeCashFlow", inputs.freeCashFlow],
      ["growthRate", inputs.growthRate],
      ["discountRate", inputs.discountRate],
      ["terminalGrowthRate", inputs.terminalGrowthRate],
      ["sharesOutstanding", inputs.sharesOutstanding],
    ];
    for (const [name, value] of numeric) {
      if (!Number.isFinite(value)) {
        throw new ValuationError(`${name} must be a finite number, got ${value}`);
      }
    }

    if (!Number.isInteger(inputs.projectionYears) || inputs.projectionYears <= 0) {
      throw new ValuationError(
        `projectionYears must be a positive integer, got ${inputs.projectionYears}`
      );
    }
    if (inputs.sharesOutstanding <= 0) {
      throw new ValuationError(
        `sharesOutstanding must be positive, got ${inputs.sharesOutstanding}`
      );
    }
    if (inputs.discountRate === inputs.terminalGrowthRate) {
      throw new ValuationError(
        `discount rate equals terminal growth rate (${inputs.discountRate}); terminal value is undefined`
      );
    }
  }
}
