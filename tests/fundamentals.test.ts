import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { resolveFundamentals } from "../src/valuation/fundamentals";

const FALLBACKS = { freeCashFlow: 1000, sharesOutstanding: 50 };

describe("resolveFundamentals", () => {
  it("subtracts capex from operating cash flow whatever its sign", () => {
    const negative = resolveFundamentals(
      { ticker: "TEST", operatingCashFlow: 500, capitalExpenditures: -100, sharesOutstanding: 10 },
      FALLBACKS
    );
    const positive = resolveFundamentals(
      { ticker: "TEST", operatingCashFlow: 500, capitalExpenditures: 100, sharesOutstanding: 10 },
      FALLBACKS
    );

    assert.equal(negative.freeCashFlow, 400);
    assert.equal(positive.freeCashFlow, 400);
    assert.equal(negative.freeCashFlowSource, "cash-flow");
    assert.equal(negative.sharesOutstanding, 10);
    assert.equal(negative.sharesFromFallback, false);
  });

  it("falls back to net income when capex is missing", () => {
    const resolved = resolveFundamentals(
      { ticker: "TEST", operatingCashFlow: 500, netIncome: 300 },
      FALLBACKS
    );
    assert.equal(resolved.freeCashFlow, 300);
    assert.equal(resolved.freeCashFlowSource, "net-income");
  });

  it("uses the configured defaults when nothing is reported", () => {
    const resolved = resolveFundamentals({ ticker: "TEST" }, FALLBACKS);
    assert.deepEqual(resolved, {
      freeCashFlow: 1000,
      freeCashFlowSource: "fallback",
      sharesOutstanding: 50,
      sharesFromFallback: true,
      currentPrice: undefined,
    });
  });

  it("ignores a zero share count and a non-finite price", () => {
    const resolved = resolveFundamentals(
      { ticker: "TEST", netIncome: 1, sharesOutstanding: 0, currentPrice: NaN },
      FALLBACKS
    );
    assert.equal(resolved.sharesOutstanding, 50);
    assert.equal(resolved.sharesFromFallback, true);
    assert.equal(resolved.currentPrice, undefined);
  });
});
