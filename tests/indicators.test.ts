import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TechnicalIndicators } from "../src/utils/indicators";
import { DAY_MS, JAN_1_2024, assertClose, makeSeries } from "./helpers";

describe("TechnicalIndicators.dailyReturns", () => {
  it("returns percent change against the previous close", () => {
    const returns = TechnicalIndicators.dailyReturns(makeSeries([100, 110, 99]));
    assert.equal(returns.length, 3);
    assert.equal(returns[0], undefined);
    assertClose(returns[1], 10);
    assertClose(returns[2], -10);
  });

  it("leaves the bar after a zero close undefined", () => {
    const returns = TechnicalIndicators.dailyReturns(makeSeries([0, 5, 10]));
    assert.equal(returns[1], undefined);
    assertClose(returns[2], 100);
  });
});

describe("TechnicalIndicators.cumulativeReturns", () => {
  it("compounds daily returns into a fraction", () => {
    const cumulative = TechnicalIndicators.cumulativeReturns(makeSeries([100, 110, 99]));
    assert.equal(cumulative[0], undefined);
    assertClose(cumulative[1], 0.1);
    assertClose(cumulative[2], -0.01);
  });
});

describe("TechnicalIndicators.movingAverages", () => {
  it("computes each usable window once and skips the rest", () => {
    const result = TechnicalIndicators.movingAverages(makeSeries([1, 2, 3, 4, 5]), [2, 2, 10, 0]);
    assert.deepEqual(Array.from(result.keys()), [2]);
    assert.deepEqual(result.get(2), [undefined, 1.5, 2.5, 3.5, 4.5]);
  });
});

describe("TechnicalIndicators.correlationMatrix", () => {
  it("finds perfect positive and negative correlation", () => {
    const matrix = TechnicalIndicators.correlationMatrix(
      new Map([
        ["AAA", makeSeries([1, 2, 3, 4])],
        ["BBB", makeSeries([2, 4, 6, 8])],
        ["CCC", makeSeries([4, 3, 2, 1])],
      ])
    );

    assert.deepEqual(matrix.tickers, ["AAA", "BBB", "CCC"]);
    assert.equal(matrix.values[0][0], 1);
    assertClose(matrix.values[0][1], 1);
    assertClose(matrix.values[0][2], -1);
    assertClose(matrix.values[2][1], -1);
  });

  it("aligns on the calendar day and only uses shared days", () => {
    // BBB starts a day later: shared closes are AAA [2, 3, 4] vs BBB [1, 2, 3]
    const matrix = TechnicalIndicators.correlationMatrix(
      new Map([
        ["AAA", makeSeries([1, 2, 3, 4])],
        ["BBB", makeSeries([1, 2, 3, 100], JAN_1_2024 + DAY_MS)],
      ])
    );
    assertClose(matrix.values[0][1], 1);
  });

  it("is undefined for a flat series or fewer than two shared days", () => {
    const matrix = TechnicalIndicators.correlationMatrix(
      new Map([
        ["AAA", makeSeries([1, 2, 3])],
        ["FLAT", makeSeries([5, 5, 5])],
        ["LATE", makeSeries([7, 8], JAN_1_2024 + 2 * DAY_MS)],
      ])
    );
    assert.equal(matrix.values[0][1], undefined);
    assert.equal(matrix.values[1][1], undefined);
    assert.equal(matrix.values[0][2], undefined);
  });
});
