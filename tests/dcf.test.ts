import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DcfModel } from "../src/valuation/dcf";
import { DcfInputs } from "../src/types";
import { ValuationError } from "../src/utils/errors";
import { assertClose } from "./helpers";

const BASE: DcfInputs = {
  freeCashFlow: 100,
  growthRate: 0.1,
  discountRate: 0.1,
  terminalGrowthRate: 0,
  projectionYears: 2,
  sharesOutstanding: 10,
};

describe("DcfModel.project", () => {
  it("grows, discounts and adds the terminal value", () => {
    const result = DcfModel.project({ ...BASE, currentPrice: 100 });

    assert.equal(result.projections.length, 2);
    assertClose(result.projections[0].freeCashFlow, 110, 1e-6);
    assertClose(result.projections[0].discountedCashFlow, 100, 1e-6);
    assertClose(result.projections[1].freeCashFlow, 121, 1e-6);
    assertClose(result.projections[1].discountedCashFlow, 100, 1e-6);
    assertClose(result.terminalValue, 1210, 1e-6);
    assertClose(result.discountedTerminalValue, 1000, 1e-6);
    assertClose(result.enterpriseValue, 1200, 1e-6);
    assertClose(result.intrinsicValuePerShare, 120, 1e-6);
    assert.equal(result.currentPrice, 100);
    assertClose(result.upsidePercent, 20, 1e-6);
  });

  it("numbers the projection years from 1", () => {
    const result = DcfModel.project({ ...BASE, projectionYears: 3 });
    assert.deepEqual(
      result.projections.map(p => p.year),
      [1, 2, 3]
    );
  });

  it("has no upside without a usable price", () => {
    const noPrice = DcfModel.project(BASE);
    assert.equal(noPrice.currentPrice, undefined);
    assert.equal(noPrice.upsidePercent, undefined);

    const zeroPrice = DcfModel.project({ ...BASE, currentPrice: 0 });
    assert.equal(zeroPrice.currentPrice, undefined);
    assert.equal(zeroPrice.upsidePercent, undefined);
  });

  it("still projects when the terminal growth exceeds the discount rate", () => {
    const result = DcfModel.project({
      ...BASE,
      growthRate: 0,
      discountRate: 0.02,
      terminalGrowthRate: 0.05,
      projectionYears: 1,
    });
    assertClose(result.terminalValue, -3500, 1e-6);
    assert.ok(Number.isFinite(result.enterpriseValue));
  });

  it("rejects a discount rate equal to the terminal growth", () => {
    assert.throws(
      () => DcfModel.project({ ...BASE, discountRate: 0.03, terminalGrowthRate: 0.03 }),
      ValuationError
    );
  });

  it("rejects bad horizons, share counts and non-finite inputs", () => {
    assert.throws(() => DcfModel.project({ ...BASE, projectionYears: 0 }), ValuationError);
    assert.throws(() => DcfModel.project({ ...BASE, projectionYears: 2.5 }), ValuationError);
    assert.throws(() => DcfModel.project({ ...BASE, sharesOutstanding: 0 }), ValuationError);
    assert.throws(() => DcfModel.project({ ...BASE, freeCashFlow: NaN }), ValuationError);
  });
});
