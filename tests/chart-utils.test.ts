import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ChartUtils } from "../src/utils/chart-utils";
import { SignalEngine } from "../src/signals/signal-engine";
import { makeSeries } from "./helpers";

const LABEL_GUTTER = " ".repeat(8);

describe("ChartUtils.generateSignalChart", () => {
  const series = makeSeries([10, 11, 9, 12, 14]);
  const signals = SignalEngine.computeSignals(series, 2, 3);

  it("plots closes, both averages and the crossing marker", () => {
    const lines = ChartUtils.generateSignalChart(series, signals, 5).split("\n");

    assert.deepEqual(lines, [
      "   14.00 |              o ",
      "   12.75 |              . ",
      "   11.50 |     o     o  : ",
      "   10.25 |  o  .  .  .    ",
      "    9.00 |        o       ",
      `${LABEL_GUTTER} |              ^ `,
    ]);
  });

  it("only shows the most recent bars", () => {
    const lines = ChartUtils.generateSignalChart(series, signals, 5, 2).split("\n");
    assert.equal(lines.length, 6);
    assert.equal(lines[5], `${LABEL_GUTTER} |     ^ `);
  });

  it("returns an empty string for an empty series", () => {
    assert.equal(ChartUtils.generateSignalChart([], signals), "");
  });

  it("reports a flat market", () => {
    const flat = makeSeries([5, 5, 5]);
    const flatSignals = SignalEngine.computeSignals(flat, 1, 2);
    assert.equal(ChartUtils.generateSignalChart(flat, flatSignals), "Flat Market");
  });
});
