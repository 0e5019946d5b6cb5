import { DcfResult } from "../types";
import { formatCompact } from "./analytics-charts";
import {
  ChartSize,
  createChartFrame,
  drawCategoryAxis,
  drawLegend,
  drawValueAxis,
  paddedRange,
  toPng,
} from "./canvas-utils";

const BAR_COLOR = "#1f77b4";
const TERMINAL_COLOR = "#ff1744";

/**
 * Discounted cash flow per projection year as bars, with the discounted
 * terminal value as a marker on the final year.
 */
export function renderDcfChart(ticker: string, result: DcfResult, size: ChartSize): Buffer {
  const years = result.projections.length;
  if (years === 0) throw new Error("DCF result has no projection years");

  const range = paddedRange([
    0,
    ...result.projections.map(p => p.discountedCashFlow),
    result.discountedTerminalValue,
  ]);
  if (!range) throw new Error("DCF result has no finite values");

  const frame = createChartFrame(`${ticker} projected free cash flows`, size, "Cash flow (USD)");
  const yFor = drawValueAxis(frame, range.min, range.max, formatCompact);
  const xFor = drawCategoryAxis(frame, years, i => `Year ${result.projections[i].year}`);

  const { ctx, plot } = frame;
  const barW = (plot.width / years) * 0.6;
  const zero = yFor(0);
  for (let i = 0; i < years; i++) {
    const y = yFor(result.projections[i].discountedCashFlow);
    ctx.fillStyle = BAR_COLOR;
    ctx.fillRect(xFor(i) - barW / 2, Math.min(y, zero), barW, Math.abs(zero - y));
  }

  const tx = xFor(years - 1);
  const ty = yFor(result.discountedTerminalValue);
  ctx.fillStyle = TERMINAL_COLOR;
  ctx.beginPath();
  ctx.arc(tx, ty, 7, 0, Math.PI * 2);
  ctx.fill();

  drawLegend(frame, [
    { label: "Discounted Cash Flow", color: BAR_COLOR },
    { label: "Terminal Value", color: TERMINAL_COLOR },
  ]);

  return toPng(frame);
}
