import { PriceSeries, SignalResult } from "../types";
import {
  ChartSize,
  THEME,
  createChartFrame,
  drawCategoryAxis,
  drawLegend,
  drawPolyline,
  drawValueAxis,
  formatDateLabel,
  paddedRange,
  toPng,
} from "./canvas-utils";

const SHORT_MA_COLOR = "#2196f3";
const LONG_MA_COLOR = "#ff9800";

/**
 * Candlesticks with both moving averages and a triangle on every crossing:
 * up and green below the bar for buys, down and red above it for sells.
 */
export function renderSignalChart(
  ticker: string,
  series: PriceSeries,
  signals: SignalResult,
  size: ChartSize
): Buffer {
  if (series.length === 0) throw new Error("Price series is empty, nothing to plot");

  const { shortWindow, longWindow } = signals;
  const range = paddedRange([
    ...series.map(c => c.low),
    ...series.map(c => c.high),
    ...signals.shortMA,
    ...signals.longMA,
  ]);
  if (!range) throw new Error("Price series has no finite values");

  const frame = createChartFrame(
    `${ticker} candlestick with buy/sell signals (MA${shortWindow} vs MA${longWindow})`,
    size,
    `${formatDateLabel(series[0].timestamp)} ~ ${formatDateLabel(
      series[series.length - 1].timestamp
    )}`
  );
  const { ctx, plot } = frame;

  const yFor = drawValueAxis(frame, range.min, range.max);
  const xFor = drawCategoryAxis(frame, series.length, i =>
    formatDateLabel(series[i].timestamp)
  );

  const slot = plot.width / series.length;
  const bodyW = Math.max(1, Math.floor(slot * 0.6));

  for (let i = 0; i < series.length; i++) {
    const c = series[i];
    const x = xFor(i);
    const color = c.close >= c.open ? THEME.bull : THEME.bear;

    ctx.strokeStyle = color;
    ctx.lineWidth = 1;
    ctx.beginPath();
    ctx.moveTo(x, yFor(c.high));
    ctx.lineTo(x, yFor(c.low));
    ctx.stroke();

    const yOpen = yFor(c.open);
    const yClose = yFor(c.close);
    ctx.fillStyle = color;
    ctx.fillRect(
      x - bodyW / 2,
      Math.min(yOpen, yClose),
      bodyW,
      Math.max(1, Math.abs(yClose - yOpen))
    );
  }

  drawPolyline(frame, signals.shortMA, xFor, yFor, SHORT_MA_COLOR);
  drawPolyline(frame, signals.longMA, xFor, yFor, LONG_MA_COLOR);

  const marker = Math.max(6, Math.min(12, slot));
  for (const crossing of signals.crossings) {
    const candle = series[crossing.index];
    const x = xFor(crossing.index);
    ctx.beginPath();
    if (crossing.kind === "BuyCrossing") {
      const y = yFor(candle.low) + 6;
      ctx.moveTo(x, y);
      ctx.lineTo(x - marker / 2, y + marker);
      ctx.lineTo(x + marker / 2, y + marker);
      ctx.fillStyle = THEME.buy;
    } else {
      const y = yFor(candle.high) - 6;
      ctx.moveTo(x, y);
      ctx.lineTo(x - marker / 2, y - marker);
      ctx.lineTo(x + marker / 2, y - marker);
      ctx.fillStyle = THEME.sell;
    }
    ctx.closePath();
    ctx.fill();
  }

  drawLegend(frame, [
    { label: `MA${shortWindow}`, color: SHORT_MA_COLOR },
    { label: `MA${longWindow}`, color: LONG_MA_COLOR },
    { label: "Buy Signal", color: THEME.buy },
    { label: "Sell Signal", color: THEME.sell },
  ]);

  return toPng(frame);
}
