import { PriceSeries } from "../types";
import { CorrelationMatrix } from "../utils/indicators";
import {
  ChartSize,
  LegendEntry,
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

export interface LineSpec {
  label: string;
  values: ReadonlyArray<number | undefined>;
  color?: string;
}

export function renderVolumeChart(ticker: string, series: PriceSeries, size: ChartSize): Buffer {
  if (series.length === 0) throw new Error("Price series is empty, nothing to plot");

  const maxVolume = series.reduce((m, c) => Math.max(m, c.volume), 0);
  const frame = createChartFrame(`${ticker} trading volume`, size);
  const yFor = drawValueAxis(frame, 0, maxVolume > 0 ? maxVolume * 1.06 : 1, v =>
    formatCompact(v)
  );
  const xFor = drawCategoryAxis(frame, series.length, i => formatDateLabel(series[i].timestamp));

  const { ctx, plot } = frame;
  const barW = Math.max(1, (plot.width / series.length) * 0.8);
  series.forEach((c, i) => {
    const top = yFor(c.volume);
    ctx.fillStyle = c.close >= c.open ? THEME.bull : THEME.bear;
    ctx.fillRect(xFor(i) - barW / 2, top, barW, Math.max(0, plot.bottom - top));
  });

  return toPng(frame);
}

/**
 * Line chart over a shared time axis. Undefined values leave gaps.
 */
export function renderLineChart(
  title: string,
  timestamps: ReadonlyArray<number>,
  lines: LineSpec[],
  size: ChartSize,
  format?: (value: number) => string
): Buffer {
  if (timestamps.length === 0) throw new Error(`${title}: no data to plot`);

  const range = paddedRange(lines.flatMap(l => [...l.values]));
  if (!range) throw new Error(`${title}: no finite values to plot`);

  const frame = createChartFrame(title, size);
  const yFor = drawValueAxis(frame, range.min, range.max, format);
  const xFor = drawCategoryAxis(frame, timestamps.length, i => formatDateLabel(timestamps[i]));

  const legend: LegendEntry[] = lines.map((line, i) => ({
    label: line.label,
    color: line.color ?? THEME.palette[i % THEME.palette.length],
  }));
  lines.forEach((line, i) => drawPolyline(frame, line.values, xFor, yFor, legend[i].color));
  drawLegend(frame, legend);

  return toPng(frame);
}

/** RdBu reversed: -1 blue, 0 near white, +1 red. */
export function correlationColor(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) return "#555555";
  const blue = [33, 102, 172];
  const white = [247, 247, 247];
  const red = [178, 24, 43];
  const t = Math.max(-1, Math.min(1, value));
  const target = t < 0 ? blue : red;
  const k = Math.abs(t);
  const rgb = white.map((c, i) => Math.round(c + (target[i] - c) * k));
  return `rgb(${rgb[0]}, ${rgb[1]}, ${rgb[2]})`;
}

export function renderCorrelationHeatmap(matrix: CorrelationMatrix, size: ChartSize): Buffer {
  const n = matrix.tickers.length;
  if (n === 0) throw new Error("Correlation matrix is empty, nothing to plot");

  const frame = createChartFrame("Correlation matrix", size);
  const { ctx, plot } = frame;
  const cell = Math.min(plot.width / n, plot.height / n);

  ctx.font = "12px Arial";
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      const value = matrix.values[i][j];
      const x = plot.left + j * cell;
      const y = plot.top + i * cell;
      ctx.fillStyle = correlationColor(value);
      ctx.fillRect(x, y, cell, cell);
      ctx.strokeStyle = THEME.background;
      ctx.strokeRect(x, y, cell, cell);

      const label = value === undefined ? "n/a" : value.toFixed(2);
      const w = ctx.measureText(label).width;
      ctx.fillStyle = value !== undefined && Math.abs(value) > 0.5 ? "#ffffff" : "#111111";
      ctx.fillText(label, x + cell / 2 - w / 2, y + cell / 2 + 4);
    }

    const ticker = matrix.tickers[i];
    const w = ctx.measureText(ticker).width;
    ctx.fillStyle = THEME.text;
    ctx.fillText(ticker, plot.left - 10 - w, plot.top + i * cell + cell / 2 + 4);
    ctx.fillText(ticker, plot.left + i * cell + cell / 2 - w / 2, plot.top + n * cell + 20);
  }

  return toPng(frame);
}

export function formatCompact(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1e12) return `${(value / 1e12).toFixed(1)}T`;
  if (abs >= 1e9) return `${(value / 1e9).toFixed(1)}B`;
  if (abs >= 1e6) return `${(value / 1e6).toFixed(1)}M`;
  if (abs >= 1e3) return `${(value / 1e3).toFixed(1)}K`;
  return value.toFixed(0);
}
