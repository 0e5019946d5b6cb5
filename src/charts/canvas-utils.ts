import { Canvas, SKRSContext2D, createCanvas } from "@napi-rs/canvas";

export const THEME = {
  background: "#111111",
  plotBackground: "#1b1f24",
  grid: "#283442",
  gridMinor: "#1f2933",
  axis: "#506784",
  text: "#f2f5fa",
  mutedText: "#a2b1c6",
  bull: "#26a69a",
  bear: "#ef5350",
  buy: "#00c853",
  sell: "#ff1744",
  palette: ["#636efa", "#ffa15a", "#00cc96", "#ab63fa", "#ef553b", "#19d3f3", "#ff6692"],
};

export interface ChartSize {
  width: number;
  height: number;
}

export interface PlotArea {
  left: number;
  top: number;
  right: number;
  bottom: number;
  width: number;
  height: number;
}

export interface ChartFrame {
  canvas: Canvas;
  ctx: SKRSContext2D;
  plot: PlotArea;
  size: ChartSize;
}

export interface LegendEntry {
  label: string;
  color: string;
}

export function getNiceStep(min: number, max: number, tickCount: number): number {
  const range = Math.max(0, max - min);
  if (range === 0) return 1;
  const rough = range / Math.max(1, tickCount - 1);
  const exponent = Math.floor(Math.log10(rough));
  const base = Math.pow(10, exponent);
  const fraction = rough / base;

  let niceFraction = 1;
  if (fraction <= 1) niceFraction = 1;
  else if (fraction <= 2) niceFraction = 2;
  else if (fraction <= 5) niceFraction = 5;
  else niceFraction = 10;

  return niceFraction * base;
}

export function inferDecimals(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 2;
  if (step >= 1) return 2;
  const decimals = Math.ceil(-Math.log10(step)) + 1;
  return Math.min(8, Math.max(2, decimals));
}

/** UTC calendar date, e.g. 2024-01-05 */
export function formatDateLabel(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}

/**
 * Min/max of the finite values with a 6% margin; a flat range is widened
 * by 1% so the scale never divides by zero.
 */
export function paddedRange(
  values: ReadonlyArray<number | undefined>
): { min: number; max: number } | undefined {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v === undefined || !Number.isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (!Number.isFinite(min) || !Number.isFinite(max)) return undefined;

  if (min === max) {
    const pad = min === 0 ? 1 : Math.abs(min) * 0.01;
    return { min: min - pad, max: max + pad };
  }
  const pad = (max - min) * 0.06;
  return { min: min - pad, max: max + pad };
}

export function createChartFrame(title: string, size: ChartSize, subtitle?: string): ChartFrame {
  const canvas = createCanvas(size.width, size.height);
  const ctx = canvas.getContext("2d");

  ctx.fillStyle = THEME.background;
  ctx.fillRect(0, 0, size.width, size.height);

  const margin = { left: 110, right: 40, top: 70, bottom: 80 };
  const plot: PlotArea = {
    left: margin.left,
    top: margin.top,
    right: size.width - margin.right,
    bottom: size.height - margin.bottom,
    width: size.width - margin.left - margin.right,
    height: size.height - margin.top - margin.bottom,
  };

  ctx.fillStyle = THEME.plotBackground;
  ctx.fillRect(plot.left, plot.top, plot.width, plot.height);

  ctx.fillStyle = THEME.text;
  ctx.font = "bold 18px Arial";
  ctx.fillText(title, plot.left, 30);
  if (subtitle) {
    ctx.font = "12px Arial";
    ctx.fillStyle = THEME.mutedText;
    ctx.fillText(subtitle, plot.left, 50);
  }

  return { canvas, ctx, plot, size };
}

/**
 * Draws horizontal grid lines with labels on the left and returns the
 * value-to-pixel mapping.
 */
export function drawValueAxis(
  frame: ChartFrame,
  minY: number,
  maxY: number,
  format?: (value: number) => string
): (value: number) => number {
  const { ctx, plot } = frame;
  const yFor = (value: number) => plot.top + ((maxY - value) / (maxY - minY)) * plot.height;

  const tickCount = Math.max(5, Math.min(12, Math.round(plot.height / 60) + 1));
  const step = getNiceStep(minY, maxY, tickCount);
  const decimals = inferDecimals(step);
  const start = Math.ceil(minY / step) * step;

  ctx.font = "12px Arial";
  ctx.lineWidth = 1;
  for (let v = start; v <= maxY + step * 1e-9; v += step) {
    const y = yFor(v);
    ctx.strokeStyle = THEME.grid;
    ctx.beginPath();
    ctx.moveTo(plot.left, y);
    ctx.lineTo(plot.right, y);
    ctx.stroke();

    const label = format ? format(v) : v.toFixed(decimals);
    const textW = ctx.measureText(label).width;
    ctx.fillStyle = THEME.mutedText;
    ctx.fillText(label, plot.left - 10 - textW, y + 4);
  }

  ctx.strokeStyle = THEME.axis;
  ctx.strokeRect(plot.left, plot.top, plot.width, plot.height);

  return yFor;
}

/**
 * Spreads `count` slots evenly across the plot, labels roughly every
 * 120px with `labelFor`, and returns the slot-centre mapping.
 */
export function drawCategoryAxis(
  frame: ChartFrame,
  count: number,
  labelFor: (index: number) => string
): (index: number) => number {
  const { ctx, plot } = frame;
  const slot = plot.width / Math.max(1, count);
  const xFor = (index: number) => plot.left + slot * (index + 0.5);

  const labelEvery = Math.max(1, Math.ceil(120 / slot));
  ctx.font = "12px Arial";
  for (let i = 0; i < count; i++) {
    if (i % labelEvery !== 0 && i !== count - 1) continue;
    const x = xFor(i);

    ctx.strokeStyle = THEME.gridMinor;
    ctx.lineWidth = 1;
    ctx.beginPath();
    ctx.moveTo(x, plot.top);
    ctx.lineTo(x, plot.bottom);
    ctx.stroke();

    const label = labelFor(i);
    const w = ctx.measureText(label).width;
    const xText = Math.max(0, Math.min(frame.size.width - w, x - w / 2));
    ctx.fillStyle = THEME.mutedText;
    ctx.fillText(label, xText, plot.bottom + 20);
  }

  return xFor;
}

export function drawPolyline(
  frame: ChartFrame,
  values: ReadonlyArray<number | undefined>,
  xFor: (index: number) => number,
  yFor: (value: number) => number,
  color: string,
  lineWidth = 1.5
) {
  const { ctx } = frame;
  ctx.strokeStyle = color;
  ctx.lineWidth = lineWidth;
  ctx.beginPath();
  let started = false;
  values.forEach((value, i) => {
    // Gaps break the line instead of bridging them
    if (value === undefined || !Number.isFinite(value)) {
      started = false;
      return;
    }
    const x = xFor(i);
    const y = yFor(value);
    if (!started) {
      ctx.moveTo(x, y);
      started = true;
    } else {
      ctx.lineTo(x, y);
    }
  });
  ctx.stroke();
}

export function drawLegend(frame: ChartFrame, entries: LegendEntry[]) {
  const { ctx, plot } = frame;
  ctx.font = "12px Arial";
  let x = plot.right;
  const y = plot.top - 14;
  for (let i = entries.length - 1; i >= 0; i--) {
    const { label, color } = entries[i];
    const w = ctx.measureText(label).width;
    x -= w;
    ctx.fillStyle = THEME.text;
    ctx.fillText(label, x, y + 4);
    x -= 18;
    ctx.fillStyle = color;
    ctx.fillRect(x, y - 4, 12, 8);
    x -= 20;
  }
}

export function toPng(frame: ChartFrame): Buffer {
  return frame.canvas.toBuffer("image/png");
}
