import { PriceSeries, SignalResult } from "../types";

export class ChartUtils {
  /**
   * Renders recent closes and both moving averages as an ASCII chart for
   * the terminal.
   *
   * Legend: `o` close, `.` short MA, `:` long MA. A final row marks
   * crossings with `^` (buy) and `v` (sell) under the bar they happened on.
   *
   * @param height Height of the plot in lines
   * @param limit Number of recent bars to show
   */
  public static generateSignalChart(
    series: PriceSeries,
    signals: SignalResult,
    height: number = 20,
    limit: number = 60
  ): string {
    if (series.length === 0) return "";

    // Slice after the averages were computed on the full history
    const startIndex = Math.max(0, series.length - limit);
    const slicedData = series.slice(startIndex);
    const slicedShort = signals.shortMA.slice(startIndex);
    const slicedLong = signals.longMA.slice(startIndex);

    let minPrice = Number.POSITIVE_INFINITY;
    let maxPrice = Number.NEGATIVE_INFINITY;
    const include = (value: number | undefined) => {
      if (value === undefined) return;
      if (value < minPrice) minPrice = value;
      if (value > maxPrice) maxPrice = value;
    };
    slicedData.forEach(c => include(c.close));
    slicedShort.forEach(include);
    slicedLong.forEach(include);

    const priceRange = maxPrice - minPrice;
    if (priceRange === 0) return "Flat Market";

    const scale = (height - 1) / priceRange;
    const clamp = (val: number) => Math.max(0, Math.min(height - 1, val));
    const rowFor = (price: number) => clamp(Math.round((maxPrice - price) * scale));

    const widthPerCandle = 3;
    const width = slicedData.length * widthPerCandle;
    const grid: string[][] = Array.from({ length: height }, () => Array(width).fill(" "));
    const markers: string[] = Array(width).fill(" ");

    slicedData.forEach((candle, index) => {
      const x = index * widthPerCandle + 1; // Center of the bar

      grid[rowFor(candle.close)][x] = "o";

      // Averages only fill empty cells so the close stays visible
      const shortVal = slicedShort[index];
      if (shortVal !== undefined) {
        const y = rowFor(shortVal);
        if (grid[y][x] === " ") grid[y][x] = ".";
      }
      const longVal = slicedLong[index];
      if (longVal !== undefined) {
        const y = rowFor(longVal);
        if (grid[y][x] === " ") grid[y][x] = ":";
      }
    });

    for (const crossing of signals.crossings) {
      if (crossing.index < startIndex) continue;
      const x = (crossing.index - startIndex) * widthPerCandle + 1;
      markers[x] = crossing.kind === "BuyCrossing" ? "^" : "v";
    }

    const resultLines: string[] = [];
    for (let i = 0; i < height; i++) {
      const price = maxPrice - i / scale;
      const label = price.toFixed(2).padStart(8, " ");
      resultLines.push(`${label} | ${grid[i].join("")}`);
    }
    resultLines.push(`${"".padStart(8, " ")} | ${markers.join("")}`);

    return resultLines.join("\n");
  }
}
