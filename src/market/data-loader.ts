import * as fs from "fs";
import { PricePoint } from "../types";
import { logger } from "../utils/logger";

type ColumnMap = {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

// timestamp, open, high, low, close, volume
const DEFAULT_COLUMNS: ColumnMap = {
  timestamp: 0,
  open: 1,
  high: 2,
  low: 3,
  close: 4,
  volume: 5,
};

export class DataLoader {
  public static async loadCSV(filePath: string): Promise<PricePoint[]> {
    logger.info(`[DataLoader] Loading CSV from ${filePath}`);

    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }

    const content = await fs.promises.readFile(filePath, "utf-8");
    const data = this.parseCSV(content);

    logger.info(`[DataLoader] Loaded ${data.length} candles`);
    return data;
  }

  /**
   * Parses OHLCV rows. A first line containing letters is treated as a
   * header and used to locate the columns; without one the default order
   * applies. Timestamps may be epoch milliseconds or date strings.
   */
  public static parseCSV(content: string): PricePoint[] {
    const lines = content.split(/\r?\n/).filter(line => line.trim() !== "");

    let startIndex = 0;
    let idx = DEFAULT_COLUMNS;

    if (lines.length > 0 && /[a-zA-Z]/.test(lines[0])) {
      startIndex = 1;
      const headerLine = lines[0]
        .toLowerCase()
        .split(",")
        .map(c => c.trim());

      // Exact names first: "open_time" contains "open", "adj close" contains "close"
      const findCol = (names: string[]) => {
        const exact = headerLine.findIndex(h => names.includes(h));
        if (exact !== -1) return exact;
        return headerLine.findIndex(h => names.some(n => h.includes(n)));
      };

      const tsIndex = findCol(["timestamp", "open_time", "time", "date"]);
      const closeIndex = findCol(["close"]);

      // Only override if we found at least the critical columns
      if (tsIndex !== -1 && closeIndex !== -1) {
        const openIndex = findCol(["open"]);
        const highIndex = findCol(["high"]);
        const lowIndex = findCol(["low"]);
        const volIndex = findCol(["volume", "vol"]);
        idx = {
          timestamp: tsIndex,
          open: openIndex !== -1 ? openIndex : closeIndex,
          high: highIndex !== -1 ? highIndex : closeIndex,
          low: lowIndex !== -1 ? lowIndex : closeIndex,
          close: closeIndex,
          volume: volIndex !== -1 ? volIndex : -1,
        };
        logger.debug(`[DataLoader] Detected CSV Header. Mapping: ${JSON.stringify(idx)}`);
      }
    }

    const byTimestamp = new Map<number, PricePoint>();

    for (let i = startIndex; i < lines.length; i++) {
      const parts = lines[i].split(",").map(p => p.trim());

      const getVal = (index: number) => {
        if (index < 0 || index >= parts.length) return NaN;
        return parseFloat(parts[index]);
      };

      // "2024-01-05" parses as 2024 with parseFloat, so only accept pure numbers
      const rawTs = parts[idx.timestamp] ?? "";
      let timestamp = /^\d+(\.\d+)?$/.test(rawTs) ? Number(rawTs) : Date.parse(rawTs);

      const close = getVal(idx.close);
      if (isNaN(timestamp) || isNaN(close)) continue;
      timestamp = Math.floor(timestamp);

      const open = getVal(idx.open);
      const high = getVal(idx.high);
      const low = getVal(idx.low);
      const volume = getVal(idx.volume);

      // Later rows win on duplicate timestamps
      byTimestamp.set(timestamp, {
        timestamp,
        open: isNaN(open) ? close : open,
        high: isNaN(high) ? close : high,
        low: isNaN(low) ? close : low,
        close,
        volume: isNaN(volume) ? 0 : volume,
      });
    }

    return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
  }
}
