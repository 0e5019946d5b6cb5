import * as path from "path";
import { DateRange, PriceSeries } from "../types";
import { UpstreamDataError } from "../utils/errors";
import { DataLoader } from "./data-loader";
import { MarketDataProvider, normalizeSeries } from "./provider";

/**
 * Offline provider: one `<TICKER>.csv` per ticker in a directory.
 */
export class CsvDataProvider implements MarketDataProvider {
  public readonly id = "csv";

  constructor(private readonly dataDir: string) {}

  public filePathFor(ticker: string): string {
    const safe = ticker.replace(/[\\/:*?"<>|]+/g, "_");
    return path.resolve(this.dataDir, `${safe}.csv`);
  }

  public async fetchPriceSeries(ticker: string, range: DateRange): Promise<PriceSeries> {
    try {
      const points = await DataLoader.loadCSV(this.filePathFor(ticker));
      return normalizeSeries(points, range);
    } catch (error) {
      throw new UpstreamDataError(
        this.id,
        `failed to load ${ticker}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
