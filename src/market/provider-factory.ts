import { MarketConfig } from "../config/config";
import { CsvDataProvider } from "./csv-provider";
import { ExchangeManager } from "./exchange-manager";
import { ExchangeDataProvider } from "./manager";
import { MarketDataProvider } from "./provider";
import { YahooFinanceProvider } from "./yahoo-provider";

export function createMarketDataProvider(config: MarketConfig): MarketDataProvider {
  switch (config.provider) {
    case "exchange":
      return new ExchangeDataProvider(new ExchangeManager(config.exchangeId).getExchange());
    case "csv":
      return new CsvDataProvider(config.csvDir);
    case "yahoo":
    default:
      return new YahooFinanceProvider();
  }
}
