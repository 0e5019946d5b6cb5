import ccxt, { Exchange } from "ccxt";
import { logger } from "../utils/logger";

type ExchangeConstructor = new (config?: Record<string, unknown>) => Exchange;

export class ExchangeManager {
  private exchange: Exchange;

  constructor(exchangeId: string) {
    // ccxt exposes every exchange class as a property of its default export
    const exchangeClass = (
      ccxt as unknown as Record<string, ExchangeConstructor | undefined>
    )[exchangeId];

    if (typeof exchangeClass !== "function") {
      throw new Error(`Exchange ${exchangeId} not found in CCXT`);
    }

    // Public market data only, no credentials
    this.exchange = new exchangeClass({
      enableRateLimit: true,
    });
    logger.debug(`[ExchangeManager] Created ${exchangeId} client`);
  }

  public getExchange(): Exchange {
    return this.exchange;
  }
}
