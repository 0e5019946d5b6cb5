import dotenv from "dotenv";
import fs from "fs";
import toml from "@iarna/toml";
import path from "path";
import { logger } from "../utils/logger";
import { ConfigError, formatError, isRecord } from "../utils/errors";

// Load environment variables immediately
dotenv.config();

export type MarketProviderId = "yahoo" | "exchange" | "csv";

export interface MarketConfig {
  provider: MarketProviderId;
  csvDir: string;
  exchangeId: string;
}

export interface AnalyzerConfig {
  ticker: string;
  startDate: string;
  endDate: string;
  shortWindow: number;
  longWindow: number;
  extraMovingAverages: number[];
  portfolio: string[];
  asciiChartBars: number;
  asciiChartHeight: number;
}

export interface ValuationConfig {
  ticker: string;
  growthRatePercent: number;
  discountRatePercent: number;
  terminalGrowthRatePercent: number;
  projectionYears: number;
  fallbackFreeCashFlow: number;
  fallbackSharesOutstanding: number;
}

export interface LlmConfig {
  provider: string;
  apiKey: string;
  baseUrl: string;
  model: string;
  logInteractions: boolean;
  timeoutMs: number;
  maxRetries: number;
}

export interface OutputConfig {
  dir: string;
  chartWidth: number;
  chartHeight: number;
}

export interface AppConfig {
  market: MarketConfig;
  analyzer: AnalyzerConfig;
  valuation: ValuationConfig;
  llm: LlmConfig;
  output: OutputConfig;
}

type Section = Record<string, unknown>;

function section(root: Section, name: string): Section {
  const value = root[name];
  return isRecord(value) ? value : {};
}

function readString(sec: Section, key: string, fallback: string): string {
  const value = sec[key];
  return typeof value === "string" ? value : fallback;
}

function readBoolean(sec: Section, key: string, fallback: boolean): boolean {
  const value = sec[key];
  return typeof value === "boolean" ? value : fallback;
}

function readNumber(sec: Section, key: string, fallback: number): number {
  const value = sec[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Reads a number and checks it against an inclusive range; anything outside
 * is reported and replaced by the default.
 */
function readBounded(
  sec: Section,
  key: string,
  fallback: number,
  min: number,
  max: number,
  integer = false
): number {
  const value = readNumber(sec, key, fallback);
  if (value < min || value > max || (integer && !Number.isInteger(value))) {
    logger.warn(
      `Warning: ${key} = ${value} is outside [${min}, ${max}], falling back to ${fallback}`
    );
    return fallback;
  }
  return value;
}

function readNumberList(sec: Section, key: string, fallback: number[]): number[] {
  const value = sec[key];
  if (!Array.isArray(value)) return fallback;
  return value.filter(
    (v): v is number => typeof v === "number" && Number.isInteger(v) && v > 0
  );
}

function readStringList(sec: Section, key: string, fallback: string[]): string[] {
  const value = sec[key];
  if (!Array.isArray(value)) return fallback;
  return value
    .filter((v): v is string => typeof v === "string")
    .map(v => v.trim().toUpperCase())
    .filter(Boolean);
}

function resolveMarketProvider(raw: string): MarketProviderId {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "yahoo" || normalized === "exchange" || normalized === "csv") {
    return normalized;
  }
  logger.warn(`Warning: unknown market provider "${raw}", using yahoo`);
  return "yahoo";
}

const DEFAULT_BASE_URLS: Record<string, string> = {
  groq: "https://api.groq.com/openai/v1",
  openai: "https://api.openai.com/v1",
  deepseek: "https://api.deepseek.com/v1",
};

/**
 * Builds the application config from TOML text and environment variables.
 * Every setting has a default, so an empty document is valid.
 */
export function parseAppConfig(
  tomlText: string,
  env: NodeJS.ProcessEnv
): AppConfig {
  let root: Section;
  try {
    root = toml.parse(tomlText);
  } catch (error) {
    throw new ConfigError(`config.toml is not valid TOML: ${formatError(error)}`);
  }

  const market = section(root, "market");
  const analyzer = section(root, "analyzer");
  const valuation = section(root, "valuation");
  const llm = section(root, "llm");
  const output = section(root, "output");

  const shortWindow = readBounded(analyzer, "short_window", 20, 5, 50, true);
  let longWindow = readBounded(analyzer, "long_window", 50, 30, 200, true);
  if (longWindow < shortWindow) {
    logger.warn(
      `Warning: long_window ${longWindow} is shorter than short_window ${shortWindow}, falling back to 50`
    );
    longWindow = Math.max(50, shortWindow);
  }

  const llmProvider = (env.LLM_PROVIDER || "groq").trim().toLowerCase();

  return {
    market: {
      provider: resolveMarketProvider(
        env.MARKET_PROVIDER || readString(market, "provider", "yahoo")
      ),
      csvDir: readString(market, "csv_dir", "data"),
      exchangeId: env.EXCHANGE_ID || readString(market, "exchange_id", "binance"),
    },
    analyzer: {
      ticker: readString(analyzer, "ticker", "AAPL").trim().toUpperCase(),
      startDate: readString(analyzer, "start_date", "2020-01-01"),
      endDate: readString(analyzer, "end_date", ""),
      shortWindow,
      longWindow,
      extraMovingAverages: readNumberList(analyzer, "extra_moving_averages", [20, 50]),
      portfolio: readStringList(analyzer, "portfolio", []),
      asciiChartBars: readBounded(analyzer, "ascii_chart_bars", 60, 10, 500, true),
      asciiChartHeight: readBounded(analyzer, "ascii_chart_height", 20, 5, 80, true),
    },
    valuation: {
      ticker: readString(valuation, "ticker", "AAPL").trim().toUpperCase(),
      growthRatePercent: readBounded(valuation, "growth_rate_percent", 5, 0, 20),
      discountRatePercent: readBounded(valuation, "discount_rate_percent", 10, 1, 15),
      terminalGrowthRatePercent: readBounded(
        valuation,
        "terminal_growth_rate_percent",
        2,
        0,
        5
      ),
      projectionYears: readBounded(valuation, "projection_years", 5, 1, 10, true),
      fallbackFreeCashFlow: readNumber(valuation, "fallback_free_cash_flow", 1_000_000_000),
      fallbackSharesOutstanding: readNumber(
        valuation,
        "fallback_shares_outstanding",
        1_000_000_000
      ),
    },
    llm: {
      provider: llmProvider,
      apiKey: env.LLM_API_KEY || env.GROQ_API_KEY || "",
      baseUrl:
        env.LLM_BASE_URL || DEFAULT_BASE_URLS[llmProvider] || DEFAULT_BASE_URLS.groq,
      model: env.LLM_MODEL || "llama-3.1-8b-instant",
      logInteractions: readBoolean(llm, "log_interactions", false),
      timeoutMs: readBounded(llm, "timeout_ms", 30000, 1000, 600000, true),
      maxRetries: readBounded(llm, "max_retries", 1, 0, 10, true),
    },
    output: {
      dir: readString(output, "dir", "output"),
      chartWidth: readBounded(output, "chart_width", 1600, 400, 4000, true),
      chartHeight: readBounded(output, "chart_height", 900, 300, 3000, true),
    },
  };
}

export class ConfigLoader {
  private static instance: AppConfig | undefined;

  private constructor() {}

  public static getInstance(): AppConfig {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = ConfigLoader.loadConfig();
    }
    return ConfigLoader.instance;
  }

  private static loadConfig(): AppConfig {
    const configPath = path.resolve(
      process.env.CONFIG_PATH || path.join(process.cwd(), "config.toml")
    );

    let fileContent = "";
    if (fs.existsSync(configPath)) {
      fileContent = fs.readFileSync(configPath, "utf-8");
    } else {
      logger.warn(`Warning: ${configPath} not found, using built-in defaults`);
    }

    return parseAppConfig(fileContent, process.env);
  }
}
