import { MarketProviderId } from "../config/config";
import { DateRange } from "../types";
import { ConfigError } from "./errors";

export type CliCommand = "analyze" | "dcf" | "help";

export interface CliOptions {
  command: CliCommand;
  ticker?: string;
  start?: string;
  end?: string;
  shortWindow?: number;
  longWindow?: number;
  provider?: MarketProviderId;
  portfolio?: string[];
  growthPercent?: number;
  discountPercent?: number;
  terminalPercent?: number;
  years?: number;
  noLlm: boolean;
}

function toNumber(map: Record<string, string | boolean>, key: string): number | undefined {
  const value = map[key];
  if (value === undefined) return undefined;
  const n = typeof value === "string" && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    throw new ConfigError(`--${key} must be a number, got ${value === true ? "no value" : `"${value}"`}`);
  }
  return n;
}

function toText(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function toProvider(value: string | boolean | undefined): MarketProviderId | undefined {
  const text = toText(value)?.toLowerCase();
  if (text === "yahoo" || text === "exchange" || text === "csv") return text;
  if (text !== undefined) {
    throw new Error(`Unknown --provider "${text}" (expected yahoo, exchange or csv)`);
  }
  return undefined;
}

/**
 * `<command> --key value --flag` style arguments. The first bare word is
 * the command; a flag followed by another flag (or nothing) is boolean.
 */
export function parseArgs(argv: string[]): CliOptions {
  const map: Record<string, string | boolean> = {};
  let command: CliCommand | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) {
      if (command === undefined) {
        if (a !== "analyze" && a !== "dcf" && a !== "help") {
          throw new Error(`Unknown command "${a}" (expected analyze or dcf)`);
        }
        command = a;
      }
      continue;
    }
    const key = a.slice(2);
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      map[key] = next;
      i++;
    } else {
      map[key] = true;
    }
  }

  const portfolio = toText(map["portfolio"])
    ?.split(",")
    .map(t => t.trim().toUpperCase())
    .filter(Boolean);

  return {
    command: command ?? (map["help"] ? "help" : "analyze"),
    ticker: toText(map["ticker"])?.toUpperCase(),
    start: toText(map["start"]),
    end: toText(map["end"]),
    shortWindow: toNumber(map, "short"),
    longWindow: toNumber(map, "long"),
    provider: toProvider(map["provider"]),
    portfolio,
    growthPercent: toNumber(map, "growth"),
    discountPercent: toNumber(map, "discount"),
    terminalPercent: toNumber(map, "terminal"),
    years: toNumber(map, "years"),
    noLlm: Boolean(map["no-llm"]),
  };
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function parseDay(label: string, text: string): Date {
  const ms = DATE_PATTERN.test(text) ? Date.parse(`${text}T00:00:00Z`) : NaN;
  if (!Number.isFinite(ms)) {
    throw new ConfigError(`${label} must be YYYY-MM-DD, got "${text}"`);
  }
  return new Date(ms);
}

/**
 * Start and end days (UTC midnight, both inclusive). An empty end means
 * `now`.
 */
export function resolveDateRange(start: string, end: string, now: Date = new Date()): DateRange {
  const range = {
    start: parseDay("start date", start),
    end: end.trim() ? parseDay("end date", end.trim()) : now,
  };
  if (range.start.getTime() > range.end.getTime()) {
    throw new ConfigError(`start date ${start} is after end date ${end || "today"}`);
  }
  return range;
}

export const USAGE = `Usage: stock-signal-lab <command> [options]

Commands:
  analyze   Moving-average crossover signals, charts and report
  dcf       Discounted cash flow valuation with AI commentary

Options (override config.toml):
  --ticker <SYMBOL>         Ticker to analyze or value
  --provider <id>           yahoo | exchange | csv
  --start <YYYY-MM-DD>      First day of history (analyze)
  --end <YYYY-MM-DD>        Last day of history, inclusive (analyze)
  --short <n>               Short moving-average window (analyze)
  --long <n>                Long moving-average window (analyze)
  --portfolio <A,B,C>       Tickers for the correlation heatmap (analyze)
  --growth <pct>            Revenue growth rate in percent (dcf)
  --discount <pct>          Discount rate in percent (dcf)
  --terminal <pct>          Terminal growth rate in percent (dcf)
  --years <n>               Projection years (dcf)
  --no-llm                  Skip the AI commentary (dcf)
`;
