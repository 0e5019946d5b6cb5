import { inspect } from "util";

export type SignalErrorKind = "InvalidWindow" | "InvalidWindowOrder";

export class SignalEngineError extends Error {
  constructor(
    public readonly kind: SignalErrorKind,
    message: string
  ) {
    super(`${kind}: ${message}`);
    this.name = "SignalEngineError";
  }
}

/**
 * Opaque failure from a market data source. The original error is kept on
 * `cause` so the CLI can log the stack.
 */
export class UpstreamDataError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${source}] ${message}`, options);
    this.name = "UpstreamDataError";
  }
}

export class ValuationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValuationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Turns anything thrown into a readable one-line message.
 */
export function formatError(err: unknown): string {
  if (err === null || err === undefined) {
    return "Unknown error";
  }
  if (typeof err === "string") {
    return err;
  }
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (isRecord(err)) {
    for (const key of ["message", "error", "msg", "code"] as const) {
      const value = err[key];
      if (typeof value === "string" && value.length > 0) {
        return value;
      }
    }
  }
  try {
    return JSON.stringify(err);
  } catch {
    return inspect(err, { depth: 5, maxArrayLength: 100 });
  }
}
