import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { PricePoint } from "../src/types";

export const DAY_MS = 24 * 60 * 60 * 1000;
export const JAN_1_2024 = Date.UTC(2024, 0, 1);

/** One bar per day from `start`; open equals close, high/low bracket it by 1. */
export function makeSeries(closes: number[], start: number = JAN_1_2024): PricePoint[] {
  return closes.map((close, i) => ({
    timestamp: start + i * DAY_MS,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1000 + i,
  }));
}

export function assertClose(actual: number | undefined, expected: number, epsilon = 1e-9) {
  assert.ok(actual !== undefined, `expected ${expected}, got undefined`);
  assert.ok(
    Math.abs(actual - expected) <= epsilon,
    `expected ${expected} (+/-${epsilon}), got ${actual}`
  );
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export function isPng(buffer: Buffer): boolean {
  return buffer.subarray(0, 8).equals(PNG_SIGNATURE);
}
