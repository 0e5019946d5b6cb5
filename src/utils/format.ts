/** $1,234.57 style; negatives keep the sign after the dollar sign. */
export function formatUsd(value: number | undefined): string {
  if (value === undefined || !Number.isFinite(value)) return "N/A";
  return `$${value.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

/** A fraction as a percentage with two decimals: 0.05 -> "5.00%" */
export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

export function formatPrice(value: number): string {
  return value.toFixed(2);
}

/** UTC calendar date of an epoch-millisecond timestamp */
export function formatDate(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}
