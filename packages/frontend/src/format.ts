const COMPACT_USD = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  notation: 'compact',
  maximumFractionDigits: 2,
});

export function formatUsd(value: number): string {
  return COMPACT_USD.format(value);
}

/** Funding amounts are reported in millions of USD. */
export function formatMillions(value: number | null): string {
  return value === null ? 'n/a' : formatUsd(value * 1_000_000);
}
