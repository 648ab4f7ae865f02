const usd = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const count = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** `$1,234.56`, or `-$1,234.56` for negatives. */
export function formatUsd(value: number): string {
  return value < 0 ? `-$${usd.format(-value)}` : `$${usd.format(value)}`;
}

export function formatPrice(value: number | null): string {
  return value === null ? 'N/A' : value.toFixed(2);
}

export function formatCount(value: number | null): string {
  return value === null ? 'N/A' : count.format(value);
}
