const currencyFormatter = new Intl.NumberFormat('en-GB', {
  style: 'currency',
  currency: 'GBP',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/**
 * Formats an amount as whole pounds, e.g. `£40,000`
 */
export function formatCurrency(value: number): string {
  return currencyFormatter.format(value);
}

/**
 * Formats a fraction as a percentage, e.g. `0.025` becomes `2.5%`
 */
export function formatPercentage(value: number, options: Intl.NumberFormatOptions = {}): string {
  return new Intl.NumberFormat('en-GB', {
    style: 'percent',
    maximumFractionDigits: 2,
    ...options,
  }).format(value);
}
