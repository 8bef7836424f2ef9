import type { Measure } from '../types/dashboard';

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  maximumFractionDigits: 0
});

const countFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

const compactFormatter = new Intl.NumberFormat('en-US', {
  notation: 'compact',
  maximumFractionDigits: 1
});

export const formatMeasureValue = (value: number, measure: Measure) =>
  measure === 'quantity' ? countFormatter.format(value) : currencyFormatter.format(value);

// Axis labels need to stay short.
export const formatAxisValue = (value: number, measure: Measure) => {
  const compact = compactFormatter.format(Math.abs(value));
  const sign = value < 0 ? '-' : '';
  return measure === 'quantity' ? `${sign}${compact}` : `${sign}$${compact}`;
};

const monthFormatter = new Intl.DateTimeFormat('en', {
  month: 'short',
  year: 'numeric',
  timeZone: 'UTC'
});

export const formatMonthLabel = (monthKey: string) => {
  const match = /^(\d{4})-(\d{2})$/.exec(monthKey);
  if (!match) {
    return monthKey;
  }
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    return monthKey;
  }
  return monthFormatter.format(new Date(Date.UTC(Number(match[1]), month - 1, 1)));
};
