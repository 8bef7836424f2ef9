import type { SalesRecord, YearSelection } from './dashboard.types.js';

export const filterByYear = (records: readonly SalesRecord[], selection: YearSelection): SalesRecord[] => {
  if (selection === 'all') {
    return [...records];
  }
  return records.filter((record) => record.year === selection);
};

export const availableYears = (records: readonly SalesRecord[]): number[] =>
  Array.from(new Set(records.map((record) => record.year))).sort((a, b) => a - b);
