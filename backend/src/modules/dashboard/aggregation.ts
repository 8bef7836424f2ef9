import { UNKNOWN_LABEL, type Breakdown, type Dimension, type Measure, type SalesRecord } from './dashboard.types.js';

const accumulate = (
  records: readonly SalesRecord[],
  keyOf: (record: SalesRecord) => string,
  measure: Measure
): Map<string, number> => {
  const sums = new Map<string, number>();
  for (const record of records) {
    const key = keyOf(record);
    sums.set(key, (sums.get(key) ?? 0) + record[measure]);
  }
  return sums;
};

const toEntries = (sums: Map<string, number>): Breakdown =>
  Array.from(sums, ([key, value]) => ({ key, value }));

export const total = (records: readonly SalesRecord[], measure: Measure): number =>
  records.reduce((sum, record) => sum + record[measure], 0);

export const monthlySeries = (records: readonly SalesRecord[], measure: Measure): Breakdown =>
  toEntries(accumulate(records, (record) => record.monthKey, measure)).sort((a, b) =>
    a.key < b.key ? -1 : a.key > b.key ? 1 : 0
  );

/**
 * Sums a measure per dimension value, largest first. Array#sort is stable, so equal
 * sums keep the order in which their keys were first seen.
 */
export const groupBreakdown = (
  records: readonly SalesRecord[],
  dimension: Dimension,
  measure: Measure
): Breakdown =>
  toEntries(accumulate(records, (record) => record[dimension] || UNKNOWN_LABEL, measure)).sort(
    (a, b) => b.value - a.value
  );

export const topN = (breakdown: Breakdown, n: number): Breakdown => {
  if (n <= 0) {
    return [];
  }
  return breakdown.length <= n ? breakdown : breakdown.slice(0, n);
};
