import { describe, expect, it } from 'vitest';
import { groupBreakdown, monthlySeries, topN, total } from './aggregation.js';
import { makeRecord } from './__fixtures__/records.js';

const scenario = [
  makeRecord({ orderDate: '2022-01-05', sales: 100 }),
  makeRecord({ orderDate: '2022-02-10', sales: 50 }),
  makeRecord({ orderDate: '2023-01-20', sales: 200 })
];

describe('total', () => {
  it('sums the measure across records', () => {
    expect(total(scenario, 'sales')).toBe(350);
  });

  it('is zero for no records', () => {
    expect(total([], 'profit')).toBe(0);
  });

  it('handles negative values', () => {
    const records = [makeRecord({ profit: 30 }), makeRecord({ profit: -45 })];
    expect(total(records, 'profit')).toBe(-15);
  });
});

describe('monthlySeries', () => {
  it('returns month buckets in chronological order', () => {
    const records = [
      makeRecord({ orderDate: '2023-01-20', sales: 200 }),
      makeRecord({ orderDate: '2022-11-02', sales: 5 }),
      makeRecord({ orderDate: '2022-02-10', sales: 50 }),
      makeRecord({ orderDate: '2022-11-20', sales: 7 })
    ];

    const series = monthlySeries(records, 'sales');

    expect(series).toEqual([
      { key: '2022-02', value: 50 },
      { key: '2022-11', value: 12 },
      { key: '2023-01', value: 200 }
    ]);
    const keys = series.map((entry) => entry.key);
    expect([...keys].sort()).toEqual(keys);
  });
});

describe('groupBreakdown', () => {
  it('sums per dimension value', () => {
    expect(groupBreakdown(scenario, 'category', 'sales')).toEqual([{ key: 'Tech', value: 350 }]);
  });

  it('orders by value descending and keeps discovery order on ties', () => {
    const records = [
      makeRecord({ shipMode: 'Second Class', quantity: 3 }),
      makeRecord({ shipMode: 'First Class', quantity: 5 }),
      makeRecord({ shipMode: 'Same Day', quantity: 3 }),
      makeRecord({ shipMode: 'Standard Class', quantity: 9 })
    ];

    expect(groupBreakdown(records, 'shipMode', 'quantity')).toEqual([
      { key: 'Standard Class', value: 9 },
      { key: 'First Class', value: 5 },
      { key: 'Second Class', value: 3 },
      { key: 'Same Day', value: 3 }
    ]);
  });

  it('groups empty values under Unknown', () => {
    const records = [
      makeRecord({ segment: '', sales: 10 }),
      makeRecord({ segment: 'Corporate', sales: 4 }),
      makeRecord({ segment: '', sales: 1 })
    ];

    expect(groupBreakdown(records, 'segment', 'sales')).toEqual([
      { key: 'Unknown', value: 11 },
      { key: 'Corporate', value: 4 }
    ]);
  });

  it('produces non-increasing values', () => {
    const records = ['A', 'B', 'C', 'A', 'D', 'B'].map((subCategory, index) =>
      makeRecord({ subCategory, profit: (index % 3) * 7 - 4 })
    );
    const values = groupBreakdown(records, 'subCategory', 'profit').map((entry) => entry.value);
    for (let index = 1; index < values.length; index += 1) {
      expect(values[index]).toBeLessThanOrEqual(values[index - 1]);
    }
  });
});

describe('topN', () => {
  const breakdown = [
    { key: 'a', value: 9 },
    { key: 'b', value: 6 },
    { key: 'c', value: 2 }
  ];

  it('keeps the leading entries in order', () => {
    expect(topN(breakdown, 2)).toEqual([
      { key: 'a', value: 9 },
      { key: 'b', value: 6 }
    ]);
  });

  it('returns short breakdowns unchanged', () => {
    expect(topN(breakdown, 3)).toEqual(breakdown);
    expect(topN(breakdown, 15)).toEqual(breakdown);
  });

  it('returns nothing for a non-positive limit', () => {
    expect(topN(breakdown, 0)).toEqual([]);
  });

  it('keeps the fifteen largest of twenty states', () => {
    const records = Array.from({ length: 20 }, (_, index) =>
      makeRecord({ state: `State ${String(index + 1).padStart(2, '0')}`, sales: (index + 1) * 10 })
    );

    const top = topN(groupBreakdown(records, 'state', 'sales'), 15);

    expect(top).toHaveLength(15);
    expect(top[0]).toEqual({ key: 'State 20', value: 200 });
    expect(top[14]).toEqual({ key: 'State 06', value: 60 });
    expect(top.map((entry) => entry.value)).toEqual([200, 190, 180, 170, 160, 150, 140, 130, 120, 110, 100, 90, 80, 70, 60]);
  });
});
