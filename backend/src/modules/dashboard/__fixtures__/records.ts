import type { SalesRecord } from '../dashboard.types.js';

export const makeRecord = (overrides: Partial<SalesRecord> = {}): SalesRecord => {
  const orderDate = overrides.orderDate ?? '2022-01-05';
  return {
    orderDate,
    year: Number(orderDate.slice(0, 4)),
    monthKey: orderDate.slice(0, 7),
    shipMode: 'Standard Class',
    segment: 'Consumer',
    state: 'Texas',
    region: 'Central',
    category: 'Tech',
    subCategory: 'Phones',
    sales: 0,
    profit: 0,
    quantity: 0,
    ...overrides
  };
};
