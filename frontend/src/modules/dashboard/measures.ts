import type { Dimension, Measure, MeasureAggregate } from './types/dashboard';

export const MEASURE_ORDER: Measure[] = ['sales', 'profit', 'quantity'];

export const MEASURE_LABELS: Record<Measure, string> = {
  sales: 'Sales',
  profit: 'Profit',
  quantity: 'Quantity'
};

type BreakdownField = Exclude<keyof MeasureAggregate, 'total' | 'monthly'>;

export interface BreakdownConfig {
  dimension: Dimension;
  field: BreakdownField;
  title: string;
}

export const BREAKDOWNS: BreakdownConfig[] = [
  { dimension: 'category', field: 'byCategory', title: 'By category' },
  { dimension: 'subCategory', field: 'bySubCategory', title: 'By sub-category' },
  { dimension: 'segment', field: 'bySegment', title: 'By segment' },
  { dimension: 'shipMode', field: 'byShipMode', title: 'By ship mode' },
  { dimension: 'state', field: 'byState', title: 'Top states' }
];
