import { groupBreakdown, monthlySeries, topN, total } from './aggregation.js';
import type { DashboardPayload, Measure, MeasureAggregate, SalesRecord } from './dashboard.types.js';

export interface AssembleOptions {
  topStates: number;
}

const aggregateMeasure = (
  records: readonly SalesRecord[],
  measure: Measure,
  options: AssembleOptions
): MeasureAggregate => ({
  total: total(records, measure),
  monthly: monthlySeries(records, measure),
  byCategory: groupBreakdown(records, 'category', measure),
  bySubCategory: groupBreakdown(records, 'subCategory', measure),
  bySegment: groupBreakdown(records, 'segment', measure),
  byShipMode: groupBreakdown(records, 'shipMode', measure),
  byState: topN(groupBreakdown(records, 'state', measure), options.topStates)
});

export const assembleDashboard = (records: readonly SalesRecord[], options: AssembleOptions): DashboardPayload => ({
  sales: aggregateMeasure(records, 'sales', options),
  profit: aggregateMeasure(records, 'profit', options),
  quantity: aggregateMeasure(records, 'quantity', options)
});
