export type Measure = 'sales' | 'profit' | 'quantity';

export type Dimension = 'category' | 'subCategory' | 'segment' | 'shipMode' | 'state';

export type ExportDimension = Dimension | 'month';

export type YearSelection = 'all' | number;

export interface BreakdownEntry {
  key: string;
  value: number;
}

export interface MeasureAggregate {
  total: number;
  monthly: BreakdownEntry[];
  byCategory: BreakdownEntry[];
  bySubCategory: BreakdownEntry[];
  bySegment: BreakdownEntry[];
  byShipMode: BreakdownEntry[];
  byState: BreakdownEntry[];
}

export type DashboardMetrics = Record<Measure, MeasureAggregate>;

export interface DashboardResponse {
  year: YearSelection;
  years: number[];
  recordCount: number;
  skippedRows: number;
  metrics: DashboardMetrics;
}
