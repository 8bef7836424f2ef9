export const MEASURES = ['sales', 'profit', 'quantity'] as const;
export type Measure = (typeof MEASURES)[number];

export const DIMENSIONS = ['category', 'subCategory', 'segment', 'shipMode', 'state'] as const;
export type Dimension = (typeof DIMENSIONS)[number];

// Month buckets are exported alongside the categorical dimensions.
export type ExportDimension = Dimension | 'month';

export const UNKNOWN_LABEL = 'Unknown';

export interface SalesRecord {
  orderDate: string;
  year: number;
  monthKey: string;
  shipMode: string;
  segment: string;
  state: string;
  region: string;
  category: string;
  subCategory: string;
  sales: number;
  profit: number;
  quantity: number;
}

export type YearSelection = 'all' | number;

export interface BreakdownEntry {
  key: string;
  value: number;
}

export type Breakdown = BreakdownEntry[];

export interface MeasureAggregate {
  total: number;
  monthly: Breakdown;
  byCategory: Breakdown;
  bySubCategory: Breakdown;
  bySegment: Breakdown;
  byShipMode: Breakdown;
  byState: Breakdown;
}

export type DashboardPayload = Record<Measure, MeasureAggregate>;

export interface LoadedDataset {
  sourcePath: string;
  records: readonly SalesRecord[];
  skippedRows: number;
  loadedAt: string;
}

export interface DashboardResponse {
  year: YearSelection;
  years: number[];
  recordCount: number;
  skippedRows: number;
  metrics: DashboardPayload;
}

export type DatasetErrorCode = 'source-missing' | 'empty-header' | 'missing-column' | 'no-data';

export class DatasetError extends Error {
  constructor(
    public readonly code: DatasetErrorCode,
    message: string,
    public readonly column?: string
  ) {
    super(message);
    this.name = 'DatasetError';
  }
}
