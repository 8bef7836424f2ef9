import { parseOrderDate, toIsoDay, toMonthKey } from './dateParsing.js';
import { DatasetError, type SalesRecord } from './dashboard.types.js';

export const REQUIRED_COLUMNS = [
  'order date',
  'ship mode',
  'segment',
  'state',
  'region',
  'category',
  'sub-category',
  'sales',
  'quantity',
  'profit'
] as const;

type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];
type ColumnIndex = Record<RequiredColumn, number>;

export interface LoadResult {
  records: SalesRecord[];
  skippedRows: number;
}

const normalizeHeader = (value: string) => value.trim().toLowerCase();

const buildColumnIndex = (header: readonly string[]): ColumnIndex => {
  if (!header.some((name) => name.trim().length > 0)) {
    throw new DatasetError('empty-header', 'The data source has an empty header row.');
  }

  const positions = new Map<string, number>();
  header.forEach((name, index) => {
    const key = normalizeHeader(name);
    // First occurrence wins for duplicated headers.
    if (key && !positions.has(key)) {
      positions.set(key, index);
    }
  });

  const locate = (column: RequiredColumn): number => {
    const position = positions.get(column);
    if (position === undefined) {
      throw new DatasetError('missing-column', `Missing required column: "${column}".`, column);
    }
    return position;
  };

  return {
    'order date': locate('order date'),
    'ship mode': locate('ship mode'),
    segment: locate('segment'),
    state: locate('state'),
    region: locate('region'),
    category: locate('category'),
    'sub-category': locate('sub-category'),
    sales: locate('sales'),
    quantity: locate('quantity'),
    profit: locate('profit')
  };
};

export const parseAmount = (value: string | undefined): number => {
  if (!value) {
    return 0;
  }
  const cleaned = value.replace(/[$,\s]/g, '');
  if (!cleaned) {
    return 0;
  }
  const parsed = Number(cleaned);
  return Number.isFinite(parsed) ? parsed : 0;
};

/**
 * Turns raw CSV rows into sales records. Rows with an unreadable order date are
 * skipped and counted; structural problems with the header throw a DatasetError.
 */
export const loadRecords = (
  header: readonly string[],
  rows: ReadonlyArray<readonly string[]>,
  dateFormats: readonly string[]
): LoadResult => {
  const columns = buildColumnIndex(header);
  const records: SalesRecord[] = [];
  let skippedRows = 0;

  for (const row of rows) {
    const cell = (column: RequiredColumn) => (row[columns[column]] ?? '').trim();

    const orderDate = parseOrderDate(cell('order date'), dateFormats);
    if (!orderDate) {
      skippedRows += 1;
      continue;
    }

    records.push(
      Object.freeze({
        orderDate: toIsoDay(orderDate),
        year: orderDate.year,
        monthKey: toMonthKey(orderDate),
        shipMode: cell('ship mode'),
        segment: cell('segment'),
        state: cell('state'),
        region: cell('region'),
        category: cell('category'),
        subCategory: cell('sub-category'),
        sales: parseAmount(cell('sales')),
        profit: parseAmount(cell('profit')),
        quantity: parseAmount(cell('quantity'))
      })
    );
  }

  if (!records.length) {
    throw new DatasetError('no-data', 'No rows with a readable order date were found in the data source.');
  }

  return { records, skippedRows };
};
