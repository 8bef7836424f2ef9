import { fileURLToPath } from 'node:url';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DashboardRepository } from './dashboard.repository.js';
import { DashboardService } from './dashboard.service.js';
import { DatasetError } from './dashboard.types.js';
import { DEFAULT_DATE_FORMATS } from '../../shared/config/appConfig.js';

const fixture = (name: string) => fileURLToPath(new URL(`./__fixtures__/${name}`, import.meta.url));
const fixturePath = fixture('orders.csv');

const createService = (topStates = 15) =>
  new DashboardService(new DashboardRepository({ dataPath: fixturePath, dateFormats: DEFAULT_DATE_FORMATS }), {
    topStates
  });

describe('DashboardRepository', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('loads records and counts skipped rows', async () => {
    const repository = new DashboardRepository({ dataPath: fixturePath, dateFormats: DEFAULT_DATE_FORMATS });
    const dataset = await repository.load();

    expect(dataset.records).toHaveLength(4);
    expect(dataset.skippedRows).toBe(1);
    expect(dataset.sourcePath).toBe(fixturePath);
    expect(dataset.records[3].sales).toBe(1000);
  });

  it('reuses the loaded dataset', async () => {
    const repository = new DashboardRepository({ dataPath: fixturePath, dateFormats: DEFAULT_DATE_FORMATS });
    const first = await repository.load();
    expect(await repository.load()).toBe(first);
  });

  it('reports a missing data source', async () => {
    const missingPath = fixture('absent.csv');
    const repository = new DashboardRepository({ dataPath: missingPath, dateFormats: DEFAULT_DATE_FORMATS });

    await expect(repository.load()).rejects.toBeInstanceOf(DatasetError);
    await expect(repository.load()).rejects.toMatchObject({ code: 'source-missing' });
  });

  it('reads a header that starts with a byte order mark', async () => {
    const repository = new DashboardRepository({ dataPath: fixture('orders-bom.csv'), dateFormats: DEFAULT_DATE_FORMATS });
    const dataset = await repository.load();

    expect(dataset.skippedRows).toBe(0);
    expect(dataset.records).toHaveLength(1);
    expect(dataset.records[0].orderDate).toBe('2022-03-14');
    expect(dataset.records[0].sales).toBe(75);
  });

  it('rejects a header line made only of delimiters', async () => {
    const repository = new DashboardRepository({
      dataPath: fixture('blank-header.csv'),
      dateFormats: DEFAULT_DATE_FORMATS
    });

    await expect(repository.load()).rejects.toMatchObject({ code: 'empty-header' });
  });
});

describe('DashboardService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('aggregates every year by default', async () => {
    const dashboard = await createService().getDashboard('all');

    expect(dashboard.year).toBe('all');
    expect(dashboard.years).toEqual([2022, 2023]);
    expect(dashboard.recordCount).toBe(4);
    expect(dashboard.skippedRows).toBe(1);
    expect(dashboard.metrics.sales.total).toBe(1350);
    expect(dashboard.metrics.profit.total).toBe(5);
    expect(dashboard.metrics.sales.byCategory).toEqual([
      { key: 'Furniture', value: 1000 },
      { key: 'Tech', value: 350 }
    ]);
    expect(dashboard.metrics.sales.monthly).toEqual([
      { key: '2022-01', value: 100 },
      { key: '2022-02', value: 50 },
      { key: '2023-01', value: 1200 }
    ]);
  });

  it('groups blank states under Unknown and applies the state limit', async () => {
    const dashboard = await createService(2).getDashboard('all');

    expect(dashboard.metrics.sales.byState).toEqual([
      { key: 'Unknown', value: 1000 },
      { key: 'Texas', value: 300 }
    ]);
  });

  it('filters by year', async () => {
    const dashboard = await createService().getDashboard(2022);

    expect(dashboard.recordCount).toBe(2);
    expect(dashboard.years).toEqual([2022, 2023]);
    expect(dashboard.metrics.sales.total).toBe(150);
    expect(dashboard.metrics.sales.monthly).toEqual([
      { key: '2022-01', value: 100 },
      { key: '2022-02', value: 50 }
    ]);
  });

  it('returns empty aggregates for a year without data', async () => {
    const dashboard = await createService().getDashboard(2030);

    expect(dashboard.recordCount).toBe(0);
    expect(dashboard.metrics.quantity.total).toBe(0);
    expect(dashboard.metrics.quantity.monthly).toEqual([]);
  });

  it('lists the available years', async () => {
    expect(await createService().getYears()).toEqual([2022, 2023]);
  });

  it('exports a breakdown as CSV', async () => {
    const csv = await createService().exportBreakdown('profit', 'segment', 'all');
    expect(csv).toBe('segment,profit\nConsumer,60\nCorporate,-5\nHome Office,-50');
  });

  it('exports the limited state breakdown', async () => {
    const csv = await createService(2).exportBreakdown('sales', 'state', 'all');
    expect(csv).toBe('state,sales\nUnknown,1000\nTexas,300');
  });

  it('exports the monthly series for one year', async () => {
    const csv = await createService().exportBreakdown('sales', 'month', 2022);
    expect(csv).toBe('month,sales\n2022-01,100\n2022-02,50');
  });
});
