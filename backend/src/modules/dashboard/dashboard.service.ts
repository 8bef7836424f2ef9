import type { DashboardRepository } from './dashboard.repository.js';
import { assembleDashboard } from './dashboard.assembler.js';
import { groupBreakdown, monthlySeries, topN } from './aggregation.js';
import { availableYears, filterByYear } from './yearFilter.js';
import type {
  Breakdown,
  DashboardResponse,
  ExportDimension,
  Measure,
  YearSelection
} from './dashboard.types.js';

const csvEscape = (value: string) => {
  if (value.includes(',') || value.includes('\n') || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
};

const formatAmount = (value: number) => String(Math.round(value * 100) / 100);

export class DashboardService {
  constructor(
    private readonly repository: DashboardRepository,
    private readonly options: { topStates: number }
  ) {}

  async getYears(): Promise<number[]> {
    const { records } = await this.repository.load();
    return availableYears(records);
  }

  async getDashboard(selection: YearSelection): Promise<DashboardResponse> {
    const dataset = await this.repository.load();
    const filtered = filterByYear(dataset.records, selection);
    return {
      year: selection,
      years: availableYears(dataset.records),
      recordCount: filtered.length,
      skippedRows: dataset.skippedRows,
      metrics: assembleDashboard(filtered, { topStates: this.options.topStates })
    };
  }

  async exportBreakdown(measure: Measure, dimension: ExportDimension, selection: YearSelection): Promise<string> {
    const { records } = await this.repository.load();
    const filtered = filterByYear(records, selection);

    let breakdown: Breakdown;
    if (dimension === 'month') {
      breakdown = monthlySeries(filtered, measure);
    } else if (dimension === 'state') {
      breakdown = topN(groupBreakdown(filtered, dimension, measure), this.options.topStates);
    } else {
      breakdown = groupBreakdown(filtered, dimension, measure);
    }

    const lines = [`${dimension},${measure}`];
    for (const entry of breakdown) {
      lines.push(`${csvEscape(entry.key)},${formatAmount(entry.value)}`);
    }
    return lines.join('\n');
  }
}
