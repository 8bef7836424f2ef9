import { buildApiUrl } from '../../../shared/config/runtimeConfig';
import { apiRequest } from '../../../shared/api/httpClient';
import type { DashboardResponse, ExportDimension, Measure, YearSelection } from '../types/dashboard';

const buildYearQuery = (year: YearSelection) => `?${new URLSearchParams({ year: String(year) }).toString()}`;

const readFileName = (contentDisposition: string | null): string | undefined => {
  const match = contentDisposition?.match(/filename="?([^";]+)"?/i);
  return match?.[1];
};

export const dashboardApi = {
  async getDashboard(year: YearSelection): Promise<DashboardResponse> {
    return apiRequest<DashboardResponse>(`/dashboard${buildYearQuery(year)}`);
  },

  async downloadBreakdown(measure: Measure, dimension: ExportDimension, year: YearSelection): Promise<void> {
    const url = buildApiUrl(`/dashboard/export/${measure}/${dimension}${buildYearQuery(year)}`);
    const response = await fetch(url, { method: 'GET' });
    if (!response.ok) {
      throw new Error('Unable to download the file.');
    }
    const blob = await response.blob();
    const fileName = readFileName(response.headers.get('Content-Disposition')) ?? `${measure}-by-${dimension}.csv`;
    const objectUrl = URL.createObjectURL(blob);
    const link = document.createElement('a');
    link.href = objectUrl;
    link.download = fileName;
    link.rel = 'noopener noreferrer';
    document.body.appendChild(link);
    link.click();
    document.body.removeChild(link);
    URL.revokeObjectURL(objectUrl);
  }
};
