import { useCallback, useEffect, useRef, useState } from 'react';
import { ApiError } from '../../../shared/api/httpClient';
import { dashboardApi } from '../services/dashboardApi';
import type { DashboardResponse, YearSelection } from '../types/dashboard';
import { createRequestTracker } from '../utils/latestRequest';

interface HookState {
  data: DashboardResponse | null;
  loading: boolean;
  error: string | null;
  reload: () => void;
}

export const useDashboard = (year: YearSelection): HookState => {
  const [data, setData] = useState<DashboardResponse | null>(null);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const requestsRef = useRef(createRequestTracker());

  const load = useCallback(async () => {
    const requests = requestsRef.current;
    const requestId = requests.begin();
    setLoading(true);
    try {
      const response = await dashboardApi.getDashboard(year);
      if (!requests.isCurrent(requestId)) {
        return;
      }
      setData(response);
      setError(null);
    } catch (err) {
      if (!requests.isCurrent(requestId)) {
        return;
      }
      console.error('Failed to load the sales dashboard:', err);
      // Dataset errors carry a message that names the broken column or file.
      setError(
        err instanceof ApiError && err.status === 503
          ? err.message
          : 'Unable to load the dashboard. Please try again later.'
      );
      setData(null);
    } finally {
      if (requests.isCurrent(requestId)) {
        setLoading(false);
      }
    }
  }, [year]);

  useEffect(() => {
    void load();
  }, [load]);

  return { data, loading, error, reload: () => void load() };
};
