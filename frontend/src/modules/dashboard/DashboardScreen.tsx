import { useCallback, useState } from 'react';
import { RefreshCw } from 'lucide-react';
import styles from '../../styles/DashboardScreen.module.css';
import { BreakdownChart } from './components/BreakdownChart';
import { DashboardFilters } from './components/DashboardFilters';
import { KpiCards } from './components/KpiCards';
import { MonthlyTrendChart } from './components/MonthlyTrendChart';
import { useDashboard } from './hooks/useDashboard';
import { dashboardApi } from './services/dashboardApi';
import { BREAKDOWNS, MEASURE_LABELS } from './measures';
import type { ExportDimension, Measure, YearSelection } from './types/dashboard';

const MEASURE_COLORS: Record<Measure, string> = {
  sales: '#2563eb',
  profit: '#059669',
  quantity: '#d97706'
};

export const DashboardScreen = () => {
  const [year, setYear] = useState<YearSelection>('all');
  const [measure, setMeasure] = useState<Measure>('sales');
  const { data, loading, error, reload } = useDashboard(year);

  const download = useCallback(
    async (dimension: ExportDimension) => {
      try {
        await dashboardApi.downloadBreakdown(measure, dimension, year);
      } catch (err) {
        console.error('Unable to download the breakdown:', err);
        window.alert('Unable to download the file. Please try again.');
      }
    },
    [measure, year]
  );

  const aggregate = data?.metrics[measure];
  const color = MEASURE_COLORS[measure];

  return (
    <div className={styles.screen}>
      <header className={styles.pageHeader}>
        <div>
          <h1 className={styles.pageTitle}>Sales overview</h1>
          {data ? (
            <p className={styles.metricDetails}>
              {year === 'all' ? 'All years' : year}
              {data.skippedRows > 0 ? ` · ${data.skippedRows} rows skipped (unreadable order date)` : ''}
            </p>
          ) : null}
        </div>
        <div className={styles.sectionActions}>
          <DashboardFilters
            years={data?.years ?? []}
            year={year}
            onYearChange={setYear}
            measure={measure}
            onMeasureChange={setMeasure}
          />
          <button type="button" className={styles.iconButton} onClick={reload} aria-label="Reload">
            <RefreshCw size={16} />
          </button>
        </div>
      </header>

      {error ? <div className={styles.errorBanner}>{error}</div> : null}
      {loading && !data ? <div className={styles.loadingLabel}>Loading dashboard…</div> : null}

      {data && aggregate ? (
        <>
          <KpiCards metrics={data.metrics} recordCount={data.recordCount} activeMeasure={measure} onSelect={setMeasure} />

          <section className={styles.sectionCard}>
            <header className={styles.sectionHeader}>
              <h2 className={styles.sectionTitle}>{MEASURE_LABELS[measure]} by month</h2>
              <button type="button" className={styles.actionButton} onClick={() => void download('month')}>
                Download CSV
              </button>
            </header>
            <MonthlyTrendChart points={aggregate.monthly} measure={measure} color={color} />
          </section>

          <div className={styles.breakdownGrid}>
            {BREAKDOWNS.map((breakdown) => (
              <BreakdownChart
                key={breakdown.dimension}
                title={breakdown.title}
                entries={aggregate[breakdown.field]}
                measure={measure}
                color={color}
                onDownload={() => void download(breakdown.dimension)}
              />
            ))}
          </div>
        </>
      ) : null}
    </div>
  );
};
