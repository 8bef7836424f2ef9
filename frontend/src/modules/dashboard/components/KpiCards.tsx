import styles from '../../../styles/DashboardScreen.module.css';
import { MEASURE_LABELS, MEASURE_ORDER } from '../measures';
import { formatMeasureValue } from '../utils/format';
import type { DashboardMetrics, Measure } from '../types/dashboard';

interface KpiCardsProps {
  metrics: DashboardMetrics;
  recordCount: number;
  activeMeasure: Measure;
  onSelect: (measure: Measure) => void;
}

export const KpiCards = ({ metrics, recordCount, activeMeasure, onSelect }: KpiCardsProps) => (
  <div className={styles.cardsGrid}>
    {MEASURE_ORDER.map((measure) => {
      const value = metrics[measure].total;
      return (
        <button
          key={measure}
          type="button"
          className={`${styles.metricCard} ${measure === activeMeasure ? styles.metricCardActive : ''}`}
          onClick={() => onSelect(measure)}
        >
          <span className={styles.metricTitle}>Total {MEASURE_LABELS[measure].toLowerCase()}</span>
          <span className={`${styles.metricValue} ${value < 0 ? styles.negativeValue : ''}`}>
            {formatMeasureValue(value, measure)}
          </span>
        </button>
      );
    })}
    <article className={styles.metricCard}>
      <span className={styles.metricTitle}>Order lines</span>
      <span className={styles.metricValue}>{formatMeasureValue(recordCount, 'quantity')}</span>
    </article>
  </div>
);
