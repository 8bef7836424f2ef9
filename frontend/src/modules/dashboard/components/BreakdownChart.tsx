import { Download } from 'lucide-react';
import styles from '../../../styles/DashboardScreen.module.css';
import { scaleBars } from '../utils/chartScale';
import { formatMeasureValue } from '../utils/format';
import type { BreakdownEntry, Measure } from '../types/dashboard';

interface BreakdownChartProps {
  title: string;
  entries: BreakdownEntry[];
  measure: Measure;
  color: string;
  onDownload: () => void;
}

const NEGATIVE_COLOR = '#f43f5e';

export const BreakdownChart = ({ title, entries, measure, color, onDownload }: BreakdownChartProps) => {
  const bars = scaleBars(entries);

  return (
    <section className={styles.sectionCard}>
      <header className={styles.sectionHeader}>
        <h2 className={styles.sectionTitle}>{title}</h2>
        <button type="button" className={styles.iconButton} onClick={onDownload} aria-label={`Download ${title} as CSV`}>
          <Download size={16} />
        </button>
      </header>
      {bars.length ? (
        <ul className={styles.barList}>
          {bars.map((bar) => (
            <li key={bar.key} className={styles.barRow}>
              <span className={styles.barLabel} title={bar.key}>
                {bar.key}
              </span>
              <span className={styles.barTrack}>
                <span
                  className={styles.barFill}
                  style={{
                    left: `${bar.offset * 100}%`,
                    width: `${bar.width * 100}%`,
                    background: bar.negative ? NEGATIVE_COLOR : color
                  }}
                />
              </span>
              <span className={`${styles.barValue} ${bar.negative ? styles.negativeValue : ''}`}>
                {formatMeasureValue(bar.value, measure)}
              </span>
            </li>
          ))}
        </ul>
      ) : (
        <div className={styles.emptyState}>No data.</div>
      )}
    </section>
  );
};
