import styles from '../../../styles/DashboardScreen.module.css';
import { MEASURE_LABELS, MEASURE_ORDER } from '../measures';
import type { Measure, YearSelection } from '../types/dashboard';

interface DashboardFiltersProps {
  years: number[];
  year: YearSelection;
  onYearChange: (value: YearSelection) => void;
  measure: Measure;
  onMeasureChange: (value: Measure) => void;
}

export const DashboardFilters = ({ years, year, onYearChange, measure, onMeasureChange }: DashboardFiltersProps) => (
  <div className={styles.filters}>
    <label className={styles.filterLabel}>
      Year
      <select
        className={styles.select}
        value={String(year)}
        onChange={(event) => onYearChange(event.target.value === 'all' ? 'all' : Number(event.target.value))}
      >
        <option value="all">All years</option>
        {years.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
    </label>
    <div className={styles.toggleGroup}>
      {MEASURE_ORDER.map((option) => (
        <button
          key={option}
          type="button"
          className={`${styles.toggleButton} ${measure === option ? styles.toggleButtonActive : ''}`}
          onClick={() => onMeasureChange(option)}
        >
          {MEASURE_LABELS[option]}
        </button>
      ))}
    </div>
  </div>
);
