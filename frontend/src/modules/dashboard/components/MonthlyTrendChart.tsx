import { useMemo } from 'react';
import styles from '../../../styles/DashboardScreen.module.css';
import { projectY, valueDomain } from '../utils/chartScale';
import { formatAxisValue, formatMeasureValue, formatMonthLabel } from '../utils/format';
import type { BreakdownEntry, Measure } from '../types/dashboard';

interface MonthlyTrendChartProps {
  points: BreakdownEntry[];
  measure: Measure;
  color: string;
}

const WIDTH = 960;
const HEIGHT = 320;
const PADDING_X = 72;
const PADDING_Y = 40;

export const MonthlyTrendChart = ({ points, measure, color }: MonthlyTrendChartProps) => {
  const xPositions = useMemo(() => {
    if (points.length <= 1) {
      return points.map(() => WIDTH / 2);
    }
    const availableWidth = WIDTH - PADDING_X * 2;
    return points.map((_, index) => PADDING_X + (index / (points.length - 1)) * availableWidth);
  }, [points]);

  const domain = useMemo(() => valueDomain(points.map((point) => point.value)), [points]);
  const top = PADDING_Y;
  const bottom = HEIGHT - PADDING_Y;
  const y = (value: number) => projectY(value, domain, top, bottom);

  const path = points
    .map((point, index) => `${index === 0 ? 'M' : 'L'} ${xPositions[index]} ${y(point.value)}`)
    .join(' ');

  const xLabels = useMemo(() => {
    const step = points.length > 12 ? Math.ceil(points.length / 12) : 1;
    return points.map((point, index) => ({
      label: formatMonthLabel(point.key),
      index,
      visible: index % step === 0 || index === points.length - 1
    }));
  }, [points]);

  if (!points.length) {
    return <div className={styles.emptyState}>No orders in the selected period.</div>;
  }

  return (
    <div className={styles.chartWrapper}>
      <svg viewBox={`0 0 ${WIDTH} ${HEIGHT}`} width="100%" role="img" aria-label="Monthly trend">
        {/* Grid lines */}
        {[0, 0.25, 0.5, 0.75, 1].map((share) => {
          const value = domain.min + share * (domain.max - domain.min);
          return (
            <g key={`grid-${share}`}>
              <line x1={PADDING_X} x2={WIDTH - PADDING_X} y1={y(value)} y2={y(value)} stroke="rgba(148,163,184,0.25)" />
              <text x={PADDING_X - 12} y={y(value) + 4} textAnchor="end" fontSize={12} fill="#475569">
                {formatAxisValue(value, measure)}
              </text>
            </g>
          );
        })}

        {/* Zero line */}
        <line x1={PADDING_X} x2={WIDTH - PADDING_X} y1={y(0)} y2={y(0)} stroke="rgba(148,163,184,0.7)" strokeWidth={1.2} />

        {xLabels.map((item) =>
          item.visible ? (
            <text key={`x-${item.index}`} x={xPositions[item.index]} y={HEIGHT - 12} textAnchor="middle" fontSize={12} fill="#475569">
              {item.label}
            </text>
          ) : null
        )}

        <path d={path} fill="none" stroke={color} strokeWidth={2.4} strokeLinejoin="round" strokeLinecap="round" />

        {points.map((point, index) => (
          <circle key={point.key} cx={xPositions[index]} cy={y(point.value)} r={3.5} fill={color}>
            <title>{`${formatMonthLabel(point.key)}: ${formatMeasureValue(point.value, measure)}`}</title>
          </circle>
        ))}
      </svg>
    </div>
  );
};
