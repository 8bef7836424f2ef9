import type { BreakdownEntry } from '../types/dashboard';

export interface BarGeometry {
  key: string;
  value: number;
  // Both expressed as a share of the track width.
  offset: number;
  width: number;
  negative: boolean;
}

/** Value range of a series, always including zero so bars and lines share a baseline. */
export const valueDomain = (values: number[]): { min: number; max: number } => {
  let min = 0;
  let max = 0;
  for (const value of values) {
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  return { min, max };
};

export const scaleBars = (entries: BreakdownEntry[]): BarGeometry[] => {
  const { min, max } = valueDomain(entries.map((entry) => entry.value));
  const range = max - min;

  return entries.map(({ key, value }) => {
    if (range === 0) {
      return { key, value, offset: 0, width: 0, negative: false };
    }
    return {
      key,
      value,
      offset: (Math.min(value, 0) - min) / range,
      width: Math.abs(value) / range,
      negative: value < 0
    };
  });
};

/** Maps a value onto a vertical pixel position inside [top, bottom]. */
export const projectY = (value: number, domain: { min: number; max: number }, top: number, bottom: number) => {
  const range = domain.max - domain.min;
  if (range === 0) {
    return bottom;
  }
  return bottom - ((value - domain.min) / range) * (bottom - top);
};
