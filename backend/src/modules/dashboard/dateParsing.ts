import { DateTime } from 'luxon';

// Written-out dates such as "July 19, 2023" or "19 Jul 2023".
const TEXTUAL_FORMATS = ['LLLL d, yyyy', 'LLL d, yyyy', 'LLLL d yyyy', 'LLL d yyyy', 'd LLLL yyyy', 'd LLL yyyy'];

// Offsets written in the value are kept so the calendar day does not depend on the server zone.
const fallbackParsers: Array<(value: string) => DateTime> = [
  (value) => DateTime.fromISO(value, { setZone: true }),
  (value) => DateTime.fromRFC2822(value, { setZone: true }),
  (value) => DateTime.fromHTTP(value, { setZone: true }),
  (value) => DateTime.fromSQL(value, { setZone: true }),
  ...TEXTUAL_FORMATS.map((format) => (value: string) => DateTime.fromFormat(value, format, { locale: 'en-US' }))
];

/**
 * Parses an order date by trying each format in the given order, then the loose parsers.
 * Returns null when nothing matches so the caller can skip the row.
 *
 * Ambiguous values such as `3/4/2022` take whichever format matches first, so the
 * order of `formats` decides between month-first and day-first readings.
 */
export const parseOrderDate = (raw: string | null | undefined, formats: readonly string[]): DateTime | null => {
  if (typeof raw !== 'string') {
    return null;
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }

  for (const format of formats) {
    const parsed = DateTime.fromFormat(trimmed, format);
    if (parsed.isValid) {
      return parsed;
    }
  }

  for (const parse of fallbackParsers) {
    const parsed = parse(trimmed);
    if (parsed.isValid) {
      return parsed;
    }
  }

  return null;
};

export const toMonthKey = (date: DateTime) => date.toFormat('yyyy-MM');

export const toIsoDay = (date: DateTime) => date.toFormat('yyyy-MM-dd');
