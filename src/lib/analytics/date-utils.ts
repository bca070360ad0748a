import { parse, isValid, format } from "date-fns";

/**
 * Timestamp spellings found in sales exports. None carry a time zone;
 * the calendar date is whatever date was written.
 *
 *   "2010-12-01 08:26:00"   table dump
 *   "2010-12-01T08:26:00"   ISO without offset
 *   "12/1/2010 8:26"        spreadsheet export
 */
const TIMESTAMP_FORMATS = [
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  "yyyy-MM-dd",
  "M/d/yyyy H:mm:ss",
  "M/d/yyyy H:mm",
  "M/d/yyyy",
];

const REFERENCE_DATE = new Date(2000, 0, 1);

export function parseTimestamp(raw: string): Date | null {
  const trimmed = raw.trim();
  if (!trimmed || /^[A-Za-z]/.test(trimmed)) return null;

  for (const fmt of TIMESTAMP_FORMATS) {
    const d = parse(trimmed, fmt, REFERENCE_DATE);
    if (isValid(d)) return d;
  }
  return null;
}

export function isValidTimestamp(raw: string): boolean {
  return parseTimestamp(raw) !== null;
}

/** yyyy-MM-dd key for grouping by calendar day */
export function getDayKey(date: Date): string {
  return format(date, "yyyy-MM-dd");
}
