/**
 * Temporal comparison for schedule dates.
 *
 * Dates arrive as exported text. Anything that is not a well-formed ISO 8601 date or
 * date-time parses to null ("unknown"), and unknown dates never count as delayed and never
 * produce a delay value. Unknown is distinct from a zero delay.
 */

import { MS_PER_DAY } from '../constants.js';

// YYYY-MM-DD, optional [T| ]HH:MM[:SS[.f...]], optional Z, ±HH:MM or ±HHMM
const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse an exported schedule date. Text without an offset is read as UTC.
 * Returns null for absent, non-string or unparseable values.
 */
export function parseScheduleDate(value: unknown): Date | null {
  if (typeof value !== 'string') return null;

  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction, offset] = match;

  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);
  if (mo < 1 || mo > 12 || d < 1 || h > 23 || mi > 59 || s > 59) return null;

  // Millisecond precision is enough for day arithmetic; extra digits are dropped.
  const ms = fraction ? Number(fraction.padEnd(3, '0').slice(0, 3)) : 0;
  // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
  const check = new Date(0);
  check.setUTCFullYear(y, mo - 1, d);
  check.setUTCHours(h, mi, s, ms);

  // Reject rolled-over dates such as 2024-02-30
  if (check.getUTCFullYear() !== y || check.getUTCMonth() !== mo - 1 || check.getUTCDate() !== d) {
    return null;
  }
  const utc = check.getTime();

  let offsetMinutes = 0;
  if (offset && offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    const offsetHours = Number(digits.slice(0, 2));
    const offsetMins = Number(digits.slice(2, 4));
    if (offsetHours > 23 || offsetMins > 59) return null;
    offsetMinutes = sign * (offsetHours * 60 + offsetMins);
  }

  return new Date(utc - offsetMinutes * 60 * 1000);
}

/**
 * True when both dates are known and the updated date is strictly later than the baseline.
 */
export function isDelayed(baseline: Date | null, updated: Date | null): boolean {
  if (!baseline || !updated) return false;
  return updated.getTime() > baseline.getTime();
}

/**
 * Signed difference (updated - baseline) in days, fractional days preserved.
 * Positive means later, negative earlier. Null when either date is unknown.
 */
export function delayDays(baseline: Date | null, updated: Date | null): number | null {
  if (!baseline || !updated) return null;
  return (updated.getTime() - baseline.getTime()) / MS_PER_DAY;
}
